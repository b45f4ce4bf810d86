import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { password } from "@inquirer/prompts";

export type PromptIO = {
  question(text: string): Promise<string>;
  secret(text: string): Promise<string>;
  write(text: string): void;
  close(): void;
};

export type AskFn = (message: string, options?: readonly string[], defaultValue?: string, secure?: boolean) => Promise<string>;

export type Prompter = {
  ask: AskFn;
  confirm(message: string, defaultAnswer: "y" | "n"): Promise<boolean>;
};

const YES_NO = ["y", "n"] as const;

function sameAnswer(left: string, right: string): boolean {
  return left.toLowerCase() === right.toLowerCase();
}

export function renderPrompt(message: string, options?: readonly string[], defaultValue?: string): string {
  if (options && options.length > 0) {
    const choices = options.map((option) =>
      defaultValue !== undefined && sameAnswer(option, defaultValue) ? option.toUpperCase() : option.toLowerCase(),
    );
    return `${message} [${choices.join("/")}]: `;
  }

  if (defaultValue) {
    return `${message} [${defaultValue}]: `;
  }

  return `${message}: `;
}

export function createPrompter(io: PromptIO): Prompter {
  const ask: AskFn = async (message, options, defaultValue, secure = false) => {
    const text = renderPrompt(message, options, defaultValue);

    for (;;) {
      io.write("\n");
      const answer = secure ? await io.secret(text) : await io.question(text);
      io.write("\n");

      if (!answer && defaultValue !== undefined) {
        return defaultValue;
      }
      if (!options || options.length === 0) {
        return answer;
      }
      if (options.some((option) => sameAnswer(option, answer))) {
        return answer;
      }
    }
  };

  return {
    ask,
    async confirm(message, defaultAnswer) {
      const answer = await ask(message, YES_NO, defaultAnswer);
      return sameAnswer(answer, "y");
    },
  };
}

export type TerminalStreams = {
  input?: Readable & { isTTY?: boolean };
  output?: Writable;
};

/**
 * Line-oriented terminal IO. One reader is shared by every question so that piped
 * input answers consecutive prompts; it is closed while a masked prompt owns a TTY.
 */
export function createTerminalPromptIO(streams: TerminalStreams = {}): PromptIO {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stdout;
  const buffered: string[] = [];
  const waiting: Array<{ resolve(line: string): void; reject(error: Error): void }> = [];
  let reader: Interface | null = null;
  let ended = false;

  const inputEnded = () => new Error("input ended before an answer was given");

  const open = () => {
    if (reader || ended) {
      return;
    }
    if (input.readableEnded) {
      ended = true;
      return;
    }

    const current = createInterface({ input, terminal: false });
    current.on("line", (line) => {
      const next = waiting.shift();
      if (next) {
        next.resolve(line);
      } else {
        buffered.push(line);
      }
    });
    current.on("close", () => {
      if (reader !== current) {
        return;
      }
      reader = null;
      ended = true;
      for (const next of waiting.splice(0)) {
        next.reject(inputEnded());
      }
    });
    reader = current;
  };

  const release = () => {
    const current = reader;
    reader = null;
    current?.close();
  };

  const readLine = (text: string): Promise<string> => {
    output.write(text);
    const line = buffered.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    open();
    if (ended) {
      return Promise.reject(inputEnded());
    }
    return new Promise((resolve, reject) => {
      waiting.push({ resolve, reject });
    });
  };

  return {
    question(text) {
      return readLine(text);
    },
    secret(text) {
      if (buffered.length > 0 || !input.isTTY) {
        return readLine(text);
      }
      release();
      return password({ message: text.replace(/:\s*$/, ""), mask: false }, { input, output });
    },
    write(text) {
      output.write(text);
    },
    close() {
      release();
    },
  };
}
