import { execa } from "execa";
import type { Logger } from "./logger";

export type ExecaFn = typeof execa;
type ExecaOptions = Record<string, unknown>;
export type JsonRecord = Record<string, unknown>;

export const GH_API_PAGE_SIZE = 100;

export type GhCommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type GhRunner = {
  run(args: string[]): Promise<GhCommandResult>;
  json(args: string[], context: string): Promise<unknown>;
  paginate(endpoint: string, context: string): Promise<JsonRecord[]>;
};

export type GhRunnerParams = {
  execaFn: ExecaFn;
  token: string;
  logger: Logger;
};

export function ghErrorText(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const execaError = error as Error & {
    stderr?: unknown;
    stdout?: unknown;
    shortMessage?: unknown;
  };

  const parts: string[] = [];
  if (execaError.message.trim()) parts.push(execaError.message);
  if (typeof execaError.shortMessage === "string" && execaError.shortMessage.trim()) parts.push(execaError.shortMessage);
  if (typeof execaError.stderr === "string" && execaError.stderr.trim()) parts.push(execaError.stderr);
  if (typeof execaError.stdout === "string" && execaError.stdout.trim()) parts.push(execaError.stdout);
  return parts.join("\n");
}

export function isNotFoundGhError(error: unknown): boolean {
  const text = ghErrorText(error).toLowerCase();
  return /\bhttp 404\b/.test(text) || text.includes("not found");
}

export function isEmptyRepositoryGhError(error: unknown): boolean {
  const text = ghErrorText(error).toLowerCase();
  return text.includes("git repository is empty");
}

export function parseJsonArray(stdout: string, context: string): JsonRecord[] {
  const parsed = JSON.parse(stdout) as unknown;
  if (!Array.isArray(parsed)) {
    throw new Error(`${context}: expected array response`);
  }
  return parsed.filter((value): value is JsonRecord => typeof value === "object" && value !== null);
}

function formatGhCommand(args: string[]): string {
  return ["gh", ...args].join(" ");
}

export function createGhRunner(params: GhRunnerParams): GhRunner {
  const { execaFn, token, logger } = params;
  const invokeGh = execaFn as unknown as (
    file: string,
    args: string[],
    options?: ExecaOptions,
  ) => Promise<{ stdout?: unknown; stderr?: unknown; exitCode?: unknown }>;

  const run = async (args: string[]): Promise<GhCommandResult> => {
    logger.debug(`$ ${formatGhCommand(args)}`);
    const response = await invokeGh("gh", args, { stdio: "pipe", env: { GH_TOKEN: token } });
    return {
      stdout: typeof response.stdout === "string" ? response.stdout : "",
      stderr: typeof response.stderr === "string" ? response.stderr : "",
      exitCode: typeof response.exitCode === "number" ? response.exitCode : 0,
    };
  };

  const json = async (args: string[], context: string): Promise<unknown> => {
    const response = await run(args);
    if (!response.stdout.trim()) {
      throw new Error(`${context}: empty response`);
    }
    return JSON.parse(response.stdout) as unknown;
  };

  const paginate = async (endpoint: string, context: string): Promise<JsonRecord[]> => {
    const all: JsonRecord[] = [];

    for (let page = 1; ; page += 1) {
      const separator = endpoint.includes("?") ? "&" : "?";
      const response = await run(["api", `${endpoint}${separator}per_page=${GH_API_PAGE_SIZE}&page=${page}`]);
      const parsed = parseJsonArray(response.stdout, context);
      all.push(...parsed);
      if (parsed.length < GH_API_PAGE_SIZE) {
        break;
      }
    }

    return all;
  };

  return { run, json, paginate };
}
