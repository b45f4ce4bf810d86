import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { execa } from "execa";
import { runBootstrap, type BootstrapOutcome } from "./core/bootstrap";
import { resolveTokenFromEnv } from "./core/credentials";
import type { ExecaFn } from "./core/gh";
import { clampVerbosity, createLogger, MAX_VERBOSITY } from "./core/logger";
import { createPrompter, createTerminalPromptIO, type PromptIO } from "./core/prompt";
import { createYamlReferenceLoader } from "./core/reference";
import { createGitHubService } from "./core/service";

export const CLI_VERSION = "1.0.0";
export const DEFAULT_REFERENCE_PATH = fileURLToPath(new URL("../config/defaults.yaml", import.meta.url));

type CliOptionValues = {
  token?: string;
  org?: string;
  repo?: string;
  defaults: boolean;
  skipLabels: boolean;
  skipMilestones: boolean;
  skipIssues: boolean;
  verbose: number;
  config: string;
  private: boolean;
};

export type CliDependencies = {
  execaFn?: ExecaFn;
  promptIO?: PromptIO;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function printOutcome(outcome: BootstrapOutcome): void {
  if (outcome.status === "declined") {
    console.log(`repo-bootstrap: stopped at ${outcome.gate} confirmation, no changes made.`);
    return;
  }

  const verb = outcome.created ? "created" : "updated";
  console.log(`repo-bootstrap: ${verb} ${outcome.repository.fullName}${outcome.repository.url ? ` (${outcome.repository.url})` : ""}`);
  for (const entry of outcome.summary) {
    if (!entry.applied) {
      const reason = entry.choice === "skip" ? "skipped" : "declined";
      console.log(`- ${entry.domain}: ${reason}`);
      continue;
    }
    const deleted = entry.domain === "issues" ? "" : `deleted ${entry.deleted}, `;
    console.log(`- ${entry.domain}: ${deleted}created ${entry.created}`);
  }
  console.log("\nrepo-bootstrap: DONE");
}

export function createProgram(dependencies: CliDependencies = {}): Command {
  const execaFn = dependencies.execaFn ?? execa;
  const env = dependencies.env ?? process.env;
  const program = new Command();

  program
    .name("repo-bootstrap")
    .description("Configure labels, milestones and seed issues of a GitHub repository")
    .version(CLI_VERSION, "--version")
    .option("-t, --token <token>", "GitHub access token (falls back to GITHUB_TOKEN / GH_TOKEN)")
    .option("-o, --org <org>", "Organization that owns the repository (defaults to the authenticated user)")
    .option("-r, --repo <name>", "Repository name (prompted when omitted)")
    .option("-d, --defaults", "Apply every domain without confirmation prompts", false)
    .option("--skip-labels", "Leave labels untouched", false)
    .option("--skip-milestones", "Leave milestones untouched", false)
    .option("--skip-issues", "Do not create seed issues", false)
    .option("-v, --verbose", `Increase log verbosity (repeatable, up to ${MAX_VERBOSITY})`, increaseVerbosity, 0)
    .option("-c, --config <path>", "Reference labels/milestones/issues YAML", DEFAULT_REFERENCE_PATH)
    .option("--private", "Create the repository as private when it does not exist", false)
    .action(async () => {
      const opts = program.opts<CliOptionValues>();
      const logger = createLogger(clampVerbosity(opts.verbose));
      const promptIO = dependencies.promptIO ?? createTerminalPromptIO();

      try {
        const outcome = await runBootstrap(
          {
            token: opts.token ?? resolveTokenFromEnv(env),
            org: opts.org ?? null,
            repo: opts.repo ?? null,
            defaults: opts.defaults,
            skipLabels: opts.skipLabels,
            skipMilestones: opts.skipMilestones,
            skipIssues: opts.skipIssues,
            private: opts.private,
          },
          {
            service: createGitHubService({ execaFn, logger }),
            prompter: createPrompter(promptIO),
            logger,
            loader: createYamlReferenceLoader(opts.config),
            cwd: dependencies.cwd,
          },
        );

        printOutcome(outcome);
        process.exitCode = 0;
      } catch (error) {
        console.error("repo-bootstrap: ERROR");
        console.error(error);
        process.exitCode = 1;
      } finally {
        promptIO.close();
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, dependencies: CliDependencies = {}): Promise<void> {
  const program = createProgram(dependencies);
  await program.parseAsync(argv);
}
