import os from "node:os";
import type { Logger } from "./logger";
import type { Prompter } from "./prompt";
import type { RepositoryService, Session } from "./service";

const TOKEN_ENV_KEY = "GITHUB_TOKEN";
const COMPAT_TOKEN_ENV_KEYS = ["GH_TOKEN"];
const USER_ENV_KEY = "REPO_BOOTSTRAP_USER";
const FALLBACK_USERNAME = "user";

export type ResolveSessionParams = {
  token: string | null;
  service: RepositoryService;
  prompter: Prompter;
  logger: Logger;
  fallbackUsername?: string;
};

export function resolveTokenFromEnv(env: NodeJS.ProcessEnv = process.env): string | null {
  const primary = env[TOKEN_ENV_KEY]?.trim();
  if (primary) {
    return primary;
  }

  for (const envKey of COMPAT_TOKEN_ENV_KEYS) {
    const compat = env[envKey]?.trim();
    if (compat) {
      return compat;
    }
  }

  return null;
}

export function defaultUsername(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[USER_ENV_KEY]?.trim();
  if (configured) {
    return configured;
  }
  try {
    return os.userInfo().username;
  } catch (error) {
    // Containers may run under a uid without a passwd entry.
    const fromEnv = env.USER?.trim();
    if (fromEnv) {
      return fromEnv;
    }
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return FALLBACK_USERNAME;
    }
    throw error;
  }
}

export async function resolveSession(params: ResolveSessionParams): Promise<Session> {
  const { service, prompter, logger } = params;
  const token = params.token?.trim();

  if (token) {
    logger.verbose("authenticating with access token");
    return service.authenticate({ kind: "token", token });
  }

  const username = await prompter.ask("GitHub username", undefined, params.fallbackUsername ?? defaultUsername());
  const secret = await prompter.ask("GitHub personal access token", undefined, undefined, true);
  logger.verbose(`authenticating as ${username}`);
  return service.authenticate({ kind: "password", username, secret });
}
