import path from "node:path";
import type { Logger } from "./logger";
import type { Prompter } from "./prompt";
import type { RepositoryService, RepositoryTarget, Session } from "./service";

export type ResolveTargetParams = {
  session: Session;
  org: string | null;
  repo: string | null;
  service: RepositoryService;
  prompter: Prompter;
  logger: Logger;
  cwd?: string;
};

export async function resolveTarget(params: ResolveTargetParams): Promise<RepositoryTarget> {
  const { session, service, prompter, logger } = params;
  const org = params.org?.trim();
  const owner = org || (await service.identity(session));

  let name = params.repo?.trim();
  if (!name) {
    name = (await prompter.ask("Repository name", undefined, path.basename(params.cwd ?? process.cwd()))).trim();
  }

  const target: RepositoryTarget = {
    owner,
    name,
    fullName: `${owner}/${name}`,
    organization: Boolean(org),
  };
  logger.info(`target repository: ${target.fullName}`);
  return target;
}
