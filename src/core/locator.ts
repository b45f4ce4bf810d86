import { NotFoundError } from "./errors";
import { ghErrorText } from "./gh";
import type { Logger } from "./logger";
import type { Prompter } from "./prompt";
import type {
  CreateRepositoryOptions,
  HistoryCheck,
  RepositoryHandle,
  RepositoryService,
  RepositoryTarget,
  Session,
} from "./service";

export type LocateResult =
  | { status: "found"; repository: RepositoryHandle }
  | { status: "created"; repository: RepositoryHandle }
  | { status: "declined"; gate: "history" | "create" };

export type LocateRepositoryParams = {
  session: Session;
  target: RepositoryTarget;
  service: RepositoryService;
  prompter: Prompter;
  logger: Logger;
  createOptions: CreateRepositoryOptions;
};

async function checkHistory(params: LocateRepositoryParams, repository: RepositoryHandle): Promise<LocateResult> {
  const { service, prompter, logger } = params;

  let history: HistoryCheck;
  try {
    history = await service.listCommits(repository);
  } catch (error) {
    logger.error(`unable to read commit history of ${repository.fullName}: ${ghErrorText(error)}`);
    throw error;
  }

  if (history.kind === "empty") {
    logger.verbose(`${repository.fullName} has no commits`);
    return { status: "found", repository };
  }

  const proceed = await prompter.confirm(
    `Repository ${repository.fullName} already has commits. Labels and milestones will be replaced. Continue?`,
    "n",
  );
  if (!proceed) {
    return { status: "declined", gate: "history" };
  }
  return { status: "found", repository };
}

export async function locateRepository(params: LocateRepositoryParams): Promise<LocateResult> {
  const { session, target, service, prompter, logger } = params;

  let repository: RepositoryHandle;
  try {
    repository = await service.getRepository(session, target.fullName);
  } catch (error) {
    if (!(error instanceof NotFoundError)) {
      throw error;
    }

    logger.info(`${target.fullName} does not exist`);
    const create = await prompter.confirm(`Repository ${target.fullName} does not exist. Create it?`, "y");
    if (!create) {
      return { status: "declined", gate: "create" };
    }

    const created = await service.createRepository(session, target, params.createOptions);
    logger.info(`created repository ${created.fullName}`);
    return { status: "created", repository: created };
  }

  logger.verbose(`found repository ${repository.fullName}`);
  return checkHistory(params, repository);
}
