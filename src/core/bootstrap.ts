import { resolveSession } from "./credentials";
import { locateRepository } from "./locator";
import type { Logger } from "./logger";
import type { Prompter } from "./prompt";
import { createReconciler, type DomainSummary, type ReconcileFlags } from "./reconcile";
import type { ReferenceLoader } from "./reference";
import type { RepositoryHandle, RepositoryService } from "./service";
import { resolveTarget } from "./target";

export type BootstrapOptions = ReconcileFlags & {
  token: string | null;
  org: string | null;
  repo: string | null;
  private: boolean;
};

export type BootstrapDependencies = {
  service: RepositoryService;
  prompter: Prompter;
  logger: Logger;
  loader: ReferenceLoader;
  cwd?: string;
  fallbackUsername?: string;
};

export type BootstrapOutcome =
  | {
      status: "completed";
      repository: RepositoryHandle;
      created: boolean;
      summary: DomainSummary[];
    }
  | {
      status: "declined";
      gate: "history" | "create";
    };

export async function runBootstrap(options: BootstrapOptions, dependencies: BootstrapDependencies): Promise<BootstrapOutcome> {
  const { service, prompter, logger, loader } = dependencies;

  const reference = await loader.load();
  logger.debug(
    `reference set: ${reference.labels.length} label(s), ${reference.milestones.length} milestone(s), ${reference.issues.length} issue(s)`,
  );

  const session = await resolveSession({
    token: options.token,
    service,
    prompter,
    logger,
    fallbackUsername: dependencies.fallbackUsername,
  });

  const target = await resolveTarget({
    session,
    org: options.org,
    repo: options.repo,
    service,
    prompter,
    logger,
    cwd: dependencies.cwd,
  });

  const located = await locateRepository({
    session,
    target,
    service,
    prompter,
    logger,
    createOptions: { private: options.private },
  });
  if (located.status === "declined") {
    return located;
  }

  const reconciler = createReconciler({ service, prompter, logger, reference });
  const summary = await reconciler.run(located.repository, options);

  return {
    status: "completed",
    repository: located.repository,
    created: located.status === "created",
    summary,
  };
}
