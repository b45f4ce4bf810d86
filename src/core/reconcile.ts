import type { Logger } from "./logger";
import type { Prompter } from "./prompt";
import type { ReferenceSet } from "./reference";
import type { RepositoryHandle, RepositoryService } from "./service";

export const RECONCILE_DOMAINS = ["labels", "milestones", "issues"] as const;
export type ReconcileDomain = (typeof RECONCILE_DOMAINS)[number];

export type ReconciliationChoice = "skip" | "apply-defaults" | "apply-with-confirmation";

export type ReconcileFlags = {
  defaults: boolean;
  skipLabels: boolean;
  skipMilestones: boolean;
  skipIssues: boolean;
};

export type DomainSummary = {
  domain: ReconcileDomain;
  choice: ReconciliationChoice;
  applied: boolean;
  deleted: number;
  created: number;
};

export type ReconcilerParams = {
  service: RepositoryService;
  prompter: Prompter;
  logger: Logger;
  reference: ReferenceSet;
};

export type Reconciler = {
  run(repo: RepositoryHandle, flags: ReconcileFlags): Promise<DomainSummary[]>;
};

type DomainCounts = {
  deleted: number;
  created: number;
};

type DomainDefinition = {
  domain: ReconcileDomain;
  question: string;
  skip: boolean;
  apply(repo: RepositoryHandle): Promise<DomainCounts>;
};

export function decideChoice(skip: boolean, defaults: boolean): ReconciliationChoice {
  if (skip) return "skip";
  if (defaults) return "apply-defaults";
  return "apply-with-confirmation";
}

export function createReconciler(params: ReconcilerParams): Reconciler {
  const { service, prompter, logger, reference } = params;

  const applyLabels = async (repo: RepositoryHandle): Promise<DomainCounts> => {
    const existing = await service.listLabels(repo);
    for (const label of existing) {
      logger.verbose(`deleting label ${label.name}`);
      await service.deleteLabel(repo, label);
    }

    for (const label of reference.labels) {
      logger.info(`creating label ${label.name}`);
      await service.createLabel(repo, label);
    }

    return { deleted: existing.length, created: reference.labels.length };
  };

  const applyMilestones = async (repo: RepositoryHandle): Promise<DomainCounts> => {
    const existing = await service.listMilestones(repo);
    for (const milestone of existing) {
      logger.verbose(`deleting milestone ${milestone.title}`);
      await service.deleteMilestone(repo, milestone);
    }

    for (const title of reference.milestones) {
      logger.info(`creating milestone ${title}`);
      await service.createMilestone(repo, title);
    }

    return { deleted: existing.length, created: reference.milestones.length };
  };

  const applyIssues = async (repo: RepositoryHandle): Promise<DomainCounts> => {
    for (const issue of reference.issues) {
      const milestone = await service.getMilestone(repo, issue.milestone);
      logger.info(`creating issue "${issue.title}" (milestone ${milestone.title})`);
      await service.createIssue(repo, {
        title: issue.title,
        body: issue.body,
        milestone,
        labels: issue.labels,
      });
    }

    return { deleted: 0, created: reference.issues.length };
  };

  return {
    async run(repo, flags) {
      const domains: DomainDefinition[] = [
        {
          domain: "labels",
          question: `Replace all labels in ${repo.fullName} with the ${reference.labels.length} default label(s)?`,
          skip: flags.skipLabels,
          apply: applyLabels,
        },
        {
          domain: "milestones",
          question: `Replace all milestones in ${repo.fullName} with the ${reference.milestones.length} default milestone(s)?`,
          skip: flags.skipMilestones,
          apply: applyMilestones,
        },
        {
          domain: "issues",
          question: `Create the ${reference.issues.length} seed issue(s) in ${repo.fullName}?`,
          skip: flags.skipIssues,
          apply: applyIssues,
        },
      ];

      const summaries: DomainSummary[] = [];
      for (const definition of domains) {
        const choice = decideChoice(definition.skip, flags.defaults);
        if (choice === "skip") {
          logger.verbose(`skipping ${definition.domain}`);
          summaries.push({ domain: definition.domain, choice, applied: false, deleted: 0, created: 0 });
          continue;
        }

        if (choice === "apply-with-confirmation" && !(await prompter.confirm(definition.question, "y"))) {
          logger.info(`${definition.domain} left unchanged`);
          summaries.push({ domain: definition.domain, choice, applied: false, deleted: 0, created: 0 });
          continue;
        }

        const counts = await definition.apply(repo);
        summaries.push({ domain: definition.domain, choice, applied: true, ...counts });
      }

      return summaries;
    },
  };
}
