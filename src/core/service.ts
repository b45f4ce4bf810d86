import { execa } from "execa";
import { z } from "zod";
import { NotFoundError } from "./errors";
import { createGhRunner, isEmptyRepositoryGhError, isNotFoundGhError, type ExecaFn, type GhRunner } from "./gh";
import { silentLogger, type Logger } from "./logger";

export type Credentials =
  | {
      kind: "token";
      token: string;
    }
  | {
      kind: "password";
      username: string;
      secret: string;
    };

export type Session = {
  readonly token: string;
  readonly login: string | null;
};

export type RepositoryTarget = {
  owner: string;
  name: string;
  fullName: string;
  organization: boolean;
};

export type RepositoryHandle = {
  session: Session;
  fullName: string;
  private: boolean;
  url: string | null;
};

export type CreateRepositoryOptions = {
  private: boolean;
};

export type HistoryCheck = { kind: "history"; commits: number } | { kind: "empty" };

export type RemoteLabel = {
  name: string;
  color: string;
  description: string;
};

export type RemoteMilestone = {
  number: number;
  title: string;
};

export type NewIssue = {
  title: string;
  body: string;
  milestone: RemoteMilestone;
  labels: readonly string[];
};

export type RemoteIssue = {
  number: number;
  title: string;
};

export type RepositoryService = {
  authenticate(credentials: Credentials): Promise<Session>;
  identity(session: Session): Promise<string>;
  getRepository(session: Session, fullName: string): Promise<RepositoryHandle>;
  createRepository(session: Session, target: RepositoryTarget, options: CreateRepositoryOptions): Promise<RepositoryHandle>;
  listCommits(repo: RepositoryHandle): Promise<HistoryCheck>;
  listLabels(repo: RepositoryHandle): Promise<RemoteLabel[]>;
  deleteLabel(repo: RepositoryHandle, label: RemoteLabel): Promise<void>;
  createLabel(repo: RepositoryHandle, label: RemoteLabel): Promise<RemoteLabel>;
  listMilestones(repo: RepositoryHandle): Promise<RemoteMilestone[]>;
  deleteMilestone(repo: RepositoryHandle, milestone: RemoteMilestone): Promise<void>;
  createMilestone(repo: RepositoryHandle, title: string): Promise<RemoteMilestone>;
  getMilestone(repo: RepositoryHandle, ordinal: number): Promise<RemoteMilestone>;
  createIssue(repo: RepositoryHandle, issue: NewIssue): Promise<RemoteIssue>;
};

const UserSchema = z.object({ login: z.string().min(1) });

const RepositorySchema = z
  .object({
    full_name: z.string().min(1),
    private: z.boolean().optional(),
    html_url: z.string().nullable().optional(),
  })
  .passthrough();

const LabelSchema = z
  .object({
    name: z.string(),
    color: z.string(),
    description: z.string().nullable().optional(),
  })
  .passthrough();

const MilestoneSchema = z
  .object({
    number: z.number().int().positive(),
    title: z.string(),
  })
  .passthrough();

const IssueSchema = z
  .object({
    number: z.number().int().positive(),
    title: z.string(),
  })
  .passthrough();

function toHandle(session: Session, raw: unknown): RepositoryHandle {
  const repo = RepositorySchema.parse(raw);
  return {
    session,
    fullName: repo.full_name,
    private: repo.private ?? false,
    url: repo.html_url ?? null,
  };
}

function toLabel(raw: unknown): RemoteLabel {
  const label = LabelSchema.parse(raw);
  return { name: label.name, color: label.color, description: label.description ?? "" };
}

function toMilestone(raw: unknown): RemoteMilestone {
  const milestone = MilestoneSchema.parse(raw);
  return { number: milestone.number, title: milestone.title };
}

export type GitHubServiceDependencies = {
  execaFn?: ExecaFn;
  logger?: Logger;
};

export function createGitHubService(dependencies: GitHubServiceDependencies = {}): RepositoryService {
  const execaFn = dependencies.execaFn ?? execa;
  const logger = dependencies.logger ?? silentLogger;

  const gh = (session: Session): GhRunner => createGhRunner({ execaFn, token: session.token, logger });

  return {
    async authenticate(credentials) {
      if (credentials.kind === "token") {
        return { token: credentials.token, login: null };
      }
      return { token: credentials.secret, login: credentials.username };
    },

    async identity(session) {
      if (session.login) {
        return session.login;
      }
      const user = UserSchema.parse(await gh(session).json(["api", "user"], "gh user"));
      return user.login;
    },

    async getRepository(session, fullName) {
      try {
        return toHandle(session, await gh(session).json(["api", `repos/${fullName}`], "gh repository"));
      } catch (error) {
        if (isNotFoundGhError(error)) {
          throw new NotFoundError(fullName, { cause: error });
        }
        throw error;
      }
    },

    async createRepository(session, target, options) {
      const endpoint = target.organization ? `orgs/${target.owner}/repos` : "user/repos";
      const args = ["api", "--method", "POST", endpoint, "-f", `name=${target.name}`, "-F", `private=${options.private}`];
      return toHandle(session, await gh(session).json(args, "gh create repository"));
    },

    async listCommits(repo) {
      try {
        const response = await gh(repo.session).run(["api", `repos/${repo.fullName}/commits?per_page=1`]);
        const parsed = z.array(z.unknown()).parse(JSON.parse(response.stdout));
        return parsed.length > 0 ? { kind: "history", commits: parsed.length } : { kind: "empty" };
      } catch (error) {
        if (isEmptyRepositoryGhError(error)) {
          return { kind: "empty" };
        }
        throw error;
      }
    },

    async listLabels(repo) {
      const rows = await gh(repo.session).paginate(`repos/${repo.fullName}/labels`, "gh labels");
      return rows.map(toLabel);
    },

    async deleteLabel(repo, label) {
      await gh(repo.session).run([
        "api",
        "--method",
        "DELETE",
        `repos/${repo.fullName}/labels/${encodeURIComponent(label.name)}`,
      ]);
    },

    async createLabel(repo, label) {
      const args = [
        "api",
        "--method",
        "POST",
        `repos/${repo.fullName}/labels`,
        "-f",
        `name=${label.name}`,
        "-f",
        `color=${label.color}`,
        "-f",
        `description=${label.description}`,
      ];
      return toLabel(await gh(repo.session).json(args, "gh create label"));
    },

    async listMilestones(repo) {
      const rows = await gh(repo.session).paginate(`repos/${repo.fullName}/milestones?state=all`, "gh milestones");
      return rows.map(toMilestone);
    },

    async deleteMilestone(repo, milestone) {
      await gh(repo.session).run(["api", "--method", "DELETE", `repos/${repo.fullName}/milestones/${milestone.number}`]);
    },

    async createMilestone(repo, title) {
      const args = ["api", "--method", "POST", `repos/${repo.fullName}/milestones`, "-f", `title=${title}`];
      return toMilestone(await gh(repo.session).json(args, "gh create milestone"));
    },

    async getMilestone(repo, ordinal) {
      return toMilestone(await gh(repo.session).json(["api", `repos/${repo.fullName}/milestones/${ordinal}`], "gh milestone"));
    },

    async createIssue(repo, issue) {
      const args = [
        "api",
        "--method",
        "POST",
        `repos/${repo.fullName}/issues`,
        "-f",
        `title=${issue.title}`,
        "-f",
        `body=${issue.body}`,
        "-F",
        `milestone=${issue.milestone.number}`,
      ];
      for (const label of issue.labels) {
        args.push("-f", `labels[]=${label}`);
      }
      const created = IssueSchema.parse(await gh(repo.session).json(args, "gh create issue"));
      return { number: created.number, title: created.title };
    },
  };
}
