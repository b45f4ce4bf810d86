import { vi } from "vitest";

import { NotFoundError } from "../src/core/errors";
import type { PromptIO } from "../src/core/prompt";
import type {
  RemoteIssue,
  RemoteLabel,
  RemoteMilestone,
  RepositoryHandle,
  RepositoryService,
  Session,
} from "../src/core/service";

export type FakeRepository = {
  labels: RemoteLabel[];
  milestones: RemoteMilestone[];
  nextMilestoneNumber: number;
  issues: Array<RemoteIssue & { milestone: number; labels: string[] }>;
  commits: number;
};

export type FakeService = RepositoryService & {
  calls: string[];
  repositories: Map<string, FakeRepository>;
};

export function fakeRepository(overrides: Partial<FakeRepository> = {}): FakeRepository {
  return {
    labels: [],
    milestones: [],
    nextMilestoneNumber: 1,
    issues: [],
    commits: 0,
    ...overrides,
  };
}

export function createFakeService(options: { login?: string; repositories?: Record<string, FakeRepository> } = {}): FakeService {
  const repositories = new Map<string, FakeRepository>(Object.entries(options.repositories ?? {}));
  const calls: string[] = [];

  const stateOf = (repo: RepositoryHandle): FakeRepository => {
    const state = repositories.get(repo.fullName);
    if (!state) {
      throw new NotFoundError(repo.fullName);
    }
    return state;
  };

  const handle = (session: Session, fullName: string): RepositoryHandle => ({
    session,
    fullName,
    private: false,
    url: `https://github.com/${fullName}`,
  });

  return {
    calls,
    repositories,

    async authenticate(credentials) {
      calls.push(`authenticate:${credentials.kind}`);
      return credentials.kind === "token"
        ? { token: credentials.token, login: null }
        : { token: credentials.secret, login: credentials.username };
    },

    async identity(session) {
      calls.push("identity");
      return session.login ?? options.login ?? "octo";
    },

    async getRepository(session, fullName) {
      calls.push(`getRepository:${fullName}`);
      if (!repositories.has(fullName)) {
        throw new NotFoundError(fullName);
      }
      return handle(session, fullName);
    },

    async createRepository(session, target) {
      calls.push(`createRepository:${target.fullName}`);
      repositories.set(target.fullName, fakeRepository());
      return handle(session, target.fullName);
    },

    async listCommits(repo) {
      calls.push("listCommits");
      const commits = stateOf(repo).commits;
      return commits > 0 ? { kind: "history", commits } : { kind: "empty" };
    },

    async listLabels(repo) {
      calls.push("listLabels");
      return stateOf(repo).labels.slice();
    },

    async deleteLabel(repo, label) {
      calls.push(`deleteLabel:${label.name}`);
      const state = stateOf(repo);
      state.labels = state.labels.filter((entry) => entry.name !== label.name);
    },

    async createLabel(repo, label) {
      calls.push(`createLabel:${label.name}`);
      const created = { name: label.name, color: label.color, description: label.description };
      stateOf(repo).labels.push(created);
      return created;
    },

    async listMilestones(repo) {
      calls.push("listMilestones");
      return stateOf(repo).milestones.slice();
    },

    async deleteMilestone(repo, milestone) {
      calls.push(`deleteMilestone:${milestone.number}`);
      const state = stateOf(repo);
      state.milestones = state.milestones.filter((entry) => entry.number !== milestone.number);
    },

    async createMilestone(repo, title) {
      calls.push(`createMilestone:${title}`);
      const state = stateOf(repo);
      const created = { number: state.nextMilestoneNumber, title };
      state.nextMilestoneNumber += 1;
      state.milestones.push(created);
      return created;
    },

    async getMilestone(repo, ordinal) {
      calls.push(`getMilestone:${ordinal}`);
      const milestone = stateOf(repo).milestones.find((entry) => entry.number === ordinal);
      if (!milestone) {
        throw new NotFoundError(`${repo.fullName} milestone ${ordinal}`);
      }
      return milestone;
    },

    async createIssue(repo, issue) {
      calls.push(`createIssue:${issue.title}`);
      const state = stateOf(repo);
      const created = {
        number: state.issues.length + 1,
        title: issue.title,
        milestone: issue.milestone.number,
        labels: [...issue.labels],
      };
      state.issues.push(created);
      return { number: created.number, title: created.title };
    },
  };
}

export function scriptedPromptIO(answers: string[]) {
  const queue = answers.slice();
  const next = (text: string) => {
    const answer = queue.shift();
    if (answer === undefined) {
      throw new Error(`unexpected prompt: ${text}`);
    }
    return Promise.resolve(answer);
  };

  const io = {
    question: vi.fn(next),
    secret: vi.fn(next),
    write: vi.fn((_text: string) => undefined),
    close: vi.fn(() => undefined),
  } satisfies PromptIO;

  return { io, remaining: () => queue.length };
}
