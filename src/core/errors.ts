export class NotFoundError extends Error {
  readonly resource: string;

  constructor(resource: string, options?: { cause?: unknown }) {
    super(`${resource} does not exist`, options);
    this.name = "NotFoundError";
    this.resource = resource;
  }
}

export class ReferenceConfigError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super([`invalid reference configuration in ${source}:`, ...issues.map((issue) => `- ${issue}`)].join("\n"));
    this.name = "ReferenceConfigError";
    this.source = source;
    this.issues = issues;
  }
}
