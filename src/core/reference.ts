import { readFile } from "node:fs/promises";
import { isMap, isScalar, parseDocument } from "yaml";
import { z } from "zod";
import { ReferenceConfigError } from "./errors";

export type ReferenceLabel = {
  name: string;
  color: string;
  description: string;
};

export type ReferenceIssue = {
  title: string;
  body: string;
  /** 1-based position in the milestone list; used as the remote milestone number. */
  milestone: number;
  labels: string[];
};

export type ReferenceSet = {
  labels: ReferenceLabel[];
  milestones: string[];
  issues: ReferenceIssue[];
};

export type ReferenceLoader = {
  load(): Promise<ReferenceSet>;
};

const HEX_COLOR = /^[0-9a-fA-F]{6}$/;

const ReferenceSchema = z
  .object({
    labels: z
      .record(
        z.string().min(1),
        z.object({
          color: z
            .string({ invalid_type_error: "expected six hex digits as a quoted string" })
            .regex(HEX_COLOR, "expected six hex digits"),
          description: z.string().default(""),
        }),
      )
      .default({}),
    milestones: z.array(z.string().min(1)).default([]),
    issues: z
      .array(
        z.object({
          title: z.string().min(1),
          body: z.string().default(""),
          milestone: z.number().int().positive(),
          labels: z.array(z.string().min(1)).default([]),
        }),
      )
      .default([]),
  })
  .superRefine((value, ctx) => {
    value.issues.forEach((issue, index) => {
      if (issue.milestone > value.milestones.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["issues", index, "milestone"],
          message: `milestone ${issue.milestone} is out of range (${value.milestones.length} milestone(s) defined)`,
        });
      }
    });
  });

// Plain objects list integer-like keys first, so label order comes from the document.
function labelNamesInDocumentOrder(labels: unknown): string[] {
  if (!isMap(labels)) {
    return [];
  }
  return labels.items.flatMap((pair) => (isScalar(pair.key) ? [String(pair.key.value)] : []));
}

export function parseReferenceSet(text: string, source: string): ReferenceSet {
  const document = parseDocument(text);
  const [syntaxError] = document.errors;
  if (syntaxError) {
    throw syntaxError;
  }

  const raw: unknown = document.toJS() ?? {};
  const parsed = ReferenceSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ReferenceConfigError(source, issues);
  }

  return {
    labels: labelNamesInDocumentOrder(document.get("labels")).flatMap((name) => {
      const label = parsed.data.labels[name];
      return label ? [{ name, color: label.color.toLowerCase(), description: label.description }] : [];
    }),
    milestones: parsed.data.milestones,
    issues: parsed.data.issues,
  };
}

export function createYamlReferenceLoader(filePath: string): ReferenceLoader {
  return {
    async load() {
      const text = await readFile(filePath, "utf8");
      return parseReferenceSet(text, filePath);
    },
  };
}
