import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_REFERENCE_PATH } from "../src/cli-program";
import { ReferenceConfigError } from "../src/core/errors";
import { createYamlReferenceLoader, parseReferenceSet } from "../src/core/reference";

describe("reference tables", () => {
  it("keeps label insertion order and lower-cases colors", () => {
    const reference = parseReferenceSet(
      [
        "labels:",
        "  zeta:",
        "    color: ABCDEF",
        "    description: last letter",
        "  alpha:",
        "    color: '123456'",
        "milestones: [One]",
        "issues:",
        "  - title: First",
        "    milestone: 1",
        "    labels: [zeta]",
      ].join("\n"),
      "inline.yaml",
    );

    expect(reference).toEqual({
      labels: [
        { name: "zeta", color: "abcdef", description: "last letter" },
        { name: "alpha", color: "123456", description: "" },
      ],
      milestones: ["One"],
      issues: [{ title: "First", body: "", milestone: 1, labels: ["zeta"] }],
    });
  });

  it("keeps document order for integer-like label names", () => {
    const text = [
      "labels:",
      "  bug:",
      '    color: "d73a4a"',
      '  "2024":',
      '    color: "0e8a16"',
      "  1:",
      '    color: "fbca04"',
    ].join("\n");

    expect(parseReferenceSet(text, "inline.yaml").labels.map((label) => label.name)).toEqual(["bug", "2024", "1"]);
  });

  it("treats an empty document as an empty reference set", () => {
    expect(parseReferenceSet("", "empty.yaml")).toEqual({ labels: [], milestones: [], issues: [] });
  });

  it("rejects milestone ordinals outside the milestone list", () => {
    const text = ["milestones: [One, Two]", "issues:", "  - title: Late", "    milestone: 3"].join("\n");

    expect(() => parseReferenceSet(text, "bad.yaml")).toThrow(ReferenceConfigError);
    expect(() => parseReferenceSet(text, "bad.yaml")).toThrow(
      "invalid reference configuration in bad.yaml:\n- issues.0.milestone: milestone 3 is out of range (2 milestone(s) defined)",
    );
  });

  it("rejects colors that are not six hex digits", () => {
    const text = ["labels:", "  bug:", "    color: red"].join("\n");

    expect(() => parseReferenceSet(text, "bad.yaml")).toThrow("labels.bug.color: expected six hex digits");
  });

  it("asks for quotes when YAML reads a color as a number", () => {
    const text = ["labels:", "  bug:", "    color: 008672"].join("\n");

    expect(() => parseReferenceSet(text, "bad.yaml")).toThrow(
      "invalid reference configuration in bad.yaml:\n- labels.bug.color: expected six hex digits as a quoted string",
    );
  });

  it("loads and validates the bundled defaults", async () => {
    const reference = await createYamlReferenceLoader(DEFAULT_REFERENCE_PATH).load();

    expect(reference.labels.length).toBe(12);
    expect(reference.milestones).toEqual(["Project setup", "First release", "Backlog"]);
    expect(reference.issues.length).toBe(5);
    const labelNames = new Set(reference.labels.map((label) => label.name));
    for (const issue of reference.issues) {
      expect(issue.milestone).toBeLessThanOrEqual(reference.milestones.length);
      for (const label of issue.labels) {
        expect(labelNames.has(label)).toBe(true);
      }
    }
  });

  describe("from disk", () => {
    let tempDir = "";

    beforeEach(() => {
      tempDir = mkdtempSync(path.join(os.tmpdir(), "repo-bootstrap-reference-test-"));
    });

    afterEach(() => {
      if (tempDir) {
        rmSync(tempDir, { recursive: true, force: true });
      }
    });

    it("names the file in validation errors", async () => {
      const filePath = path.join(tempDir, "reference.yaml");
      writeFileSync(filePath, "milestones: [1]\n", "utf8");

      await expect(createYamlReferenceLoader(filePath).load()).rejects.toThrow(`invalid reference configuration in ${filePath}:`);
    });
  });
});
