import { describe, it, expect } from "vitest";
import { ValidationFailure } from "../errors.ts";
import { parseHandlerSpec, unwrapJson, validateHandlerSpec } from "../handler-spec.ts";

const VALID = {
  name: "beekeeping",
  keywords: ["hive", "honey", "beekeeping"],
  extractRequirements: [
    { title: "Hive Monitoring", priority: "high", category: "functional", whenAny: ["hive"] },
  ],
  priorityScore: 4,
};

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ValidationFailure) return e.issues;
    throw e;
  }
  throw new Error("expected a ValidationFailure");
}

describe("parseHandlerSpec", () => {
  it("accepts a well-formed spec", () => {
    const spec = parseHandlerSpec(JSON.stringify(VALID));
    expect(spec.name).toBe("beekeeping");
    expect(spec.extractRequirements[0]?.whenAny).toEqual(["hive"]);
  });

  it("unwraps a fenced json block", () => {
    const spec = parseHandlerSpec("Here you go:\n```json\n" + JSON.stringify(VALID) + "\n```\n");
    expect(spec.keywords).toEqual(["hive", "honey", "beekeeping"]);
  });

  it("reports malformed JSON as a syntax issue", () => {
    const issues = issuesOf(() => parseHandlerSpec("{ name: beekeeping"));
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith("syntax: ")).toBe(true);
  });

  it("requires extractRequirements", () => {
    const { extractRequirements: _, ...partial } = VALID;
    expect(issuesOf(() => parseHandlerSpec(JSON.stringify(partial)))).toEqual(["extractRequirements: Required"]);
  });

  it("rejects unknown members", () => {
    const issues = issuesOf(() => validateHandlerSpec({ ...VALID, run: "process.exit()" }));
    expect(issues).toEqual(["(root): Unrecognized key(s) in object: 'run'"]);
  });

  it("rejects names outside the lowercase pattern", () => {
    const issues = issuesOf(() => validateHandlerSpec({ ...VALID, name: "Bee Keeping" }));
    expect(issues).toEqual(["name: must be lowercase letters, digits and underscores"]);
  });

  it("reserves the no-match domain name", () => {
    const issues = issuesOf(() => validateHandlerSpec({ ...VALID, name: "general" }));
    expect(issues).toEqual(["name: 'general' is reserved for documents no handler matches"]);
  });

  it("rejects a priority score out of range", () => {
    const issues = issuesOf(() => validateHandlerSpec({ ...VALID, priorityScore: 9 }));
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith("priorityScore: ")).toBe(true);
  });
});

describe("unwrapJson", () => {
  it("returns unfenced text trimmed", () => {
    expect(unwrapJson('  {"a":1}\n')).toBe('{"a":1}');
  });
});
