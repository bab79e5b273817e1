import { describe, it, expect } from "vitest";
import { extractSnippet, parseDocument } from "../document-parser.ts";

describe("parseDocument", () => {
  it("separates frontmatter from the body", () => {
    const doc = parseDocument("---\ntitle: Clinic Portal\n---\n# Overview\nPatients book visits.\n");
    expect(doc.frontmatter).toEqual({ title: "Clinic Portal" });
    expect(doc.text).toBe("# Overview\nPatients book visits.");
  });

  it("keeps plain text as is", () => {
    expect(parseDocument("  just text  ")).toEqual({ frontmatter: {}, text: "just text" });
  });
});

describe("extractSnippet", () => {
  it("strips markdown markup", () => {
    expect(extractSnippet("# Title\n**Bold** and [link](https://example.com) text")).toBe("Title Bold and link text");
  });

  it("truncates at a word boundary", () => {
    const text = "word ".repeat(60);
    const snippet = extractSnippet(text, 50);
    expect(snippet.endsWith("...")).toBe(true);
    expect(snippet.length).toBeLessThanOrEqual(53);
  });
});
