/**
 * Document parsing — frontmatter stripping and plain-text snippets.
 */

import { readFile } from "node:fs/promises";
import matter from "gray-matter";

export interface ParsedDocument {
  frontmatter: Record<string, unknown>;
  /** Body without frontmatter; what detection and extraction see. */
  text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function extractFrontmatter(content: string): [Record<string, unknown>, string] {
  try {
    const { data, content: body } = matter(content);
    return [isRecord(data) ? data : {}, body];
  } catch {
    // Malformed YAML: treat the whole file as body.
    return [{}, content];
  }
}

export function parseDocument(content: string): ParsedDocument {
  const [frontmatter, body] = extractFrontmatter(content);
  return { frontmatter, text: body.trim() };
}

export async function loadDocument(path: string): Promise<ParsedDocument> {
  return parseDocument(await readFile(path, "utf-8"));
}

export function extractSnippet(content: string, maxLength = 200): string {
  let text = content.trim();
  text = text.replace(/^#+\s+/gm, "");
  text = text.replace(/\*\*([^*]+)\*\*/g, "$1");
  text = text.replace(/\*([^*]+)\*/g, "$1");
  text = text.replace(/\[([^\]]+)\]\([^)]+\)/g, "$1");
  text = text.replace(/\s+/g, " ").trim();

  if (text.length <= maxLength) return text;

  const truncated = text.slice(0, maxLength);
  const lastPeriod = truncated.lastIndexOf(". ");
  if (lastPeriod > maxLength / 2) return truncated.slice(0, lastPeriod + 1);

  const lastSpace = truncated.lastIndexOf(" ");
  if (lastSpace > maxLength / 2) return truncated.slice(0, lastSpace) + "...";

  return truncated + "...";
}
