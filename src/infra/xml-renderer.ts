/**
 * XML rendering of the approval decision.
 */

import type { PipelineResult } from "../domain/types.ts";

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

export function renderApprovalXml(result: Pick<PipelineResult, "approval">): string {
  const { status, reasoning } = result.approval;
  return `<approval status="${escapeXml(status)}">${escapeXml(reasoning)}</approval>`;
}
