/**
 * Prompt for the generation service. The response must be a JSON handler
 * spec; anything else is rejected by validation.
 */

import type { GenerationRequest, HandlerSummary } from "../../domain/types.ts";

export const GENERATION_SYSTEM_PROMPT = [
  "You design keyword-based domain handlers for a requirements analysis tool.",
  "Reply with a single JSON object and nothing else. Members:",
  '- "name": lowercase snake_case domain name',
  '- "keywords": 5 to 20 lowercase detection terms or short phrases',
  '- "extractRequirements": array of rules { "title", "priority": "high"|"medium"|"low",',
  '  "category": "functional"|"non-functional", "whenAny": [trigger terms], "description"?, "acceptanceCriteria"? }',
  '- optional "priorityScore" (integer 1-5, higher for more specific domains), "stakeholders", "description"',
  "Do not add other members.",
].join("\n");

const MAX_DOCUMENT_CHARS = 6000;

function describeDomain(summary: HandlerSummary): string {
  const keywords = summary.keywords.slice(0, 12).join(", ");
  return `- ${summary.domain} (priority ${summary.priorityScore}): ${summary.description}. Keywords: ${keywords}`;
}

export function buildGenerationPrompt(request: GenerationRequest): string {
  const parts: string[] = [];

  if (request.existingDomains.length > 0) {
    parts.push(
      "Closest existing domains (none matched well enough; specialize rather than duplicate them):",
      ...request.existingDomains.map(describeDomain),
      "",
    );
  }

  const text = request.text.length > MAX_DOCUMENT_CHARS
    ? request.text.slice(0, MAX_DOCUMENT_CHARS)
    : request.text;
  parts.push("Document:", "<<<", text, ">>>");

  return parts.join("\n");
}
