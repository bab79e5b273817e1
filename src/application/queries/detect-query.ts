/**
 * Detect query — best domain for a document plus the top ranked candidates.
 */

import type { DetectionResult } from "../../domain/types.ts";
import type { DomainRegistry } from "../handlers/registry.ts";

const DEFAULT_LIMIT = 5;

export interface DetectQueryInput {
  text: string;
  /** Positive integer; anything else falls back to 5. */
  limit?: number;
}

export interface DetectCandidate {
  domain: string;
  confidence: number;
  priorityScore: number;
  matchedKeywords: string[];
}

export interface DetectQueryResult {
  detection: DetectionResult;
  candidates: DetectCandidate[];
}

export function detectQuery(input: DetectQueryInput, registry: DomainRegistry): DetectQueryResult {
  const { text } = input;
  const limit = input.limit !== undefined && Number.isInteger(input.limit) && input.limit > 0 ? input.limit : DEFAULT_LIMIT;

  const candidates = registry
    .rank(text)
    .filter((s) => s.confidence > 0)
    .slice(0, limit)
    .map(({ domain, confidence, priorityScore, matchedKeywords }) => ({
      domain,
      confidence,
      priorityScore,
      matchedKeywords,
    }));

  return { detection: registry.detect(text), candidates };
}
