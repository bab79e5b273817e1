/**
 * Extract query — requirements and stakeholders for a document, either for a
 * named domain or for the detected one.
 */

import { UnknownDomainError } from "../../domain/errors.ts";
import type { Requirement } from "../../domain/types.ts";
import type { DomainRegistry } from "../handlers/registry.ts";
import { collectRequirements } from "../pipeline/stages.ts";

export interface ExtractQueryInput {
  text: string;
  domain?: string | null;
  /** Include security, reliability and real-time requirements. Default true. */
  crossCutting?: boolean;
}

export interface ExtractQueryResult {
  domain: string;
  confidence: number;
  requirements: Requirement[];
  stakeholders: string[];
}

export function extractQuery(input: ExtractQueryInput, registry: DomainRegistry): ExtractQueryResult {
  const { text, domain = null, crossCutting = true } = input;

  let target: string;
  let confidence: number;
  if (domain) {
    if (!registry.has(domain)) throw new UnknownDomainError(domain);
    target = domain;
    confidence = registry.rank(text).find((s) => s.domain === domain)?.confidence ?? 0;
  } else {
    const detection = registry.detect(text);
    target = detection.domain;
    confidence = detection.confidence;
  }

  const requirements = crossCutting
    ? collectRequirements(registry, target, text)
    : registry.extractRequirements(target, text);

  return {
    domain: target,
    confidence,
    requirements,
    stakeholders: registry.stakeholders(target, text),
  };
}
