/**
 * Base handler protocol and shared helpers.
 */

import { HandlerContractError } from "../../domain/errors.ts";
import { containsAny } from "../../domain/rules.ts";
import {
  DEFAULT_STAKEHOLDERS,
  DOMAIN_NAME_PATTERN,
  MAX_PRIORITY_SCORE,
  MIN_PRIORITY_SCORE,
  NO_DOMAIN,
  type HandlerSummary,
  type Requirement,
} from "../../domain/types.ts";

/**
 * Detection and extraction policy for one business domain. Implementations
 * are pure: no I/O, no shared mutable state.
 */
export interface DomainHandler {
  name(): string;
  keywords(): ReadonlySet<string>;
  /** Integer in [1,5]; higher wins confidence ties. */
  priorityScore(): number;
  /** Returns [] when nothing domain-specific matches. */
  extractRequirements(text: string): Requirement[];
  stakeholders?(text: string): string[];
  description?(): string;
}

/** A requirement emitted when any trigger term occurs in the text. */
export interface RequirementRule {
  whenAny: readonly string[];
  requirement: Requirement;
}

/** Rules with no trigger terms always apply. */
export function applyRules(text: string, rules: readonly RequirementRule[]): Requirement[] {
  const lower = text.toLowerCase();
  return rules
    .filter((rule) => rule.whenAny.length === 0 || containsAny(lower, rule.whenAny))
    .map((rule) => ({ ...rule.requirement }));
}

export type StakeholderRule = [terms: readonly string[], stakeholder: string];

export function collectStakeholders(
  text: string,
  base: readonly string[],
  rules: readonly StakeholderRule[] = [],
): string[] {
  const lower = text.toLowerCase();
  const out = [...base];
  for (const [terms, stakeholder] of rules) {
    if (containsAny(lower, terms) && !out.includes(stakeholder)) out.push(stakeholder);
  }
  return out;
}

export function defaultStakeholders(): string[] {
  return [...DEFAULT_STAKEHOLDERS];
}

export function assertHandlerContract(handler: DomainHandler): void {
  const name = handler.name();
  if (!DOMAIN_NAME_PATTERN.test(name)) {
    throw new HandlerContractError(name, "name must be lowercase letters, digits and underscores");
  }
  if (name === NO_DOMAIN) {
    throw new HandlerContractError(name, `'${NO_DOMAIN}' is reserved for documents no handler matches`);
  }

  const keywords = handler.keywords();
  if (keywords.size === 0) {
    throw new HandlerContractError(name, "keyword set is empty");
  }
  for (const k of keywords) {
    if (!k.trim()) throw new HandlerContractError(name, "keywords must be non-blank");
  }

  const priority = handler.priorityScore();
  if (!Number.isInteger(priority) || priority < MIN_PRIORITY_SCORE || priority > MAX_PRIORITY_SCORE) {
    throw new HandlerContractError(
      name,
      `priority score must be an integer in [${MIN_PRIORITY_SCORE},${MAX_PRIORITY_SCORE}], got ${priority}`,
    );
  }
}

export function summarizeHandler(handler: DomainHandler): HandlerSummary {
  const name = handler.name();
  return {
    domain: name,
    description: handler.description?.() ?? name.replace(/_/g, " "),
    keywords: [...handler.keywords()],
    priorityScore: handler.priorityScore(),
  };
}
