/**
 * Business rules as pure functions.
 *
 * Scoring, ranking, cross-cutting requirements, risk, recommendations and
 * handler spec quality.
 */

import type { HandlerSpec } from "./handler-spec.ts";
import {
  DEFAULT_SPEC_PRIORITY,
  Priority,
  RequirementCategory,
  RiskLevel,
  type Requirement,
  type ScoredDomain,
  type SpecQuality,
} from "./types.ts";

// ── Keyword scoring ─────────────────────────────────────────────────

export function containsAny(lowerText: string, terms: readonly string[]): boolean {
  return terms.some((term) => lowerText.includes(term));
}

export interface KeywordScore {
  confidence: number;
  matched: string[];
}

/**
 * Share of the (case-folded, de-duplicated) keywords that occur as
 * substrings of the lowercased text.
 */
export function keywordConfidence(text: string, keywords: Iterable<string>): KeywordScore {
  const folded = new Set<string>();
  for (const k of keywords) {
    const trimmed = k.trim().toLowerCase();
    if (trimmed) folded.add(trimmed);
  }
  if (folded.size === 0) return { confidence: 0, matched: [] };

  const lower = text.toLowerCase();
  const matched = [...folded].filter((k) => lower.includes(k));
  return { confidence: matched.length / folded.size, matched };
}

/** Confidence desc, then priority desc, then registration order asc. */
export function compareScored(a: ScoredDomain, b: ScoredDomain): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  if (a.priorityScore !== b.priorityScore) return b.priorityScore - a.priorityScore;
  return a.order - b.order;
}

// ── Cross-cutting requirements ──────────────────────────────────────

const SECURITY_TERMS = ["security", "cyber", "encryption", "auth", "secure"];
const RELIABILITY_TERMS = ["performance", "scalability", "reliability"];
const REALTIME_TERMS = ["real-time", "realtime", "instant", "live"];
const UPTIME_RE = /(\d+\.?\d*)%\s*uptime/;
const DEFAULT_UPTIME = "99.9";

export function crossCuttingRequirements(text: string): Requirement[] {
  const lower = text.toLowerCase();
  const requirements: Requirement[] = [];

  if (containsAny(lower, SECURITY_TERMS)) {
    requirements.push({
      title: "Comprehensive Cybersecurity Framework and Data Protection",
      priority: Priority.HIGH,
      category: RequirementCategory.NON_FUNCTIONAL,
    });
  }

  const uptime = UPTIME_RE.exec(lower);
  if (uptime || containsAny(lower, RELIABILITY_TERMS)) {
    const target = uptime?.[1] ?? DEFAULT_UPTIME;
    requirements.push({
      title: `System Reliability and Performance (${target}% uptime requirement)`,
      priority: Priority.HIGH,
      category: RequirementCategory.NON_FUNCTIONAL,
    });
  }

  if (containsAny(lower, REALTIME_TERMS)) {
    requirements.push({
      title: "Real-Time Data Processing and Event Handling System",
      priority: Priority.HIGH,
      category: RequirementCategory.NON_FUNCTIONAL,
    });
  }

  return requirements;
}

/** Keeps the first requirement seen for each title. */
export function dedupeRequirements(requirements: Requirement[]): Requirement[] {
  const seen = new Set<string>();
  return requirements.filter((r) => {
    const key = r.title.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

// ── Approval ────────────────────────────────────────────────────────

export const RISK_INDICATORS: Record<RiskLevel, readonly string[]> = {
  [RiskLevel.HIGH]: ["complex", "advanced", "critical", "enterprise", "security", "integration"],
  [RiskLevel.MEDIUM]: ["moderate", "standard", "typical", "normal"],
  [RiskLevel.LOW]: ["simple", "basic", "straightforward", "minimal"],
};

export function assessRiskLevel(text: string): RiskLevel {
  const lower = text.toLowerCase();
  const count = (level: RiskLevel) => RISK_INDICATORS[level].filter((t) => lower.includes(t)).length;

  const high = count(RiskLevel.HIGH);
  const medium = count(RiskLevel.MEDIUM);

  if (high >= 2) return RiskLevel.HIGH;
  if (medium >= 2 || high >= 1) return RiskLevel.MEDIUM;
  return RiskLevel.LOW;
}

const SHORT_DOCUMENT_LENGTH = 300;
const MAX_RECOMMENDATIONS = 3;

export function recommendationsFor(text: string): string[] {
  const lower = text.toLowerCase();
  const recommendations: string[] = [];

  if (!lower.includes("test")) recommendations.push("Add comprehensive testing strategy");
  if (!lower.includes("security")) recommendations.push("Include security requirements and measures");
  if (!lower.includes("performance")) recommendations.push("Define performance criteria and benchmarks");
  if (lower.length < SHORT_DOCUMENT_LENGTH) {
    recommendations.push("Expand requirements with more detailed specifications");
  }

  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}

// ── Handler spec quality ────────────────────────────────────────────

const RICH_KEYWORDS = 5;
const BASIC_KEYWORDS = 3;
const RICH_RULES = 2;
const RICH_STAKEHOLDERS = 3;
const SPECIFIC_PRIORITY = 3;

/**
 * Points for keyword coverage (30), rule coverage (25), named stakeholders
 * (20), priority (15) and a non-functional rule (10).
 */
export function assessSpecQuality(spec: HandlerSpec): SpecQuality {
  const keywords = new Set(spec.keywords.map((k) => k.trim().toLowerCase())).size;
  const rules = spec.extractRequirements.length;
  const stakeholders = spec.stakeholders?.length ?? 0;
  const priority = spec.priorityScore ?? DEFAULT_SPEC_PRIORITY;

  let score = 0;
  if (keywords >= RICH_KEYWORDS) score += 30;
  else if (keywords >= BASIC_KEYWORDS) score += 20;
  if (rules >= RICH_RULES) score += 25;
  else if (rules >= 1) score += 15;
  if (stakeholders >= RICH_STAKEHOLDERS) score += 20;
  if (priority >= SPECIFIC_PRIORITY) score += 15;
  if (spec.extractRequirements.some((r) => r.category === RequirementCategory.NON_FUNCTIONAL)) score += 10;

  const recommendations: string[] = [];
  if (keywords < RICH_KEYWORDS) recommendations.push("Add more domain-specific keywords for better detection");
  if (rules < RICH_RULES) recommendations.push("Define more requirement patterns for comprehensive extraction");
  if (priority < SPECIFIC_PRIORITY) {
    recommendations.push("Consider increasing priority score if domain is highly specific");
  }

  return { score, recommendations };
}
