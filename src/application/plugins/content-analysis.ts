/**
 * Offline content analysis — suggests a handler spec from term frequency
 * and fixed pattern tables, without any generation service.
 */

import type { HandlerSpec, RequirementRuleSpec } from "../../domain/handler-spec.ts";
import { assessSpecQuality, containsAny } from "../../domain/rules.ts";
import {
  DEFAULT_STAKEHOLDERS,
  NO_DOMAIN,
  Priority,
  RequirementCategory,
  type GenerationRequest,
  type HandlerGenerator,
  type SpecQuality,
} from "../../domain/types.ts";

const WORD_RE = /\b[a-z]{3,}\b/g;
const MAX_KEY_TERMS = 10;
const MAX_SPEC_KEYWORDS = 8;
const SUGGESTED_PRIORITY = 3;

const STOPWORDS = new Set([
  "the", "and", "for", "with", "that", "this", "from", "into", "our", "their",
  "they", "them", "will", "must", "should", "can", "could", "would", "are", "was",
  "were", "has", "have", "had", "all", "any", "each", "also", "than", "such",
  "more", "new", "use", "using", "need", "needs", "build", "system", "including",
  "which", "who", "its", "not", "but", "via", "per", "other",
]);

interface RequirementPattern {
  type: string;
  whenAny: string[];
  title: (entity: string) => string;
  priority: Priority;
}

const REQUIREMENT_PATTERNS: RequirementPattern[] = [
  {
    type: "management",
    whenAny: ["manage", "track", "monitor"],
    title: (entity) => `Comprehensive ${entity} Management and Tracking System`,
    priority: Priority.HIGH,
  },
  {
    type: "integration",
    whenAny: ["integrate", "sync", "connect"],
    title: () => "External System Integration and Data Synchronization",
    priority: Priority.MEDIUM,
  },
  {
    type: "reporting",
    whenAny: ["report", "analytics", "dashboard"],
    title: () => "Advanced Reporting and Analytics Dashboard",
    priority: Priority.MEDIUM,
  },
  {
    type: "interface",
    whenAny: ["user", "interface", "ux"],
    title: () => "User Interface and Experience Implementation",
    priority: Priority.MEDIUM,
  },
];

const STAKEHOLDER_PATTERNS: Array<[term: string, stakeholders: string[]]> = [
  ["admin", ["System Administrators"]],
  ["manager", ["Management Team"]],
  ["customer", ["Customers", "Customer Service"]],
  ["doctor", ["Medical Staff", "Healthcare Providers"]],
  ["teacher", ["Educators", "Academic Staff"]],
  ["student", ["Students", "Learners"]],
  ["vendor", ["Vendors", "Suppliers"]],
  ["investor", ["Investors", "Financial Stakeholders"]],
];

const CROSS_CUTTING: Array<[concern: string, terms: string[]]> = [
  ["security", ["security", "secure", "encryption", "auth"]],
  ["performance", ["performance", "scalability", "load"]],
  ["compliance", ["compliance", "regulation", "audit"]],
  ["disaster_recovery", ["backup", "disaster", "recovery"]],
];

export interface ContentAnalysis {
  keyTerms: string[];
  requirementPatterns: string[];
  stakeholders: string[];
  crossCutting: string[];
  suggestedSpec: HandlerSpec;
  quality: SpecQuality;
}

/** Most frequent non-stopword terms; ties keep first-occurrence order. */
export function keyTerms(text: string, limit = MAX_KEY_TERMS): string[] {
  const counts = new Map<string, number>();
  for (const word of text.toLowerCase().match(WORD_RE) ?? []) {
    if (STOPWORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => word);
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function analyzeContent(text: string): ContentAnalysis {
  const lower = text.toLowerCase();
  const terms = keyTerms(text);
  const domainName = terms.find((t) => t !== NO_DOMAIN) ?? "custom";
  const entity = titleCase(domainName);

  const patterns = REQUIREMENT_PATTERNS.filter((p) => containsAny(lower, p.whenAny));
  const rules: RequirementRuleSpec[] = patterns.map((p) => ({
    title: p.title(entity),
    priority: p.priority,
    category: RequirementCategory.FUNCTIONAL,
    whenAny: p.whenAny,
  }));
  if (rules.length === 0) {
    rules.push({
      title: `Core ${entity} System Implementation`,
      priority: Priority.HIGH,
      category: RequirementCategory.FUNCTIONAL,
    });
  }

  const stakeholders = [...DEFAULT_STAKEHOLDERS];
  for (const [term, names] of STAKEHOLDER_PATTERNS) {
    if (!lower.includes(term)) continue;
    for (const name of names) {
      if (!stakeholders.includes(name)) stakeholders.push(name);
    }
  }

  const crossCutting = CROSS_CUTTING.filter(([, t]) => containsAny(lower, t)).map(([concern]) => concern);

  const suggestedSpec: HandlerSpec = {
    name: domainName,
    keywords: terms.length > 0 ? terms.slice(0, MAX_SPEC_KEYWORDS) : [domainName],
    extractRequirements: rules,
    priorityScore: SUGGESTED_PRIORITY,
    stakeholders,
    description: `Suggested from document terms: ${terms.slice(0, 3).join(", ") || domainName}`,
  };

  return {
    keyTerms: terms,
    requirementPatterns: patterns.map((p) => p.type),
    stakeholders,
    crossCutting,
    suggestedSpec,
    quality: assessSpecQuality(suggestedSpec),
  };
}

/** Generation service backed by analyzeContent; needs no network. */
export class HeuristicHandlerGenerator implements HandlerGenerator {
  readonly name = "heuristic";

  async generate(request: GenerationRequest): Promise<string> {
    return JSON.stringify(analyzeContent(request.text).suggestedSpec);
  }
}
