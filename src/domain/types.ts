/**
 * Domain types for domainkit.
 */

// ── Enums (as const objects for runtime + type safety) ──────────────

export const Priority = {
  HIGH: "high",
  MEDIUM: "medium",
  LOW: "low",
} as const;
export type Priority = (typeof Priority)[keyof typeof Priority];

export const RequirementCategory = {
  FUNCTIONAL: "functional",
  NON_FUNCTIONAL: "non-functional",
} as const;
export type RequirementCategory = (typeof RequirementCategory)[keyof typeof RequirementCategory];

export const RiskLevel = {
  LOW: "low",
  MEDIUM: "medium",
  HIGH: "high",
} as const;
export type RiskLevel = (typeof RiskLevel)[keyof typeof RiskLevel];

export const DecisionAction = {
  REUSE: "reuse",
  CREATED: "created",
  REJECTED: "rejected",
} as const;
export type DecisionAction = (typeof DecisionAction)[keyof typeof DecisionAction];

export const RejectionReason = {
  GENERATION_FAILED: "generation_failed",
  VALIDATION_FAILED: "validation_failed",
} as const;
export type RejectionReason = (typeof RejectionReason)[keyof typeof RejectionReason];

/** What PluginCreator does when a generated name is already registered. */
export const CollisionPolicy = {
  REJECT: "reject",
  REPLACE: "replace",
  SUFFIX: "suffix",
} as const;
export type CollisionPolicy = (typeof CollisionPolicy)[keyof typeof CollisionPolicy];

export const PipelineStage = {
  ANALYZE: "analyze",
  REQUIREMENTS: "requirements",
  TASKS: "tasks",
  APPROVAL: "approval",
} as const;
export type PipelineStage = (typeof PipelineStage)[keyof typeof PipelineStage];

export const ApprovalStatus = {
  APPROVED: "approved",
  REJECTED: "rejected",
} as const;
export type ApprovalStatus = (typeof ApprovalStatus)[keyof typeof ApprovalStatus];

// ── Constants ───────────────────────────────────────────────────────

/** Sentinel domain returned when no handler matches at all. */
export const NO_DOMAIN = "general";

export const DEFAULT_STAKEHOLDERS: readonly string[] = ["End Users", "Development Team"];

export const MIN_PRIORITY_SCORE = 1;
export const MAX_PRIORITY_SCORE = 5;
/** Priority of a handler spec that leaves priorityScore out. */
export const DEFAULT_SPEC_PRIORITY = 3;

/** Lowercase words joined by underscores, e.g. `real_estate`. */
export const DOMAIN_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

// ── Records ─────────────────────────────────────────────────────────

export interface Requirement {
  title: string;
  priority: Priority;
  category: RequirementCategory;
  description?: string;
  acceptanceCriteria?: string[];
}

export interface ScoredDomain {
  domain: string;
  confidence: number;
  priorityScore: number;
  matchedKeywords: string[];
  /** Registration slot, used as the final tie-break. */
  order: number;
}

export interface DomainMatch {
  domain: string;
  confidence: number;
}

export interface DetectionResult {
  domain: string;
  confidence: number;
  runnerUp: DomainMatch | null;
}

export interface HandlerSummary {
  domain: string;
  description: string;
  keywords: string[];
  priorityScore: number;
}

/** Completeness of a handler spec, 0–100, with what would raise it. */
export interface SpecQuality {
  score: number;
  recommendations: string[];
}

export type DecisionRecord =
  | { action: typeof DecisionAction.REUSE; domain: string; confidence: number }
  | {
      action: typeof DecisionAction.CREATED;
      domain: string;
      confidence: number;
      persistedTo: string | null;
      quality: SpecQuality;
    }
  | {
      action: typeof DecisionAction.REJECTED;
      reason: RejectionReason;
      issues: string[];
      fallback: DetectionResult;
    };

export interface Task {
  id: string;
  title: string;
  requirement: string;
  priority: Priority;
  category: RequirementCategory;
}

export interface ApprovalDecision {
  status: ApprovalStatus;
  riskLevel: RiskLevel;
  requirementCount: number;
  recommendations: string[];
  reasoning: string;
}

export interface PipelineResult {
  domain: string;
  confidence: number;
  decision: DecisionRecord | null;
  summary: string;
  stakeholders: string[];
  requirements: Requirement[];
  tasks: Task[];
  approval: ApprovalDecision;
  metrics: {
    stages: Record<PipelineStage, number>;
    totalMs: number;
  };
}

// ── Generation service seam ─────────────────────────────────────────

export interface GenerationRequest {
  text: string;
  existingDomains: HandlerSummary[];
}

/**
 * External synthesis of a new handler. Returns the raw response text, which
 * is expected to hold a JSON handler spec; validation happens downstream.
 */
export interface HandlerGenerator {
  readonly name: string;
  generate(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}
