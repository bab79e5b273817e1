/**
 * Handler spec — the structured rule specification a generated handler is
 * made of. Generated handlers are data interpreted by RuleBasedHandler.
 */

import { z } from "zod";
import { ValidationFailure, messageOf } from "./errors.ts";
import {
  DOMAIN_NAME_PATTERN,
  MAX_PRIORITY_SCORE,
  MIN_PRIORITY_SCORE,
  NO_DOMAIN,
  Priority,
  RequirementCategory,
} from "./types.ts";

const term = z.string().trim().min(1);

export const RequirementRuleSchema = z
  .object({
    title: term,
    priority: z.nativeEnum(Priority),
    category: z.nativeEnum(RequirementCategory),
    whenAny: z.array(term).optional(),
    description: z.string().optional(),
    acceptanceCriteria: z.array(term).optional(),
  })
  .strict();

export const HandlerSpecSchema = z
  .object({
    name: z
      .string()
      .regex(DOMAIN_NAME_PATTERN, "must be lowercase letters, digits and underscores")
      .refine((name) => name !== NO_DOMAIN, `'${NO_DOMAIN}' is reserved for documents no handler matches`),
    keywords: z.array(term).min(1),
    extractRequirements: z.array(RequirementRuleSchema).min(1),
    priorityScore: z.number().int().min(MIN_PRIORITY_SCORE).max(MAX_PRIORITY_SCORE).optional(),
    stakeholders: z.array(term).optional(),
    description: z.string().optional(),
  })
  .strict();

export type RequirementRuleSpec = z.infer<typeof RequirementRuleSchema>;
export type HandlerSpec = z.infer<typeof HandlerSpecSchema>;

const FENCED_JSON_RE = /```(?:json)?\s*\n([\s\S]*?)```/;

/** Strips a ```json fence when the response wraps its payload in one. */
export function unwrapJson(raw: string): string {
  const fenced = FENCED_JSON_RE.exec(raw);
  return (fenced?.[1] ?? raw).trim();
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

export function validateHandlerSpec(value: unknown): HandlerSpec {
  const result = HandlerSpecSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationFailure(result.error.issues.map(formatIssue));
  }
  return result.data;
}

/**
 * Syntax check (JSON) followed by the structural check. Throws
 * ValidationFailure with every issue found.
 */
export function parseHandlerSpec(raw: string): HandlerSpec {
  let value: unknown;
  try {
    value = JSON.parse(unwrapJson(raw));
  } catch (e) {
    throw new ValidationFailure([`syntax: ${messageOf(e)}`]);
  }
  return validateHandlerSpec(value);
}
