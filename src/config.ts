/**
 * Configuration — environment variables validated with zod.
 */

import { z } from "zod";
import { ConfigError } from "./domain/errors.ts";
import { CollisionPolicy } from "./domain/types.ts";

export const GeneratorMode = {
  AUTO: "auto",
  LLM: "llm",
  HEURISTIC: "heuristic",
  NONE: "none",
} as const;
export type GeneratorMode = (typeof GeneratorMode)[keyof typeof GeneratorMode];

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  DOMAINKIT_PLUGINS_DIR: z.string().default(".domainkit/plugins"),
  DOMAINKIT_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  DOMAINKIT_SUMMARY_COUNT: z.coerce.number().int().min(0).default(3),
  DOMAINKIT_COLLISION_POLICY: z.nativeEnum(CollisionPolicy).default(CollisionPolicy.REJECT),
  DOMAINKIT_MIN_REQUIREMENTS: z.coerce.number().int().min(0).default(1),
  DOMAINKIT_GENERATOR: z.nativeEnum(GeneratorMode).default(GeneratorMode.AUTO),
  DOMAINKIT_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default("https://api.anthropic.com/v1/"),
  LLM_MODEL: z.string().default("claude-sonnet-4-20250514"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export interface LlmConfig {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface DomainkitConfig {
  pluginsDir: string;
  confidenceThreshold: number;
  summaryCount: number;
  collisionPolicy: CollisionPolicy;
  minRequirements: number;
  generator: GeneratorMode;
  logLevel: LogLevel;
  llm: LlmConfig;
}

/** Empty variables count as unset. */
function definedEntries(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): DomainkitConfig {
  const parsed = EnvSchema.safeParse(definedEntries(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  return {
    pluginsDir: e.DOMAINKIT_PLUGINS_DIR,
    confidenceThreshold: e.DOMAINKIT_CONFIDENCE_THRESHOLD,
    summaryCount: e.DOMAINKIT_SUMMARY_COUNT,
    collisionPolicy: e.DOMAINKIT_COLLISION_POLICY,
    minRequirements: e.DOMAINKIT_MIN_REQUIREMENTS,
    generator: e.DOMAINKIT_GENERATOR,
    logLevel: e.DOMAINKIT_LOG_LEVEL,
    llm: {
      apiKey: e.LLM_API_KEY ?? null,
      baseUrl: e.LLM_BASE_URL,
      model: e.LLM_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
  };
}
