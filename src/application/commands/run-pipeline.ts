/**
 * RunPipeline command — analyze → requirements → tasks → approval over a
 * single document.
 */

import { DecisionAction, PipelineStage, type DecisionRecord, type PipelineResult } from "../../domain/types.ts";
import { extractSnippet } from "../../infra/document-parser.ts";
import { getLogger } from "../../logger.ts";
import type { DomainRegistry } from "../handlers/registry.ts";
import type { PluginCreator } from "../plugins/plugin-creator.ts";
import { breakIntoTasks, collectRequirements, decideApproval } from "../pipeline/stages.ts";

export interface RunPipelineOptions {
  registry: DomainRegistry;
  /** Without a creator the analyze stage is plain detection. */
  creator?: PluginCreator | null;
  minRequirements?: number;
  signal?: AbortSignal;
}

function workingDomain(decision: DecisionRecord): { domain: string; confidence: number } {
  if (decision.action === DecisionAction.REJECTED) {
    return { domain: decision.fallback.domain, confidence: decision.fallback.confidence };
  }
  return { domain: decision.domain, confidence: decision.confidence };
}

function round(ms: number): number {
  return Math.round(ms * 100) / 100;
}

export async function runPipeline(text: string, opts: RunPipelineOptions): Promise<PipelineResult> {
  const { registry, creator = null, minRequirements = 1, signal } = opts;
  const started = performance.now();
  const stages: Record<PipelineStage, number> = {
    [PipelineStage.ANALYZE]: 0,
    [PipelineStage.REQUIREMENTS]: 0,
    [PipelineStage.TASKS]: 0,
    [PipelineStage.APPROVAL]: 0,
  };

  // 1. Analyze
  let t = performance.now();
  let decision: DecisionRecord | null = null;
  let target: { domain: string; confidence: number };
  if (creator) {
    decision = await creator.ensureHandler(text, { signal });
    target = workingDomain(decision);
  } else {
    const detection = registry.detect(text);
    target = { domain: detection.domain, confidence: detection.confidence };
  }
  const stakeholders = registry.stakeholders(target.domain, text);
  stages[PipelineStage.ANALYZE] = round(performance.now() - t);

  // 2. Requirements
  t = performance.now();
  const requirements = collectRequirements(registry, target.domain, text);
  stages[PipelineStage.REQUIREMENTS] = round(performance.now() - t);

  // 3. Tasks
  t = performance.now();
  const tasks = breakIntoTasks(requirements);
  stages[PipelineStage.TASKS] = round(performance.now() - t);

  // 4. Approval
  t = performance.now();
  const approval = decideApproval(text, requirements, minRequirements);
  stages[PipelineStage.APPROVAL] = round(performance.now() - t);

  const totalMs = round(performance.now() - started);
  getLogger("pipeline").info(
    { domain: target.domain, requirements: requirements.length, tasks: tasks.length, status: approval.status, totalMs },
    "pipeline finished",
  );

  return {
    domain: target.domain,
    confidence: target.confidence,
    decision,
    summary: extractSnippet(text),
    stakeholders,
    requirements,
    tasks,
    approval,
    metrics: { stages, totalMs },
  };
}
