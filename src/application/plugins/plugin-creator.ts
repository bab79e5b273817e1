/**
 * PluginCreator — reuse an existing handler when one matches well enough,
 * otherwise synthesize, validate and register a new one.
 *
 * ensureHandler never rejects. Generation or validation failures degrade to
 * the best existing match, reported as a `rejected` decision.
 */

import { GenerationFailure, ValidationFailure, messageOf } from "../../domain/errors.ts";
import { parseHandlerSpec, type HandlerSpec } from "../../domain/handler-spec.ts";
import { assessSpecQuality, keywordConfidence } from "../../domain/rules.ts";
import {
  CollisionPolicy,
  DecisionAction,
  RejectionReason,
  type DecisionRecord,
  type DetectionResult,
  type HandlerGenerator,
} from "../../domain/types.ts";
import { getLogger } from "../../logger.ts";
import { summarizeHandler } from "../handlers/base.ts";
import { RuleBasedHandler } from "../handlers/rule-based.ts";
import type { DomainRegistry } from "../handlers/registry.ts";

/** Where created handlers are written. Implemented by infra/plugin-store. */
export interface HandlerSink {
  save(spec: HandlerSpec): Promise<string>;
}

export interface PluginCreatorOptions {
  threshold: number;
  /** How many ranked handlers are described to the generator. */
  summaryCount: number;
  timeoutMs: number;
  collisionPolicy: CollisionPolicy;
  store?: HandlerSink | null;
}

export interface EnsureOptions {
  signal?: AbortSignal;
}

export const DEFAULT_CREATOR_OPTIONS: PluginCreatorOptions = {
  threshold: 0.6,
  summaryCount: 3,
  timeoutMs: 30_000,
  collisionPolicy: CollisionPolicy.REJECT,
  store: null,
};

export class PluginCreator {
  private log = getLogger("plugin-creator");
  private options: PluginCreatorOptions;

  constructor(
    private readonly registry: DomainRegistry,
    private readonly generator: HandlerGenerator | null,
    options: Partial<PluginCreatorOptions> = {},
  ) {
    this.options = { ...DEFAULT_CREATOR_OPTIONS, ...options };
  }

  async ensureHandler(text: string, options: EnsureOptions = {}): Promise<DecisionRecord> {
    const detection = this.registry.detect(text);
    if (detection.confidence >= this.options.threshold) {
      this.log.debug({ domain: detection.domain, confidence: detection.confidence }, "reusing handler");
      return { action: DecisionAction.REUSE, domain: detection.domain, confidence: detection.confidence };
    }

    if (!this.generator) {
      return this.reject(RejectionReason.GENERATION_FAILED, ["no generation service configured"], detection);
    }

    let raw: string;
    try {
      raw = await this.generate(this.generator, text, options.signal);
    } catch (e) {
      return this.reject(RejectionReason.GENERATION_FAILED, [messageOf(e)], detection);
    }

    let handler: RuleBasedHandler;
    try {
      const spec = parseHandlerSpec(raw);
      const name = this.resolveName(spec.name);
      handler = new RuleBasedHandler({ ...spec, name });
      // Collision check and registration share one synchronous turn.
      this.registry.register(handler, { replace: this.options.collisionPolicy === CollisionPolicy.REPLACE });
    } catch (e) {
      const issues = e instanceof ValidationFailure ? e.issues : [messageOf(e)];
      return this.reject(RejectionReason.VALIDATION_FAILED, issues, detection);
    }

    const domain = handler.name();
    const { confidence } = keywordConfidence(text, handler.keywords());
    const quality = assessSpecQuality(handler.toSpec());
    const persistedTo = await this.persist(handler.toSpec());
    this.log.info(
      { domain, confidence, quality: quality.score, generator: this.generator.name, persistedTo },
      "created domain handler",
    );

    return { action: DecisionAction.CREATED, domain, confidence, persistedTo, quality };
  }

  private async generate(generator: HandlerGenerator, text: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw new GenerationFailure("generation cancelled");

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new GenerationFailure(`generation timed out after ${this.options.timeoutMs}ms`)),
      this.options.timeoutMs,
    );
    const onCallerAbort = () => controller.abort(new GenerationFailure("generation cancelled"));
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    // Generators that ignore the signal still lose the race.
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });

    try {
      const existingDomains = this.registry
        .rank(text)
        .slice(0, this.options.summaryCount)
        .flatMap((scored) => {
          const existing = this.registry.get(scored.domain);
          return existing ? [summarizeHandler(existing)] : [];
        });

      const raw = await Promise.race([generator.generate({ text, existingDomains }, controller.signal), aborted]);
      if (!raw.trim()) throw new GenerationFailure("generation service returned an empty response");
      return raw;
    } catch (e) {
      if (e instanceof GenerationFailure) throw e;
      throw new GenerationFailure(`generation service failed: ${messageOf(e)}`, { cause: e });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private resolveName(name: string): string {
    if (!this.registry.has(name)) return name;

    switch (this.options.collisionPolicy) {
      case CollisionPolicy.REPLACE:
        return name;
      case CollisionPolicy.SUFFIX: {
        let version = 2;
        while (this.registry.has(`${name}_v${version}`)) version++;
        return `${name}_v${version}`;
      }
      case CollisionPolicy.REJECT:
        throw new ValidationFailure([`name: domain '${name}' is already registered`]);
    }
  }

  private async persist(spec: HandlerSpec): Promise<string | null> {
    if (!this.options.store) return null;
    try {
      return await this.options.store.save(spec);
    } catch (e) {
      this.log.warn({ err: e, domain: spec.name }, "failed to persist created handler");
      return null;
    }
  }

  private reject(reason: RejectionReason, issues: string[], fallback: DetectionResult): DecisionRecord {
    this.log.warn(
      { reason, issues, fallbackDomain: fallback.domain, fallbackConfidence: fallback.confidence },
      "handler creation rejected; using best existing match",
    );
    return { action: DecisionAction.REJECTED, reason, issues, fallback };
  }
}
