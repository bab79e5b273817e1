/**
 * Domain registry — maps domain names to handlers and picks the best match
 * for a document.
 */

import { DuplicateDomainError, HandlerExecutionError } from "../../domain/errors.ts";
import { compareScored, keywordConfidence } from "../../domain/rules.ts";
import {
  NO_DOMAIN,
  type DetectionResult,
  type HandlerSummary,
  type Requirement,
  type ScoredDomain,
} from "../../domain/types.ts";
import { getLogger } from "../../logger.ts";
import { assertHandlerContract, defaultStakeholders, summarizeHandler, type DomainHandler } from "./base.ts";
import { CustomerSupportHandler } from "./domains/customer-support.ts";
import { EcommerceHandler } from "./domains/ecommerce.ts";
import { EnterpriseHandler } from "./domains/enterprise.ts";
import { FintechHandler } from "./domains/fintech.ts";
import { FitnessAppHandler } from "./domains/fitness-app.ts";
import { GamingStudioManagementHandler } from "./domains/gaming-studio-management.ts";
import { HealthcareHandler } from "./domains/healthcare.ts";
import { MobileAppHandler } from "./domains/mobile-app.ts";
import { RealEstateHandler } from "./domains/real-estate.ts";
import { RestaurantManagementHandler } from "./domains/restaurant-management.ts";
import { TrafficManagementHandler } from "./domains/traffic-management.ts";
import { VisualWorkflowHandler } from "./domains/visual-workflow.ts";

export interface RegisterOptions {
  /** Swap an existing entry instead of raising DuplicateDomainError. */
  replace?: boolean;
}

export const NO_MATCH: DetectionResult = Object.freeze({ domain: NO_DOMAIN, confidence: 0, runnerUp: null });

export class DomainRegistry {
  private handlers = new Map<string, DomainHandler>();
  private log = getLogger("registry");

  register(handler: DomainHandler, options: RegisterOptions = {}): void {
    assertHandlerContract(handler);
    const name = handler.name();
    const exists = this.handlers.has(name);
    if (exists && !options.replace) {
      throw new DuplicateDomainError(name);
    }
    // Map.set on an existing key keeps its insertion slot.
    this.handlers.set(name, handler);
    this.log.debug({ domain: name, replaced: exists }, "registered domain handler");
  }

  get(name: string): DomainHandler | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  list(): string[] {
    return [...this.handlers.keys()];
  }

  get size(): number {
    return this.handlers.size;
  }

  summaries(): HandlerSummary[] {
    return [...this.handlers.values()].map(summarizeHandler);
  }

  /** Every handler scored against the text, best first. */
  rank(text: string): ScoredDomain[] {
    const scored: ScoredDomain[] = [];
    let order = 0;
    for (const [domain, handler] of this.handlers) {
      const { confidence, matched } = keywordConfidence(text, handler.keywords());
      scored.push({
        domain,
        confidence,
        priorityScore: handler.priorityScore(),
        matchedKeywords: matched,
        order: order++,
      });
    }
    return scored.sort(compareScored);
  }

  detect(text: string): DetectionResult {
    const [best, second] = this.rank(text);
    if (!best || best.confidence === 0) return { ...NO_MATCH };

    return {
      domain: best.domain,
      confidence: best.confidence,
      runnerUp: second && second.confidence > 0
        ? { domain: second.domain, confidence: second.confidence }
        : null,
    };
  }

  /**
   * Runs one handler's extraction. A throwing handler is logged and
   * contributes no requirements.
   */
  extractRequirements(domain: string, text: string): Requirement[] {
    const handler = this.handlers.get(domain);
    if (!handler) return [];
    try {
      return handler.extractRequirements(text);
    } catch (e) {
      const error = new HandlerExecutionError(domain, "extractRequirements", e);
      this.log.error({ err: error, domain }, error.message);
      return [];
    }
  }

  stakeholders(domain: string, text: string): string[] {
    const handler = this.handlers.get(domain);
    if (!handler?.stakeholders) return defaultStakeholders();
    try {
      return handler.stakeholders(text);
    } catch (e) {
      const error = new HandlerExecutionError(domain, "stakeholders", e);
      this.log.error({ err: error, domain }, error.message);
      return defaultStakeholders();
    }
  }
}

export function createDefaultRegistry(): DomainRegistry {
  const registry = new DomainRegistry();
  registry.register(new CustomerSupportHandler());
  registry.register(new FitnessAppHandler());
  registry.register(new TrafficManagementHandler());
  registry.register(new RealEstateHandler());
  registry.register(new HealthcareHandler());
  registry.register(new MobileAppHandler());
  registry.register(new EcommerceHandler());
  registry.register(new FintechHandler());
  registry.register(new VisualWorkflowHandler());
  registry.register(new EnterpriseHandler());
  registry.register(new RestaurantManagementHandler());
  registry.register(new GamingStudioManagementHandler());
  return registry;
}
