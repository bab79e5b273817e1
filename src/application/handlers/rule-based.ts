/**
 * RuleBasedHandler — interprets a HandlerSpec. Every generated or persisted
 * handler is an instance of this class.
 */

import type { HandlerSpec } from "../../domain/handler-spec.ts";
import { DEFAULT_SPEC_PRIORITY, type Requirement } from "../../domain/types.ts";
import { applyRules, defaultStakeholders, type DomainHandler, type RequirementRule } from "./base.ts";

export class RuleBasedHandler implements DomainHandler {
  private readonly keywordSet: ReadonlySet<string>;
  private readonly rules: RequirementRule[];

  constructor(private readonly spec: HandlerSpec) {
    this.keywordSet = new Set(spec.keywords.map((k) => k.toLowerCase()));
    this.rules = spec.extractRequirements.map((r) => {
      const requirement: Requirement = { title: r.title, priority: r.priority, category: r.category };
      if (r.description) requirement.description = r.description;
      if (r.acceptanceCriteria) requirement.acceptanceCriteria = [...r.acceptanceCriteria];
      return { whenAny: (r.whenAny ?? []).map((t) => t.toLowerCase()), requirement };
    });
  }

  name(): string {
    return this.spec.name;
  }

  keywords(): ReadonlySet<string> {
    return this.keywordSet;
  }

  priorityScore(): number {
    return this.spec.priorityScore ?? DEFAULT_SPEC_PRIORITY;
  }

  description(): string {
    return this.spec.description ?? `Generated handler for ${this.spec.name.replace(/_/g, " ")}`;
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, this.rules);
  }

  stakeholders(): string[] {
    return this.spec.stakeholders ? [...this.spec.stakeholders] : defaultStakeholders();
  }

  toSpec(): HandlerSpec {
    return this.spec;
  }
}
