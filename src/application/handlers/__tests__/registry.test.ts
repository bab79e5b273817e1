import { describe, it, expect } from "vitest";
import { DuplicateDomainError, HandlerContractError } from "../../../domain/errors.ts";
import type { HandlerSpec } from "../../../domain/handler-spec.ts";
import { Priority, RequirementCategory, type Requirement } from "../../../domain/types.ts";
import type { DomainHandler } from "../base.ts";
import { DomainRegistry, NO_MATCH } from "../registry.ts";
import { RuleBasedHandler } from "../rule-based.ts";

function handler(name: string, keywords: string[], priorityScore = 3): RuleBasedHandler {
  const spec: HandlerSpec = {
    name,
    keywords,
    priorityScore,
    extractRequirements: [
      { title: `${name} core`, priority: Priority.HIGH, category: RequirementCategory.FUNCTIONAL },
    ],
  };
  return new RuleBasedHandler(spec);
}

class ThrowingHandler implements DomainHandler {
  name(): string {
    return "broken";
  }
  keywords(): ReadonlySet<string> {
    return new Set(["broken"]);
  }
  priorityScore(): number {
    return 3;
  }
  extractRequirements(): Requirement[] {
    throw new Error("rule table corrupt");
  }
  stakeholders(): string[] {
    throw new Error("no stakeholders");
  }
}

describe("DomainRegistry.detect", () => {
  it("returns the sentinel for an empty registry", () => {
    expect(new DomainRegistry().detect("anything")).toEqual({ domain: "general", confidence: 0, runnerUp: null });
  });

  it("returns the sentinel for empty text", () => {
    const registry = new DomainRegistry();
    registry.register(handler("healthcare", ["patient"]));
    expect(registry.detect("")).toEqual(NO_MATCH);
  });

  it("scores matched keywords over defined keywords", () => {
    const registry = new DomainRegistry();
    registry.register(handler("healthcare", ["patient", "HIPAA", "diagnosis"]));
    expect(registry.detect("Patient records must comply with HIPAA.")).toEqual({
      domain: "healthcare",
      confidence: 2 / 3,
      runnerUp: null,
    });
  });

  it("breaks confidence ties by priority score", () => {
    const registry = new DomainRegistry();
    registry.register(handler("retail", ["order"], 2));
    registry.register(handler("kitchen", ["order"], 4));
    expect(registry.detect("new order")).toEqual({
      domain: "kitchen",
      confidence: 1,
      runnerUp: { domain: "retail", confidence: 1 },
    });
  });

  it("breaks full ties by registration order", () => {
    const registry = new DomainRegistry();
    registry.register(handler("first", ["order"]));
    registry.register(handler("second", ["order"]));
    expect(registry.detect("order").domain).toBe("first");
  });

  it("omits a runner-up that scored zero", () => {
    const registry = new DomainRegistry();
    registry.register(handler("retail", ["order"]));
    registry.register(handler("clinic", ["patient"]));
    expect(registry.detect("order").runnerUp).toBeNull();
  });

  it("returns equal results for repeated calls", () => {
    const registry = new DomainRegistry();
    registry.register(handler("retail", ["order", "cart"]));
    registry.register(handler("kitchen", ["order", "menu"], 4));
    expect(registry.detect("order from the menu")).toEqual(registry.detect("order from the menu"));
  });

  it("sees a handler registered after an earlier detect", () => {
    const registry = new DomainRegistry();
    registry.register(handler("retail", ["order"]));
    expect(registry.detect("hive honey").domain).toBe("general");
    registry.register(handler("beekeeping", ["hive", "honey"]));
    expect(registry.detect("hive honey")).toEqual({ domain: "beekeeping", confidence: 1, runnerUp: null });
  });
});

describe("DomainRegistry.register", () => {
  it("rejects a duplicate name and keeps the original", () => {
    const registry = new DomainRegistry();
    const original = handler("healthcare", ["patient"]);
    registry.register(original);

    registry.register(handler("clinic", ["clinic", "patient", "nurse"]));
    const before = registry.detect("patient seen at the clinic");

    expect(() => registry.register(handler("healthcare", ["nurse", "rota"]))).toThrow(DuplicateDomainError);
    expect(registry.size).toBe(2);
    expect(registry.get("healthcare")).toBe(original);
    expect(registry.detect("patient seen at the clinic")).toEqual(before);
  });

  it("replaces in place when asked", () => {
    const registry = new DomainRegistry();
    registry.register(handler("a", ["alpha"]));
    registry.register(handler("b", ["beta"]));
    const replacement = handler("a", ["aleph"]);
    registry.register(replacement, { replace: true });

    expect(registry.list()).toEqual(["a", "b"]);
    expect(registry.get("a")).toBe(replacement);
  });

  it("enforces the handler contract", () => {
    const registry = new DomainRegistry();
    expect(() => registry.register(handler("Bad Name", ["x"]))).toThrow(HandlerContractError);
    expect(() => registry.register(handler("ok", ["x"], 7))).toThrow(HandlerContractError);
    expect(() => registry.register(handler("blank", ["  "]))).toThrow(HandlerContractError);
    expect(() => registry.register(handler("general", ["widget"]))).toThrow(HandlerContractError);
    expect(registry.size).toBe(0);
  });
});

describe("DomainRegistry extraction", () => {
  it("isolates a throwing handler", () => {
    const registry = new DomainRegistry();
    registry.register(new ThrowingHandler());
    expect(registry.extractRequirements("broken", "broken text")).toEqual([]);
    expect(registry.stakeholders("broken", "broken text")).toEqual(["End Users", "Development Team"]);
  });

  it("returns nothing for unknown domains", () => {
    const registry = new DomainRegistry();
    expect(registry.extractRequirements("general", "text")).toEqual([]);
    expect(registry.stakeholders("general", "text")).toEqual(["End Users", "Development Team"]);
  });

  it("summarizes handlers in registration order", () => {
    const registry = new DomainRegistry();
    registry.register(handler("real_estate", ["Lease", "tenant"], 4));
    expect(registry.summaries()).toEqual([
      {
        domain: "real_estate",
        description: "Generated handler for real estate",
        keywords: ["lease", "tenant"],
        priorityScore: 4,
      },
    ]);
  });
});
