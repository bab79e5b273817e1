import { describe, it, expect } from "vitest";
import {
  assessRiskLevel,
  assessSpecQuality,
  compareScored,
  crossCuttingRequirements,
  dedupeRequirements,
  keywordConfidence,
  recommendationsFor,
} from "../rules.ts";
import { Priority, RequirementCategory, RiskLevel, type ScoredDomain } from "../types.ts";

describe("keywordConfidence", () => {
  it("scores the share of keywords found as substrings", () => {
    const result = keywordConfidence("Patient records must comply with HIPAA.", ["patient", "HIPAA", "diagnosis"]);
    expect(result.confidence).toBe(2 / 3);
    expect(result.matched).toEqual(["patient", "hipaa"]);
  });

  it("case-folds and de-duplicates keywords before counting", () => {
    expect(keywordConfidence("A REST api", ["API", "api", " Api "]).confidence).toBe(1);
  });

  it("returns 0 for an empty keyword set or empty text", () => {
    expect(keywordConfidence("anything", []).confidence).toBe(0);
    expect(keywordConfidence("", ["patient"]).confidence).toBe(0);
  });

  it("matches multi-word phrases", () => {
    const result = keywordConfidence("Store every medical record securely", ["medical record", "x-ray"]);
    expect(result.matched).toEqual(["medical record"]);
    expect(result.confidence).toBe(0.5);
  });
});

describe("compareScored", () => {
  const scored = (domain: string, confidence: number, priorityScore: number, order: number): ScoredDomain => ({
    domain,
    confidence,
    priorityScore,
    matchedKeywords: [],
    order,
  });

  it("orders by confidence, then priority, then registration order", () => {
    const ranked = [
      scored("late", 0.5, 3, 3),
      scored("low", 0.5, 1, 0),
      scored("best", 0.9, 1, 4),
      scored("early", 0.5, 3, 1),
    ].sort(compareScored);
    expect(ranked.map((s) => s.domain)).toEqual(["best", "early", "late", "low"]);
  });
});

describe("crossCuttingRequirements", () => {
  it("adds security, reliability with the stated uptime, and real-time", () => {
    const titles = crossCuttingRequirements("Secure login with 99.95% uptime and live updates").map((r) => r.title);
    expect(titles).toEqual([
      "Comprehensive Cybersecurity Framework and Data Protection",
      "System Reliability and Performance (99.95% uptime requirement)",
      "Real-Time Data Processing and Event Handling System",
    ]);
  });

  it("defaults the uptime figure to 99.9", () => {
    expect(crossCuttingRequirements("Improve performance")).toEqual([
      {
        title: "System Reliability and Performance (99.9% uptime requirement)",
        priority: Priority.HIGH,
        category: RequirementCategory.NON_FUNCTIONAL,
      },
    ]);
  });

  it("returns nothing for unrelated text", () => {
    expect(crossCuttingRequirements("a plain note")).toEqual([]);
  });
});

describe("dedupeRequirements", () => {
  it("keeps the first requirement per case-insensitive title", () => {
    const result = dedupeRequirements([
      { title: "A", priority: Priority.HIGH, category: RequirementCategory.FUNCTIONAL },
      { title: "a", priority: Priority.LOW, category: RequirementCategory.FUNCTIONAL },
      { title: "B", priority: Priority.LOW, category: RequirementCategory.FUNCTIONAL },
    ]);
    expect(result.map((r) => [r.title, r.priority])).toEqual([["A", "high"], ["B", "low"]]);
  });
});

describe("assessRiskLevel", () => {
  it("is high with two or more high-risk terms", () => {
    expect(assessRiskLevel("complex enterprise integration")).toBe(RiskLevel.HIGH);
  });

  it("is medium with one high-risk term or two medium terms", () => {
    expect(assessRiskLevel("critical fix")).toBe(RiskLevel.MEDIUM);
    expect(assessRiskLevel("standard and typical")).toBe(RiskLevel.MEDIUM);
  });

  it("is low otherwise", () => {
    expect(assessRiskLevel("a simple tool")).toBe(RiskLevel.LOW);
  });
});

describe("recommendationsFor", () => {
  it("caps the list at three", () => {
    expect(recommendationsFor("")).toEqual([
      "Add comprehensive testing strategy",
      "Include security requirements and measures",
      "Define performance criteria and benchmarks",
    ]);
  });

  it("asks for more detail on short documents", () => {
    expect(recommendationsFor("test security performance")).toEqual([
      "Expand requirements with more detailed specifications",
    ]);
  });

  it("is empty for a long document that covers everything", () => {
    expect(recommendationsFor(`test security performance ${"x".repeat(300)}`)).toEqual([]);
  });
});

describe("assessSpecQuality", () => {
  it("scores a thin spec and says what is missing", () => {
    expect(
      assessSpecQuality({
        name: "beekeeping",
        keywords: ["hive", "Hive", "honey"],
        extractRequirements: [{ title: "Hive Telemetry", priority: "high", category: "functional" }],
        priorityScore: 2,
      }),
    ).toEqual({
      score: 15,
      recommendations: [
        "Add more domain-specific keywords for better detection",
        "Define more requirement patterns for comprehensive extraction",
        "Consider increasing priority score if domain is highly specific",
      ],
    });
  });

  it("gives full marks to a complete spec", () => {
    expect(
      assessSpecQuality({
        name: "beekeeping",
        keywords: ["hive", "honey", "apiary", "pollen", "queen"],
        extractRequirements: [
          { title: "Hive Telemetry", priority: "high", category: "functional" },
          { title: "Sensor Uptime", priority: "medium", category: "non-functional" },
        ],
        stakeholders: ["Beekeepers", "Apiary Owners", "Inspectors"],
        priorityScore: 4,
      }),
    ).toEqual({ score: 100, recommendations: [] });
  });
});
