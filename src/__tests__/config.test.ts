import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.ts";
import { ConfigError } from "../domain/errors.ts";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      pluginsDir: ".domainkit/plugins",
      confidenceThreshold: 0.6,
      summaryCount: 3,
      collisionPolicy: "reject",
      minRequirements: 1,
      generator: "auto",
      logLevel: "info",
      llm: {
        apiKey: null,
        baseUrl: "https://api.anthropic.com/v1/",
        model: "claude-sonnet-4-20250514",
        timeoutMs: 30000,
      },
    });
  });

  it("reads and coerces variables", () => {
    const config = loadConfig({
      DOMAINKIT_CONFIDENCE_THRESHOLD: "0.75",
      DOMAINKIT_COLLISION_POLICY: "suffix",
      DOMAINKIT_GENERATOR: "heuristic",
      LLM_API_KEY: "test-secret",
      LLM_TIMEOUT_MS: "5000",
    });
    expect(config.confidenceThreshold).toBe(0.75);
    expect(config.collisionPolicy).toBe("suffix");
    expect(config.generator).toBe("heuristic");
    expect(config.llm.apiKey).toBe("test-secret");
    expect(config.llm.timeoutMs).toBe(5000);
  });

  it("treats empty values as unset", () => {
    expect(loadConfig({ LLM_API_KEY: "", DOMAINKIT_PLUGINS_DIR: "  " }).llm.apiKey).toBeNull();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ DOMAINKIT_CONFIDENCE_THRESHOLD: "2" })).toThrow(ConfigError);
    expect(() => loadConfig({ DOMAINKIT_COLLISION_POLICY: "merge" })).toThrow(ConfigError);
  });
});
