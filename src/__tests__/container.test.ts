import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig } from "../config.ts";
import { createContainer, createGenerator } from "../container.ts";
import { ConfigError } from "../domain/errors.ts";
import { PluginStore } from "../infra/plugin-store.ts";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "domainkit-container-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const env = () => ({ DOMAINKIT_PLUGINS_DIR: dir, DOMAINKIT_GENERATOR: "none", DOMAINKIT_LOG_LEVEL: "silent" });

describe("createContainer", () => {
  it("registers the built-in handlers", async () => {
    const c = await createContainer({ env: env() });
    expect(c.registry.size).toBe(12);
    expect(c.generator).toBeNull();
  });

  it("loads persisted plugins after the built-ins", async () => {
    await new PluginStore(dir).save({
      name: "beekeeping",
      keywords: ["hive", "honey"],
      extractRequirements: [{ title: "Hive Telemetry", priority: "high", category: "functional" }],
    });

    const c = await createContainer({ env: env() });
    expect(c.registry.list().at(-1)).toBe("beekeeping");
    expect(c.registry.detect("hive and honey").domain).toBe("beekeeping");
  });

  it("starts with the built-ins when the manifest is corrupt", async () => {
    await writeFile(join(dir, "manifest.json"), "{ not json", "utf-8");

    const c = await createContainer({ env: env() });
    expect(c.registry.size).toBe(12);
  });

  it("wires the creator to the store", async () => {
    const c = await createContainer({
      env: { ...env(), DOMAINKIT_GENERATOR: "heuristic" },
    });
    const decision = await c.creator.ensureHandler("Track beekeeping hive temperature and honey yield.");
    expect(decision).toEqual({
      action: "created",
      domain: "track",
      confidence: 1,
      persistedTo: join(dir, "track_handler.json"),
      quality: { score: 60, recommendations: ["Define more requirement patterns for comprehensive extraction"] },
    });
    expect((await c.store.loadManifest()).handlers.map((h) => h.domain)).toEqual(["track"]);
  });
});

describe("createGenerator", () => {
  it("picks the heuristic generator without an API key", () => {
    expect(createGenerator(loadConfig({}))?.name).toBe("heuristic");
  });

  it("picks the LLM generator with an API key", () => {
    expect(createGenerator(loadConfig({ LLM_API_KEY: "test-secret" }))?.name).toBe("llm");
  });

  it("requires a key for the llm mode", () => {
    expect(() => createGenerator(loadConfig({ DOMAINKIT_GENERATOR: "llm" }))).toThrow(ConfigError);
  });

  it("returns null for none", () => {
    expect(createGenerator(loadConfig({ DOMAINKIT_GENERATOR: "none" }))).toBeNull();
  });
});
