import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { HandlerSpec } from "../../domain/handler-spec.ts";
import { PluginStore, handlerFileName } from "../plugin-store.ts";

const BEE_SPEC: HandlerSpec = {
  name: "beekeeping",
  keywords: ["beekeeping", "hive", "honey"],
  extractRequirements: [{ title: "Hive Telemetry", priority: "high", category: "functional" }],
  priorityScore: 4,
};

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "domainkit-plugins-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("PluginStore", () => {
  it("names handler files after the domain", () => {
    expect(handlerFileName("real_estate")).toBe("real_estate_handler.json");
  });

  it("returns an empty manifest for a missing directory", async () => {
    const store = new PluginStore(join(dir, "absent"));
    expect(await store.loadManifest()).toEqual({ version: "1.0.0", handlers: [] });
    expect(await store.loadAll()).toEqual({ specs: [], failures: [] });
  });

  it("saves a spec and records it in the manifest", async () => {
    const store = new PluginStore(dir);
    const path = await store.save(BEE_SPEC);

    expect(path).toBe(join(dir, "beekeeping_handler.json"));
    expect(JSON.parse(await readFile(path, "utf-8"))).toEqual(BEE_SPEC);

    const manifest = await store.loadManifest();
    expect(manifest.handlers).toHaveLength(1);
    expect(manifest.handlers[0]).toMatchObject({ domain: "beekeeping", file: "beekeeping_handler.json" });
  });

  it("replaces the manifest entry when a domain is saved again", async () => {
    const store = new PluginStore(dir);
    await store.save(BEE_SPEC);
    await store.save({ ...BEE_SPEC, keywords: ["apiary"] });

    const manifest = await store.loadManifest();
    expect(manifest.handlers.map((h) => h.domain)).toEqual(["beekeeping"]);

    const { specs } = await store.loadAll();
    expect(specs).toEqual([{ ...BEE_SPEC, keywords: ["apiary"] }]);
  });

  it("loads specs in manifest order", async () => {
    const store = new PluginStore(dir);
    await store.save(BEE_SPEC);
    await store.save({ ...BEE_SPEC, name: "orchard", keywords: ["orchard"] });

    const { specs, failures } = await store.loadAll();
    expect(specs.map((s) => s.name)).toEqual(["beekeeping", "orchard"]);
    expect(failures).toEqual([]);
  });

  it("reports invalid files and loads the rest", async () => {
    const store = new PluginStore(dir);
    await store.save(BEE_SPEC);
    await store.save({ ...BEE_SPEC, name: "orchard", keywords: ["orchard"] });
    await writeFile(join(dir, "orchard_handler.json"), JSON.stringify({ name: "orchard" }), "utf-8");

    const { specs, failures } = await store.loadAll();
    expect(specs.map((s) => s.name)).toEqual(["beekeeping"]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.file).toBe("orchard_handler.json");
  });

  it("keeps every entry when saves overlap", async () => {
    const store = new PluginStore(dir);
    const results = await Promise.allSettled([
      store.save(BEE_SPEC),
      store.save({ ...BEE_SPEC, name: "orchard", keywords: ["orchard"] }),
      store.save({ ...BEE_SPEC, name: "vineyard", keywords: ["vineyard"] }),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled", "fulfilled"]);
    const { specs, failures } = await store.loadAll();
    expect(specs.map((s) => s.name)).toEqual(["beekeeping", "orchard", "vineyard"]);
    expect(failures).toEqual([]);
  });

  it("reports a corrupt manifest and loads nothing", async () => {
    await writeFile(join(dir, "manifest.json"), "{ not json", "utf-8");
    const store = new PluginStore(dir);

    const { specs, failures } = await store.loadAll();
    expect(specs).toEqual([]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.file).toBe("manifest.json");
  });
});
