/**
 * Container — wires configuration, the registry, persisted plugins and the
 * plugin creator.
 */

import { resolve } from "node:path";
import { loadConfig, GeneratorMode, type DomainkitConfig } from "./config.ts";
import { ConfigError } from "./domain/errors.ts";
import type { HandlerGenerator } from "./domain/types.ts";
import { createDefaultRegistry, type DomainRegistry } from "./application/handlers/registry.ts";
import { RuleBasedHandler } from "./application/handlers/rule-based.ts";
import { HeuristicHandlerGenerator } from "./application/plugins/content-analysis.ts";
import { PluginCreator } from "./application/plugins/plugin-creator.ts";
import { LlmHandlerGenerator } from "./infra/llm-generator.ts";
import { PluginStore } from "./infra/plugin-store.ts";
import { getLogger, initLogger } from "./logger.ts";

export interface Container {
  config: DomainkitConfig;
  registry: DomainRegistry;
  store: PluginStore;
  generator: HandlerGenerator | null;
  creator: PluginCreator;
}

export function createGenerator(config: DomainkitConfig): HandlerGenerator | null {
  switch (config.generator) {
    case GeneratorMode.NONE:
      return null;
    case GeneratorMode.HEURISTIC:
      return new HeuristicHandlerGenerator();
    case GeneratorMode.LLM:
      if (!config.llm.apiKey) {
        throw new ConfigError(["LLM_API_KEY: required when DOMAINKIT_GENERATOR is llm"]);
      }
      return new LlmHandlerGenerator(config.llm);
    case GeneratorMode.AUTO:
      return config.llm.apiKey ? new LlmHandlerGenerator(config.llm) : new HeuristicHandlerGenerator();
  }
}

/** Registers every spec listed in the plugin manifest over the built-ins. */
export async function loadPlugins(registry: DomainRegistry, store: PluginStore): Promise<number> {
  const log = getLogger("container");
  const { specs, failures } = await store.loadAll();

  for (const failure of failures) {
    log.warn({ file: failure.file, error: failure.error }, "skipping invalid plugin file");
  }
  for (const spec of specs) {
    registry.register(new RuleBasedHandler(spec), { replace: true });
  }
  return specs.length;
}

export async function createContainer(
  options: { config?: DomainkitConfig; env?: Record<string, string | undefined> } = {},
): Promise<Container> {
  const config = options.config ?? loadConfig(options.env);
  initLogger(config.logLevel);

  const registry = createDefaultRegistry();
  const store = new PluginStore(resolve(config.pluginsDir));
  const loaded = await loadPlugins(registry, store);

  const generator = createGenerator(config);
  const creator = new PluginCreator(registry, generator, {
    threshold: config.confidenceThreshold,
    summaryCount: config.summaryCount,
    timeoutMs: config.llm.timeoutMs,
    collisionPolicy: config.collisionPolicy,
    store,
  });

  getLogger("container").debug(
    { domains: registry.size, plugins: loaded, generator: generator?.name ?? null },
    "container ready",
  );

  return { config, registry, store, generator, creator };
}
