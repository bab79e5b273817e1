/**
 * Plugin store — persists created handlers under the plugins directory:
 *
 *   <dir>/<domain>_handler.json   one HandlerSpec per file
 *   <dir>/manifest.json           which files to load, in order
 */

import { join } from "node:path";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { z } from "zod";
import { messageOf } from "../domain/errors.ts";
import { validateHandlerSpec, type HandlerSpec } from "../domain/handler-spec.ts";
import type { HandlerSink } from "../application/plugins/plugin-creator.ts";

export const MANIFEST_VERSION = "1.0.0";

const ManifestSchema = z.object({
  version: z.string(),
  handlers: z.array(
    z.object({
      domain: z.string(),
      file: z.string(),
      created_at: z.string(),
    }),
  ),
});

export type PluginManifest = z.infer<typeof ManifestSchema>;

export interface LoadFailure {
  file: string;
  error: string;
}

export interface LoadedPlugins {
  specs: HandlerSpec[];
  failures: LoadFailure[];
}

export function handlerFileName(domain: string): string {
  return `${domain}_handler.json`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

let tmpCounter = 0;

export class PluginStore implements HandlerSink {
  /** Tail of the save queue; manifest updates are read-modify-write. */
  private pending: Promise<unknown> = Promise.resolve();

  constructor(readonly pluginsDir: string) {}

  /** Writes the spec and records it in the manifest. Returns the file path. */
  save(spec: HandlerSpec): Promise<string> {
    const next = this.pending.then(() => this.write(spec));
    // The caller sees the failure through `next`; the queue moves on.
    this.pending = next.catch(() => undefined);
    return next;
  }

  private async write(spec: HandlerSpec): Promise<string> {
    await mkdir(this.pluginsDir, { recursive: true });
    const file = handlerFileName(spec.name);
    const path = join(this.pluginsDir, file);
    await writeAtomic(path, JSON.stringify(spec, null, 2) + "\n");

    const manifest = await this.loadManifest();
    const entry = { domain: spec.name, file, created_at: new Date().toISOString() };
    const index = manifest.handlers.findIndex((h) => h.domain === spec.name);
    if (index >= 0) manifest.handlers[index] = entry;
    else manifest.handlers.push(entry);
    await writeAtomic(join(this.pluginsDir, "manifest.json"), JSON.stringify(manifest, null, 2) + "\n");

    return path;
  }

  async loadManifest(): Promise<PluginManifest> {
    let text: string;
    try {
      text = await readFile(join(this.pluginsDir, "manifest.json"), "utf-8");
    } catch (e) {
      if (isMissingFile(e)) return { version: MANIFEST_VERSION, handlers: [] };
      throw e;
    }
    return ManifestSchema.parse(JSON.parse(text));
  }

  /**
   * Loads every spec the manifest lists. A bad file is reported in
   * `failures` and skipped; the rest still load. An unreadable manifest
   * loads nothing and is reported the same way.
   */
  async loadAll(): Promise<LoadedPlugins> {
    const specs: HandlerSpec[] = [];
    const failures: LoadFailure[] = [];

    let manifest: PluginManifest;
    try {
      manifest = await this.loadManifest();
    } catch (e) {
      failures.push({ file: "manifest.json", error: messageOf(e) });
      return { specs, failures };
    }

    for (const { file } of manifest.handlers) {
      try {
        const text = await readFile(join(this.pluginsDir, file), "utf-8");
        specs.push(validateHandlerSpec(JSON.parse(text)));
      } catch (e) {
        failures.push({ file, error: messageOf(e) });
      }
    }

    return { specs, failures };
  }
}

async function writeAtomic(path: string, content: string): Promise<void> {
  const tmp = `${path}.${process.pid}.${++tmpCounter}.tmp`;
  await writeFile(tmp, content, "utf-8");
  await rename(tmp, path);
}
