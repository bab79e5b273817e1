/**
 * domainkit CLI.
 *
 * Subcommands: detect, extract, ensure, suggest, run, domains
 */

import { defineCommand, runMain } from "citty";
import { resolve } from "node:path";
import { createContainer } from "./container.ts";
import { DomainkitError } from "./domain/errors.ts";
import { detectQuery } from "./application/queries/detect-query.ts";
import { extractQuery } from "./application/queries/extract-query.ts";
import { domainsQuery } from "./application/queries/domains-query.ts";
import { runPipeline } from "./application/commands/run-pipeline.ts";
import { analyzeContent } from "./application/plugins/content-analysis.ts";
import { loadDocument, parseDocument } from "./infra/document-parser.ts";
import { renderApprovalXml } from "./infra/xml-renderer.ts";
import { closeLogger } from "./logger.ts";

const inputArgs = {
  file: { type: "positional", description: "Path to a requirements document", required: false },
  text: { type: "string", description: "Document text (instead of a file)" },
} as const;

async function readInput(args: { file?: string; text?: string }): Promise<string> {
  if (args.text) return parseDocument(args.text).text;
  if (args.file) return (await loadDocument(resolve(args.file))).text;
  throw new DomainkitError("INPUT_MISSING", "pass a document path or --text");
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// ── Detection ───────────────────────────────────────────────────────

const detectCmd = defineCommand({
  meta: { name: "detect", description: "Detect the business domain of a document" },
  args: {
    ...inputArgs,
    n: { type: "string", description: "Max candidates", default: "5" },
  },
  async run({ args }) {
    const limit = Number(args.n);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new DomainkitError("INVALID_ARGUMENT", `--n must be a positive integer, got '${args.n}'`);
    }
    const text = await readInput(args);
    const { registry } = await createContainer();
    print(detectQuery({ text, limit }, registry));
  },
});

const extractCmd = defineCommand({
  meta: { name: "extract", description: "Extract requirements and stakeholders" },
  args: {
    ...inputArgs,
    domain: { type: "string", description: "Domain to extract with (default: detected)" },
    "cross-cutting": { type: "boolean", description: "Add security, reliability and real-time requirements", default: true },
  },
  async run({ args }) {
    const text = await readInput(args);
    const { registry } = await createContainer();
    print(extractQuery({ text, domain: args.domain ?? null, crossCutting: args["cross-cutting"] }, registry));
  },
});

const domainsCmd = defineCommand({
  meta: { name: "domains", description: "List registered domain handlers" },
  async run() {
    const { registry } = await createContainer();
    print(domainsQuery(registry));
  },
});

// ── Plugin creation ─────────────────────────────────────────────────

const ensureCmd = defineCommand({
  meta: { name: "ensure", description: "Reuse a matching handler or create a new one" },
  args: inputArgs,
  async run({ args }) {
    const text = await readInput(args);
    const { creator } = await createContainer();
    print(await creator.ensureHandler(text));
  },
});

const suggestCmd = defineCommand({
  meta: { name: "suggest", description: "Offline content analysis and handler suggestion" },
  args: inputArgs,
  async run({ args }) {
    print(analyzeContent(await readInput(args)));
  },
});

// ── Pipeline ────────────────────────────────────────────────────────

const runCmd = defineCommand({
  meta: { name: "run", description: "Run analyze → requirements → tasks → approval" },
  args: {
    ...inputArgs,
    format: { type: "string", description: "Output format: json or xml", default: "json" },
    create: { type: "boolean", description: "Create a handler when none matches (--no-create to detect only)", default: true },
  },
  async run({ args }) {
    if (args.format !== "json" && args.format !== "xml") {
      throw new DomainkitError("INVALID_ARGUMENT", `unknown format '${args.format}' (expected json or xml)`);
    }
    const text = await readInput(args);
    const { registry, creator, config } = await createContainer();

    const result = await runPipeline(text, {
      registry,
      creator: args.create ? creator : null,
      minRequirements: config.minRequirements,
    });

    if (args.format === "xml") console.log(renderApprovalXml(result));
    else print(result);
  },
});

// ── Main ────────────────────────────────────────────────────────────

const main = defineCommand({
  meta: { name: "domainkit", version: "1.0.0", description: "Keyword-based domain detection and requirements analysis" },
  subCommands: {
    detect: detectCmd,
    extract: extractCmd,
    ensure: ensureCmd,
    suggest: suggestCmd,
    run: runCmd,
    domains: domainsCmd,
  },
  cleanup() {
    closeLogger();
  },
});

runMain(main);
