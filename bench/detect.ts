/**
 * Benchmark — measures detection and pipeline latency.
 */

import { createDefaultRegistry } from "../src/application/handlers/registry.ts";
import { runPipeline } from "../src/application/commands/run-pipeline.ts";
import { initLogger } from "../src/logger.ts";

initLogger("silent");

const DOCUMENTS = [
  "Patient portal with appointment booking, prescription refills and HIPAA-compliant medical records.",
  "Online store with shopping cart, checkout, payment processing and order tracking.",
  "Trading platform with digital wallet, KYC onboarding and fraud detection for banking customers.",
  "Restaurant reservation system with menu management, kitchen display and table booking.",
  "Track beekeeping hive temperature and honey yield.",
];

interface BenchResult {
  label: string;
  ms: number;
}

const results: BenchResult[] = [];

function record(label: string, ms: number) {
  results.push({ label, ms });
  console.log(`  ${label}: ${ms.toFixed(3)}ms`);
}

function average(times: number[]): number {
  return times.reduce((a, b) => a + b, 0) / times.length;
}

console.log("\n=== domainkit Benchmark ===\n");

console.log("1. Registry construction:");
let t0 = performance.now();
const registry = createDefaultRegistry();
record("registry_build", performance.now() - t0);
console.log(`   Domains: ${registry.size}`);

console.log("\n2. Detection latency:");
t0 = performance.now();
registry.detect(DOCUMENTS[0] ?? "");
record("detect_cold", performance.now() - t0);

const detectTimes: number[] = [];
for (let i = 0; i < 1000; i++) {
  const t = performance.now();
  registry.detect(DOCUMENTS[i % DOCUMENTS.length] ?? "");
  detectTimes.push(performance.now() - t);
}
record("detect_warm_avg_1000", average(detectTimes));

console.log("\n3. Pipeline latency (detection only, no generation):");
const pipelineTimes: number[] = [];
for (const text of DOCUMENTS) {
  const t = performance.now();
  await runPipeline(text, { registry });
  pipelineTimes.push(performance.now() - t);
}
record(`pipeline_avg_${DOCUMENTS.length}`, average(pipelineTimes));

console.log("\n\n=== Summary ===\n");
console.log("| Metric | Time (ms) |");
console.log("|--------|-----------|");
for (const r of results) {
  console.log(`| ${r.label} | ${r.ms.toFixed(3)} |`);
}
console.log("\nDone.");
