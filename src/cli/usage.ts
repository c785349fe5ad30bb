import { summarizeSynthesis } from "../core/usage.js";

export async function printUsageReport(
  stateDir: string,
  log: (line: string) => void = console.log,
  debug = false,
) {
  const summary = await summarizeSynthesis(stateDir, debug);
  if (!summary.entries) {
    log("No synthesis recorded yet (synthesis.jsonl is empty or missing).");
    return summary;
  }

  log("Synthesis cost summary:");
  log(`  Runs:          ${summary.runs}`);
  log(`  Created:       ${summary.created}`);
  log(`  Failed:        ${summary.failed}`);
  log(`  Total cost:    ${summary.totalCost.toFixed(4)}`);
  log(`  Total tokens:  ${summary.totalTokens}`);
  log(`  Avg quality:   ${summary.averageQuality === null ? "n/a" : summary.averageQuality.toFixed(0)}`);

  log("\nBy domain:");
  for (const [domain, b] of Object.entries(summary.byDomain)) {
    log(`  ${domain}: created=${b.created} failed=${b.failed} cost=${b.cost.toFixed(4)} tokens=${b.tokens}`);
  }

  log("\nBy synthesizer:");
  for (const [id, b] of Object.entries(summary.bySynthesizer)) {
    log(`  ${id}: created=${b.created} failed=${b.failed} cost=${b.cost.toFixed(4)} tokens=${b.tokens}`);
  }

  const rated = Object.entries(summary.quality);
  if (rated.length) {
    log("\nHandler quality:");
    for (const [domain, q] of rated) {
      log(`  ${domain}: ${q.score}/100`);
      for (const r of q.recommendations) log(`    - ${r}`);
    }
  }
  return summary;
}
