import fs from "fs-extra";
import path from "node:path";
import ora from "ora";
import chalk from "chalk";
import { loadPipelineContext, type ConfigOverrides, type PipelineConfig } from "../core/context.js";
import { createEngine, type Engine } from "../core/engine.js";
import { checkEnvironment } from "../core/env.js";
import { setEngineEventListener, type EngineEvent } from "../core/events.js";
import { configureLogger } from "../core/logger.js";
import { runPipeline } from "../core/orchestrator.js";
import { parseDocument } from "../core/ingress.js";
import { weightedScore } from "../domains/handler.js";
import { exitCodeFor, formatDescriptor, formatOutcome } from "./report.js";
import { ProgressReporter, progressModeFromOpts } from "./progress.js";
import { printUsageReport } from "./usage.js";

export type CliOpts = ConfigOverrides & {
  domain?: string;
  json?: boolean;
  out?: string;
  verbose?: boolean;
};

function loadConfig(opts: CliOpts): PipelineConfig {
  const config = loadPipelineContext(opts);
  configureLogger({ debug: config.debug, quiet: config.quiet || !!opts.json });
  return config;
}

async function withEngine<T>(
  label: string,
  opts: CliOpts,
  fn: (engine: Engine) => Promise<T>,
): Promise<T> {
  const config = loadConfig(opts);
  const quiet = config.quiet || !!opts.json;
  const reporter = opts.verbose && !quiet ? new ProgressReporter(progressModeFromOpts(opts)) : null;
  const spinner = !quiet && !reporter ? ora(label).start() : null;
  const startedAt = Date.now();
  let iteration = 0;
  let current = "";

  setEngineEventListener((ev: EngineEvent) => {
    reporter?.log(ev);
    if (!spinner) return;
    if (ev.type === "iteration-start" && ev.iteration) iteration = ev.iteration;
    if (ev.type === "stage-start" && ev.stage) current = ev.stage;
    if (ev.type === "gate-start" && ev.gate) current = `gate:${ev.gate}`;
    const elapsedSec = Math.round((Date.now() - startedAt) / 1000);
    const round = iteration ? ` iteration=${iteration}` : "";
    spinner.text = `${label}: ${current || "starting"}${round} time=${elapsedSec}s`;
  });

  try {
    const engine = await createEngine(config);
    const result = await fn(engine);
    spinner?.succeed("done");
    return result;
  } catch (e) {
    spinner?.fail(String(e));
    throw e;
  } finally {
    setEngineEventListener(null);
  }
}

export async function runRun(file: string, opts: CliOpts): Promise<number> {
  const raw = await fs.readFile(path.resolve(file));
  const { outcome, maxIterations } = await withEngine(`reqforge run ${path.basename(file)}`, opts, async (engine) => ({
    outcome: await runPipeline(raw, engine, {
      domainHint: opts.domain,
      maxIterations: engine.config.maxIterations,
      debug: engine.config.debug,
    }),
    maxIterations: engine.config.maxIterations,
  }));

  if (opts.out) {
    const outFile = path.resolve(opts.out);
    await fs.outputJson(outFile, outcome, { spaces: 2 });
    if (!opts.json) console.log(chalk.dim(`outcome written to ${outFile}`));
  }
  if (opts.json) {
    console.log(JSON.stringify(outcome, null, 2));
  } else {
    for (const line of formatOutcome(outcome, maxIterations)) console.log(line);
  }
  return exitCodeFor(outcome);
}

/** Scores every handler against a document without running the pipeline. */
export async function runDetect(file: string, opts: CliOpts): Promise<number> {
  const parsed = parseDocument(await fs.readFile(path.resolve(file)));
  if (!parsed.ok) {
    console.error(chalk.redBright(`${parsed.error.kind}: ${parsed.error.message}`));
    return 1;
  }
  const content = parsed.value.content;
  const scores = await withEngine("reqforge detect", { ...opts, synthesis: false }, async (engine) => {
    const rows: { name: string; score: number }[] = [];
    for (const name of engine.catalog.list()) {
      const handler = await engine.catalog.get(name);
      if (handler) rows.push({ name, score: weightedScore(handler, content) });
    }
    return { rows, threshold: engine.config.threshold };
  });

  const ranked = [...scores.rows].sort((a, b) => b.score - a.score);
  if (opts.json) {
    console.log(JSON.stringify({ threshold: scores.threshold, scores: ranked }, null, 2));
    return 0;
  }
  for (const { name, score } of ranked) {
    const line = `${score.toFixed(3)}  ${name}`;
    console.log(score >= scores.threshold ? chalk.greenBright(line) : line);
  }
  return 0;
}

export async function runDomains(opts: CliOpts): Promise<number> {
  const descriptors = await withEngine("reqforge domains", { ...opts, synthesis: false }, async (engine) =>
    engine.catalog.descriptors(),
  );
  if (opts.json) {
    console.log(JSON.stringify(descriptors, null, 2));
    return 0;
  }
  for (const d of descriptors) console.log(formatDescriptor(d));
  return 0;
}

export async function runUsage(opts: CliOpts): Promise<number> {
  const config = loadConfig(opts);
  await printUsageReport(config.stateDir, console.log, config.debug);
  return 0;
}

export async function runDoctor(opts: CliOpts): Promise<number> {
  const config = loadConfig(opts);
  return (await checkEnvironment(config)) ? 0 : 1;
}
