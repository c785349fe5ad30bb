#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import { logError } from "../core/logger.js";
import {
  runDetect,
  runDoctor,
  runDomains,
  runRun,
  runUsage,
  type CliOpts,
} from "./runners.js";

loadDotenv();

const program = new Command()
  .name("reqforge")
  .description("Turn a project description into a reviewed requirements and task plan")
  .option("--state <dir>", "state directory for synthesized handlers and the cost ledger")
  .option("--handlers <dir...>", "extra directories of handler definitions")
  .option("--threshold <n>", "confidence needed to accept an existing handler (0..1)")
  .option("--no-synthesis", "never synthesize handlers; fall back to general")
  .option("--synthesizer <id>", "handler synthesizer (template|openai)")
  .option("--model <name>", "model used by the openai synthesizer")
  .option("--json", "machine-readable output")
  .option("--debug", "verbose logging of scoring, synthesis and gates")
  .option("--verbose", "print a progress line per stage instead of a spinner")
  .option("--quiet", "minimal output (no spinner, no info logs)");

type GlobalOpts = {
  state?: string;
  handlers?: string[];
  threshold?: string;
  synthesis?: boolean;
  synthesizer?: string;
  model?: string;
  json?: boolean;
  debug?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

function globalOpts(): CliOpts {
  const o = program.opts<GlobalOpts>();
  return {
    stateDir: o.state,
    handlerDirs: o.handlers,
    threshold: o.threshold,
    // commander sets synthesis=true by default for --no-synthesis; only the flag overrides env
    synthesis: o.synthesis === false ? false : undefined,
    synthesizer: o.synthesizer,
    model: o.model,
    json: o.json,
    debug: o.debug,
    verbose: o.verbose,
    quiet: o.quiet,
  };
}

function exitWith(code: number) {
  process.exitCode = code;
}

program
  .command("run")
  .description("Resolve the domain and iterate requirements, tasks and quality gate")
  .argument("<file>", "project description (UTF-8 text)")
  .option("--domain <name>", "domain hint; skips scoring when the handler exists")
  .option("--max-iterations <n>", "bound on quality gate evaluations")
  .option("--out <file>", "also write the outcome as JSON")
  .action(async (file: string, cmd: { domain?: string; maxIterations?: string; out?: string }) => {
    exitWith(
      await runRun(file, {
        ...globalOpts(),
        domain: cmd.domain,
        maxIterations: cmd.maxIterations,
        out: cmd.out,
      }),
    );
  });

program
  .command("detect")
  .description("Score every known handler against a document")
  .argument("<file>", "project description (UTF-8 text)")
  .action(async (file: string) => exitWith(await runDetect(file, globalOpts())));

program
  .command("domains")
  .description("List built-in and synthesized domain handlers")
  .action(async () => exitWith(await runDomains(globalOpts())));

program
  .command("usage")
  .description("Print the synthesis cost report from synthesis.jsonl")
  .action(async () => exitWith(await runUsage(globalOpts())));

program
  .command("doctor")
  .description("Check environment and bundled assets")
  .action(async () => exitWith(await runDoctor(globalOpts())));

program.parseAsync().catch((e: unknown) => {
  logError("cli", e instanceof Error ? e.message : String(e));
  process.exit(1);
});
