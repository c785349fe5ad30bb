import fs from "fs-extra";
import type { PipelineConfig } from "./context.js";
import { hasOpenAIKey } from "./llm.js";
import { builtinHandlersDir, loadSchemaFile } from "./schemaLoader.js";
import { HANDLER_SCHEMA_FILE } from "../domains/catalog.js";
import { loadTemplateData } from "../synthesis/template.js";

export type CheckResult = { name: string; pass: boolean; optional?: boolean; info?: string };

function pad(name: string, width: number) {
  return (name + " ".repeat(width)).slice(0, width);
}

function mark(pass: boolean) {
  return pass ? "✓" : "✗";
}

async function check(name: string, fn: () => Promise<string | undefined>, optional = false) {
  try {
    return { name, pass: true, optional, info: await fn() };
  } catch (e) {
    return { name, pass: false, optional, info: e instanceof Error ? e.message : String(e) };
  }
}

export async function collectEnvironmentChecks(config: PipelineConfig): Promise<CheckResult[]> {
  const [major] = process.versions.node.split(".").map(Number);
  const results: CheckResult[] = [
    { name: "Node >= 20", pass: major >= 20, info: process.versions.node },
  ];

  results.push(await check("handler schema", async () => {
    await loadSchemaFile(HANDLER_SCHEMA_FILE);
    return HANDLER_SCHEMA_FILE;
  }));
  results.push(await check("built-in handlers", async () => {
    const dir = await builtinHandlersDir();
    const files = (await fs.readdir(dir)).filter((f) => f.endsWith(".json"));
    return `${files.length} in ${dir}`;
  }));
  results.push(await check("template synthesizer data", async () => {
    const data = await loadTemplateData();
    return `${Object.keys(data.domainPatterns).length} domain patterns`;
  }));
  results.push(await check("state dir writable", async () => {
    await fs.ensureDir(config.stateDir);
    await fs.access(config.stateDir, fs.constants.W_OK);
    return config.stateDir;
  }));
  results.push({
    name: "OPENAI_API_KEY/OPENAI_KEY present",
    pass: hasOpenAIKey(),
    optional: config.synthesizer !== "openai",
  });
  return results;
}

export async function checkEnvironment(config: PipelineConfig, log: Console = console) {
  const results = await collectEnvironmentChecks(config);
  const width = 36;
  log.info("Environment check:");
  for (const r of results) {
    const suffix = r.optional ? " (optional)" : "";
    log.info(`  ${mark(r.pass)} ${pad(`${r.name}${suffix}:`, width)}${r.info ?? ""}`);
  }
  const allPass = results.every((r) => r.pass || r.optional);
  if (!allPass) {
    log.warn("Some requirements not met. Runs may fall back to the general handler.");
  }
  return allPass;
}
