import fs from "fs-extra";
import path from "node:path";
import type { HandlerDefinition, HandlerProvenance } from "../core/types.js";

export function customHandlersDir(stateDir: string) {
  return path.join(stateDir, "handlers");
}

/**
 * Write a synthesized definition with its provenance so the next scan picks
 * it up. Written to a temp file first so a crash never leaves half a file
 * in the scan path.
 */
export async function saveSynthesizedHandler(
  dir: string,
  definition: HandlerDefinition,
  provenance: HandlerProvenance,
): Promise<string> {
  await fs.ensureDir(dir);
  const file = path.join(dir, `${definition.name}.json`);
  const tmp = `${file}.${process.pid}.tmp`;
  await fs.writeJson(tmp, { ...definition, provenance }, { spaces: 2 });
  await fs.move(tmp, file, { overwrite: true });
  return file;
}
