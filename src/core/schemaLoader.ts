import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { SchemaObject } from "ajv";

const distDir = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
);
const projectRoot = path.resolve(distDir, "..");

function assetCandidates(...segments: string[]) {
  return [
    // Packaged assets under dist/ (installed CLI)
    path.join(distDir, ...segments),
    // Source assets in a dev/linked setup
    path.join(projectRoot, "src", ...segments),
  ];
}

const schemaCache = new Map<string, SchemaObject>();

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function loadSchemaFile(fileName: string): Promise<SchemaObject> {
  const cached = schemaCache.get(fileName);
  if (cached) return cached;

  for (const candidate of assetCandidates("schemas", fileName)) {
    if (await fs.pathExists(candidate)) {
      const schema: unknown = await fs.readJson(candidate);
      if (!isSchemaObject(schema)) {
        throw new Error(`Schema is not a JSON object: ${candidate}`);
      }
      schemaCache.set(fileName, schema);
      return schema;
    }
  }

  throw new Error(`Schema not found: ${fileName}`);
}

export async function loadDataFile(relPath: string): Promise<unknown> {
  for (const candidate of assetCandidates(relPath)) {
    if (await fs.pathExists(candidate)) {
      return fs.readJson(candidate);
    }
  }
  throw new Error(`Data file not found: ${relPath}`);
}

/** Directory holding the JSON definitions of the built-in domain handlers. */
export async function builtinHandlersDir(): Promise<string> {
  for (const candidate of assetCandidates("domains", "builtin")) {
    if (await fs.pathExists(candidate)) return candidate;
  }
  throw new Error("Built-in handler definitions not found (domains/builtin)");
}
