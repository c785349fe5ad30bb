import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";

const distDir = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
);
const projectRoot = path.resolve(distDir, "..");

export async function loadPrompt(fileName: string) {
  const candidates = [
    // CWD override
    path.join(process.cwd(), "prompts", fileName),
    // Packaged prompts under dist/ (if present)
    path.join(distDir, "prompts", fileName),
    // Source prompts in a dev/linked setup
    path.join(projectRoot, "src", "prompts", fileName),
  ];

  for (const candidate of candidates) {
    if (await fs.pathExists(candidate)) {
      return fs.readFile(candidate, "utf8");
    }
  }

  throw new Error(`Prompt not found: ${fileName}`);
}

/** Replace `{{key}}` placeholders; unknown keys are left as they are. */
export function renderPrompt(template: string, vars: Record<string, string>) {
  return template.replace(/\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(vars, key) ? vars[key] : whole,
  );
}
