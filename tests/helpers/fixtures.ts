import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import type { HandlerDefinition, RequirementRule } from "../../src/core/types.js";

export async function makeTempDir(prefix: string) {
  return fs.mkdtemp(path.join(os.tmpdir(), `reqforge-${prefix}-`));
}

export function definition(
  name: string,
  keywords: string[],
  priority: number,
  extra: Partial<HandlerDefinition> = {},
): HandlerDefinition {
  return {
    name,
    keywords,
    priority,
    requirements: [
      {
        title: `${name} core`,
        triggers: [keywords[0] ?? name],
        priority: "high",
        category: "functional",
      },
    ],
    stakeholders: { base: [] },
    ...extra,
  };
}

export async function writeDefinition(dir: string, file: string, body: unknown) {
  await fs.ensureDir(dir);
  await fs.writeJson(path.join(dir, file), body, { spaces: 2 });
}

/** Rules "Capability 1".."Capability n", all triggered by "plan". */
export function capabilityRules(priorities: RequirementRule["priority"][]): RequirementRule[] {
  return priorities.map((priority, i) => ({
    title: `Capability ${i + 1}`,
    triggers: ["plan"],
    priority,
    category: "functional",
  }));
}
