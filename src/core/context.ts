import path from "node:path";
import { z } from "zod";

export const SYNTHESIZERS = ["template", "openai"] as const;
export type SynthesizerId = (typeof SYNTHESIZERS)[number];

const DEFAULT_STATE_DIR = ".reqforge";
const DEFAULT_MODEL = "gpt-4.1-mini";

const flag = z.preprocess((v) => {
  if (typeof v !== "string") return v;
  const s = v.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(s)) return true;
  if (["0", "false", "no", "off"].includes(s)) return false;
  return v;
}, z.boolean());

const ConfigSchema = z.object({
  threshold: z.coerce.number().min(0).max(1),
  maxIterations: z.coerce.number().int().min(1).max(20),
  synthesis: flag,
  synthesizer: z.enum(SYNTHESIZERS),
  synthesisTimeoutMs: z.coerce.number().int().positive(),
  model: z.string().min(1),
  stateDir: z.string().min(1),
  handlerDirs: z.array(z.string().min(1)),
  debug: flag,
  quiet: flag,
});

export type PipelineConfig = z.infer<typeof ConfigSchema>;

/** Values as they arrive from commander: strings, numbers or booleans. */
export type ConfigOverrides = {
  threshold?: string | number;
  maxIterations?: string | number;
  synthesis?: boolean;
  synthesizer?: string;
  synthesisTimeoutMs?: string | number;
  model?: string;
  stateDir?: string;
  handlerDirs?: string[];
  debug?: boolean;
  quiet?: boolean;
};

const DEFAULTS = {
  threshold: 0.6,
  maxIterations: 3,
  synthesis: true,
  synthesizer: "template",
  synthesisTimeoutMs: 30_000,
  model: DEFAULT_MODEL,
  stateDir: DEFAULT_STATE_DIR,
  handlerDirs: [],
  debug: false,
  quiet: false,
} satisfies Record<keyof PipelineConfig, unknown>;

function fromEnv(env: NodeJS.ProcessEnv) {
  const dirs = env.REQFORGE_HANDLER_DIRS?.split(path.delimiter).filter(Boolean);
  return {
    threshold: env.REQFORGE_THRESHOLD,
    maxIterations: env.REQFORGE_MAX_ITERATIONS,
    synthesis: env.REQFORGE_SYNTHESIS,
    synthesizer: env.REQFORGE_SYNTHESIZER,
    synthesisTimeoutMs: env.REQFORGE_SYNTHESIS_TIMEOUT_MS,
    model: env.REQFORGE_MODEL,
    stateDir: env.REQFORGE_STATE_DIR,
    handlerDirs: dirs?.length ? dirs : undefined,
    debug: env.REQFORGE_DEBUG,
  };
}

function pickDefined(obj: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined && v !== ""),
  );
}

/**
 * Merge CLI options over REQFORGE_* variables over defaults and validate the
 * result. Directories come back absolute, resolved against `cwd`.
 */
export function loadPipelineContext(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): PipelineConfig {
  const merged = {
    ...DEFAULTS,
    ...pickDefined(fromEnv(env)),
    ...pickDefined(overrides),
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "config"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const config = parsed.data;
  return {
    ...config,
    stateDir: path.resolve(cwd, config.stateDir),
    handlerDirs: config.handlerDirs.map((d) => path.resolve(cwd, d)),
  };
}
