import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import { logDebug } from "./logger.js";

export const SYNTHESIS_LEDGER_FILE = "synthesis.jsonl";

const SynthesisEntrySchema = z.object({
  timestamp: z.string(),
  runId: z.string(),
  domain: z.string(),
  synthesizer: z.string(),
  status: z.enum(["created", "failed"]),
  cost: z.number(),
  model: z.string().optional(),
  inputTokens: z.number().optional(),
  outputTokens: z.number().optional(),
  totalTokens: z.number().optional(),
  reason: z.string().optional(),
  qualityScore: z.number().optional(),
  recommendations: z.array(z.string()).optional(),
});

export type SynthesisEntry = z.infer<typeof SynthesisEntrySchema>;

let currentRunId: string | null = null;

export function newRunId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/** Process-wide run id, pinned by REQFORGE_RUN_ID when set. */
export function getRunId(): string {
  if (currentRunId) return currentRunId;
  currentRunId = process.env.REQFORGE_RUN_ID || newRunId();
  return currentRunId;
}

export async function recordSynthesis(
  stateDir: string,
  entry: Omit<SynthesisEntry, "timestamp" | "runId"> & { runId?: string },
) {
  const file = path.join(stateDir, SYNTHESIS_LEDGER_FILE);
  const full: SynthesisEntry = {
    ...entry,
    timestamp: new Date().toISOString(),
    runId: entry.runId ?? getRunId(),
  };
  await fs.ensureDir(stateDir);
  await fs.appendFile(file, JSON.stringify(full) + "\n", "utf8");
}

export async function readSynthesisEntries(
  stateDir: string,
  debug = false,
): Promise<SynthesisEntry[]> {
  const file = path.join(stateDir, SYNTHESIS_LEDGER_FILE);
  if (!(await fs.pathExists(file))) return [];
  const raw = await fs.readFile(file, "utf8");
  const out: SynthesisEntry[] = [];
  raw.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (e) {
      logDebug(debug, "usage", `ledger line ${index + 1} is not JSON`, e);
      return;
    }
    const entry = SynthesisEntrySchema.safeParse(parsed);
    if (entry.success) out.push(entry.data);
    else logDebug(debug, "usage", `ledger line ${index + 1} skipped`, entry.error.issues);
  });
  return out;
}

type Bucket = { created: number; failed: number; cost: number; tokens: number };

export type SynthesisSummary = {
  entries: number;
  runs: number;
  created: number;
  failed: number;
  totalCost: number;
  totalTokens: number;
  byDomain: Record<string, Bucket>;
  bySynthesizer: Record<string, Bucket>;
  /** Mean quality score of created handlers that carry one; null when none do. */
  averageQuality: number | null;
  /** Latest recorded quality per created domain. */
  quality: Record<string, { score: number; recommendations: string[] }>;
};

export async function summarizeSynthesis(
  stateDir: string,
  debug = false,
): Promise<SynthesisSummary> {
  const entries = await readSynthesisEntries(stateDir, debug);
  const runIds = new Set<string>();
  const summary: SynthesisSummary = {
    entries: entries.length,
    runs: 0,
    created: 0,
    failed: 0,
    totalCost: 0,
    totalTokens: 0,
    byDomain: {},
    bySynthesizer: {},
    averageQuality: null,
    quality: {},
  };
  const scores: number[] = [];

  const bump = (map: Record<string, Bucket>, key: string, e: SynthesisEntry, tokens: number) => {
    const b = (map[key] ??= { created: 0, failed: 0, cost: 0, tokens: 0 });
    b[e.status] += 1;
    b.cost += e.cost;
    b.tokens += tokens;
  };

  for (const e of entries) {
    runIds.add(e.runId);
    const tokens = e.totalTokens ?? (e.inputTokens ?? 0) + (e.outputTokens ?? 0);
    summary[e.status] += 1;
    summary.totalCost += e.cost;
    summary.totalTokens += tokens;
    bump(summary.byDomain, e.domain, e, tokens);
    bump(summary.bySynthesizer, e.synthesizer, e, tokens);
    if (e.status === "created" && e.qualityScore !== undefined) {
      scores.push(e.qualityScore);
      summary.quality[e.domain] = { score: e.qualityScore, recommendations: e.recommendations ?? [] };
    }
  }
  if (scores.length) {
    summary.averageQuality = scores.reduce((a, b) => a + b, 0) / scores.length;
  }
  summary.runs = runIds.size;
  return summary;
}
