import type { AnalysisPacket } from "../core/types.js";
import type { Resolution } from "../domains/resolver.js";

export const MAX_COMPLEXITY = 5;

const COMPLEXITY_SIGNALS = [
  ["integration", "integrate", "third-party", "api"],
  ["real-time", "realtime", "live", "streaming"],
  ["scalab", "high availability", "uptime", "distributed"],
  ["security", "compliance", "encryption", "audit"],
  ["machine learning", "analytics", "recommendation", "prediction"],
  ["multi-tenant", "multi-region", "migration", "legacy"],
] as const;

/** Number of distinct complexity signal groups present, capped at 5. */
export function assessComplexity(content: string) {
  const lower = content.toLowerCase();
  const hits = COMPLEXITY_SIGNALS.filter((group) => group.some((s) => lower.includes(s))).length;
  return Math.min(hits, MAX_COMPLEXITY);
}

export function buildAnalysisPacket(content: string, resolution: Resolution): AnalysisPacket {
  return Object.freeze({
    domain: resolution.domainName,
    complexity: assessComplexity(content),
    content,
    confidence: resolution.confidence,
    synthesized: resolution.wasSynthesized,
  });
}
