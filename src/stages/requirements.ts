import {
  GENERAL_DOMAIN,
  type AnalysisPacket,
  type FeedbackReason,
  type Requirement,
  type RequirementDraft,
  type RequirementsPacket,
} from "../core/types.js";
import { DEFAULT_STAKEHOLDERS, type DomainHandler } from "../domains/handler.js";

export const MAX_REQUIREMENTS = 8;
export const MAX_EXPLICIT_TITLE = 120;

export const GENERIC_REQUIREMENTS: readonly RequirementDraft[] = [
  { title: "Core System Architecture and Data Management", priority: "high", category: "functional" },
  { title: "User Interface and Experience Implementation", priority: "high", category: "functional" },
  { title: "API Development and Integration Framework", priority: "medium", category: "functional" },
];

const MARKER = /REQ-\d+\s*:/g;

export function normalizeTitle(title: string) {
  return title.toLowerCase().replace(/\s+/g, " ").trim();
}

function formatId(n: number) {
  return `REQ-${String(n).padStart(3, "0")}`;
}

/** `REQ-<n>: <text>` markers; each title runs to the next marker. */
export function explicitRequirements(content: string): RequirementDraft[] {
  const starts = [...content.matchAll(MARKER)];
  return starts.flatMap((m, i) => {
    const from = (m.index ?? 0) + m[0].length;
    const to = i + 1 < starts.length ? (starts[i + 1].index ?? content.length) : content.length;
    const text = content
      .slice(from, to)
      .replace(/\s+/g, " ")
      .trim()
      .replace(/[\s.,;:!]+$/, "");
    // Code points, so a surrogate pair is never cut in half.
    const title = Array.from(text).slice(0, MAX_EXPLICIT_TITLE).join("").trim();
    return title ? [{ title, priority: "medium" as const, category: "functional" as const }] : [];
  });
}

/** Drop repeated titles, number in order, keep the first `MAX_REQUIREMENTS`. */
export function finalizeRequirements(drafts: readonly RequirementDraft[]): Requirement[] {
  const seen = new Set<string>();
  const out: Requirement[] = [];
  for (const draft of drafts) {
    const key = normalizeTitle(draft.title);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push({ id: formatId(out.length + 1), ...draft });
    if (out.length >= MAX_REQUIREMENTS) break;
  }
  return out;
}

const BASIC_PREFIX = "Basic ";

function simplify(req: Requirement): Requirement {
  const title = req.title.startsWith(BASIC_PREFIX) ? req.title : BASIC_PREFIX + req.title;
  return { ...req, title, priority: "medium" };
}

/**
 * Feedback transforms only filter, cap or rewrite; they never renumber, so a
 * surviving requirement keeps the ID it was extracted with.
 */
export function applyFeedbackTransform(
  requirements: readonly Requirement[],
  feedback: FeedbackReason,
): Requirement[] {
  switch (feedback) {
    case "reduce-scope":
    case "too-many-requirements":
      return requirements.filter((r) => r.priority === "high").slice(0, 5);
    case "too-complex":
      return requirements.slice(0, 6).map(simplify);
    case "too-many-tasks":
      return requirements.slice(0, 3);
    case "insufficient-quality":
      return [...requirements];
  }
}

export class RequirementsStage {
  extract(packet: AnalysisPacket, handler?: DomainHandler): RequirementsPacket {
    return {
      domain: packet.domain,
      requirements: finalizeRequirements(this.drafts(packet.content, handler)),
      stakeholders: this.stakeholders(packet.content, handler),
      feedbackApplied: false,
    };
  }

  applyFeedback(
    previous: RequirementsPacket,
    feedback: FeedbackReason,
    originalContent: string,
    handler?: DomainHandler,
  ): RequirementsPacket {
    const fresh = finalizeRequirements(this.drafts(originalContent, handler));
    return {
      domain: previous.domain,
      requirements: applyFeedbackTransform(fresh, feedback),
      stakeholders: this.stakeholders(originalContent, handler),
      feedbackApplied: true,
    };
  }

  private drafts(content: string, handler?: DomainHandler): RequirementDraft[] {
    const explicit = explicitRequirements(content);
    if (explicit.length) return explicit;

    if (handler && handler.name !== GENERAL_DOMAIN) {
      const found = [
        ...handler.extractRequirements(content),
        ...handler.crossCuttingRequirements(content),
      ];
      if (found.length) return found;
    }
    return [...GENERIC_REQUIREMENTS];
  }

  private stakeholders(content: string, handler?: DomainHandler): string[] {
    const names = handler ? handler.extractStakeholders(content) : DEFAULT_STAKEHOLDERS;
    return [...new Set(names)];
  }
}
