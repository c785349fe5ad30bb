import {
  GENERAL_DOMAIN,
  type HandlerDefinition,
  type RequirementDraft,
  type RequirementRule,
  type StakeholderRule,
} from "../core/types.js";

export const MAX_PRIORITY = 5;

export const DEFAULT_STAKEHOLDERS = ["End Users", "Development Team"];

/** Lower snake_case form of free text, e.g. " Bee Farm! " → "bee_farm". */
export function toHandlerName(text: string) {
  return text
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export interface DomainHandler {
  readonly name: string;
  readonly keywords: readonly string[];
  readonly priority: number;
  detectConfidence(content: string): number;
  extractRequirements(content: string): RequirementDraft[];
  crossCuttingRequirements(content: string): RequirementDraft[];
  extractStakeholders(content: string): string[];
}

function countOccurrences(haystack: string, needle: string) {
  if (!needle) return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const at = haystack.indexOf(needle, from);
    if (at < 0) return count;
    count += 1;
    from = at + needle.length;
  }
}

function wordCount(phrase: string) {
  return phrase.trim().split(/\s+/).filter(Boolean).length;
}

/**
 * Keyword affinity in [0, 1]. Each keyword contributes its occurrence count
 * in the lower-cased content times its word count; the sum is normalized by
 * `keywords.length * 2` and clamped.
 */
export function detectConfidence(
  content: string,
  keywords: readonly string[],
): number {
  const lower = content.toLowerCase();
  let matches = 0;
  for (const keyword of keywords) {
    const needle = keyword.toLowerCase();
    matches += countOccurrences(lower, needle) * Math.max(wordCount(needle), 1);
  }
  const baseline = Math.max(keywords.length * 2, 1);
  return Math.min(Math.max(matches / baseline, 0), 1);
}

export function weightedScore(handler: DomainHandler, content: string) {
  return handler.detectConfidence(content) * (handler.priority / MAX_PRIORITY);
}

function mentionsAny(lower: string, terms: readonly string[]) {
  return terms.some((t) => lower.includes(t.toLowerCase()));
}

const SECURITY_TERMS = ["security", "cyber", "encryption", "auth", "secure"];
const PERFORMANCE_TERMS = ["performance", "scalability", "reliability"];
const REALTIME_TERMS = ["real-time", "realtime", "instant", "live"];

/** Security, reliability and real-time concerns shared by every domain. */
export function crossCuttingRequirements(content: string): RequirementDraft[] {
  const lower = content.toLowerCase();
  const out: RequirementDraft[] = [];

  if (mentionsAny(lower, SECURITY_TERMS)) {
    out.push({
      title: "Comprehensive Cybersecurity Framework and Data Protection",
      priority: "high",
      category: "non-functional",
    });
  }

  const uptime = /(\d+(?:\.\d+)?)%\s*uptime/.exec(lower);
  if (uptime || mentionsAny(lower, PERFORMANCE_TERMS)) {
    const target = uptime?.[1] ?? "99.9";
    out.push({
      title: `System Reliability and Performance (${target}% uptime requirement)`,
      priority: "high",
      category: "non-functional",
    });
  }

  if (mentionsAny(lower, REALTIME_TERMS)) {
    out.push({
      title: "Real-Time Data Processing and Event Handling System",
      priority: "high",
      category: "non-functional",
    });
  }

  return out;
}

/** Handler driven entirely by a validated `HandlerDefinition`. */
export class ConfiguredDomainHandler implements DomainHandler {
  readonly name: string;
  readonly keywords: readonly string[];
  readonly priority: number;
  private readonly rules: readonly RequirementRule[];
  private readonly baseStakeholders: readonly string[];
  private readonly stakeholderRules: readonly StakeholderRule[];

  constructor(definition: HandlerDefinition) {
    this.name = definition.name;
    this.keywords = Object.freeze([...definition.keywords]);
    this.priority = definition.priority;
    this.rules = Object.freeze(definition.requirements.map((r) => ({ ...r })));
    this.baseStakeholders = Object.freeze([...definition.stakeholders.base]);
    this.stakeholderRules = Object.freeze(
      (definition.stakeholders.rules ?? []).map((r) => ({ ...r })),
    );
  }

  detectConfidence(content: string): number {
    return detectConfidence(content, this.keywords);
  }

  extractRequirements(content: string): RequirementDraft[] {
    const lower = content.toLowerCase();
    return this.rules
      .filter((rule) => mentionsAny(lower, rule.triggers))
      .map(({ title, priority, category }) => ({ title, priority, category }));
  }

  crossCuttingRequirements(content: string): RequirementDraft[] {
    return crossCuttingRequirements(content);
  }

  extractStakeholders(content: string): string[] {
    const lower = content.toLowerCase();
    const names = new Set(
      this.baseStakeholders.length ? this.baseStakeholders : DEFAULT_STAKEHOLDERS,
    );
    for (const rule of this.stakeholderRules) {
      if (mentionsAny(lower, rule.triggers)) {
        for (const n of rule.names) names.add(n);
      }
    }
    return [...names];
  }
}

/** Sentinel used when nothing matches; extracts nothing on its own. */
export class GeneralDomainHandler implements DomainHandler {
  readonly name = GENERAL_DOMAIN;
  readonly keywords: readonly string[] = [];
  readonly priority = 1;

  detectConfidence(): number {
    return 0;
  }

  extractRequirements(): RequirementDraft[] {
    return [];
  }

  crossCuttingRequirements(content: string): RequirementDraft[] {
    return crossCuttingRequirements(content);
  }

  extractStakeholders(): string[] {
    return [...DEFAULT_STAKEHOLDERS];
  }
}

export const generalHandler: DomainHandler = new GeneralDomainHandler();

const REQUIRED_METHODS = [
  "detectConfidence",
  "extractRequirements",
  "crossCuttingRequirements",
  "extractStakeholders",
] as const;

/**
 * Structural conformance check run before a handler enters the catalog.
 * Returns the list of problems; empty means the handler is usable.
 */
export function handlerCapabilityProblems(candidate: unknown): string[] {
  if (typeof candidate !== "object" || candidate === null) {
    return ["handler is not an object"];
  }
  const problems: string[] = [];
  const name: unknown = Reflect.get(candidate, "name");
  const keywords: unknown = Reflect.get(candidate, "keywords");
  const priority: unknown = Reflect.get(candidate, "priority");

  if (typeof name !== "string" || !name) problems.push("missing name");
  if (!Array.isArray(keywords) || !keywords.every((k) => typeof k === "string")) {
    problems.push("keywords must be a string array");
  }
  if (
    typeof priority !== "number" ||
    !Number.isInteger(priority) ||
    priority < 1 ||
    priority > MAX_PRIORITY
  ) {
    problems.push(`priority must be an integer in 1..${MAX_PRIORITY}`);
  }
  for (const method of REQUIRED_METHODS) {
    if (typeof Reflect.get(candidate, method) !== "function") {
      problems.push(`missing ${method}()`);
    }
  }
  return problems;
}
