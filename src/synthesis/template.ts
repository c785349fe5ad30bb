import { z } from "zod";
import { err, ok, type Result } from "../core/errors.js";
import { loadDataFile } from "../core/schemaLoader.js";
import {
  GENERAL_DOMAIN,
  type HandlerDefinition,
  type RequirementRule,
} from "../core/types.js";
import { DEFAULT_STAKEHOLDERS, MAX_PRIORITY, toHandlerName } from "../domains/handler.js";
import type { PluginSynthesizer, SynthesisArtifact } from "./types.js";

const PriorityEnum = z.enum(["high", "medium", "low"]);

const TemplateDataSchema = z.object({
  domainPatterns: z.record(z.array(z.string()).min(1)),
  requirementPatterns: z.array(
    z.object({
      type: z.string(),
      triggers: z.array(z.string()).min(1),
      template: z.string(),
      priority: PriorityEnum,
    }),
  ),
  stakeholderPatterns: z.record(z.array(z.string()).min(1)),
  stopwords: z.array(z.string()),
});

export type TemplateData = z.infer<typeof TemplateDataSchema>;

export const TEMPLATE_DATA_FILE = "synthesis/template-data.json";

export async function loadTemplateData(): Promise<TemplateData> {
  const raw = await loadDataFile(TEMPLATE_DATA_FILE);
  const parsed = TemplateDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid ${TEMPLATE_DATA_FILE}: ${parsed.error.message}`);
  }
  return parsed.data;
}

const NAME_PATTERN = /^[a-z][a-z0-9_]*$/;
const MAX_KEYWORDS = 12;
const MIN_PATTERN_HITS = 2;

function titleCase(name: string) {
  return name
    .split("_")
    .filter(Boolean)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(" ");
}

/**
 * Most frequent words of three or more letters, stopwords removed. Ties go
 * to the word that appears first.
 */
export function keyTerms(content: string, stopwords: readonly string[], limit = 10) {
  const stop = new Set(stopwords);
  const stats = new Map<string, { count: number; first: number }>();
  const words = content.toLowerCase().match(/[a-z]+/g) ?? [];
  words.forEach((word, index) => {
    if (word.length < 3 || stop.has(word)) return;
    const s = stats.get(word);
    if (s) s.count += 1;
    else stats.set(word, { count: 1, first: index });
  });
  return [...stats.entries()]
    .sort((a, b) => b[1].count - a[1].count || a[1].first - b[1].first)
    .slice(0, limit)
    .map(([word]) => word);
}

export type PatternMatch = { name: string; score: number; matched: string[] };

/** Best-covered domain pattern; needs at least two distinct keyword hits. */
export function matchDomainPattern(
  content: string,
  patterns: TemplateData["domainPatterns"],
): PatternMatch | null {
  const lower = content.toLowerCase();
  let best: PatternMatch | null = null;
  for (const [name, keywords] of Object.entries(patterns)) {
    const matched = keywords.filter((k) => lower.includes(k));
    if (matched.length < MIN_PATTERN_HITS) continue;
    const score = matched.length / keywords.length;
    if (!best || score > best.score) best = { name, score, matched };
  }
  return best;
}

/**
 * Name for a new handler: the hint when it is free, else the best-covered
 * domain pattern, else `<top term>_management`. Same inputs, same name.
 */
export function proposeHandlerName(
  content: string,
  domainHint: string,
  existingNames: readonly string[],
  data: Pick<TemplateData, "domainPatterns" | "stopwords">,
) {
  const hint = toHandlerName(domainHint);
  if (NAME_PATTERN.test(hint) && hint !== GENERAL_DOMAIN && !existingNames.includes(hint)) {
    return hint;
  }
  const pattern = matchDomainPattern(content, data.domainPatterns);
  if (pattern) return pattern.name;
  const [top] = keyTerms(content, data.stopwords, 1);
  return top ? `${top}_management` : undefined;
}

/**
 * Builds handler definitions from keyword statistics and a fixed table of
 * domain, requirement and stakeholder patterns. Deterministic and free.
 */
export class TemplateSynthesizer implements PluginSynthesizer {
  readonly id = "template";

  constructor(private readonly data: TemplateData) {}

  static async create() {
    return new TemplateSynthesizer(await loadTemplateData());
  }

  proposeName(content: string, domainHint: string, existingNames: readonly string[]) {
    return proposeHandlerName(content, domainHint, existingNames, this.data);
  }

  async synthesize(
    content: string,
    domainHint: string,
    existingNames: readonly string[],
    signal?: AbortSignal,
  ): Promise<Result<SynthesisArtifact, Error>> {
    if (signal?.aborted) return err(new Error("synthesis aborted"));

    const name = this.proposeName(content, domainHint, existingNames);
    if (!name) return err(new Error("content has no distinctive terms"));
    if (existingNames.includes(name)) {
      return err(new Error(`handler "${name}" already exists`));
    }

    const pattern = matchDomainPattern(content, this.data.domainPatterns);
    const keywords = [
      ...new Set([...(pattern?.matched ?? []), ...keyTerms(content, this.data.stopwords)]),
    ].slice(0, MAX_KEYWORDS);
    if (keywords.length < 3) {
      return err(new Error(`only ${keywords.length} usable keywords in content`));
    }

    const entity = titleCase(name);
    const requirements: RequirementRule[] = [
      {
        title: `${entity} Core Records and Data Management`,
        triggers: keywords.slice(0, 3),
        priority: "high",
        category: "functional",
      },
      ...this.data.requirementPatterns.map((p) => ({
        title: p.template.replace("{entity}", entity),
        triggers: [...p.triggers],
        priority: p.priority,
        category: "functional" as const,
      })),
    ];

    const definition: HandlerDefinition = {
      name,
      description:
        `Generated handler for ${entity} projects` +
        (domainHint && domainHint !== name ? ` (closest known domain: ${domainHint})` : ""),
      keywords,
      priority: pattern
        ? Math.min(MAX_PRIORITY, 2 + Math.round(pattern.score * 3))
        : 2,
      requirements,
      stakeholders: {
        base: [...DEFAULT_STAKEHOLDERS],
        rules: Object.entries(this.data.stakeholderPatterns).map(([trigger, names]) => ({
          triggers: [trigger],
          names: [...names],
        })),
      },
    };

    return ok({ definition, cost: 0, synthesizer: this.id });
  }
}
