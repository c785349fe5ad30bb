import type OpenAI from "openai";
import { zodTextFormat } from "openai/helpers/zod";
import { z } from "zod";
import { err, errorMessage, ok, type Result } from "../core/errors.js";
import { estimateCost, getClient } from "../core/llm.js";
import { logDebug } from "../core/logger.js";
import { loadPrompt, renderPrompt } from "../core/promptLoader.js";
import type { HandlerDefinition } from "../core/types.js";
import { loadTemplateData, proposeHandlerName, type TemplateData } from "./template.js";
import type { PluginSynthesizer, SynthesisArtifact } from "./types.js";

// Structured outputs need every field present; optional parts are empty arrays.
// The name is not asked for: it is fixed before the request.
const HandlerDraft = z.object({
  description: z.string(),
  keywords: z.array(z.string()),
  priority: z.number().int(),
  requirements: z.array(
    z.object({
      title: z.string(),
      triggers: z.array(z.string()),
      priority: z.enum(["high", "medium", "low"]),
      category: z.enum(["functional", "non-functional"]),
    }),
  ),
  stakeholders: z.object({
    base: z.array(z.string()),
    rules: z.array(
      z.object({
        triggers: z.array(z.string()),
        names: z.array(z.string()),
      }),
    ),
  }),
});

export type HandlerDraft = z.infer<typeof HandlerDraft>;

export type DraftRequest = {
  prompt: string;
  model: string;
  maxOutputTokens: number;
  signal?: AbortSignal;
};

export type DraftReply = {
  draft: unknown;
  model: string;
  inputTokens: number;
  outputTokens: number;
};

/** One model round-trip. Swapped out in tests. */
export type DraftRequester = (req: DraftRequest) => Promise<DraftReply>;

export function openAIDraftRequester(client?: OpenAI): DraftRequester {
  return async ({ prompt, model, maxOutputTokens, signal }) => {
    const res = await (client ?? getClient()).responses.parse(
      {
        model,
        input: [{ role: "user", content: prompt }],
        text: { format: zodTextFormat(HandlerDraft, "domain_handler") },
        max_output_tokens: maxOutputTokens,
      },
      { signal },
    );
    return {
      draft: res.output_parsed,
      model: res.model,
      inputTokens: res.usage?.input_tokens ?? 0,
      outputTokens: res.usage?.output_tokens ?? 0,
    };
  };
}

export type OpenAISynthesizerOptions = {
  model: string;
  /** Patterns and stopwords used to pick the handler name. */
  naming: Pick<TemplateData, "domainPatterns" | "stopwords">;
  maxOutputTokens?: number;
  maxContentChars?: number;
  requester?: DraftRequester;
  debug?: boolean;
};

export const SYNTHESIS_PROMPT_FILE = "synthesize-handler.md";

function toDefinition(name: string, draft: HandlerDraft): HandlerDefinition {
  const clean = (xs: string[]) => xs.map((x) => x.trim().toLowerCase()).filter(Boolean);
  const description = draft.description.trim();
  return {
    name,
    ...(description ? { description } : {}),
    keywords: [...new Set(clean(draft.keywords))],
    priority: draft.priority,
    requirements: draft.requirements.map((r) => ({
      title: r.title.trim(),
      triggers: clean(r.triggers),
      priority: r.priority,
      category: r.category,
    })),
    stakeholders: {
      base: draft.stakeholders.base.map((s) => s.trim()).filter(Boolean),
      rules: draft.stakeholders.rules.map((r) => ({
        triggers: clean(r.triggers),
        names: r.names.map((n) => n.trim()).filter(Boolean),
      })),
    },
  };
}

/**
 * Asks a generative model for a handler definition as structured output.
 * The name is chosen locally so a repeat request can be answered from the
 * catalog without a model call.
 */
export class OpenAISynthesizer implements PluginSynthesizer {
  readonly id = "openai";
  private readonly requester: DraftRequester;

  constructor(private readonly opts: OpenAISynthesizerOptions) {
    this.requester = opts.requester ?? openAIDraftRequester();
  }

  static async create(opts: Omit<OpenAISynthesizerOptions, "naming">) {
    return new OpenAISynthesizer({ ...opts, naming: await loadTemplateData() });
  }

  proposeName(content: string, domainHint: string, existingNames: readonly string[]) {
    return proposeHandlerName(content, domainHint, existingNames, this.opts.naming);
  }

  async synthesize(
    content: string,
    domainHint: string,
    existingNames: readonly string[],
    signal?: AbortSignal,
  ): Promise<Result<SynthesisArtifact, Error>> {
    const name = this.proposeName(content, domainHint, existingNames);
    if (!name) return err(new Error("content has no distinctive terms"));

    const limit = this.opts.maxContentChars ?? 6000;
    let reply: DraftReply;
    try {
      const template = await loadPrompt(SYNTHESIS_PROMPT_FILE);
      const prompt = renderPrompt(template, {
        content: content.length > limit ? content.slice(0, limit) : content,
        name,
        hint: domainHint,
        existing: existingNames.length ? existingNames.join(", ") : "(none)",
      });
      reply = await this.requester({
        prompt,
        model: this.opts.model,
        maxOutputTokens: this.opts.maxOutputTokens ?? 2000,
        signal,
      });
    } catch (e) {
      return err(new Error(`model request failed: ${errorMessage(e)}`, { cause: e }));
    }

    const cost = estimateCost(reply.model, reply.inputTokens, reply.outputTokens);
    logDebug(!!this.opts.debug, "openai", "synthesis reply", {
      model: reply.model,
      inputTokens: reply.inputTokens,
      outputTokens: reply.outputTokens,
      cost,
    });

    const parsed = HandlerDraft.safeParse(reply.draft);
    if (!parsed.success) {
      return err(new Error(`model returned no usable handler: ${parsed.error.message}`));
    }
    return ok({
      definition: toDefinition(name, parsed.data),
      cost,
      synthesizer: this.id,
      usage: {
        model: reply.model,
        inputTokens: reply.inputTokens,
        outputTokens: reply.outputTokens,
      },
    });
  }
}
