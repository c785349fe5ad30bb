import type { Result } from "../core/errors.js";
import type { HandlerDefinition } from "../core/types.js";

/** What a synthesizer hands back; nothing here is trusted until validated. */
export type SynthesisArtifact = {
  definition: HandlerDefinition;
  cost: number;
  synthesizer: string;
  usage?: { model: string; inputTokens: number; outputTokens: number };
};

export interface PluginSynthesizer {
  readonly id: string;

  /**
   * Name the synthesizer would give a handler for this content, without
   * doing the (possibly expensive) synthesis. Lets the resolver reuse an
   * existing handler of that name instead.
   */
  proposeName?(
    content: string,
    domainHint: string,
    existingNames: readonly string[],
  ): string | undefined;

  synthesize(
    content: string,
    domainHint: string,
    existingNames: readonly string[],
    signal?: AbortSignal,
  ): Promise<Result<SynthesisArtifact, Error>>;
}
