import { err, ok, PipelineError, type Result } from "../core/errors.js";
import { loadSchemaFile } from "../core/schemaLoader.js";
import type { HandlerDefinition, HandlerQuality } from "../core/types.js";
import { HANDLER_SCHEMA_FILE } from "../domains/catalog.js";
import {
  ConfiguredDomainHandler,
  handlerCapabilityProblems,
  MAX_PRIORITY,
  type DomainHandler,
} from "../domains/handler.js";
import { validateAgainst } from "../gates/schema.js";
import { assessHandlerQuality } from "./quality.js";
import type { SynthesisArtifact } from "./types.js";

export const MIN_SYNTHESIZED_KEYWORDS = 3;

const NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export type ValidatedArtifact = SynthesisArtifact & {
  handler: DomainHandler;
  quality: HandlerQuality;
};

/**
 * Gate between a synthesizer and the catalog. Everything a synthesizer
 * returns passes through here before it can be registered; the definition
 * is re-checked against the schema since it usually comes from outside.
 */
export async function validateArtifact(
  artifact: SynthesisArtifact,
  existingNames: readonly string[],
): Promise<Result<ValidatedArtifact>> {
  const fail = (message: string) =>
    err(new PipelineError("SynthesisFailure", message));

  const { cost, synthesizer } = artifact;
  if (!Number.isFinite(cost) || cost < 0) {
    return fail(`invalid synthesis cost: ${cost}`);
  }
  if (!synthesizer) {
    return fail("artifact does not name its synthesizer");
  }

  const schema = await loadSchemaFile(HANDLER_SCHEMA_FILE);
  const checked = validateAgainst<HandlerDefinition>(schema, artifact.definition);
  if (!checked.valid) {
    return fail(`definition failed schema validation: ${checked.reason}`);
  }
  const def = checked.value;

  if (!NAME_PATTERN.test(def.name)) {
    return fail(`invalid handler name "${def.name}"`);
  }
  if (existingNames.includes(def.name)) {
    return fail(`handler name "${def.name}" is already taken`);
  }
  if (!Number.isInteger(def.priority) || def.priority < 1 || def.priority > MAX_PRIORITY) {
    return fail(`priority ${def.priority} outside 1..${MAX_PRIORITY}`);
  }
  const keywords = new Set(def.keywords.map((k) => k.trim().toLowerCase()).filter(Boolean));
  if (keywords.size < MIN_SYNTHESIZED_KEYWORDS) {
    return fail(
      `handler "${def.name}" has ${keywords.size} distinct keywords, needs ${MIN_SYNTHESIZED_KEYWORDS}`,
    );
  }

  const handler = new ConfiguredDomainHandler(def);
  const problems = handlerCapabilityProblems(handler);
  if (problems.length) {
    return fail(`handler "${def.name}" is not usable: ${problems.join(", ")}`);
  }
  return ok({ ...artifact, definition: def, handler, quality: assessHandlerQuality(def) });
}
