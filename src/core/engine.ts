import type { PipelineConfig } from "./context.js";
import type { EngineEventListener } from "./events.js";
import { builtinHandlersDir } from "./schemaLoader.js";
import { HandlerCatalog } from "../domains/catalog.js";
import { DomainResolver } from "../domains/resolver.js";
import { QualityGate } from "../gates/quality.js";
import { OpenAISynthesizer } from "../synthesis/openai.js";
import { customHandlersDir } from "../synthesis/store.js";
import { TemplateSynthesizer } from "../synthesis/template.js";
import type { PluginSynthesizer } from "../synthesis/types.js";
import type { PipelineDeps } from "./orchestrator.js";

export type Engine = PipelineDeps & {
  config: PipelineConfig;
  catalog: HandlerCatalog;
  resolver: DomainResolver;
};

async function createSynthesizer(config: PipelineConfig): Promise<PluginSynthesizer> {
  switch (config.synthesizer) {
    case "openai":
      return OpenAISynthesizer.create({ model: config.model, debug: config.debug });
    case "template":
      return TemplateSynthesizer.create();
  }
}

/**
 * Build the process-wide catalog (built-ins, then persisted custom handlers,
 * then extra directories) and the resolver around it.
 */
export async function createEngine(
  config: PipelineConfig,
  opts: { onEvent?: EngineEventListener } = {},
): Promise<Engine> {
  const catalog = new HandlerCatalog({
    dirs: [await builtinHandlersDir(), customHandlersDir(config.stateDir), ...config.handlerDirs],
    debug: config.debug,
    onEvent: opts.onEvent,
  });
  await catalog.scan();

  const resolver = new DomainResolver({
    catalog,
    synthesizer: config.synthesis ? await createSynthesizer(config) : null,
    synthesisEnabled: config.synthesis,
    confidenceThreshold: config.threshold,
    synthesisTimeoutMs: config.synthesisTimeoutMs,
    customHandlersDir: customHandlersDir(config.stateDir),
    ledgerDir: config.stateDir,
    debug: config.debug,
  });

  return { config, catalog, resolver, gate: new QualityGate() };
}
