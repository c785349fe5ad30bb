export * from "./core/types.js";
export {
  PipelineError,
  ok,
  err,
  isPipelineError,
  type PipelineErrorKind,
  type Result,
} from "./core/errors.js";
export { parseDocument, type IngressDocument } from "./core/ingress.js";
export {
  loadPipelineContext,
  type PipelineConfig,
  type ConfigOverrides,
} from "./core/context.js";
export { createEngine, type Engine } from "./core/engine.js";
export { setEngineEventListener, type EngineEvent, type EngineEventListener } from "./core/events.js";
export { configureLogger } from "./core/logger.js";
export {
  runPipeline,
  DEFAULT_MAX_ITERATIONS,
  type PipelineDeps,
  type PipelineOptions,
  type PipelineOutcome,
} from "./core/orchestrator.js";
export { summarizeSynthesis, readSynthesisEntries } from "./core/usage.js";
export {
  ConfiguredDomainHandler,
  detectConfidence,
  weightedScore,
  generalHandler,
  type DomainHandler,
} from "./domains/handler.js";
export { HandlerCatalog } from "./domains/catalog.js";
export { DomainResolver, type Resolution } from "./domains/resolver.js";
export { QualityGate, DEFAULT_THRESHOLDS, type QualityThresholds } from "./gates/quality.js";
export { RequirementsStage } from "./stages/requirements.js";
export { TaskStage } from "./stages/tasks.js";
export { TemplateSynthesizer } from "./synthesis/template.js";
export { OpenAISynthesizer } from "./synthesis/openai.js";
export { assessHandlerQuality } from "./synthesis/quality.js";
export type { PluginSynthesizer, SynthesisArtifact } from "./synthesis/types.js";
