import { emitEngineEvent, type EngineEventListener } from "../core/events.js";
import { errorMessage, PipelineError, type Result } from "../core/errors.js";
import { logDebug, logInfo, logWarn } from "../core/logger.js";
import { recordSynthesis } from "../core/usage.js";
import { GENERAL_DOMAIN } from "../core/types.js";
import { saveSynthesizedHandler } from "../synthesis/store.js";
import type { PluginSynthesizer, SynthesisArtifact } from "../synthesis/types.js";
import { validateArtifact, type ValidatedArtifact } from "../synthesis/validate.js";
import type { CatalogLockScope, HandlerCatalog } from "./catalog.js";
import { generalHandler, toHandlerName, weightedScore, type DomainHandler } from "./handler.js";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;
export const DEFAULT_SYNTHESIS_TIMEOUT_MS = 30_000;

export type Resolution = {
  handler: DomainHandler;
  domainName: string;
  wasSynthesized: boolean;
  cost: number;
  confidence: number;
};

export type DomainResolverOptions = {
  catalog: HandlerCatalog;
  synthesizer?: PluginSynthesizer | null;
  synthesisEnabled?: boolean;
  confidenceThreshold?: number;
  synthesisTimeoutMs?: number;
  /** Where synthesized definitions are written; in-memory only when unset. */
  customHandlersDir?: string | null;
  /** Directory holding the synthesis cost ledger; no ledger when unset. */
  ledgerDir?: string | null;
  debug?: boolean;
};

export type ResolveOptions = {
  signal?: AbortSignal;
  runId?: string;
  onEvent?: EngineEventListener;
};

type ScoredHandler = { name: string; handler: DomainHandler; score: number };

function timeoutError(ms: number) {
  return new Error(`synthesis timed out after ${ms}ms`);
}

/**
 * Settles with `work` unless `signal` aborts first. The synthesizer also
 * receives the signal; this covers implementations that ignore it.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
  });
}

export class DomainResolver {
  private readonly catalog: HandlerCatalog;
  private readonly synthesizer: PluginSynthesizer | null;
  private readonly synthesisEnabled: boolean;
  private readonly threshold: number;
  private readonly timeoutMs: number;
  private readonly customHandlersDir: string | null;
  private readonly ledgerDir: string | null;
  private readonly debug: boolean;

  constructor(opts: DomainResolverOptions) {
    this.catalog = opts.catalog;
    this.synthesizer = opts.synthesizer ?? null;
    this.synthesisEnabled = opts.synthesisEnabled ?? true;
    this.threshold = opts.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.timeoutMs = opts.synthesisTimeoutMs ?? DEFAULT_SYNTHESIS_TIMEOUT_MS;
    this.customHandlersDir = opts.customHandlersDir ?? null;
    this.ledgerDir = opts.ledgerDir ?? null;
    this.debug = !!opts.debug;
  }

  get confidenceThreshold() {
    return this.threshold;
  }

  /** Highest weighted score over every loadable handler; earlier entries win ties. */
  async bestMatch(content: string): Promise<ScoredHandler | null> {
    let best: ScoredHandler | null = null;
    for (const name of this.catalog.list()) {
      const handler = await this.catalog.get(name);
      if (!handler) continue;
      const score = weightedScore(handler, content);
      logDebug(this.debug, "resolver", `score ${name}=${score.toFixed(3)}`);
      if (!best || score > best.score) best = { name, handler, score };
    }
    return best;
  }

  async resolve(
    content: string,
    domainHint?: string,
    opts: ResolveOptions = {},
  ): Promise<Resolution> {
    const hint = domainHint ? toHandlerName(domainHint) : "";
    if (hint && hint !== GENERAL_DOMAIN && this.catalog.has(hint)) {
      const handler = await this.catalog.get(hint);
      if (handler) {
        return {
          handler,
          domainName: hint,
          wasSynthesized: false,
          cost: 0,
          confidence: weightedScore(handler, content),
        };
      }
      logWarn("resolver", `hinted handler "${hint}" could not be loaded; scoring all handlers`);
    }

    const best = await this.bestMatch(content);
    if (best && best.score >= this.threshold) {
      return {
        handler: best.handler,
        domainName: best.name,
        wasSynthesized: false,
        cost: 0,
        confidence: best.score,
      };
    }

    if (!this.synthesisEnabled || !this.synthesizer) {
      const e = new PipelineError(
        "NoHandlerMatch",
        `no handler reached confidence ${this.threshold} (best: ${best ? `${best.name}=${best.score.toFixed(3)}` : "none"})`,
      );
      logInfo("resolver", `${e.message}; using "${GENERAL_DOMAIN}"`);
      return this.fallback();
    }

    const guess = hint && hint !== GENERAL_DOMAIN ? hint : (best?.name ?? GENERAL_DOMAIN);
    return this.synthesizeHandler(this.synthesizer, content, guess, opts);
  }

  private fallback(): Resolution {
    return {
      handler: generalHandler,
      domainName: GENERAL_DOMAIN,
      wasSynthesized: false,
      cost: 0,
      confidence: 0,
    };
  }

  private async synthesizeHandler(
    synthesizer: PluginSynthesizer,
    content: string,
    hint: string,
    opts: ResolveOptions,
  ): Promise<Resolution> {
    const proposed = synthesizer.proposeName?.(content, hint, this.catalog.list());
    let attempted = proposed ?? hint;
    try {
      if (proposed) {
        return await this.catalog.withLock(proposed, async (scope) => {
          const reused = await this.reuse(scope, proposed, content, opts);
          if (reused) return reused;
          const artifact = await this.runSynthesizer(synthesizer, content, hint, this.catalog.list(), opts);
          if (artifact.definition.name !== proposed) {
            throw new PipelineError(
              "SynthesisFailure",
              `synthesizer proposed "${proposed}" but returned "${artifact.definition.name}"`,
            );
          }
          return this.commit(scope, await this.validate(artifact), content, opts);
        });
      }

      const snapshot = this.catalog.list();
      const artifact = await this.runSynthesizer(synthesizer, content, hint, snapshot, opts);
      const name = artifact.definition.name;
      attempted = name;
      return await this.catalog.withLock(name, async (scope) => {
        if (this.reusable(name, snapshot)) {
          const reused = await this.reuse(scope, name, content, opts);
          if (reused) {
            const race = new PipelineError(
              "RegistryRace",
              `"${name}" is already registered as a synthesized handler; discarding the new definition`,
            );
            logDebug(this.debug, "resolver", race.kind, race.message);
            return reused;
          }
        }
        return this.commit(scope, await this.validate(artifact), content, opts);
      });
    } catch (e) {
      const failure =
        e instanceof PipelineError ? e : new PipelineError("SynthesisFailure", errorMessage(e), e);
      logWarn("resolver", `synthesis failed (${failure.kind}): ${failure.message}; using "${GENERAL_DOMAIN}"`);
      emitEngineEvent(
        {
          type: "synthesis-failed",
          runId: opts.runId,
          domain: attempted,
          success: false,
          data: { reason: failure.message, synthesizer: synthesizer.id },
        },
        opts.onEvent,
      );
      await this.record({
        runId: opts.runId,
        domain: attempted,
        synthesizer: synthesizer.id,
        status: "failed",
        cost: 0,
        reason: failure.message,
      });
      return this.fallback();
    }
  }

  /**
   * A name taken by a built-in or operator-supplied handler is a collision.
   * One registered after `snapshot` or by an earlier synthesis is the same
   * domain arriving again.
   */
  private reusable(name: string, snapshot: readonly string[]) {
    const d = this.catalog.describe(name);
    return !!d && (!snapshot.includes(name) || d.customCreated);
  }

  private async reuse(
    scope: CatalogLockScope,
    name: string,
    content: string,
    opts: ResolveOptions,
  ): Promise<Resolution | null> {
    const existing = await scope.existing();
    if (!existing) return null;
    logDebug(this.debug, "resolver", `reusing registered handler "${name}"`);
    emitEngineEvent(
      { type: "synthesis-reused", runId: opts.runId, domain: name, success: true },
      opts.onEvent,
    );
    return {
      handler: existing,
      domainName: name,
      wasSynthesized: false,
      cost: 0,
      confidence: weightedScore(existing, content),
    };
  }

  private async runSynthesizer(
    synthesizer: PluginSynthesizer,
    content: string,
    hint: string,
    existingNames: readonly string[],
    opts: ResolveOptions,
  ): Promise<SynthesisArtifact> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

    let result: Result<SynthesisArtifact, Error>;
    try {
      result = await raceAbort(
        synthesizer.synthesize(content, hint, existingNames, signal),
        signal,
      );
    } catch (e) {
      const message = timeout.aborted ? timeoutError(this.timeoutMs).message : errorMessage(e);
      throw new PipelineError("SynthesisFailure", message, e);
    }
    if (!result.ok) {
      throw new PipelineError("SynthesisFailure", result.error.message, result.error);
    }
    return result.value;
  }

  /** Checked against the catalog as it is now; call while holding the name's lock. */
  private async validate(artifact: SynthesisArtifact): Promise<ValidatedArtifact> {
    const checked = await validateArtifact(artifact, this.catalog.list());
    if (!checked.ok) throw checked.error;
    return checked.value;
  }

  private async commit(
    scope: CatalogLockScope,
    artifact: ValidatedArtifact,
    content: string,
    opts: ResolveOptions,
  ): Promise<Resolution> {
    const { definition, handler, cost, quality } = artifact;
    const createdTimestamp = new Date().toISOString();
    const source = await this.persist(artifact, createdTimestamp);
    const { handler: registered } = scope.register(
      {
        name: definition.name,
        priorityScore: definition.priority,
        customCreated: true,
        creationCost: cost,
        createdTimestamp,
        qualityScore: quality.score,
        source,
      },
      handler,
    );

    logInfo("resolver", `synthesized handler "${definition.name}" (cost ${cost}, quality ${quality.score})`);
    for (const r of quality.recommendations) {
      logDebug(this.debug, "resolver", `"${definition.name}": ${r}`);
    }
    emitEngineEvent(
      {
        type: "handler-synthesized",
        runId: opts.runId,
        domain: definition.name,
        success: true,
        data: { cost, synthesizer: artifact.synthesizer, source, quality: quality.score },
      },
      opts.onEvent,
    );
    await this.record({
      runId: opts.runId,
      domain: definition.name,
      synthesizer: artifact.synthesizer,
      status: "created",
      cost,
      ...(artifact.usage ?? {}),
      qualityScore: quality.score,
      recommendations: quality.recommendations,
    });

    return {
      handler: registered,
      domainName: definition.name,
      wasSynthesized: true,
      cost,
      confidence: weightedScore(registered, content),
    };
  }

  /** Returns the written file, or null when persistence is off or failed. */
  private async persist(artifact: ValidatedArtifact, createdTimestamp: string) {
    if (!this.customHandlersDir) return null;
    try {
      return await saveSynthesizedHandler(this.customHandlersDir, artifact.definition, {
        customCreated: true,
        creationCost: artifact.cost,
        createdTimestamp,
        synthesizer: artifact.synthesizer,
        quality: artifact.quality,
      });
    } catch (e) {
      logWarn("resolver", `could not persist handler "${artifact.definition.name}": ${errorMessage(e)}`);
      return null;
    }
  }

  private async record(entry: Parameters<typeof recordSynthesis>[1]) {
    if (!this.ledgerDir) return;
    try {
      await recordSynthesis(this.ledgerDir, entry);
    } catch (e) {
      logWarn("resolver", `could not append to synthesis ledger: ${errorMessage(e)}`);
    }
  }
}
