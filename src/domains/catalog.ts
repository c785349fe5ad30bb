import fg from "fast-glob";
import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import { KeyedMutex } from "../core/mutex.js";
import { emitEngineEvent, type EngineEventListener } from "../core/events.js";
import { errorMessage } from "../core/errors.js";
import { logDebug, logWarn } from "../core/logger.js";
import { loadSchemaFile } from "../core/schemaLoader.js";
import type { DomainHandlerDescriptor, HandlerDefinition } from "../core/types.js";
import { validateAgainst } from "../gates/schema.js";
import {
  ConfiguredDomainHandler,
  handlerCapabilityProblems,
  type DomainHandler,
} from "./handler.js";

export const HANDLER_SCHEMA_FILE = "DomainHandler.schema.json";

// Only what scan() needs; the full definition is validated on first load.
const HandlerMetadata = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/),
  priority: z.number().int().min(1).max(5),
  provenance: z
    .object({
      customCreated: z.boolean(),
      creationCost: z.number().nonnegative(),
      createdTimestamp: z.string(),
      quality: z.object({ score: z.number() }),
    })
    .partial()
    .optional(),
});

export type HandlerRegistration = Omit<DomainHandlerDescriptor, "loaded" | "order">;

export type RegisterResult = {
  handler: DomainHandler;
  registered: boolean;
};

/** Operations available while holding the lock for one handler name. */
export type CatalogLockScope = {
  existing(): Promise<DomainHandler | undefined>;
  register(entry: HandlerRegistration, handler: DomainHandler): RegisterResult;
};

export type HandlerCatalogOptions = {
  dirs: string[];
  debug?: boolean;
  onEvent?: EngineEventListener;
};

type CatalogEntry = {
  descriptor: DomainHandlerDescriptor;
  handler?: DomainHandler;
};

/**
 * Process-wide registry of domain handlers. Owns every descriptor and every
 * loaded instance; loading and registration are serialized per name.
 */
export class HandlerCatalog {
  private readonly entries = new Map<string, CatalogEntry>();
  private readonly mutex = new KeyedMutex();
  private readonly dirs: string[];
  private readonly debug: boolean;
  private readonly onEvent?: EngineEventListener;
  private nextOrder = 0;

  constructor(opts: HandlerCatalogOptions) {
    this.dirs = [...opts.dirs];
    this.debug = !!opts.debug;
    this.onEvent = opts.onEvent;
  }

  /** Discover handler definitions without instantiating them. */
  async scan(): Promise<void> {
    for (const dir of this.dirs) {
      if (!(await fs.pathExists(dir))) {
        logDebug(this.debug, "catalog", "handler dir missing, skipped", dir);
        continue;
      }
      const files = (
        await fg("*.json", { cwd: dir, absolute: true, onlyFiles: true })
      ).sort();
      for (const file of files) {
        await this.scanEntry(file);
      }
    }
    logDebug(this.debug, "catalog", "scan complete", { handlers: this.list() });
  }

  private async scanEntry(file: string) {
    let raw: unknown;
    try {
      raw = await fs.readJson(file);
    } catch (e) {
      logWarn("catalog", `skipping unreadable handler ${path.basename(file)}: ${errorMessage(e)}`);
      return;
    }
    const meta = HandlerMetadata.safeParse(raw);
    if (!meta.success) {
      const issues = meta.error.issues
        .map((i) => `${i.path.join(".") || "/"} ${i.message}`)
        .join("; ");
      logWarn("catalog", `skipping invalid handler ${path.basename(file)}: ${issues}`);
      return;
    }
    const { name, priority, provenance } = meta.data;
    const known = this.entries.get(name);
    if (known) {
      if (known.descriptor.source !== file) {
        logWarn("catalog", `duplicate handler name "${name}" in ${file}; keeping ${known.descriptor.source ?? "in-memory entry"}`);
      }
      return;
    }
    this.entries.set(name, {
      descriptor: {
        name,
        loaded: false,
        priorityScore: priority,
        customCreated: provenance?.customCreated ?? false,
        creationCost: provenance?.creationCost ?? 0,
        createdTimestamp: provenance?.createdTimestamp,
        qualityScore: provenance?.quality?.score,
        source: file,
        order: this.nextOrder++,
      },
    });
  }

  /** Cached instance, loading it on first use; `undefined` when unknown. */
  async get(name: string): Promise<DomainHandler | undefined> {
    const entry = this.entries.get(name);
    if (!entry) return undefined;
    if (entry.handler) return entry.handler;
    return this.mutex.runExclusive(name, () => this.load(entry));
  }

  list(): string[] {
    return [...this.entries.values()]
      .sort((a, b) => a.descriptor.order - b.descriptor.order)
      .map((e) => e.descriptor.name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  describe(name: string): DomainHandlerDescriptor | undefined {
    const entry = this.entries.get(name);
    return entry ? { ...entry.descriptor } : undefined;
  }

  descriptors(): DomainHandlerDescriptor[] {
    return this.list().flatMap((name) => {
      const d = this.describe(name);
      return d ? [d] : [];
    });
  }

  /** Add a handler created at runtime. At most one registration per name survives. */
  async register(
    entry: HandlerRegistration,
    handler: DomainHandler,
  ): Promise<RegisterResult> {
    return this.mutex.runExclusive(entry.name, () =>
      this.registerLocked(entry, handler),
    );
  }

  /**
   * Run `fn` while holding the lock for `name`, so a caller can check for an
   * existing handler and register a new one as a single step.
   */
  async withLock<T>(
    name: string,
    fn: (scope: CatalogLockScope) => Promise<T>,
  ): Promise<T> {
    return this.mutex.runExclusive(name, () =>
      fn({
        existing: async () => {
          const entry = this.entries.get(name);
          return entry ? this.load(entry) : undefined;
        },
        register: (entry, handler) => {
          if (entry.name !== name) {
            throw new Error(
              `Cannot register "${entry.name}" while holding the lock for "${name}"`,
            );
          }
          return this.registerLocked(entry, handler);
        },
      }),
    );
  }

  private registerLocked(
    entry: HandlerRegistration,
    handler: DomainHandler,
  ): RegisterResult {
    const problems = handlerCapabilityProblems(handler);
    if (problems.length) {
      throw new Error(`Handler "${entry.name}" rejected: ${problems.join(", ")}`);
    }
    if (handler.name !== entry.name) {
      throw new Error(`Handler name "${handler.name}" does not match "${entry.name}"`);
    }
    const current = this.entries.get(entry.name);
    if (current) {
      logDebug(this.debug, "catalog", `"${entry.name}" already registered; keeping existing entry`);
      if (current.handler) return { handler: current.handler, registered: false };
      // Scanned but never loaded: the new instance fills the empty slot.
      current.handler = handler;
      current.descriptor.loaded = true;
      return { handler, registered: false };
    }
    this.entries.set(entry.name, {
      descriptor: { ...entry, loaded: true, order: this.nextOrder++ },
      handler,
    });
    return { handler, registered: true };
  }

  private async load(entry: CatalogEntry): Promise<DomainHandler | undefined> {
    if (entry.handler) return entry.handler;
    const { name, source } = entry.descriptor;
    if (!source) return undefined;

    let raw: unknown;
    try {
      raw = await fs.readJson(source);
    } catch (e) {
      logWarn("catalog", `cannot read handler "${name}": ${errorMessage(e)}`);
      return undefined;
    }
    const schema = await loadSchemaFile(HANDLER_SCHEMA_FILE);
    const checked = validateAgainst<HandlerDefinition>(schema, raw);
    if (!checked.valid) {
      logWarn("catalog", `handler "${name}" failed validation: ${checked.reason}`);
      return undefined;
    }
    if (checked.value.name !== name) {
      logWarn("catalog", `handler file ${source} changed its name to "${checked.value.name}"`);
      return undefined;
    }
    const handler = new ConfiguredDomainHandler(checked.value);
    const problems = handlerCapabilityProblems(handler);
    if (problems.length) {
      logWarn("catalog", `handler "${name}" is missing capabilities: ${problems.join(", ")}`);
      return undefined;
    }

    entry.handler = handler;
    entry.descriptor.loaded = true;
    entry.descriptor.priorityScore = handler.priority;
    emitEngineEvent({ type: "handler-loaded", domain: name }, this.onEvent);
    logDebug(this.debug, "catalog", `loaded handler "${name}"`);
    return handler;
  }
}
