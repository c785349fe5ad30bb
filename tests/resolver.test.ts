import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { err, ok, type Result } from "../src/core/errors.js";
import type { EngineEvent } from "../src/core/events.js";
import { summarizeSynthesis } from "../src/core/usage.js";
import { HandlerCatalog } from "../src/domains/catalog.js";
import { DomainResolver } from "../src/domains/resolver.js";
import { TemplateSynthesizer } from "../src/synthesis/template.js";
import type { PluginSynthesizer, SynthesisArtifact } from "../src/synthesis/types.js";
import { definition, makeTempDir, writeDefinition } from "./helpers/fixtures.js";

const BEE_KEYWORDS = ["hive", "honey", "apiary", "beekeeping", "colony", "swarm"];
// hive 2, honey 2, apiary 1, beekeeping 1: 6/12 * 4/5 = 0.4
const BEES = "track hive and honey at the apiary, beekeeping with hive and honey";

type Produce = (hint: string, signal?: AbortSignal) => Promise<Result<SynthesisArtifact, Error>>;

class FakeSynthesizer implements PluginSynthesizer {
  readonly id = "fake";
  calls = 0;
  hints: string[] = [];
  proposeName?: PluginSynthesizer["proposeName"];

  constructor(
    private readonly produce: Produce,
    proposed?: string,
  ) {
    if (proposed) this.proposeName = () => proposed;
  }

  async synthesize(_content: string, hint: string, _existing: readonly string[], signal?: AbortSignal) {
    this.calls += 1;
    this.hints.push(hint);
    return this.produce(hint, signal);
  }
}

function artifactFor(name: string, keywords = BEE_KEYWORDS): Produce {
  return async () => ok({ definition: definition(name, keywords, 4), cost: 0.02, synthesizer: "fake" });
}

async function setup() {
  const root = await makeTempDir("resolver");
  const handlers = path.join(root, "builtin");
  await writeDefinition(handlers, "retail_shop.json", definition("retail_shop", ["shop", "checkout", "cart"], 4));
  await writeDefinition(handlers, "clinic.json", definition("clinic", ["patient", "doctor", "clinic"], 5));
  const catalog = new HandlerCatalog({ dirs: [handlers, path.join(root, "handlers")] });
  await catalog.scan();
  return { root, handlers, catalog };
}

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

describe("DomainResolver matching", () => {
  it("accepts the best handler at or above the threshold", async () => {
    const { catalog } = await setup();
    const synth = new FakeSynthesizer(artifactFor("beekeeping"));
    const resolver = new DomainResolver({ catalog, synthesizer: synth });
    const r = await resolver.resolve("shop cart checkout shop cart checkout");
    expect(r).toEqual(
      expect.objectContaining({ domainName: "retail_shop", wasSynthesized: false, cost: 0 }),
    );
    expect(r.confidence).toBeCloseTo(0.8);
    expect(synth.calls).toBe(0);
  });

  it("breaks ties by catalog order", async () => {
    const dir = await makeTempDir("resolver-tie");
    await writeDefinition(dir, "alpha.json", definition("alpha", ["x1", "x2", "x3"], 5));
    await writeDefinition(dir, "beta.json", definition("beta", ["x1", "x2", "x3"], 5));
    const catalog = new HandlerCatalog({ dirs: [dir] });
    await catalog.scan();
    const resolver = new DomainResolver({ catalog, confidenceThreshold: 0.5, synthesisEnabled: false });
    const r = await resolver.resolve("x1 x2 x3");
    expect(r.domainName).toBe("alpha");
    expect(r.confidence).toBe(0.5);
  });

  it("uses a known hint without scoring", async () => {
    const { catalog } = await setup();
    const synth = new FakeSynthesizer(artifactFor("beekeeping"));
    const resolver = new DomainResolver({ catalog, synthesizer: synth });
    const r = await resolver.resolve(BEES, " Clinic ");
    expect(r.domainName).toBe("clinic");
    expect(r.confidence).toBe(0);
    expect(synth.calls).toBe(0);
  });

  it("matches a free-text hint by its handler name", async () => {
    const { catalog } = await setup();
    const resolver = new DomainResolver({ catalog, synthesisEnabled: false });
    expect((await resolver.resolve(BEES, "Retail Shop!")).domainName).toBe("retail_shop");
  });

  it("falls back to general when synthesis is off", async () => {
    const { catalog } = await setup();
    const synth = new FakeSynthesizer(artifactFor("beekeeping"));
    const off = new DomainResolver({ catalog, synthesizer: synth, synthesisEnabled: false });
    const none = new DomainResolver({ catalog });
    for (const resolver of [off, none]) {
      const r = await resolver.resolve(BEES);
      expect(r).toEqual(
        expect.objectContaining({ domainName: "general", wasSynthesized: false, cost: 0, confidence: 0 }),
      );
    }
    expect(synth.calls).toBe(0);
  });
});

describe("DomainResolver synthesis", () => {
  it("synthesizes, persists, records and then reuses a handler", async () => {
    const { root, handlers, catalog } = await setup();
    const synth = new FakeSynthesizer(artifactFor("beekeeping"), "beekeeping");
    const events: EngineEvent[] = [];
    const resolver = new DomainResolver({
      catalog,
      synthesizer: synth,
      customHandlersDir: path.join(root, "handlers"),
      ledgerDir: root,
    });

    const first = await resolver.resolve(BEES, undefined, { runId: "run-1", onEvent: (e) => events.push(e) });
    expect(first).toEqual(
      expect.objectContaining({ domainName: "beekeeping", wasSynthesized: true, cost: 0.02 }),
    );
    expect(first.confidence).toBeCloseTo(0.4);
    expect(synth.hints).toEqual(["clinic"]);

    const file = path.join(root, "handlers", "beekeeping.json");
    expect(catalog.describe("beekeeping")).toEqual(
      expect.objectContaining({ customCreated: true, creationCost: 0.02, qualityScore: 60, source: file, loaded: true }),
    );
    const synthesized = events.find((e) => e.type === "handler-synthesized");
    expect(synthesized).toEqual(
      expect.objectContaining({
        runId: "run-1",
        domain: "beekeeping",
        data: { cost: 0.02, synthesizer: "fake", source: file, quality: 60 },
      }),
    );

    const second = await resolver.resolve(BEES, undefined, { onEvent: (e) => events.push(e) });
    expect(second).toEqual(
      expect.objectContaining({ domainName: "beekeeping", wasSynthesized: false, cost: 0 }),
    );
    expect(synth.calls).toBe(1);
    expect(events.map((e) => e.type)).toContain("synthesis-reused");

    const summary = await summarizeSynthesis(root);
    expect(summary.created).toBe(1);
    expect(summary.totalCost).toBeCloseTo(0.02);
    expect(summary.byDomain.beekeeping).toEqual({ created: 1, failed: 0, cost: 0.02, tokens: 0 });
    expect(summary.quality.beekeeping).toEqual({
      score: 60,
      recommendations: [
        "Define more requirement rules for broader extraction",
        "Name at least three stakeholder roles",
        "Add a non-functional rule for cross-cutting concerns",
      ],
    });

    const rescanned = new HandlerCatalog({ dirs: [handlers, path.join(root, "handlers")] });
    await rescanned.scan();
    expect(rescanned.list()).toEqual(["clinic", "retail_shop", "beekeeping"]);
    expect(rescanned.describe("beekeeping")).toEqual(
      expect.objectContaining({ customCreated: true, qualityScore: 60, loaded: false }),
    );
    expect((await rescanned.get("beekeeping"))?.keywords).toEqual(BEE_KEYWORDS);
  });

  it("synthesizes once for concurrent requests", async () => {
    const { catalog } = await setup();
    const synth = new FakeSynthesizer(async (hint) => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      return artifactFor("beekeeping")(hint);
    }, "beekeeping");
    const resolver = new DomainResolver({ catalog, synthesizer: synth });

    const results = await Promise.all([resolver.resolve(BEES), resolver.resolve(BEES)]);
    expect(synth.calls).toBe(1);
    expect(results.map((r) => r.domainName)).toEqual(["beekeeping", "beekeeping"]);
    expect(results.filter((r) => r.wasSynthesized)).toHaveLength(1);
  });

  it("reuses an earlier synthesis when the synthesizer proposes no name", async () => {
    const { root, catalog } = await setup();
    const synth = new FakeSynthesizer(artifactFor("beekeeping"));
    const events: EngineEvent[] = [];
    const resolver = new DomainResolver({ catalog, synthesizer: synth, ledgerDir: root });

    const first = await resolver.resolve(BEES);
    const second = await resolver.resolve(BEES, undefined, { onEvent: (e) => events.push(e) });

    expect([first.domainName, first.wasSynthesized]).toEqual(["beekeeping", true]);
    expect([second.domainName, second.wasSynthesized, second.cost]).toEqual(["beekeeping", false, 0]);
    expect(second.confidence).toBeCloseTo(0.4);
    expect(synth.calls).toBe(2);
    expect(events.map((e) => e.type)).toEqual(["synthesis-reused"]);
    const summary = await summarizeSynthesis(root);
    expect([summary.created, summary.failed]).toEqual([1, 0]);
  });

  it("registers once when unnamed syntheses race", async () => {
    const { catalog } = await setup();
    const synth = new FakeSynthesizer(async (hint) => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      return artifactFor("beekeeping")(hint);
    });
    const resolver = new DomainResolver({ catalog, synthesizer: synth });

    const results = await Promise.all([resolver.resolve(BEES), resolver.resolve(BEES)]);
    expect(synth.calls).toBe(2);
    expect(results.map((r) => r.domainName)).toEqual(["beekeeping", "beekeeping"]);
    expect(results.filter((r) => r.wasSynthesized)).toHaveLength(1);
    expect(catalog.list()).toEqual(["clinic", "retail_shop", "beekeeping"]);
  });

  it("registers under the artifact name when no name is proposed", async () => {
    const { catalog } = await setup();
    const resolver = new DomainResolver({ catalog, synthesizer: new FakeSynthesizer(artifactFor("apiary")) });
    const r = await resolver.resolve(BEES);
    expect(r.domainName).toBe("apiary");
    expect(catalog.has("apiary")).toBe(true);
  });

  describe("degrades to general", () => {
    async function failureReason(synth: FakeSynthesizer, timeoutMs?: number) {
      const { root, catalog } = await setup();
      const events: EngineEvent[] = [];
      const resolver = new DomainResolver({
        catalog,
        synthesizer: synth,
        synthesisTimeoutMs: timeoutMs,
        ledgerDir: root,
      });
      const r = await resolver.resolve(BEES, undefined, { onEvent: (e) => events.push(e) });
      expect(r).toEqual(expect.objectContaining({ domainName: "general", wasSynthesized: false, cost: 0 }));
      expect((await summarizeSynthesis(root)).failed).toBe(1);
      const failed = events.find((e) => e.type === "synthesis-failed");
      expect(failed?.data?.synthesizer).toBe("fake");
      return failed?.data?.reason;
    }

    it("on an error result", async () => {
      const synth = new FakeSynthesizer(async () => err(new Error("boom")), "beekeeping");
      expect(await failureReason(synth)).toBe("boom");
    });

    it("on a timeout", async () => {
      const synth = new FakeSynthesizer(
        () => new Promise<Result<SynthesisArtifact, Error>>(() => undefined),
        "beekeeping",
      );
      expect(await failureReason(synth, 20)).toBe("synthesis timed out after 20ms");
    });

    it("on too few keywords", async () => {
      const synth = new FakeSynthesizer(artifactFor("beekeeping", ["hive", "honey"]), "beekeeping");
      expect(await failureReason(synth)).toBe('handler "beekeeping" has 2 distinct keywords, needs 3');
    });

    it("on a name other than the proposed one", async () => {
      const synth = new FakeSynthesizer(artifactFor("apiary"), "beekeeping");
      expect(await failureReason(synth)).toBe('synthesizer proposed "beekeeping" but returned "apiary"');
    });

    it("on a name already in the catalog", async () => {
      const synth = new FakeSynthesizer(artifactFor("clinic"));
      expect(await failureReason(synth)).toBe('handler name "clinic" is already taken');
    });
  });
});

describe("DomainResolver determinism", () => {
  const inputs = [
    "shop cart checkout shop cart checkout",
    "patient doctor clinic patient doctor clinic",
    BEES,
    "a an to",
    "shop shop patient",
  ];

  it.each(inputs)("returns the same domain and confidence for %j", async (content) => {
    const { catalog } = await setup();
    const resolver = new DomainResolver({ catalog, synthesizer: await TemplateSynthesizer.create() });
    const runs: [string, number][] = [];
    for (let i = 0; i < 3; i++) {
      const r = await resolver.resolve(content);
      runs.push([r.domainName, r.confidence]);
    }
    expect(runs[1]).toEqual(runs[0]);
    expect(runs[2]).toEqual(runs[0]);
  });

  it("does not depend on synthesis being enabled for matched content", async () => {
    const { catalog } = await setup();
    const on = new DomainResolver({ catalog, synthesizer: await TemplateSynthesizer.create() });
    const off = new DomainResolver({ catalog, synthesisEnabled: false });
    for (const content of inputs.slice(0, 2)) {
      const a = await on.resolve(content);
      const b = await off.resolve(content);
      expect([a.domainName, a.confidence]).toEqual([b.domainName, b.confidence]);
    }
  });
});
