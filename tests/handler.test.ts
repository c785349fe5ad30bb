import { describe, expect, it } from "vitest";
import {
  ConfiguredDomainHandler,
  DEFAULT_STAKEHOLDERS,
  crossCuttingRequirements,
  detectConfidence,
  generalHandler,
  handlerCapabilityProblems,
  weightedScore,
} from "../src/domains/handler.js";
import { definition } from "./helpers/fixtures.js";

describe("detectConfidence", () => {
  it("normalizes matches by twice the keyword count", () => {
    expect(detectConfidence("hive honey", ["hive", "honey", "apiary"])).toBeCloseTo(1 / 3);
  });

  it("weights multi-word keywords by their word count", () => {
    expect(detectConfidence("the supply chain", ["supply chain", "x"])).toBe(0.5);
  });

  it("counts non-overlapping occurrences", () => {
    expect(detectConfidence("aaaa", ["aa", "zz"])).toBe(0.5);
  });

  it("is case insensitive and clamped to 1", () => {
    expect(detectConfidence("HIVE hive Hive hive", ["hive"])).toBe(1);
  });

  it("is 0 for an empty keyword list", () => {
    expect(detectConfidence("anything", [])).toBe(0);
  });
});

describe("weightedScore", () => {
  it("scales confidence by priority over 5", () => {
    const handler = new ConfiguredDomainHandler(definition("apiary", ["hive", "honey"], 4));
    // 2 matches / 4 = 0.5, times 4/5
    expect(weightedScore(handler, "hive and honey")).toBeCloseTo(0.4);
  });

  it("is always 0 for the general handler", () => {
    expect(weightedScore(generalHandler, "hive honey")).toBe(0);
  });
});

describe("crossCuttingRequirements", () => {
  it("adds security, reliability with the stated uptime, and real-time", () => {
    const drafts = crossCuttingRequirements("secure platform with 99.95% uptime and live tracking");
    expect(drafts.map((d) => d.title)).toEqual([
      "Comprehensive Cybersecurity Framework and Data Protection",
      "System Reliability and Performance (99.95% uptime requirement)",
      "Real-Time Data Processing and Event Handling System",
    ]);
    expect(drafts.every((d) => d.priority === "high" && d.category === "non-functional")).toBe(true);
  });

  it("defaults the uptime target when only performance is mentioned", () => {
    expect(crossCuttingRequirements("scalability matters")).toEqual([
      {
        title: "System Reliability and Performance (99.9% uptime requirement)",
        priority: "high",
        category: "non-functional",
      },
    ]);
  });

  it("returns nothing for plain content", () => {
    expect(crossCuttingRequirements("a recipe book")).toEqual([]);
  });
});

describe("ConfiguredDomainHandler", () => {
  const handler = new ConfiguredDomainHandler(
    definition("apiary", ["hive", "honey"], 4, {
      requirements: [
        { title: "Hive Registry", triggers: ["hive"], priority: "high", category: "functional" },
        { title: "Harvest Log", triggers: ["harvest"], priority: "medium", category: "functional" },
      ],
      stakeholders: { base: [], rules: [{ triggers: ["beekeeper"], names: ["Beekeepers"] }] },
    }),
  );

  it("extracts rules whose triggers appear", () => {
    expect(handler.extractRequirements("Track each HIVE")).toEqual([
      { title: "Hive Registry", priority: "high", category: "functional" },
    ]);
  });

  it("falls back to default stakeholders and adds rule matches", () => {
    expect(handler.extractStakeholders("for the beekeeper")).toEqual([
      ...DEFAULT_STAKEHOLDERS,
      "Beekeepers",
    ]);
    expect(handler.extractStakeholders("nothing")).toEqual(DEFAULT_STAKEHOLDERS);
  });
});

describe("handlerCapabilityProblems", () => {
  it("accepts a configured handler", () => {
    expect(handlerCapabilityProblems(new ConfiguredDomainHandler(definition("ok", ["a"], 3)))).toEqual([]);
  });

  it("lists every problem of a plain object", () => {
    expect(handlerCapabilityProblems({ name: "x", keywords: ["a"], priority: 7 })).toEqual([
      "priority must be an integer in 1..5",
      "missing detectConfidence()",
      "missing extractRequirements()",
      "missing crossCuttingRequirements()",
      "missing extractStakeholders()",
    ]);
  });

  it("rejects non-objects", () => {
    expect(handlerCapabilityProblems(null)).toEqual(["handler is not an object"]);
  });
});
