import { describe, expect, it } from "vitest";
import type { TaskPacket } from "../src/core/types.js";
import { DEFAULT_THRESHOLDS, QualityGate } from "../src/gates/quality.js";

function tasks(totalTasks: number, storyPoints: number, expansionRatio: number): TaskPacket {
  return { tasks: [], totalTasks, storyPoints, totalHours: 0, expansionRatio };
}

describe("QualityGate", () => {
  const gate = new QualityGate();

  it("approves a small plan", () => {
    expect(gate.evaluate(tasks(8, 22, 4), 3)).toEqual({
      approved: true,
      qualityScore: 100,
      riskLevel: "low",
      feedback: "approved",
      checks: { reasonableTaskCount: true, manageableStoryPoints: true, adequateScope: true, goodTaskRatio: true },
    });
  });

  it("approves medium risk when the score holds", () => {
    const d = gate.evaluate(tasks(20, 65, 4), 5);
    expect(d.approved).toBe(true);
    expect(d.riskLevel).toBe("medium");
  });

  it("asks to reduce scope for high risk even at the minimum score", () => {
    const d = gate.evaluate(tasks(32, 120, 4), 8);
    expect(d).toEqual(
      expect.objectContaining({ approved: false, qualityScore: 75, riskLevel: "high", feedback: "reduce-scope" }),
    );
  });

  it("reports too many tasks before the task ratio", () => {
    const d = gate.evaluate(tasks(60, 80, 30), 2);
    expect(d).toEqual(
      expect.objectContaining({ qualityScore: 25, riskLevel: "medium", feedback: "too-many-tasks" }),
    );
  });

  it("reports an excessive task ratio as too complex", () => {
    const d = gate.evaluate(tasks(40, 50, 20), 2);
    expect(d).toEqual(expect.objectContaining({ qualityScore: 50, riskLevel: "low", feedback: "too-complex" }));
  });

  it("reports too many requirements", () => {
    const strict = new QualityGate({ minRequirements: 10, minScore: 100 });
    expect(strict.evaluate(tasks(36, 40, 4), 9).feedback).toBe("too-many-requirements");
  });

  it("falls back to insufficient quality", () => {
    const strict = new QualityGate({ minScore: 100 });
    const d = strict.evaluate(tasks(8, 22, 4), 2);
    expect(d).toEqual(expect.objectContaining({ approved: false, qualityScore: 75, feedback: "insufficient-quality" }));
  });

  it("merges partial thresholds over the defaults", () => {
    expect(new QualityGate({ maxTasks: 10 }).thresholds).toEqual({ ...DEFAULT_THRESHOLDS, maxTasks: 10 });
  });
});
