import { afterEach, describe, expect, it, vi } from "vitest";
import { emitEngineEvent, setEngineEventListener, type EngineEvent } from "../src/core/events.js";

afterEach(() => setEngineEventListener(null));

describe("engine events", () => {
  it("reaches the local and the global listener with a timestamp", () => {
    const local: EngineEvent[] = [];
    const global: EngineEvent[] = [];
    setEngineEventListener((e) => global.push(e));
    emitEngineEvent({ type: "gate-end", gate: "quality", success: true }, (e) => local.push(e));

    expect(local).toHaveLength(1);
    expect(global).toEqual(local);
    expect(local[0]).toEqual(
      expect.objectContaining({ type: "gate-end", gate: "quality", success: true, timestamp: expect.any(String) }),
    );
  });

  it("keeps delivering when a listener throws", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const global: EngineEvent[] = [];
    setEngineEventListener((e) => global.push(e));
    emitEngineEvent({ type: "stage-start", stage: "resolve" }, () => {
      throw new Error("listener broke");
    });
    expect(global).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith("[reqforge][events]", "local listener failed: listener broke");
  });
});
