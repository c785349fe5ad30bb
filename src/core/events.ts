import { errorMessage } from "./errors.js";
import { logWarn } from "./logger.js";

export type EngineEventType =
  | "stage-start"
  | "stage-end"
  | "iteration-start"
  | "iteration-end"
  | "gate-start"
  | "gate-end"
  | "handler-loaded"
  | "handler-synthesized"
  | "synthesis-failed"
  | "synthesis-reused";

export type EngineEvent = {
  type: EngineEventType;
  timestamp: string;
  runId?: string;
  stage?: string;
  gate?: string;
  domain?: string;
  iteration?: number;
  success?: boolean;
  data?: Record<string, unknown>;
};

export type EngineEventListener = (event: EngineEvent) => void;

let globalListener: EngineEventListener | null = null;

export function setEngineEventListener(listener: EngineEventListener | null) {
  globalListener = listener;
}

export function emitEngineEvent(
  event: Omit<EngineEvent, "timestamp">,
  local?: EngineEventListener,
) {
  const enriched: EngineEvent = {
    ...event,
    timestamp: new Date().toISOString(),
  };
  if (local) {
    try {
      local(enriched);
    } catch (e) {
      logWarn("events", `local listener failed: ${errorMessage(e)}`);
    }
  }
  if (globalListener) {
    try {
      globalListener(enriched);
    } catch (e) {
      logWarn("events", `global listener failed: ${errorMessage(e)}`);
    }
  }
}
