import { emitEngineEvent, type EngineEvent, type EngineEventListener } from "./events.js";
import type { PipelineErrorKind } from "./errors.js";
import { parseDocument } from "./ingress.js";
import { logDebug, logInfo } from "./logger.js";
import type {
  AnalysisPacket,
  ApprovalDecision,
  FeedbackReason,
  RequirementsPacket,
  TaskPacket,
} from "./types.js";
import { newRunId } from "./usage.js";
import type { DomainResolver } from "../domains/resolver.js";
import { QualityGate } from "../gates/quality.js";
import { buildAnalysisPacket } from "../stages/analysis.js";
import { RequirementsStage } from "../stages/requirements.js";
import { TaskStage } from "../stages/tasks.js";

export const DEFAULT_MAX_ITERATIONS = 3;

export type PipelineDeps = {
  resolver: Pick<DomainResolver, "resolve">;
  requirements?: RequirementsStage;
  tasks?: TaskStage;
  gate?: QualityGate;
};

export type PipelineOptions = {
  domainHint?: string;
  maxIterations?: number;
  signal?: AbortSignal;
  runId?: string;
  debug?: boolean;
  onEvent?: EngineEventListener;
};

export type IterationRecord = {
  iteration: number;
  requirementCount: number;
  totalTasks: number;
  storyPoints: number;
  decision: ApprovalDecision;
};

type Completed = {
  runId: string;
  analysis: AnalysisPacket;
  requirements: RequirementsPacket;
  tasks: TaskPacket;
  iterations: number;
  synthesisCost: number;
  history: IterationRecord[];
};

export type PipelineOutcome =
  | (Completed & { status: "approved"; decision: ApprovalDecision & { approved: true } })
  | (Completed & {
      status: "rejected";
      decision: ApprovalDecision & { approved: false };
      feedback: FeedbackReason;
    })
  | { status: "error"; runId: string; kind: PipelineErrorKind; reason: string };

// Iterating(k); the feedback and packet of the previous round drive the next.
type IterationState = { k: number; feedback?: FeedbackReason; previous?: RequirementsPacket };

/**
 * Runs one document through resolve, then up to `maxIterations` rounds of
 * requirements, tasks and quality gate. Never evaluates the gate more than
 * `maxIterations` times.
 */
export async function runPipeline(
  raw: unknown,
  deps: PipelineDeps,
  opts: PipelineOptions = {},
): Promise<PipelineOutcome> {
  const runId = opts.runId ?? newRunId();
  const requested = opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const maxIterations = Number.isFinite(requested)
    ? Math.max(1, Math.floor(requested))
    : DEFAULT_MAX_ITERATIONS;
  const debug = !!opts.debug;
  const requirementsStage = deps.requirements ?? new RequirementsStage();
  const taskStage = deps.tasks ?? new TaskStage();
  const gate = deps.gate ?? new QualityGate();

  const emit = (event: Omit<EngineEvent, "timestamp" | "runId">) =>
    emitEngineEvent({ runId, ...event }, opts.onEvent);

  const parsed = parseDocument(raw);
  if (!parsed.ok) {
    logInfo("pipeline", `input rejected: ${parsed.error.message}`);
    return { status: "error", runId, kind: parsed.error.kind, reason: parsed.error.message };
  }
  const content = parsed.value.content;

  opts.signal?.throwIfAborted();
  emit({ type: "stage-start", stage: "resolve" });
  const resolution = await deps.resolver.resolve(content, opts.domainHint, {
    signal: opts.signal,
    runId,
    onEvent: opts.onEvent,
  });
  const analysis = buildAnalysisPacket(content, resolution);
  emit({
    type: "stage-end",
    stage: "resolve",
    domain: analysis.domain,
    success: true,
    data: {
      confidence: analysis.confidence,
      synthesized: analysis.synthesized,
      cost: resolution.cost,
      complexity: analysis.complexity,
    },
  });
  logDebug(debug, "pipeline", "resolved", {
    domain: analysis.domain,
    confidence: analysis.confidence,
    synthesized: analysis.synthesized,
  });

  const history: IterationRecord[] = [];
  let state: IterationState = { k: 0 };

  for (;;) {
    opts.signal?.throwIfAborted();
    const { k } = state;
    emit({ type: "iteration-start", iteration: k + 1, domain: analysis.domain });

    emit({ type: "stage-start", stage: "requirements", iteration: k + 1 });
    const requirements: RequirementsPacket =
      state.feedback && state.previous
        ? requirementsStage.applyFeedback(state.previous, state.feedback, content, resolution.handler)
        : requirementsStage.extract(analysis, resolution.handler);
    emit({
      type: "stage-end",
      stage: "requirements",
      iteration: k + 1,
      success: true,
      data: { count: requirements.requirements.length, feedbackApplied: requirements.feedbackApplied },
    });

    emit({ type: "stage-start", stage: "tasks", iteration: k + 1 });
    const tasks = taskStage.decompose(requirements);
    emit({
      type: "stage-end",
      stage: "tasks",
      iteration: k + 1,
      success: true,
      data: { totalTasks: tasks.totalTasks, storyPoints: tasks.storyPoints },
    });

    emit({ type: "gate-start", gate: "quality", iteration: k + 1 });
    const decision = gate.evaluate(tasks, requirements.requirements.length);
    emit({
      type: "gate-end",
      gate: "quality",
      iteration: k + 1,
      success: decision.approved,
      data: { qualityScore: decision.qualityScore, riskLevel: decision.riskLevel, feedback: decision.feedback },
    });

    history.push({
      iteration: k + 1,
      requirementCount: requirements.requirements.length,
      totalTasks: tasks.totalTasks,
      storyPoints: tasks.storyPoints,
      decision,
    });
    emit({ type: "iteration-end", iteration: k + 1, success: decision.approved });

    const completed: Completed = {
      runId,
      analysis,
      requirements,
      tasks,
      iterations: k + 1,
      synthesisCost: resolution.cost,
      history,
    };

    if (decision.approved) {
      logInfo("pipeline", `approved after ${k + 1} iteration(s)`);
      return { ...completed, status: "approved", decision };
    }
    if (k + 1 >= maxIterations) {
      logInfo("pipeline", `rejected after ${k + 1} iteration(s): ${decision.feedback}`);
      return { ...completed, status: "rejected", decision, feedback: decision.feedback };
    }
    logDebug(debug, "pipeline", `iteration ${k + 1} rejected: ${decision.feedback}`);
    state = { k: k + 1, feedback: decision.feedback, previous: requirements };
  }
}
