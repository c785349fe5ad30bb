import chalk from "chalk";
import type { EngineEvent } from "../core/events.js";

export type ProgressMode = "live" | "none";

type TaskStatus = "running" | "ok" | "fail" | "info";

type Task = {
  label: string;
  status: TaskStatus;
  detail?: string;
  startedAt?: number;
  endedAt?: number;
};

const icons: Record<TaskStatus, string> = {
  running: "⏳",
  ok: "✅",
  fail: "❌",
  info: "✨",
};

function fmtMs(ms: number) {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function describeData(data: Record<string, unknown> | undefined, keys: string[]) {
  if (!data) return undefined;
  const parts = keys.filter((k) => data[k] !== undefined).map((k) => `${k}=${String(data[k])}`);
  return parts.length ? parts.join(" ") : undefined;
}

/** Prints one line per stage, gate and synthesis event. */
export class ProgressReporter {
  private readonly tasks = new Map<string, Task>();

  constructor(
    private readonly mode: ProgressMode,
    private readonly write: (line: string) => void = (line) => console.log(line),
  ) {}

  private printLine(task: Task) {
    if (this.mode === "none") return;
    const elapsed =
      task.startedAt !== undefined && task.endedAt !== undefined
        ? fmtMs(task.endedAt - task.startedAt)
        : "";
    const statusColor =
      task.status === "ok"
        ? chalk.greenBright
        : task.status === "fail"
          ? chalk.redBright
          : task.status === "info"
            ? chalk.magentaBright
            : chalk.cyanBright;
    const parts = [
      statusColor(`${icons[task.status]} ${task.label}`),
      elapsed ? chalk.dim(elapsed) : "",
      task.detail ? chalk.yellow(task.detail) : "",
    ].filter(Boolean);
    this.write(parts.join("  "));
  }

  private upsertTask(key: string, partial: Partial<Task>) {
    const existing = this.tasks.get(key);
    const merged: Task = {
      label: partial.label ?? existing?.label ?? key,
      status: partial.status ?? existing?.status ?? "running",
      detail: partial.detail ?? existing?.detail,
      startedAt: partial.startedAt ?? existing?.startedAt,
      endedAt: partial.endedAt ?? existing?.endedAt,
    };
    this.tasks.set(key, merged);
    this.printLine(merged);
  }

  log(event: EngineEvent) {
    if (this.mode === "none") return;
    const round = event.iteration ? `#${event.iteration} ` : "";

    switch (event.type) {
      case "stage-start":
      case "gate-start": {
        const name = event.stage ?? event.gate ?? "task";
        const kind = event.type === "gate-start" ? "Gate" : "Stage";
        this.upsertTask(`${round}${name}`, {
          label: `${round}${kind}: ${name}`,
          status: "running",
          startedAt: Date.now(),
          detail: undefined,
          endedAt: undefined,
        });
        return;
      }
      case "stage-end":
      case "gate-end": {
        const name = event.stage ?? event.gate ?? "task";
        this.upsertTask(`${round}${name}`, {
          status: event.success === false ? "fail" : "ok",
          endedAt: Date.now(),
          detail: describeData(event.data, [
            "domain",
            "count",
            "totalTasks",
            "storyPoints",
            "qualityScore",
            "riskLevel",
            "feedback",
          ]) ?? event.domain,
        });
        return;
      }
      case "handler-synthesized":
        this.upsertTask(`synth:${event.domain}`, {
          label: `Synthesized handler: ${event.domain ?? "?"}`,
          status: "info",
          detail: describeData(event.data, ["synthesizer", "cost", "quality"]),
        });
        return;
      case "synthesis-reused":
        this.upsertTask(`synth:${event.domain}`, {
          label: `Reused handler: ${event.domain ?? "?"}`,
          status: "ok",
        });
        return;
      case "synthesis-failed":
        this.upsertTask(`synth:${event.domain}`, {
          label: `Synthesis failed: ${event.domain ?? "?"}`,
          status: "fail",
          detail: describeData(event.data, ["reason"]),
        });
        return;
      default:
        return;
    }
  }
}

export function progressModeFromOpts(opts: { quiet?: boolean; json?: boolean }): ProgressMode {
  return opts.quiet || opts.json ? "none" : "live";
}
