import chalk from "chalk";
import type { PipelineOutcome } from "../core/orchestrator.js";
import type { DomainHandlerDescriptor } from "../core/types.js";

/** One `reqforge domains` line. */
export function formatDescriptor(d: DomainHandlerDescriptor) {
  const quality = d.qualityScore === undefined ? "" : ` quality=${d.qualityScore}`;
  const origin = d.customCreated
    ? chalk.magenta(`custom cost=${d.creationCost}${quality}`)
    : chalk.dim("built-in");
  return `${d.name.padEnd(28)} priority=${d.priorityScore}  ${origin}`;
}

export function exitCodeFor(outcome: PipelineOutcome) {
  switch (outcome.status) {
    case "approved":
      return 0;
    case "rejected":
      return 2;
    case "error":
      return 1;
  }
}

export function formatOutcome(outcome: PipelineOutcome, maxIterations: number): string[] {
  if (outcome.status === "error") {
    return [chalk.redBright(`ERROR (${outcome.kind}): ${outcome.reason}`)];
  }

  const { analysis, decision, requirements, tasks } = outcome;
  const headline =
    outcome.status === "approved"
      ? chalk.greenBright.bold("APPROVED")
      : chalk.yellowBright.bold(`REJECTED (${outcome.feedback})`);
  const lines = [
    `${headline} after ${outcome.iterations}/${maxIterations} iteration(s)`,
    `Domain:       ${analysis.domain}${analysis.synthesized ? chalk.magenta(" (synthesized)") : ""}  confidence=${analysis.confidence.toFixed(3)}  complexity=${analysis.complexity}`,
    `Quality:      score=${decision.qualityScore} risk=${decision.riskLevel}`,
    `Stakeholders: ${requirements.stakeholders.join(", ")}`,
    "Requirements:",
    ...requirements.requirements.map(
      (r) => `  ${chalk.cyan(r.id)} [${r.priority}] ${r.title} ${chalk.dim(r.category)}`,
    ),
    `Tasks:        ${tasks.totalTasks} tasks, ${tasks.storyPoints} points, ${tasks.totalHours}h, ratio=${tasks.expansionRatio.toFixed(2)}`,
  ];
  if (outcome.synthesisCost > 0) {
    lines.push(`Synthesis:    cost=${outcome.synthesisCost.toFixed(4)}`);
  }
  return lines;
}
