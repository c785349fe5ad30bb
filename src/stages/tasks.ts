import {
  DOMAIN_TASK_REF,
  type Priority,
  type Requirement,
  type RequirementsPacket,
  type Task,
  type TaskPacket,
} from "../core/types.js";

export const HOURS_PER_POINT = 3.5;
export const DOMAIN_TASK_POINTS = 3;

const STEPS = [
  { verb: "Design", points: 2 },
  { verb: "Implement", points: 3 },
  { verb: "Test", points: 2 },
  { verb: "Document", points: 2 },
] as const;

/** Fixed extra work per domain, appended after the per-requirement tasks. */
export const DOMAIN_TASKS: Readonly<Record<string, readonly string[]>> = {
  enterprise: ["Enterprise Security Setup and Access Control", "Compliance Review and Audit Preparation"],
  healthcare: ["HIPAA Compliance Assessment", "Clinical Data Privacy Review"],
  fintech: ["PCI DSS Compliance Setup", "Financial Transaction Audit Trail"],
  ecommerce: ["Payment Gateway Certification"],
  mobile_app: ["App Store Submission and Review"],
  gaming_studio_management: ["Platform Certification and Age Rating Submission"],
};

function taskId(n: number) {
  return `TASK-${String(n).padStart(3, "0")}`;
}

function hoursFor(points: number) {
  return Math.floor(points * HOURS_PER_POINT);
}

export class TaskStage {
  decompose(packet: RequirementsPacket): TaskPacket {
    const tasks: Task[] = [];
    const push = (requirementId: string, title: string, storyPoints: number, priority: Priority) =>
      tasks.push({
        id: taskId(tasks.length + 1),
        requirementId,
        title,
        storyPoints,
        hours: hoursFor(storyPoints),
        priority,
      });

    for (const req of packet.requirements) {
      for (const { verb, points } of STEPS) {
        push(req.id, `${verb}: ${req.title}`, points + bonus(req), req.priority);
      }
    }
    for (const title of DOMAIN_TASKS[packet.domain] ?? []) {
      push(DOMAIN_TASK_REF, title, DOMAIN_TASK_POINTS, "high");
    }

    return {
      tasks,
      totalTasks: tasks.length,
      storyPoints: tasks.reduce((sum, t) => sum + t.storyPoints, 0),
      totalHours: tasks.reduce((sum, t) => sum + t.hours, 0),
      expansionRatio: tasks.length / Math.max(packet.requirements.length, 1),
    };
  }
}

function bonus(req: Requirement) {
  return req.priority === "high" ? 1 : 0;
}
