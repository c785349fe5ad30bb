import type {
  ApprovalDecision,
  FeedbackReason,
  QualityChecks,
  RiskLevel,
  TaskPacket,
} from "../core/types.js";
import { MAX_REQUIREMENTS } from "../stages/requirements.js";

export type QualityThresholds = {
  maxTasks: number;
  maxStoryPoints: number;
  minRequirements: number;
  maxExpansionRatio: number;
  highRiskPoints: number;
  mediumRiskPoints: number;
  minScore: number;
  maxRequirements: number;
};

export const DEFAULT_THRESHOLDS: QualityThresholds = {
  maxTasks: 50,
  maxStoryPoints: 80,
  minRequirements: 3,
  maxExpansionRatio: 15,
  highRiskPoints: 100,
  mediumRiskPoints: 60,
  minScore: 75,
  maxRequirements: MAX_REQUIREMENTS,
};

export class QualityGate {
  readonly thresholds: QualityThresholds;

  constructor(thresholds: Partial<QualityThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
  }

  evaluate(packet: TaskPacket, requirementCount: number): ApprovalDecision {
    const t = this.thresholds;
    const checks: QualityChecks = {
      reasonableTaskCount: packet.totalTasks <= t.maxTasks,
      manageableStoryPoints: packet.storyPoints <= t.maxStoryPoints,
      adequateScope: requirementCount >= t.minRequirements,
      goodTaskRatio: packet.expansionRatio <= t.maxExpansionRatio,
    };
    const passed = Object.values(checks).filter(Boolean).length;
    const qualityScore = (100 * passed) / 4;
    const riskLevel: RiskLevel =
      packet.storyPoints > t.highRiskPoints
        ? "high"
        : packet.storyPoints > t.mediumRiskPoints
          ? "medium"
          : "low";

    if (qualityScore >= t.minScore && riskLevel !== "high") {
      return { approved: true, qualityScore, riskLevel, feedback: "approved", checks };
    }
    return {
      approved: false,
      qualityScore,
      riskLevel,
      feedback: this.reason(checks, riskLevel, requirementCount),
      checks,
    };
  }

  /** First matching cause wins; the order is fixed. */
  private reason(checks: QualityChecks, risk: RiskLevel, requirementCount: number): FeedbackReason {
    if (!checks.manageableStoryPoints || risk === "high") return "reduce-scope";
    if (!checks.reasonableTaskCount) return "too-many-tasks";
    if (!checks.goodTaskRatio) return "too-complex";
    if (requirementCount > this.thresholds.maxRequirements) return "too-many-requirements";
    return "insufficient-quality";
  }
}
