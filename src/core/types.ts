// Shared TypeScript types for the planning pipeline and its JSON artifacts.

export type Priority = "high" | "medium" | "low";

export type RequirementCategory = "functional" | "non-functional";

export type RiskLevel = "low" | "medium" | "high";

export const GENERAL_DOMAIN = "general";

export const DOMAIN_TASK_REF = "DOMAIN";

export type AnalysisPacket = {
  domain: string;
  complexity: number;
  content: string;
  confidence: number;
  synthesized: boolean;
};

/** A requirement as produced by a handler, before IDs are assigned. */
export type RequirementDraft = {
  title: string;
  priority: Priority;
  category: RequirementCategory;
};

export type Requirement = RequirementDraft & {
  id: string;
};

export type RequirementsPacket = {
  domain: string;
  requirements: Requirement[];
  stakeholders: string[];
  feedbackApplied: boolean;
};

export type Task = {
  id: string;
  requirementId: string;
  title: string;
  storyPoints: number;
  hours: number;
  priority: Priority;
};

export type TaskPacket = {
  tasks: Task[];
  totalTasks: number;
  storyPoints: number;
  totalHours: number;
  expansionRatio: number;
};

/**
 * Closed set of rejection causes. The requirements stage maps each one to a
 * transform; anything outside this set is never produced by the gate.
 */
export const FEEDBACK_REASONS = [
  "reduce-scope",
  "too-many-tasks",
  "too-complex",
  "too-many-requirements",
  "insufficient-quality",
] as const;

export type FeedbackReason = (typeof FEEDBACK_REASONS)[number];

export type QualityChecks = {
  reasonableTaskCount: boolean;
  manageableStoryPoints: boolean;
  adequateScope: boolean;
  goodTaskRatio: boolean;
};

export type ApprovalDecision =
  | {
      approved: true;
      qualityScore: number;
      riskLevel: RiskLevel;
      feedback: "approved";
      checks: QualityChecks;
    }
  | {
      approved: false;
      qualityScore: number;
      riskLevel: RiskLevel;
      feedback: FeedbackReason;
      checks: QualityChecks;
    };

export type DomainHandlerDescriptor = {
  name: string;
  loaded: boolean;
  priorityScore: number;
  customCreated: boolean;
  creationCost: number;
  createdTimestamp?: string;
  /** Quality score recorded when the handler was synthesized. */
  qualityScore?: number;
  source: string | null;
  order: number;
};

export type RequirementRule = {
  title: string;
  triggers: string[];
  priority: Priority;
  category: RequirementCategory;
};

export type StakeholderRule = {
  triggers: string[];
  names: string[];
};

export type HandlerQuality = {
  /** 0..100 */
  score: number;
  recommendations: string[];
};

export type HandlerProvenance = {
  customCreated: boolean;
  creationCost: number;
  createdTimestamp: string;
  synthesizer: string;
  quality?: HandlerQuality;
};

/** Declarative handler form, stored as JSON and produced by synthesizers. */
export type HandlerDefinition = {
  name: string;
  description?: string;
  keywords: string[];
  priority: number;
  requirements: RequirementRule[];
  stakeholders: {
    base: string[];
    rules?: StakeholderRule[];
  };
  provenance?: HandlerProvenance;
};
