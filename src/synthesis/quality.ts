import type { HandlerDefinition, HandlerQuality } from "../core/types.js";

/**
 * Scores a synthesized definition on how much it gives detection and
 * extraction to work with. Points: keywords (30), requirement rules (25),
 * stakeholder roles (20), priority (15), a non-functional rule (10).
 */
export function assessHandlerQuality(def: HandlerDefinition): HandlerQuality {
  const keywords = new Set(def.keywords.map((k) => k.trim().toLowerCase()).filter(Boolean)).size;
  const rules = def.requirements.length;
  const roles = new Set([
    ...def.stakeholders.base,
    ...(def.stakeholders.rules ?? []).flatMap((r) => r.names),
  ]).size;
  const crossCutting = def.requirements.some((r) => r.category === "non-functional");

  let score = 0;
  if (keywords >= 5) score += 30;
  else if (keywords >= 3) score += 20;
  if (rules >= 2) score += 25;
  else if (rules >= 1) score += 15;
  if (roles >= 3) score += 20;
  if (def.priority >= 3) score += 15;
  if (crossCutting) score += 10;

  const recommendations: string[] = [];
  if (keywords < 5) {
    recommendations.push("Add more domain-specific keywords for better detection");
  }
  if (rules < 2) {
    recommendations.push("Define more requirement rules for broader extraction");
  }
  if (roles < 3) {
    recommendations.push("Name at least three stakeholder roles");
  }
  if (def.priority < 3) {
    recommendations.push("Consider a higher priority if the domain is highly specific");
  }
  if (!crossCutting) {
    recommendations.push("Add a non-functional rule for cross-cutting concerns");
  }

  return { score: Math.min(score, 100), recommendations };
}
