/**
 * Pipeline stages after analysis: requirements, tasks, approval.
 */

import { assessRiskLevel, crossCuttingRequirements, dedupeRequirements, recommendationsFor } from "../../domain/rules.ts";
import {
  ApprovalStatus,
  RequirementCategory,
  RiskLevel,
  type ApprovalDecision,
  type Requirement,
  type Task,
} from "../../domain/types.ts";
import type { DomainRegistry } from "../handlers/registry.ts";

/** Domain requirements first, then cross-cutting ones; first title wins. */
export function collectRequirements(registry: DomainRegistry, domain: string, text: string): Requirement[] {
  return dedupeRequirements([
    ...registry.extractRequirements(domain, text),
    ...crossCuttingRequirements(text),
  ]);
}

const FUNCTIONAL_TASKS = ["Design", "Implement", "Test"];
const NON_FUNCTIONAL_TASKS = ["Define acceptance criteria for", "Verify"];

export function breakIntoTasks(requirements: Requirement[]): Task[] {
  const tasks: Task[] = [];
  for (const requirement of requirements) {
    const verbs = requirement.category === RequirementCategory.FUNCTIONAL ? FUNCTIONAL_TASKS : NON_FUNCTIONAL_TASKS;
    for (const verb of verbs) {
      tasks.push({
        id: `T-${String(tasks.length + 1).padStart(3, "0")}`,
        title: `${verb} ${requirement.title}`,
        requirement: requirement.title,
        priority: requirement.priority,
        category: requirement.category,
      });
    }
  }
  return tasks;
}

export function decideApproval(text: string, requirements: Requirement[], minRequirements: number): ApprovalDecision {
  const riskLevel = assessRiskLevel(text);
  const count = requirements.length;
  const approved = count >= minRequirements && riskLevel !== RiskLevel.HIGH;
  const noun = count === 1 ? "requirement" : "requirements";

  const reasoning = approved
    ? `Project APPROVED for execution. ${count} ${noun} identified; risk level ${riskLevel}.`
    : `Project REQUIRES REVISION before approval. ${count} ${noun} identified (minimum ${minRequirements}); risk level ${riskLevel}.`;

  return {
    status: approved ? ApprovalStatus.APPROVED : ApprovalStatus.REJECTED,
    riskLevel,
    requirementCount: count,
    recommendations: recommendationsFor(text),
    reasoning,
  };
}
