import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "traffic", "transportation", "smart city", "municipal",
  "emergency", "camera", "sensor", "routing",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["camera", "sensor", "monitoring", "detection"],
    requirement: { title: "Traffic Camera Integration and Sensor Network Management", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["mobile", "citizen", "public", "user"],
    requirement: { title: "Mobile Application for Citizen Traffic Information and Reporting", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["emergency", "ambulance", "fire", "police", "routing"],
    requirement: { title: "Emergency Vehicle Priority Routing and Traffic Signal Control", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["analytics", "dashboard", "planning", "data", "insight"],
    requirement: { title: "Traffic Analytics Dashboard for Urban Planning and Operations", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["api", "third-party", "integration", "external"],
    requirement: { title: "RESTful API for Third-Party Traffic Data Integration", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["environment", "air quality", "pollution", "green"],
    requirement: { title: "Environmental Impact Monitoring and Air Quality Integration", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Traffic Authorities", "Citizens", "Emergency Services", "City Planners"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["government", "municipal"], "Government Agencies"],
  [["developer"], "Development Team"],
];

export class TrafficManagementHandler implements DomainHandler {
  name(): string {
    return "traffic_management";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 3;
  }

  description(): string {
    return "Smart-city traffic monitoring, signal control and emergency routing";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
