import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "enterprise", "compliance", "security", "corporate", "governance",
  "audit", "policy", "sso", "ldap", "active directory", "rbac",
  "scalability", "high availability", "disaster recovery",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["security", "enterprise", "corporate"],
    requirement: { title: "Enterprise Security Framework and Access Control", priority: Priority.HIGH, category: Category.NON_FUNCTIONAL },
  },
  {
    whenAny: ["sso", "single sign-on", "authentication", "ldap"],
    requirement: { title: "Single Sign-On (SSO) and Directory Integration", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["rbac", "role", "permission", "access control"],
    requirement: { title: "Role-Based Access Control (RBAC) System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["compliance", "audit", "governance", "policy"],
    requirement: { title: "Compliance Management and Audit Trail System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["scalability", "scale", "performance", "load"],
    requirement: { title: "Enterprise Scalability and Performance Framework", priority: Priority.HIGH, category: Category.NON_FUNCTIONAL },
  },
  {
    whenAny: ["availability", "uptime", "redundancy", "failover"],
    requirement: { title: "High Availability and Disaster Recovery System", priority: Priority.MEDIUM, category: Category.NON_FUNCTIONAL },
  },
  {
    whenAny: ["integration", "api", "legacy"],
    requirement: { title: "Enterprise System Integration and API Gateway", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Enterprise Users", "IT Administrators", "Security Team", "Development Team"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["compliance", "audit"], "Compliance Officers"],
  [["executive", "management"], "Executive Leadership"],
  [["admin", "administrator"], "System Administrators"],
  [["legal", "policy"], "Legal Team"],
];

export class EnterpriseHandler implements DomainHandler {
  name(): string {
    return "enterprise";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 4;
  }

  description(): string {
    return "Corporate governance, compliance, identity and high-availability platforms";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
