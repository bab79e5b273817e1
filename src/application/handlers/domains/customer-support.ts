import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "support", "ticket", "helpdesk", "customer service", "agent", "escalation", "call center",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["ticket", "support", "helpdesk", "case"],
    requirement: { title: "Intelligent Ticket Management and Routing System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["agent", "staff", "representative", "operator"],
    requirement: { title: "Support Agent Dashboard and Workload Management", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["escalation", "escalate", "priority", "urgent"],
    requirement: { title: "Automated Escalation and Priority Management System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["knowledge base", "documentation", "self-service"],
    requirement: { title: "Self-Service Knowledge Base and FAQ System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["salesforce", "crm", "customer data", "integration"],
    requirement: { title: "CRM Integration and Customer Data Synchronization", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["phone", "telephony", "voice", "pbx"],
    requirement: { title: "Telephony System Integration and Call Management", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["email", "chat", "social", "channel"],
    requirement: { title: "Multi-Channel Support (Email, Chat, Phone, Social Media)", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

const VOLUME_RE = /(\d+,?\d*)\s*(?:monthly|per month|tickets)/;

const STAKEHOLDERS = ["Support Agents", "Customers", "Management"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["enterprise", "business"], "Business Stakeholders"],
  [["developer"], "Development Team"],
];

export class CustomerSupportHandler implements DomainHandler {
  name(): string {
    return "customer_support";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  // Most generic vocabulary of the built-ins.
  priorityScore(): number {
    return 1;
  }

  description(): string {
    return "Help desks, ticketing, escalation and multi-channel customer service";
  }

  extractRequirements(text: string): Requirement[] {
    const requirements = applyRules(text, RULES);

    const volume = VOLUME_RE.exec(text.toLowerCase());
    if (volume) {
      requirements.push({
        title: `High-Volume Ticket Processing (${volume[1]} monthly capacity)`,
        priority: Priority.HIGH,
        category: Category.NON_FUNCTIONAL,
      });
    }

    return requirements;
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
