import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "finance", "banking", "payment", "financial", "trading", "investment",
  "crypto", "blockchain", "wallet", "transaction", "money", "currency",
  "loan", "credit", "debit", "account", "balance", "fintech",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["financial", "payment", "banking", "money"],
    requirement: { title: "Financial Security and Regulatory Compliance Framework", priority: Priority.HIGH, category: Category.NON_FUNCTIONAL },
  },
  {
    whenAny: ["payment", "transaction", "transfer", "money"],
    requirement: { title: "Secure Payment Processing and Transaction System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["account", "balance", "wallet", "portfolio"],
    requirement: { title: "Financial Account Management and Balance Tracking", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["trading", "investment", "stock", "market"],
    requirement: { title: "Trading Platform and Investment Management System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["fraud", "security", "risk", "monitoring"],
    requirement: { title: "Fraud Detection and Risk Monitoring System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["crypto", "blockchain", "bitcoin", "ethereum"],
    requirement: { title: "Cryptocurrency Integration and Blockchain Support", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["report", "analytics", "statement", "tax"],
    requirement: { title: "Financial Reporting and Analytics Dashboard", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Financial Users", "Compliance Officers", "Security Team", "Development Team"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["trader", "investor"], "Traders/Investors"],
  [["bank", "banker"], "Banking Partners"],
  [["regulator", "compliance"], "Financial Regulators"],
  [["auditor", "audit"], "Financial Auditors"],
];

export class FintechHandler implements DomainHandler {
  name(): string {
    return "fintech";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  // Regulated and security-critical.
  priorityScore(): number {
    return 5;
  }

  description(): string {
    return "Banking, payments, trading, wallets and regulated financial services";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
