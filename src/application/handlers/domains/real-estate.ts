import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "property", "real estate", "mls", "tenant", "lease", "rent", "listing",
  "property management", "rental", "landlord", "maintenance", "vacancy",
  "apartment", "commercial", "residential", "portfolio", "unit",
  "application", "screening", "deposit", "eviction", "inspection",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["listing", "property", "mls", "catalog"],
    requirement: { title: "Property Listing Management System with MLS Integration", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["tenant", "resident", "renter", "lease"],
    requirement: { title: "Comprehensive Tenant Management and Lease Tracking System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["rent", "payment", "collection", "billing"],
    requirement: { title: "Automated Rent Collection and Payment Processing System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["maintenance", "repair", "work order"],
    requirement: { title: "Maintenance Request Management and Work Order System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["portfolio", "multiple", "properties", "units"],
    requirement: { title: "Multi-Property Portfolio Management Dashboard", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["screening", "application", "background", "credit"],
    requirement: { title: "Tenant Screening and Application Processing System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["financial", "report", "income", "expense", "accounting"],
    requirement: { title: "Financial Reporting and Property Accounting System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["document", "lease", "contract", "agreement"],
    requirement: { title: "Digital Document Management and Lease Agreement System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Property Managers", "Landlords", "Tenants", "Development Team"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["agent", "broker", "realtor"], "Real Estate Agents"],
  [["owner", "investor"], "Property Owners"],
  [["maintenance", "contractor"], "Maintenance Contractors"],
  [["legal", "compliance"], "Legal Compliance Team"],
];

export class RealEstateHandler implements DomainHandler {
  name(): string {
    return "real_estate";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 4;
  }

  description(): string {
    return "Property listings, tenants, leases, rent collection and maintenance";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
