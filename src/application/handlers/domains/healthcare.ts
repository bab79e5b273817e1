import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "healthcare", "medical", "patient", "hospital", "clinic", "hipaa",
  "doctor", "nurse", "appointment", "prescription", "diagnosis",
  "treatment", "medical record", "health", "wellness", "telemedicine",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["patient", "medical", "health", "hipaa"],
    requirement: { title: "HIPAA Compliance and Data Security Framework", priority: Priority.HIGH, category: Category.NON_FUNCTIONAL },
  },
  {
    whenAny: ["patient", "medical record", "chart"],
    requirement: { title: "Electronic Health Records (EHR) Management System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["appointment", "schedule", "booking"],
    requirement: { title: "Medical Appointment Scheduling and Calendar System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["prescription", "medication", "drug", "pharmacy"],
    requirement: { title: "Prescription Management and Drug Interaction System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["telemedicine", "virtual", "remote", "video call"],
    requirement: { title: "Telemedicine Platform with Video Consultation", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["billing", "insurance", "claim", "payment"],
    requirement: { title: "Medical Billing and Insurance Claims Processing", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Patients", "Healthcare Providers", "IT Security Team", "Development Team"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["doctor", "physician"], "Doctors/Physicians"],
  [["nurse", "nursing"], "Nurses"],
  [["admin", "administrator"], "Hospital Administrators"],
  [["compliance", "hipaa"], "Compliance Officers"],
  [["pharmacy", "pharmacist"], "Pharmacists"],
];

export class HealthcareHandler implements DomainHandler {
  name(): string {
    return "healthcare";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  // Heavily regulated domain.
  priorityScore(): number {
    return 5;
  }

  description(): string {
    return "Patient care, medical records, scheduling and HIPAA-regulated health systems";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
