import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "canvas", "visual", "workflow", "drag", "drop", "flowchart",
  "diagram", "node", "edge", "graph", "builder", "designer",
  "visual editor", "flow builder", "process designer",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["canvas", "visual", "draw", "design"],
    requirement: { title: "Interactive Canvas System with Zoom and Pan Controls", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["drag", "drop", "draggable", "move"],
    requirement: { title: "Drag-and-Drop Interface with Node Manipulation", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["node", "element", "component", "block"],
    requirement: { title: "Node Creation and Management System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["connection", "edge", "link", "flow"],
    requirement: { title: "Node Connection and Edge Management System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["workflow", "process", "logic", "automation"],
    requirement: { title: "Workflow Logic Engine and Process Execution", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["template", "preset", "library", "gallery"],
    requirement: { title: "Template Library and Pre-built Component System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["export", "import", "save", "load"],
    requirement: { title: "Workflow Export/Import and Sharing System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Visual Designers", "Workflow Users", "UI/UX Team", "Development Team"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["business", "analyst"], "Business Analysts"],
  [["process", "automation"], "Process Managers"],
  [["admin", "administrator"], "System Administrators"],
];

export class VisualWorkflowHandler implements DomainHandler {
  name(): string {
    return "visual_workflow";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 4;
  }

  description(): string {
    return "Canvas editors, drag-and-drop flow builders and process designers";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
