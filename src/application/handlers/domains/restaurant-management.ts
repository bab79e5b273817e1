import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "restaurant", "menu", "orders", "kitchen", "waitstaff", "pos",
  "reservations", "tables", "dining", "food", "beverage", "chef",
  "inventory", "ingredients", "recipes", "takeout", "delivery",
  "restaurant management", "food service", "hospitality", "dining room",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["menu", "dishes", "recipes", "ingredients"],
    requirement: {
      title: "Digital Menu Management System",
      description: "Manage menu items, pricing, ingredients, and dietary information",
      priority: Priority.HIGH,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: [
        "Create and edit menu items with photos",
        "Manage pricing and seasonal availability",
        "Track ingredient inventory and allergens",
      ],
    },
  },
  {
    whenAny: ["orders", "pos", "payment", "checkout"],
    requirement: {
      title: "Point of Sale (POS) Integration",
      description: "Integrated ordering and payment processing system",
      priority: Priority.HIGH,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: [
        "Process dine-in, takeout, and delivery orders",
        "Accept multiple payment methods",
        "Split bills and handle group orders",
      ],
    },
  },
  {
    whenAny: ["tables", "reservations", "booking", "seating"],
    requirement: {
      title: "Table and Reservation Management",
      description: "Manage dining room layout, reservations, and table assignments",
      priority: Priority.HIGH,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: ["Online reservation booking system", "Waitlist management for walk-ins"],
    },
  },
  {
    whenAny: ["kitchen", "chef", "cooking", "preparation"],
    requirement: {
      title: "Kitchen Display System (KDS)",
      description: "Digital kitchen workflow and order management",
      priority: Priority.HIGH,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: ["Display incoming orders by preparation time", "Track order status and completion times"],
    },
  },
  {
    whenAny: ["staff", "waitstaff", "servers", "scheduling"],
    requirement: {
      title: "Staff Scheduling and Management",
      priority: Priority.MEDIUM,
      category: Category.FUNCTIONAL,
    },
  },
  {
    whenAny: ["inventory", "ingredients", "supplies", "stock"],
    requirement: {
      title: "Inventory and Supply Management",
      priority: Priority.MEDIUM,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: ["Monitor ingredient stock levels", "Automatic reorder notifications"],
    },
  },
  {
    whenAny: ["delivery", "takeout", "pickup", "online orders"],
    requirement: {
      title: "Delivery and Takeout Management",
      priority: Priority.MEDIUM,
      category: Category.FUNCTIONAL,
    },
  },
];

const STAKEHOLDERS = ["Restaurant Owners", "Kitchen Staff", "Waitstaff", "Customers"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["manager", "management"], "Restaurant Managers"],
  [["chef", "kitchen"], "Head Chef"],
  [["bartender", "drinks"], "Bar Staff"],
  [["host", "seating"], "Host/Hostess Staff"],
  [["delivery", "driver"], "Delivery Drivers"],
  [["supplier", "vendor", "distributor"], "Food Suppliers"],
  [["health", "inspection", "compliance"], "Health Inspectors"],
];

export class RestaurantManagementHandler implements DomainHandler {
  name(): string {
    return "restaurant_management";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 4;
  }

  description(): string {
    return "Menus, point of sale, reservations, kitchen display and restaurant inventory";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
