import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "ecommerce", "e-commerce", "shopping", "cart", "product", "order",
  "payment", "checkout", "store", "retail", "inventory", "catalog",
  "marketplace", "merchant", "customer", "purchase", "sale",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["product", "catalog", "inventory", "item"],
    requirement: { title: "Product Catalog Management and Inventory System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["cart", "shopping", "basket"],
    requirement: { title: "Shopping Cart and Session Management System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["payment", "checkout", "billing", "credit card"],
    requirement: { title: "Secure Payment Processing and Checkout System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["order", "purchase", "transaction", "sale"],
    requirement: { title: "Order Management and Processing System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["customer", "account", "profile", "login"],
    requirement: { title: "Customer Account Management and Profile System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["search", "filter", "browse", "category"],
    requirement: { title: "Product Search and Advanced Filtering System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["review", "rating", "feedback", "comment"],
    requirement: { title: "Product Reviews and Rating System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Customers", "Store Managers", "Payment Processors", "Development Team"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["merchant", "seller", "vendor"], "Merchants/Vendors"],
  [["admin", "administrator"], "Store Administrators"],
  [["shipping", "logistics"], "Shipping Partners"],
  [["marketing", "promotion"], "Marketing Team"],
];

export class EcommerceHandler implements DomainHandler {
  name(): string {
    return "ecommerce";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 4;
  }

  description(): string {
    return "Online stores, catalogs, carts, checkout and order management";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
