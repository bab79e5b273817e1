import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "mobile", "app", "ios", "android", "smartphone", "tablet",
  "react native", "flutter", "swift", "kotlin", "mobile app",
  "push notification", "offline", "touch", "gesture", "camera",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["ios", "android", "mobile", "app"],
    requirement: { title: "Cross-Platform Mobile App Development (iOS/Android)", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["login", "auth", "user", "account"],
    requirement: { title: "Mobile User Authentication and Profile Management", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["offline", "cache", "sync", "local storage"],
    requirement: { title: "Offline Data Storage and Synchronization", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["notification", "push", "alert", "message"],
    requirement: { title: "Push Notification System and Messaging", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["camera", "photo", "video", "media", "image"],
    requirement: { title: "Camera Integration and Media Capture System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["touch", "gesture", "swipe", "tap", "pinch"],
    requirement: { title: "Touch-Optimized User Interface with Gesture Support", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: [],
    requirement: { title: "Mobile Performance Optimization and Battery Efficiency", priority: Priority.MEDIUM, category: Category.NON_FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Mobile Users", "UI/UX Designers", "Mobile Developers", "Development Team"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["ios", "iphone", "ipad"], "iOS Users"],
  [["android", "google play"], "Android Users"],
  [["testing", "qa"], "Mobile QA Testers"],
  [["store", "publish", "deployment"], "App Store Managers"],
];

export class MobileAppHandler implements DomainHandler {
  name(): string {
    return "mobile_app";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 4;
  }

  description(): string {
    return "iOS and Android apps: offline sync, push notifications, media and touch UI";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
