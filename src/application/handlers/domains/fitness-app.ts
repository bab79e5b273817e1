import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "fitness", "workout", "nutrition", "health", "wellness", "exercise", "trainer",
  "meal", "calorie", "step", "wearable", "fitbit", "apple watch", "strava",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["workout", "exercise", "fitness", "training"],
    requirement: { title: "Comprehensive Workout Tracking and Exercise Logging System", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["nutrition", "food", "meal", "calorie", "diet", "eating"],
    requirement: { title: "Nutrition Tracking with Barcode Scanning and Food Database", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["apple watch", "fitbit", "wearable", "smartwatch", "heart rate"],
    requirement: { title: "Wearable Device Integration (Apple Watch, Fitbit, Heart Rate Monitors)", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["trainer", "coach", "instructor"],
    requirement: { title: "Personal Trainer Management and Coaching Platform", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["social", "community", "friend", "challenge", "leaderboard"],
    requirement: { title: "Social Features and Community Platform with Challenges", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["strava", "myfitnesspal", "apple health", "google fit"],
    requirement: { title: "Third-Party Fitness App Integration (Strava, Apple Health, Google Fit)", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["mobile", "ios", "android"],
    requirement: { title: "Cross-Platform Mobile Application with Offline Sync", priority: Priority.HIGH, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["progress", "goal", "achievement"],
    requirement: { title: "Progress Tracking and Goal Achievement Analytics", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
];

// "5,000 to 50,000 users", "10000 users"
const USER_SCALE_RE = /(\d[\d,]*)\s*(?:(?:to|-)\s*(\d[\d,]*)\s*)?(?:users|customers)/;

const STAKEHOLDERS = ["Fitness Enthusiasts", "Personal Trainers", "Health Professionals"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["social", "community"], "Community Members"],
  [["premium", "subscription"], "Premium Subscribers"],
];

export class FitnessAppHandler implements DomainHandler {
  name(): string {
    return "fitness_app";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 4;
  }

  description(): string {
    return "Workout, nutrition and wearable tracking apps with coaching and community";
  }

  extractRequirements(text: string): Requirement[] {
    const requirements = applyRules(text, RULES);

    const scale = USER_SCALE_RE.exec(text.toLowerCase());
    if (scale) {
      const min = scale[1];
      const max = scale[2] ?? min;
      requirements.push({
        title: `Scalable Architecture for ${min} to ${max} Users`,
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
