import { Priority, RequirementCategory as Category, type Requirement } from "../../../domain/types.ts";
import { applyRules, collectStakeholders, type DomainHandler, type RequirementRule, type StakeholderRule } from "../base.ts";

const KEYWORDS: ReadonlySet<string> = new Set([
  "game", "gaming", "multiplayer", "players", "unity", "unreal",
  "esports", "battle royale", "game development", "game engine",
  "player progression", "anti-cheat", "microtransaction", "gaming studio",
  "game design", "qa testing", "game analytics", "live ops",
  "monetization", "player retention", "game balance", "patch",
  "tournament", "competitive", "console", "steam", "epic games",
]);

const RULES: RequirementRule[] = [
  {
    whenAny: ["unity", "unreal", "game engine", "cross-platform"],
    requirement: {
      title: "Game Engine Integration and Development Framework",
      description: "Core game engine functionality with cross-platform support",
      priority: Priority.HIGH,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: [
        "Support Unity and Unreal Engine integration",
        "Cross-platform deployment (PC, console, mobile)",
        "Engine-specific asset pipeline management",
      ],
    },
  },
  {
    whenAny: ["multiplayer", "networking", "server", "real-time"],
    requirement: {
      title: "Multiplayer Networking and Server Architecture",
      description: "Multiplayer networking on dedicated servers",
      priority: Priority.HIGH,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: ["Dedicated server architecture", "Support 100+ concurrent players", "Regional server deployment"],
    },
  },
  {
    whenAny: ["player", "progression", "unlockable", "battle pass"],
    requirement: {
      title: "Player Progression and Reward Systems",
      description: "Player advancement, unlocks and engagement mechanics",
      priority: Priority.HIGH,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: ["Experience point and leveling system", "Battle pass progression tracking"],
    },
  },
  {
    whenAny: ["anti-cheat", "cheat", "security", "detection"],
    requirement: {
      title: "Anti-Cheat and Game Security System",
      priority: Priority.HIGH,
      category: Category.FUNCTIONAL,
      acceptanceCriteria: ["Real-time monitoring and reporting", "Automated ban and suspension system", "Appeal and review process"],
    },
  },
  {
    whenAny: ["economy", "microtransaction", "virtual currency", "monetization"],
    requirement: { title: "In-Game Economy and Monetization Platform", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["analytics", "dashboard", "behavior", "balancing", "live ops"],
    requirement: { title: "Game Analytics and Live Operations Dashboard", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["community", "clan", "social", "friend", "chat"],
    requirement: { title: "Community Management and Social Features", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  {
    whenAny: ["esports", "tournament", "competitive", "bracket"],
    requirement: { title: "Esports Tournament and Competitive Play System", priority: Priority.MEDIUM, category: Category.FUNCTIONAL },
  },
  // Always apply to a game.
  {
    whenAny: [],
    requirement: {
      title: "High-Performance Gaming Infrastructure",
      priority: Priority.HIGH,
      category: Category.NON_FUNCTIONAL,
      acceptanceCriteria: ["60+ FPS performance targets", "Sub-100ms network latency"],
    },
  },
  {
    whenAny: [],
    requirement: { title: "Gaming Industry Compliance and Privacy", priority: Priority.MEDIUM, category: Category.NON_FUNCTIONAL },
  },
];

const STAKEHOLDERS = ["Game Developers", "Game Designers", "QA Testers", "Players"];
const STAKEHOLDER_RULES: StakeholderRule[] = [
  [["artist", "art", "3d", "graphics"], "Game Artists"],
  [["community", "social", "moderation"], "Community Managers"],
  [["esports", "tournament", "competitive"], "Esports Coordinators"],
  [["support", "customer", "ticket"], "Player Support Team"],
  [["marketing", "monetization", "revenue"], "Marketing and Monetization Team"],
  [["producer", "project", "management"], "Game Producers"],
  [["platform", "steam", "console", "mobile"], "Platform Partners"],
];

export class GamingStudioManagementHandler implements DomainHandler {
  name(): string {
    return "gaming_studio_management";
  }

  keywords(): ReadonlySet<string> {
    return KEYWORDS;
  }

  priorityScore(): number {
    return 4;
  }

  description(): string {
    return "Game development studios: engines, multiplayer, live ops, monetization and esports";
  }

  extractRequirements(text: string): Requirement[] {
    return applyRules(text, RULES);
  }

  stakeholders(text: string): string[] {
    return collectStakeholders(text, STAKEHOLDERS, STAKEHOLDER_RULES);
  }
}
