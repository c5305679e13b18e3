import type {
  DeveloperType,
  Domain,
  ExperienceLevel,
  ProjectType,
} from "./types.js";

export interface RepoTraits {
  topics: string[];
  language: string | null;
}

/**
 * A repository belongs to a domain when any of its topics (compared
 * lower-cased) is listed, or its primary language is. Domains are
 * independent flags, so every rule is evaluated.
 */
export interface DomainRule {
  domain: Domain;
  topics: readonly string[];
  languages: readonly string[];
}

export const DOMAIN_RULES: readonly DomainRule[] = [
  {
    domain: "web",
    topics: ["web", "website", "react", "vue", "angular"],
    languages: ["JavaScript", "TypeScript", "HTML", "CSS"],
  },
  {
    domain: "mobile",
    topics: ["mobile", "android", "ios", "react-native", "flutter"],
    languages: ["Swift", "Kotlin", "Java", "Dart"],
  },
  {
    domain: "api",
    topics: ["api", "rest", "graphql", "fastapi", "express"],
    languages: [],
  },
  {
    domain: "library",
    topics: ["library", "framework", "package"],
    languages: [],
  },
  {
    domain: "cli",
    topics: ["cli", "command-line", "tool"],
    languages: [],
  },
];

/** Evaluated top-down; the first rule with a matching topic wins. */
export const PROJECT_TYPE_RULES: readonly {
  type: ProjectType;
  topics: readonly string[];
}[] = [
  { type: "web-app", topics: ["web", "website", "webapp", "frontend"] },
  { type: "mobile-app", topics: ["mobile", "android", "ios"] },
  { type: "api", topics: ["api", "rest", "graphql"] },
  { type: "library", topics: ["library", "framework", "package"] },
  { type: "cli-tool", topics: ["cli", "command-line", "tool"] },
];

export const BACKEND_LANGUAGES: readonly string[] = ["Python", "Java", "Go", "Rust"];

export interface ExperienceThresholds {
  seniorStars: number;
  seniorRepos: number;
  midStars: number;
  midRepos: number;
}

export const EXPERIENCE_THRESHOLDS: ExperienceThresholds = {
  seniorStars: 500,
  seniorRepos: 50,
  midStars: 100,
  midRepos: 20,
};

export const MAX_PRIMARY_LANGUAGES = 10;
export const MAX_FEATURED_PROJECTS = 6;

function lowerTopics(repo: RepoTraits): Set<string> {
  return new Set(repo.topics.map((t) => t.toLowerCase()));
}

export function matchesDomain(repo: RepoTraits, rule: DomainRule): boolean {
  const topics = lowerTopics(repo);
  if (rule.topics.some((t) => topics.has(t))) return true;
  return repo.language !== null && rule.languages.includes(repo.language);
}

export function classifyProjectType(repo: RepoTraits): ProjectType {
  const topics = lowerTopics(repo);
  const rule = PROJECT_TYPE_RULES.find((r) => r.topics.some((t) => topics.has(t)));
  return rule?.type ?? "other";
}

export function classifyExperience(
  totalStars: number,
  totalRepos: number,
  config: ExperienceThresholds = EXPERIENCE_THRESHOLDS,
): ExperienceLevel {
  if (totalStars > config.seniorStars || totalRepos > config.seniorRepos) {
    return "Senior";
  }
  if (totalStars > config.midStars || totalRepos > config.midRepos) {
    return "Mid-level";
  }
  return "Junior";
}

export interface DeveloperSignals {
  domains: ReadonlySet<Domain>;
  primaryLanguages: string[];
}

const DEVELOPER_TYPE_RULES: readonly {
  type: DeveloperType;
  applies: (signals: DeveloperSignals) => boolean;
}[] = [
  {
    type: "Full-stack Developer",
    applies: (s) => s.domains.has("web") && s.domains.has("mobile"),
  },
  { type: "Frontend Developer", applies: (s) => s.domains.has("web") },
  {
    type: "Backend Developer",
    applies: (s) =>
      s.domains.has("api") ||
      s.primaryLanguages.slice(0, 3).some((l) => BACKEND_LANGUAGES.includes(l)),
  },
];

export function classifyDeveloper(signals: DeveloperSignals): DeveloperType {
  const rule = DEVELOPER_TYPE_RULES.find((r) => r.applies(signals));
  return rule?.type ?? "Software Developer";
}
