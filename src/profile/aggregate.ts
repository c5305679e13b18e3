import type {
  LanguageHistogram,
  RepositoryRecord,
  UserSnapshot,
} from "../state/schema.js";
import {
  DOMAIN_RULES,
  MAX_FEATURED_PROJECTS,
  MAX_PRIMARY_LANGUAGES,
  classifyDeveloper,
  classifyExperience,
  classifyProjectType,
  matchesDomain,
} from "./rules.js";
import type { Domain, FeaturedProject, Profile } from "./types.js";

export interface RepositoryTotals {
  totalStars: number;
  totalForks: number;
  languagesUsed: LanguageHistogram;
}

export function summarizeRepositories(
  repositories: readonly RepositoryRecord[],
): RepositoryTotals {
  const languagesUsed: LanguageHistogram = {};
  let totalStars = 0;
  let totalForks = 0;

  for (const repo of repositories) {
    totalStars += repo.stars;
    totalForks += repo.forks;
    for (const [lang, bytes] of Object.entries(repo.languages)) {
      languagesUsed[lang] = (languagesUsed[lang] ?? 0) + bytes;
    }
  }

  return { totalStars, totalForks, languagesUsed };
}

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

export function languagePercentages(
  histogram: LanguageHistogram,
): Record<string, number> {
  const total = Object.values(histogram).reduce((sum, b) => sum + b, 0) || 1;
  const percentages: Record<string, number> = {};
  for (const [lang, bytes] of Object.entries(histogram)) {
    percentages[lang] = (bytes * 100) / total;
  }
  return percentages;
}

/** Byte volume descending; equal volumes fall back to name order. */
export function rankLanguages(
  histogram: LanguageHistogram,
  limit = MAX_PRIMARY_LANGUAGES,
): string[] {
  return Object.entries(histogram)
    .sort(([a, aBytes], [b, bBytes]) => {
      if (aBytes !== bBytes) return bBytes - aBytes;
      return a < b ? -1 : a > b ? 1 : 0;
    })
    .slice(0, limit)
    .map(([lang]) => lang);
}

function featuredProjects(repositories: readonly RepositoryRecord[]): FeaturedProject[] {
  return repositories
    .filter((r) => !r.isFork)
    .sort((a, b) => b.stars - a.stars)
    .slice(0, MAX_FEATURED_PROJECTS)
    .map((r) => ({
      name: r.name,
      description: r.description,
      url: r.url,
      stars: r.stars,
      forks: r.forks,
      language: r.language,
      topics: [...r.topics],
      updatedAt: r.updatedAt,
      hasReadme: r.features.hasReadme,
      projectType: classifyProjectType(r),
    }));
}

/**
 * Derives the heuristic profile of an account. Pure: reads the snapshot,
 * never touches it, and yields the same profile for the same input.
 */
export function buildProfile(snapshot: UserSnapshot): Profile {
  const repos = snapshot.repositories;
  const totals = summarizeRepositories(repos);

  const totalRepositories = repos.length;
  const publicRepositories = repos.filter((r) => !r.isPrivate).length;
  const originalRepositories = repos.filter((r) => !r.isFork).length;
  const repoDivisor = Math.max(totalRepositories, 1);

  const domains = new Set<Domain>();
  for (const rule of DOMAIN_RULES) {
    if (repos.some((r) => matchesDomain(r, rule))) domains.add(rule.domain);
  }

  const repositoriesWithReadme = repos.filter((r) => r.features.hasReadme).length;
  const primaryLanguages = rankLanguages(totals.languagesUsed);

  const collaborationScore = clampScore(
    (repositoriesWithReadme / repoDivisor) * 40 +
      (publicRepositories / repoDivisor) * 30 +
      (totals.totalForks / repoDivisor) * 30,
  );

  const innovationScore = clampScore(
    (totals.totalStars / Math.max(originalRepositories, 1)) * 50 +
      Object.keys(totals.languagesUsed).length * 5 +
      (originalRepositories / repoDivisor) * 45,
  );

  return {
    username: snapshot.username,
    profileUrl: snapshot.profileUrl,
    totalRepositories,
    publicRepositories,
    privateRepositories: totalRepositories - publicRepositories,
    originalRepositories,
    forkedRepositories: totalRepositories - originalRepositories,
    totalStars: totals.totalStars,
    totalForks: totals.totalForks,
    followers: snapshot.followers,
    following: snapshot.following,
    languagesUsed: totals.languagesUsed,
    languagesPercentage: languagePercentages(totals.languagesUsed),
    primaryLanguages,
    hasWebProjects: domains.has("web"),
    hasMobileProjects: domains.has("mobile"),
    hasApis: domains.has("api"),
    hasLibraries: domains.has("library"),
    hasCliTools: domains.has("cli"),
    repositoriesWithReadme,
    repositoriesWithTests: repos.filter((r) => r.features.hasTests).length,
    repositoriesWithCi: repos.filter((r) => r.features.hasCi).length,
    repositoriesWithDocker: repos.filter((r) => r.features.hasDockerfile).length,
    collaborationScore,
    innovationScore,
    experienceLevel: classifyExperience(totals.totalStars, totalRepositories),
    developerType: classifyDeveloper({ domains, primaryLanguages }),
    featuredProjects: featuredProjects(repos),
  };
}

/** Returns a copy of the snapshot with its profile recomputed. */
export function rebuildProfile(snapshot: UserSnapshot): UserSnapshot {
  return { ...snapshot, profile: buildProfile(snapshot) };
}
