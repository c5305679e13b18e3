import type { FeaturedProject, Profile } from "../profile/types.js";
import type { UserSnapshot } from "../state/schema.js";

function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function formatFeatured(project: FeaturedProject): string {
  const language = project.language ?? "N/A";
  return `  - ${project.name} [${project.projectType}] ${project.stars} stars, ${language}`;
}

export function formatSnapshotSummary(snapshot: UserSnapshot, profile: Profile): string {
  const header = snapshot.name ? `${snapshot.name} (@${snapshot.username})` : `@${snapshot.username}`;
  const topLanguages = profile.primaryLanguages
    .slice(0, 5)
    .map((lang) => `${lang} ${formatPercent(profile.languagesPercentage[lang] ?? 0)}`);

  const lines = [
    header,
    `Profile: ${snapshot.profileUrl}`,
    `Fetched: ${snapshot.fetchedAt} (scope: ${snapshot.scope}${snapshot.complete ? "" : ", incomplete"})`,
    `Repositories: ${profile.totalRepositories} (${profile.originalRepositories} original, ${profile.forkedRepositories} forks, ${profile.privateRepositories} private)`,
    `Stars: ${profile.totalStars} | Forks: ${profile.totalForks} | Followers: ${profile.followers}`,
    `Languages: ${topLanguages.length > 0 ? topLanguages.join(", ") : "none detected"}`,
    `Type: ${profile.developerType} | Level: ${profile.experienceLevel}`,
    `Collaboration: ${Math.round(profile.collaborationScore)}/100 | Innovation: ${Math.round(profile.innovationScore)}/100`,
    `Practices: ${profile.repositoriesWithReadme} README, ${profile.repositoriesWithTests} tests, ${profile.repositoriesWithCi} CI, ${profile.repositoriesWithDocker} Docker`,
  ];

  if (profile.featuredProjects.length > 0) {
    lines.push("Featured:", ...profile.featuredProjects.map(formatFeatured));
  }

  return lines.join("\n");
}
