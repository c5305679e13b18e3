import type { LanguageHistogram } from "../state/schema.js";

export type Domain = "web" | "mobile" | "api" | "library" | "cli";

export type ProjectType =
  | "web-app"
  | "mobile-app"
  | "api"
  | "library"
  | "cli-tool"
  | "other";

export type ExperienceLevel = "Senior" | "Mid-level" | "Junior";

export type DeveloperType =
  | "Full-stack Developer"
  | "Frontend Developer"
  | "Backend Developer"
  | "Software Developer";

export interface FeaturedProject {
  name: string;
  description: string;
  url: string;
  stars: number;
  forks: number;
  language: string | null;
  topics: string[];
  updatedAt: string;
  hasReadme: boolean;
  projectType: ProjectType;
}

export interface Profile {
  username: string;
  profileUrl: string;

  totalRepositories: number;
  publicRepositories: number;
  privateRepositories: number;
  originalRepositories: number;
  forkedRepositories: number;

  totalStars: number;
  totalForks: number;
  followers: number;
  following: number;

  languagesUsed: LanguageHistogram;
  languagesPercentage: Record<string, number>;
  primaryLanguages: string[];

  hasWebProjects: boolean;
  hasMobileProjects: boolean;
  hasApis: boolean;
  hasLibraries: boolean;
  hasCliTools: boolean;

  repositoriesWithReadme: number;
  repositoriesWithTests: number;
  repositoriesWithCi: number;
  repositoriesWithDocker: number;

  collaborationScore: number;
  innovationScore: number;
  experienceLevel: ExperienceLevel;
  developerType: DeveloperType;

  featuredProjects: FeaturedProject[];
}
