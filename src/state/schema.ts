import { z } from "zod";
import { FETCH_SCOPES } from "../config.js";
import type { Profile } from "../profile/types.js";

export const CACHE_SCHEMA_VERSION = 1;

const isoInstant = z.iso.datetime({ offset: true });

export const languageHistogramSchema = z.record(
  z.string(),
  z.number().int().nonnegative(),
);

export const featureFlagsSchema = z.object({
  hasReadme: z.boolean(),
  hasLicense: z.boolean(),
  hasDockerfile: z.boolean(),
  hasCi: z.boolean(),
  hasTests: z.boolean(),
});

export const repositoryRecordSchema = z.object({
  name: z.string(),
  owner: z.string(),
  fullName: z.string(),
  url: z.string(),
  cloneUrl: z.string(),
  sshUrl: z.string(),
  description: z.string(),
  language: z.string().nullable(),
  topics: z.array(z.string()),
  languages: languageHistogramSchema,
  stars: z.number().int().nonnegative(),
  forks: z.number().int().nonnegative(),
  watchers: z.number().int().nonnegative(),
  sizeKb: z.number().int().nonnegative(),
  createdAt: isoInstant,
  updatedAt: isoInstant,
  pushedAt: isoInstant,
  defaultBranch: z.string(),
  isPrivate: z.boolean(),
  isFork: z.boolean(),
  isArchived: z.boolean(),
  licenseName: z.string().nullable(),
  features: featureFlagsSchema,
  localPath: z.string().nullable(),
  mirrored: z.boolean(),
});

export const cachedSnapshotSchema = z.object({
  schemaVersion: z.literal(CACHE_SCHEMA_VERSION),
  username: z.string(),
  name: z.string().nullable(),
  email: z.string().nullable(),
  bio: z.string().nullable(),
  location: z.string().nullable(),
  website: z.string().nullable(),
  profileUrl: z.string(),
  avatarUrl: z.string(),
  publicRepos: z.number().int().nonnegative(),
  privateRepos: z.number().int().nonnegative(),
  followers: z.number().int().nonnegative(),
  following: z.number().int().nonnegative(),
  createdAt: isoInstant,
  updatedAt: isoInstant,
  repositories: z.array(repositoryRecordSchema),
  totalStars: z.number().int().nonnegative(),
  totalForks: z.number().int().nonnegative(),
  languagesUsed: languageHistogramSchema,
  fetchedAt: isoInstant,
  scope: z.enum(FETCH_SCOPES),
  complete: z.boolean(),
});

export type LanguageHistogram = z.infer<typeof languageHistogramSchema>;
export type FeatureFlags = z.infer<typeof featureFlagsSchema>;
export type RepositoryRecord = z.infer<typeof repositoryRecordSchema>;
export type CachedSnapshot = z.infer<typeof cachedSnapshotSchema>;

/**
 * Everything known about one account at one point in time. The derived
 * profile is never persisted; it is null until rebuilt from the rest.
 */
export type UserSnapshot = Omit<CachedSnapshot, "schemaVersion"> & {
  profile: Profile | null;
};

export const NO_FEATURES: FeatureFlags = {
  hasReadme: false,
  hasLicense: false,
  hasDockerfile: false,
  hasCi: false,
  hasTests: false,
};
