import pino from "pino";
import { NotFoundError } from "../errors.js";
import type {
  AccountInfo,
  ContentEntry,
  RemoteRepoClient,
  RepoVisibility,
  RepositoryHandle,
} from "../github/client.js";
import { NO_FEATURES, type LanguageHistogram, type RepositoryRecord, type UserSnapshot } from "../state/schema.js";

export const silentLogger = (): pino.Logger => pino({ level: "silent" });

export function makeAccount(login: string, overrides: Partial<AccountInfo> = {}): AccountInfo {
  return {
    login,
    name: "Test User",
    email: null,
    bio: null,
    location: null,
    website: null,
    htmlUrl: `https://github.com/${login}`,
    avatarUrl: `https://avatars.example.test/${login}`,
    publicRepos: 0,
    privateRepos: 0,
    followers: 3,
    following: 1,
    createdAt: "2020-01-01T00:00:00Z",
    updatedAt: "2024-01-01T00:00:00Z",
    ...overrides,
  };
}

export function makeHandle(
  name: string,
  overrides: Partial<RepositoryHandle> = {},
): RepositoryHandle {
  const owner = overrides.owner ?? "octo";
  return {
    owner,
    name,
    fullName: `${owner}/${name}`,
    htmlUrl: `https://github.com/${owner}/${name}`,
    cloneUrl: `https://github.com/${owner}/${name}.git`,
    sshUrl: `git@github.com:${owner}/${name}.git`,
    description: null,
    language: null,
    topics: [],
    licenseName: null,
    stars: 0,
    forks: 0,
    watchers: 0,
    sizeKb: 10,
    createdAt: "2021-01-01T00:00:00Z",
    updatedAt: "2024-01-01T00:00:00Z",
    pushedAt: "2024-01-01T00:00:00Z",
    defaultBranch: "main",
    isPrivate: false,
    isFork: false,
    isArchived: false,
    ...overrides,
  };
}

export function makeRecord(
  name: string,
  overrides: Partial<RepositoryRecord> = {},
): RepositoryRecord {
  return {
    name,
    owner: "octo",
    fullName: `octo/${name}`,
    url: `https://github.com/octo/${name}`,
    cloneUrl: `https://github.com/octo/${name}.git`,
    sshUrl: `git@github.com:octo/${name}.git`,
    description: "",
    language: null,
    topics: [],
    languages: {},
    stars: 0,
    forks: 0,
    watchers: 0,
    sizeKb: 10,
    createdAt: "2021-01-01T00:00:00Z",
    updatedAt: "2024-01-01T00:00:00Z",
    pushedAt: "2024-01-01T00:00:00Z",
    defaultBranch: "main",
    isPrivate: false,
    isFork: false,
    isArchived: false,
    licenseName: null,
    features: { ...NO_FEATURES },
    localPath: null,
    mirrored: false,
    ...overrides,
  };
}

export function makeSnapshot(
  repositories: RepositoryRecord[],
  overrides: Partial<UserSnapshot> = {},
): UserSnapshot {
  return {
    username: "octo",
    name: "Test User",
    email: null,
    bio: null,
    location: null,
    website: null,
    profileUrl: "https://github.com/octo",
    avatarUrl: "https://avatars.example.test/octo",
    publicRepos: repositories.length,
    privateRepos: 0,
    followers: 3,
    following: 1,
    createdAt: "2020-01-01T00:00:00Z",
    updatedAt: "2024-01-01T00:00:00Z",
    repositories,
    totalStars: repositories.reduce((sum, r) => sum + r.stars, 0),
    totalForks: repositories.reduce((sum, r) => sum + r.forks, 0),
    languagesUsed: {},
    fetchedAt: "2024-06-01T12:00:00.000Z",
    scope: "public",
    complete: true,
    profile: null,
    ...overrides,
  };
}

/** In-memory stand-in for the GitHub API. */
export class FakeRepoClient implements RemoteRepoClient {
  login: string | null = null;
  authError: Error | null = null;
  readonly accounts = new Map<string, AccountInfo | Error>();
  readonly listings: Record<RepoVisibility, RepositoryHandle[] | Error> = {
    owner: [],
    private: [],
  };
  readonly languages = new Map<string, LanguageHistogram | Error>();
  readonly contents = new Map<string, ContentEntry[] | Error>();
  readonly calls: string[] = [];

  async authenticate(): Promise<string | null> {
    this.calls.push("authenticate");
    if (this.authError) throw this.authError;
    return this.login;
  }

  async lookupUser(username: string): Promise<AccountInfo> {
    this.calls.push(`lookupUser:${username}`);
    const account = this.accounts.get(username);
    if (account instanceof Error) throw account;
    if (!account) throw new NotFoundError(`GitHub user '${username}' not found`, 404);
    return account;
  }

  async *listRepositories(
    username: string,
    visibility: RepoVisibility,
  ): AsyncGenerator<RepositoryHandle> {
    this.calls.push(`listRepositories:${username}:${visibility}`);
    const listing = this.listings[visibility];
    if (listing instanceof Error) throw listing;
    yield* listing;
  }

  async getLanguages(owner: string, repo: string): Promise<LanguageHistogram> {
    this.calls.push(`getLanguages:${owner}/${repo}`);
    const languages = this.languages.get(`${owner}/${repo}`) ?? {};
    if (languages instanceof Error) throw languages;
    return languages;
  }

  async getTopics(owner: string, repo: string): Promise<string[]> {
    this.calls.push(`getTopics:${owner}/${repo}`);
    return ["fetched-topic"];
  }

  async getLicense(owner: string, repo: string): Promise<string | null> {
    this.calls.push(`getLicense:${owner}/${repo}`);
    return "MIT License";
  }

  async listContents(owner: string, repo: string, path: string): Promise<ContentEntry[]> {
    this.calls.push(`listContents:${owner}/${repo}:${path}`);
    const entries = this.contents.get(`${owner}/${repo}:${path}`) ?? [];
    if (entries instanceof Error) throw entries;
    return entries;
  }

  async downloadArchive(owner: string, repo: string, ref: string): Promise<Buffer> {
    this.calls.push(`downloadArchive:${owner}/${repo}@${ref}`);
    throw new NotFoundError(`No archive for ${owner}/${repo}`, 404);
  }
}

export function file(name: string, dir = ""): ContentEntry {
  return { name, path: dir ? `${dir}/${name}` : name, type: "file" };
}

export function dir(name: string, parent = ""): ContentEntry {
  return { name, path: parent ? `${parent}/${name}` : name, type: "dir" };
}
