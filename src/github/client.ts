import { Octokit } from "@octokit/rest";
import { throttling } from "@octokit/plugin-throttling";
import type pino from "pino";
import { AuthError, classifyRequestError, httpStatusOf } from "../errors.js";
import type { LanguageHistogram } from "../state/schema.js";

const ThrottledOctokit = Octokit.plugin(throttling);

export type GitHubClient = InstanceType<typeof ThrottledOctokit>;

export interface GitHubClientOptions {
  token?: string;
  timeoutMs: number;
  logger: pino.Logger;
  fetch?: typeof fetch;
}

function withTimeout(fetchImpl: typeof fetch, timeoutMs: number): typeof fetch {
  return (input, init) =>
    fetchImpl(input, {
      ...init,
      signal: init?.signal ?? AbortSignal.timeout(timeoutMs),
    });
}

export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  const { logger: log } = options;

  return new ThrottledOctokit({
    auth: options.token,
    userAgent: "repofolio",
    request: {
      fetch: withTimeout(options.fetch ?? globalThis.fetch, options.timeoutMs),
    },
    throttle: {
      onRateLimit: (retryAfter, requestOptions, _octokit, retryCount) => {
        log.warn(
          {
            method: requestOptions.method,
            url: requestOptions.url,
            retryAfter,
            retryCount,
          },
          "GitHub rate limit hit",
        );
        if (retryCount < 1) {
          log.info({ retryAfter }, "Retrying after rate limit");
          return true;
        }
        return false;
      },
      onSecondaryRateLimit: (retryAfter, requestOptions) => {
        log.warn(
          { method: requestOptions.method, url: requestOptions.url, retryAfter },
          "GitHub secondary rate limit hit",
        );
        return false;
      },
    },
  });
}

export interface AccountInfo {
  login: string;
  name: string | null;
  email: string | null;
  bio: string | null;
  location: string | null;
  website: string | null;
  htmlUrl: string;
  avatarUrl: string;
  publicRepos: number;
  privateRepos: number;
  followers: number;
  following: number;
  createdAt: string;
  updatedAt: string;
}

/** A repository as the listing endpoints describe it, before any probing. */
export interface RepositoryHandle {
  owner: string;
  name: string;
  fullName: string;
  htmlUrl: string;
  cloneUrl: string;
  sshUrl: string;
  description: string | null;
  language: string | null;
  /** Undefined when the listing did not include topics. */
  topics: string[] | undefined;
  /** Undefined when the listing did not say; null when there is no license. */
  licenseName: string | null | undefined;
  stars: number;
  forks: number;
  watchers: number;
  sizeKb: number;
  createdAt: string;
  updatedAt: string;
  pushedAt: string | null;
  defaultBranch: string;
  isPrivate: boolean;
  isFork: boolean;
  isArchived: boolean;
}

export interface ContentEntry {
  name: string;
  path: string;
  type: string;
}

/** `owner` lists what anyone can see; `private` needs the owner's token. */
export type RepoVisibility = "owner" | "private";

export interface RemoteRepoClient {
  /** Verifies the credential. Resolves to the token's login, or null when anonymous. */
  authenticate(): Promise<string | null>;
  lookupUser(username: string): Promise<AccountInfo>;
  listRepositories(username: string, visibility: RepoVisibility): AsyncIterable<RepositoryHandle>;
  getLanguages(owner: string, repo: string): Promise<LanguageHistogram>;
  getTopics(owner: string, repo: string): Promise<string[]>;
  getLicense(owner: string, repo: string): Promise<string | null>;
  listContents(owner: string, repo: string, path: string): Promise<ContentEntry[]>;
  downloadArchive(owner: string, repo: string, ref: string): Promise<Buffer>;
}

interface RawRepository {
  name: string;
  full_name: string;
  owner: { login: string };
  html_url: string;
  clone_url?: string;
  ssh_url?: string;
  description: string | null;
  language?: string | null;
  topics?: string[];
  license?: { name?: string } | null;
  stargazers_count?: number;
  forks_count?: number;
  watchers_count?: number;
  size?: number;
  created_at?: string | null;
  updated_at?: string | null;
  pushed_at?: string | null;
  default_branch?: string;
  private: boolean;
  fork: boolean;
  archived?: boolean;
}

const EPOCH = new Date(0).toISOString();

export function toRepositoryHandle(raw: RawRepository): RepositoryHandle {
  const updatedAt = raw.updated_at ?? raw.created_at ?? EPOCH;
  return {
    owner: raw.owner.login,
    name: raw.name,
    fullName: raw.full_name,
    htmlUrl: raw.html_url,
    cloneUrl: raw.clone_url ?? `${raw.html_url}.git`,
    sshUrl: raw.ssh_url ?? `git@github.com:${raw.full_name}.git`,
    description: raw.description,
    language: raw.language ?? null,
    topics: raw.topics,
    licenseName: raw.license === undefined ? undefined : (raw.license?.name ?? null),
    stars: raw.stargazers_count ?? 0,
    forks: raw.forks_count ?? 0,
    watchers: raw.watchers_count ?? 0,
    sizeKb: raw.size ?? 0,
    createdAt: raw.created_at ?? updatedAt,
    updatedAt,
    pushedAt: raw.pushed_at ?? null,
    defaultBranch: raw.default_branch ?? "main",
    isPrivate: raw.private,
    isFork: raw.fork,
    isArchived: raw.archived ?? false,
  };
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (data instanceof Uint8Array) return Buffer.from(data);
  throw new TypeError("Archive download returned an unexpected payload");
}

export class GitHubRepoClient implements RemoteRepoClient {
  private authenticatedLogin: string | null = null;

  constructor(
    private readonly octokit: GitHubClient,
    private readonly hasToken: boolean,
  ) {}

  async authenticate(): Promise<string | null> {
    if (!this.hasToken) {
      this.authenticatedLogin = null;
      return null;
    }
    try {
      const { data } = await this.octokit.rest.users.getAuthenticated();
      this.authenticatedLogin = data.login;
      return data.login;
    } catch (err) {
      throw classifyRequestError(err, "GitHub rejected the access token");
    }
  }

  async lookupUser(username: string): Promise<AccountInfo> {
    try {
      const { data } = await this.octokit.rest.users.getByUsername({ username });
      const privateRepos =
        "total_private_repos" in data ? (data.total_private_repos ?? 0) : 0;
      return {
        login: data.login,
        name: data.name,
        email: data.email,
        bio: data.bio,
        location: data.location,
        website: data.blog || null,
        htmlUrl: data.html_url,
        avatarUrl: data.avatar_url,
        publicRepos: data.public_repos,
        privateRepos,
        followers: data.followers,
        following: data.following,
        createdAt: data.created_at,
        updatedAt: data.updated_at,
      };
    } catch (err) {
      throw classifyRequestError(err, `GitHub user '${username}' lookup failed`);
    }
  }

  async *listRepositories(
    username: string,
    visibility: RepoVisibility,
  ): AsyncGenerator<RepositoryHandle> {
    try {
      if (visibility === "owner") {
        const pages = this.octokit.paginate.iterator(
          this.octokit.rest.repos.listForUser,
          { username, type: "owner", sort: "updated", per_page: 100 },
        );
        for await (const { data } of pages) {
          for (const raw of data) yield toRepositoryHandle(raw);
        }
        return;
      }

      if (this.authenticatedLogin?.toLowerCase() !== username.toLowerCase()) {
        throw new AuthError(
          `Private repositories of '${username}' need a token issued to that account`,
        );
      }
      const pages = this.octokit.paginate.iterator(
        this.octokit.rest.repos.listForAuthenticatedUser,
        { visibility: "private", affiliation: "owner", sort: "updated", per_page: 100 },
      );
      for await (const { data } of pages) {
        for (const raw of data) yield toRepositoryHandle(raw);
      }
    } catch (err) {
      throw classifyRequestError(err, `Listing ${visibility} repositories of '${username}' failed`);
    }
  }

  async getLanguages(owner: string, repo: string): Promise<LanguageHistogram> {
    try {
      const { data } = await this.octokit.rest.repos.listLanguages({ owner, repo });
      const histogram: LanguageHistogram = {};
      for (const [lang, bytes] of Object.entries(data)) {
        if (Number.isInteger(bytes) && bytes >= 0) histogram[lang] = bytes;
      }
      return histogram;
    } catch (err) {
      throw classifyRequestError(err, `Languages of ${owner}/${repo}`);
    }
  }

  async getTopics(owner: string, repo: string): Promise<string[]> {
    try {
      const { data } = await this.octokit.rest.repos.getAllTopics({ owner, repo });
      return data.names;
    } catch (err) {
      throw classifyRequestError(err, `Topics of ${owner}/${repo}`);
    }
  }

  async getLicense(owner: string, repo: string): Promise<string | null> {
    try {
      const { data } = await this.octokit.rest.licenses.getForRepo({ owner, repo });
      return data.license?.name ?? null;
    } catch (err) {
      if (httpStatusOf(err) === 404) return null;
      throw classifyRequestError(err, `License of ${owner}/${repo}`);
    }
  }

  async listContents(owner: string, repo: string, path: string): Promise<ContentEntry[]> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({ owner, repo, path });
      if (!Array.isArray(data)) return [];
      return data.map((entry) => ({
        name: entry.name,
        path: entry.path,
        type: entry.type,
      }));
    } catch (err) {
      throw classifyRequestError(err, `Contents of ${owner}/${repo}/${path}`);
    }
  }

  async downloadArchive(owner: string, repo: string, ref: string): Promise<Buffer> {
    try {
      const { data } = await this.octokit.rest.repos.downloadZipballArchive({
        owner,
        repo,
        ref,
      });
      return toBuffer(data);
    } catch (err) {
      throw classifyRequestError(err, `Archive of ${owner}/${repo}@${ref}`);
    }
  }
}
