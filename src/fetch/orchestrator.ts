import type pino from "pino";
import { z } from "zod";
import type { FetchScope } from "../config.js";
import {
  FetchError,
  InvalidUsernameError,
  classifyRequestError,
  errorMessage,
} from "../errors.js";
import type { AccountInfo, RemoteRepoClient, RepositoryHandle } from "../github/client.js";
import { enumerateRepositories } from "../github/repositories.js";
import type { FileMirror } from "../mirror/fileMirror.js";
import { buildProfile, summarizeRepositories } from "../profile/aggregate.js";
import type { FeatureProbe } from "../probe/featureProbe.js";
import type { LanguageHistogram, RepositoryRecord, UserSnapshot } from "../state/schema.js";
import type { SnapshotCache } from "../state/snapshotCache.js";
import { mapWithLimit } from "./concurrency.js";
import { PROGRESS, ProgressTracker, bandPercent, type ProgressListener } from "./progress.js";

export const usernameSchema = z
  .string()
  .trim()
  .regex(
    /^[A-Za-z0-9](?:[A-Za-z0-9]|-(?=[A-Za-z0-9])){0,38}$/,
    "must be 1-39 letters, digits or single inner hyphens",
  );

export type FetchState =
  | { name: "idle" }
  | { name: "authenticating" }
  | { name: "enumerating" }
  | { name: "processing"; done: number; total: number }
  | { name: "aggregating" }
  | { name: "caching" }
  | { name: "done" }
  | { name: "failed"; reason: FetchError }
  | { name: "cancelled" };

export interface FetchRequest {
  username: string;
  scope: FetchScope;
  includeFiles: boolean;
}

export interface FetchRunOptions {
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

/**
 * `cancelled` carries the repositories that finished before the request was
 * aborted, marked `complete: false` and never cached. It is null when the
 * account itself was not looked up yet.
 */
export type FetchOutcome =
  | { status: "done"; snapshot: UserSnapshot; warnings: string[] }
  | { status: "failed"; error: FetchError; warnings: string[] }
  | { status: "cancelled"; snapshot: UserSnapshot | null; warnings: string[] };

export interface FetchOrchestratorDeps {
  client: RemoteRepoClient;
  probe: FeatureProbe;
  mirror: FileMirror;
  cache: SnapshotCache;
  concurrency: number;
  logger: pino.Logger;
  now?: () => Date;
}

/**
 * Drives one fetch: authenticate, look the account up, enumerate its
 * repositories, probe (and optionally mirror) each, aggregate, cache.
 * Only authentication and lookup failures end in `failed`; everything past
 * that degrades into field defaults plus warnings.
 */
export class FetchOrchestrator {
  private current: FetchState = { name: "idle" };
  private readonly log: pino.Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: FetchOrchestratorDeps) {
    this.log = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  get state(): FetchState {
    return this.current;
  }

  private transition(next: FetchState): void {
    this.log.debug({ from: this.current.name, to: next.name }, "Fetch state change");
    this.current = next;
  }

  async run(request: FetchRequest, options: FetchRunOptions = {}): Promise<FetchOutcome> {
    const progress = new ProgressTracker(options.onProgress);
    const { signal } = options;
    const warnings: string[] = [];

    const parsed = usernameSchema.safeParse(request.username);
    if (!parsed.success) {
      const message = parsed.error.issues[0]?.message ?? "invalid username";
      return this.fail(
        new InvalidUsernameError(`Invalid GitHub username '${request.username}': ${message}`),
        warnings,
      );
    }
    const username = parsed.data;

    this.transition({ name: "authenticating" });
    progress.report("Fetching user information...", PROGRESS.lookup);

    let account: AccountInfo;
    try {
      const login = await this.deps.client.authenticate();
      if (login) this.log.info({ login }, "Authenticated with GitHub");
      account = await this.deps.client.lookupUser(username);
    } catch (err) {
      return this.fail(classifyRequestError(err, `Fetching '${username}' failed`), warnings);
    }

    if (signal?.aborted) return this.cancel(null, warnings);

    this.transition({ name: "enumerating" });
    progress.report(`Fetching ${request.scope} repositories...`, PROGRESS.enumerate);
    const enumeration = await enumerateRepositories(
      this.deps.client,
      account.login,
      request.scope,
      this.log,
      signal,
    );
    warnings.push(...enumeration.warnings);
    const handles = enumeration.repositories;

    let done = 0;
    this.transition({ name: "processing", done, total: handles.length });
    progress.report(`Found ${handles.length} repositories`, PROGRESS.processStart);

    const records = await mapWithLimit(
      handles,
      this.deps.concurrency,
      async (handle) => {
        const record = await this.processRepository(handle, request.includeFiles, warnings);
        done++;
        this.transition({ name: "processing", done, total: handles.length });
        progress.report(
          `Analyzed repository ${done}/${handles.length}: ${handle.name}`,
          bandPercent(done, handles.length, PROGRESS.processStart, PROGRESS.processEnd),
        );
        return record;
      },
      signal,
    );
    const repositories = records.filter((r): r is RepositoryRecord => r !== undefined);

    if (signal?.aborted) {
      const partial = this.assemble(account, repositories, request.scope, false);
      this.log.info(
        { username, processed: repositories.length, total: handles.length },
        "Fetch cancelled",
      );
      return this.cancel(partial, warnings);
    }

    this.transition({ name: "aggregating" });
    progress.report("Building profile...", PROGRESS.aggregate);
    const snapshot = this.assemble(account, repositories, request.scope, true);
    snapshot.profile = buildProfile(snapshot);

    this.transition({ name: "caching" });
    progress.report("Caching data...", PROGRESS.cache);
    try {
      await this.deps.cache.save(snapshot);
    } catch (err) {
      const warning = `Snapshot could not be cached: ${errorMessage(err)}`;
      this.log.error({ username, err }, "Failed to cache snapshot");
      warnings.push(warning);
    }

    this.transition({ name: "done" });
    progress.report("GitHub data fetch completed", PROGRESS.done);
    this.log.info(
      { username, repositories: repositories.length, warnings: warnings.length },
      "Fetch completed",
    );
    return { status: "done", snapshot, warnings };
  }

  private fail(error: FetchError, warnings: string[]): FetchOutcome {
    this.transition({ name: "failed", reason: error });
    this.log.error({ kind: error.kind, retryable: error.retryable, err: error }, "Fetch failed");
    return { status: "failed", error, warnings };
  }

  private cancel(snapshot: UserSnapshot | null, warnings: string[]): FetchOutcome {
    this.transition({ name: "cancelled" });
    return { status: "cancelled", snapshot, warnings };
  }

  private async processRepository(
    handle: RepositoryHandle,
    includeFiles: boolean,
    warnings: string[],
  ): Promise<RepositoryRecord> {
    const { client, probe, mirror } = this.deps;
    const degrade = (what: string, err: unknown) => {
      const warning = `${handle.fullName}: ${what} unavailable (${errorMessage(err)})`;
      this.log.warn({ repo: handle.fullName, err }, `${what} lookup failed`);
      warnings.push(warning);
    };

    let languages: LanguageHistogram = {};
    try {
      languages = await client.getLanguages(handle.owner, handle.name);
    } catch (err) {
      degrade("languages", err);
    }

    let topics = handle.topics ?? [];
    if (handle.topics === undefined) {
      try {
        topics = await client.getTopics(handle.owner, handle.name);
      } catch (err) {
        degrade("topics", err);
      }
    }

    let licenseName = handle.licenseName ?? null;
    if (handle.licenseName === undefined) {
      try {
        licenseName = await client.getLicense(handle.owner, handle.name);
      } catch (err) {
        degrade("license", err);
      }
    }

    const probed = await probe.probe(handle);
    warnings.push(...probed.warnings);

    let localPath: string | null = null;
    let mirrored = false;
    if (includeFiles) {
      const result = await mirror.mirror(handle);
      localPath = result.localPath;
      mirrored = result.localPath !== null;
      if (!mirrored) warnings.push(`${handle.fullName}: local mirror failed`);
    }

    return {
      name: handle.name,
      owner: handle.owner,
      fullName: handle.fullName,
      url: handle.htmlUrl,
      cloneUrl: handle.cloneUrl,
      sshUrl: handle.sshUrl,
      description: handle.description ?? "",
      language: handle.language,
      topics,
      languages,
      stars: handle.stars,
      forks: handle.forks,
      watchers: handle.watchers,
      sizeKb: handle.sizeKb,
      createdAt: handle.createdAt,
      updatedAt: handle.updatedAt,
      pushedAt: handle.pushedAt ?? handle.updatedAt,
      defaultBranch: handle.defaultBranch,
      isPrivate: handle.isPrivate,
      isFork: handle.isFork,
      isArchived: handle.isArchived,
      licenseName,
      features: probed.flags,
      localPath,
      mirrored,
    };
  }

  private assemble(
    account: AccountInfo,
    repositories: RepositoryRecord[],
    scope: FetchScope,
    complete: boolean,
  ): UserSnapshot {
    const totals = summarizeRepositories(repositories);
    return {
      username: account.login,
      name: account.name,
      email: account.email,
      bio: account.bio,
      location: account.location,
      website: account.website,
      profileUrl: account.htmlUrl,
      avatarUrl: account.avatarUrl,
      publicRepos: account.publicRepos,
      privateRepos: account.privateRepos,
      followers: account.followers,
      following: account.following,
      createdAt: account.createdAt,
      updatedAt: account.updatedAt,
      repositories,
      totalStars: totals.totalStars,
      totalForks: totals.totalForks,
      languagesUsed: totals.languagesUsed,
      fetchedAt: this.now().toISOString(),
      scope,
      complete,
      profile: null,
    };
  }
}
