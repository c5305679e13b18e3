import type { AppConfig } from "./config.js";
import { FetchOrchestrator } from "./fetch/orchestrator.js";
import { GitHubRepoClient, createGitHubClient } from "./github/client.js";
import { createLogger } from "./logger.js";
import { FileMirror } from "./mirror/fileMirror.js";
import { FeatureProbe } from "./probe/featureProbe.js";
import { SnapshotCache } from "./state/snapshotCache.js";

export interface Services {
  cache: SnapshotCache;
  orchestrator: FetchOrchestrator;
}

export function createServices(config: AppConfig): Services {
  const remote = new GitHubRepoClient(
    createGitHubClient({
      token: config.GITHUB_TOKEN,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      logger: createLogger("github"),
    }),
    config.GITHUB_TOKEN !== undefined,
  );

  const cache = new SnapshotCache({
    cacheDir: config.CACHE_DIR,
    maxAgeDays: config.MAX_CACHE_AGE_DAYS,
    logger: createLogger("cache"),
  });
  const mirror = new FileMirror(
    config.MIRROR_DIR,
    (owner, repo, ref) => remote.downloadArchive(owner, repo, ref),
    createLogger("mirror"),
  );
  const orchestrator = new FetchOrchestrator({
    client: remote,
    probe: new FeatureProbe(remote, createLogger("probe")),
    mirror,
    cache,
    concurrency: config.FETCH_CONCURRENCY,
    logger: createLogger("fetch"),
  });

  return { cache, orchestrator };
}
