import type pino from "pino";
import type { FetchScope } from "../config.js";
import type { SnapshotCache } from "../state/snapshotCache.js";
import type { FetchOrchestrator } from "./orchestrator.js";

export interface RefreshPlan {
  usernames: string[];
  scope: FetchScope;
  maxCacheAgeDays: number;
}

export interface RefreshReport {
  refreshed: string[];
  failed: string[];
  pruned: string[];
}

/**
 * One scheduled pass: refetch every configured account in turn (fetches
 * for one username never overlap), then drop cache files past their age.
 */
export async function runRefreshCycle(
  orchestrator: FetchOrchestrator,
  cache: SnapshotCache,
  plan: RefreshPlan,
  log: pino.Logger,
): Promise<RefreshReport> {
  const report: RefreshReport = { refreshed: [], failed: [], pruned: [] };

  for (const username of plan.usernames) {
    const outcome = await orchestrator.run({ username, scope: plan.scope, includeFiles: false });
    if (outcome.status === "done") {
      report.refreshed.push(username);
      log.info(
        { username, repositories: outcome.snapshot.repositories.length, warnings: outcome.warnings.length },
        "Snapshot refreshed",
      );
    } else {
      report.failed.push(username);
      log.warn({ username, status: outcome.status }, "Snapshot refresh did not complete");
    }
  }

  try {
    report.pruned = await cache.invalidateOlderThan(plan.maxCacheAgeDays);
  } catch (err) {
    log.error({ err }, "Cache cleanup failed");
  }

  log.info(
    { refreshed: report.refreshed.length, failed: report.failed.length, pruned: report.pruned.length },
    "Refresh cycle complete",
  );
  return report;
}
