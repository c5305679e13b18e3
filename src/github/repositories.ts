import type pino from "pino";
import type { FetchScope } from "../config.js";
import { errorMessage } from "../errors.js";
import type { RemoteRepoClient, RepoVisibility, RepositoryHandle } from "./client.js";

export const SINGLE_SCOPE_LIMIT = 10;

export interface Enumeration {
  repositories: RepositoryHandle[];
  warnings: string[];
}

interface ListingPlan {
  visibility: RepoVisibility;
  label: string;
  /** Drops private entries an owner's token can surface in the owner listing. */
  publicOnly: boolean;
}

const SCOPE_PLANS: Record<Exclude<FetchScope, "single">, ListingPlan[]> = {
  public: [{ visibility: "owner", label: "public", publicOnly: true }],
  all: [
    { visibility: "owner", label: "public", publicOnly: false },
    { visibility: "private", label: "private", publicOnly: false },
  ],
  private: [{ visibility: "private", label: "private", publicOnly: false }],
};

async function enumerateSingle(
  client: RemoteRepoClient,
  username: string,
  signal?: AbortSignal,
): Promise<RepositoryHandle[]> {
  const picked: RepositoryHandle[] = [];
  for await (const repo of client.listRepositories(username, "owner")) {
    if (signal?.aborted) break;
    if (repo.isFork || repo.isPrivate) continue;
    picked.push(repo);
    if (picked.length >= SINGLE_SCOPE_LIMIT) break;
  }
  return picked;
}

/**
 * Lists the repositories a scope covers, most recently updated first per
 * listing. A listing that fails part-way keeps what it already yielded and
 * records a warning; under `all`, a refused private listing leaves the
 * public results standing. Listing stops at the next entry once `signal`
 * aborts.
 */
export async function enumerateRepositories(
  client: RemoteRepoClient,
  username: string,
  scope: FetchScope,
  log: pino.Logger,
  signal?: AbortSignal,
): Promise<Enumeration> {
  const warnings: string[] = [];

  if (scope === "single") {
    try {
      return { repositories: await enumerateSingle(client, username, signal), warnings };
    } catch (err) {
      const warning = `Could not list repositories: ${errorMessage(err)}`;
      log.warn({ username, scope, err }, warning);
      return { repositories: [], warnings: [warning] };
    }
  }

  const seen = new Set<string>();
  const repositories: RepositoryHandle[] = [];

  for (const plan of SCOPE_PLANS[scope]) {
    if (signal?.aborted) break;
    let count = 0;
    try {
      for await (const repo of client.listRepositories(username, plan.visibility)) {
        if (signal?.aborted) break;
        if (plan.publicOnly && repo.isPrivate) continue;
        if (seen.has(repo.fullName)) continue;
        seen.add(repo.fullName);
        repositories.push(repo);
        count++;
      }
      log.info({ username, listing: plan.label, count }, "Repositories listed");
    } catch (err) {
      const warning = `Could not list ${plan.label} repositories: ${errorMessage(err)}`;
      log.warn({ username, listing: plan.label, count, err }, warning);
      warnings.push(warning);
    }
  }

  log.info({ username, scope, total: repositories.length }, "Repository enumeration finished");
  return { repositories, warnings };
}
