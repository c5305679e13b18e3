import type pino from "pino";
import { errorMessage } from "../errors.js";
import type { ContentEntry, RemoteRepoClient, RepositoryHandle } from "../github/client.js";
import { NO_FEATURES, type FeatureFlags } from "../state/schema.js";

export const README_MARKERS = ["README.md", "README.rst", "README.txt", "README"];
export const LICENSE_MARKERS = ["LICENSE", "LICENSE.md", "LICENSE.txt", "LICENCE"];
export const DOCKERFILE_MARKERS = ["Dockerfile", "dockerfile"];
export const CI_ROOT_MARKERS = [".gitlab-ci.yml", ".travis.yml", "Jenkinsfile"];
export const TEST_DIR_PREFIXES = ["test", "tests", "__tests__", "spec", "specs"];

export interface ProbeResult {
  flags: FeatureFlags;
  warnings: string[];
}

function hasFile(entries: ContentEntry[], markers: string[]): boolean {
  return entries.some((e) => e.type === "file" && markers.includes(e.name));
}

function hasTestDirectory(entries: ContentEntry[]): boolean {
  return entries.some(
    (e) =>
      e.type === "dir" &&
      TEST_DIR_PREFIXES.some((prefix) => e.name.toLowerCase().startsWith(prefix)),
  );
}

/**
 * Looks for conventional marker files at a repository's root. Every listing
 * is best-effort: a failed call turns the flags that depend on it false and
 * adds a warning.
 */
export class FeatureProbe {
  constructor(
    private readonly client: RemoteRepoClient,
    private readonly log: pino.Logger,
  ) {}

  async probe(repo: RepositoryHandle): Promise<ProbeResult> {
    let root: ContentEntry[];
    try {
      root = await this.client.listContents(repo.owner, repo.name, "");
    } catch (err) {
      const warning = `${repo.fullName}: root listing failed, feature flags default to false (${errorMessage(err)})`;
      this.log.warn({ repo: repo.fullName, err }, "Root listing failed");
      return { flags: { ...NO_FEATURES }, warnings: [warning] };
    }

    const warnings: string[] = [];
    const hasCi = await this.detectCi(repo, root, warnings);

    return {
      flags: {
        hasReadme: hasFile(root, README_MARKERS),
        hasLicense: hasFile(root, LICENSE_MARKERS),
        hasDockerfile: hasFile(root, DOCKERFILE_MARKERS),
        hasCi,
        hasTests: hasTestDirectory(root),
      },
      warnings,
    };
  }

  private async detectCi(
    repo: RepositoryHandle,
    root: ContentEntry[],
    warnings: string[],
  ): Promise<boolean> {
    if (hasFile(root, CI_ROOT_MARKERS)) return true;

    const github = root.find((e) => e.type === "dir" && e.name === ".github");
    if (!github) return false;

    try {
      const inner = await this.client.listContents(repo.owner, repo.name, github.path);
      const workflows = inner.find((e) => e.type === "dir" && e.name === "workflows");
      if (!workflows) return false;
      const files = await this.client.listContents(repo.owner, repo.name, workflows.path);
      return files.length > 0;
    } catch (err) {
      this.log.warn({ repo: repo.fullName, err }, "Workflow listing failed");
      warnings.push(`${repo.fullName}: workflow listing failed, CI flag defaults to false (${errorMessage(err)})`);
      return false;
    }
  }
}
