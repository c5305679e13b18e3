import { mkdir, mkdtemp, readdir, rename, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import AdmZip from "adm-zip";
import type pino from "pino";
import type { RepositoryHandle } from "../github/client.js";

export type ArchiveDownloader = (
  owner: string,
  repo: string,
  ref: string,
) => Promise<Buffer>;

export interface MirrorResult {
  localPath: string | null;
  downloaded: boolean;
}

async function hasContent(dir: string): Promise<boolean> {
  const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  });
  for (const entry of entries) {
    if (entry.isFile()) return true;
    if (entry.isDirectory() && (await readdir(join(dir, entry.name))).length > 0) {
      return true;
    }
  }
  return false;
}

/**
 * Archives wrap the tree in one folder (`{repo}-{branch}/` or
 * `{owner}-{repo}-{sha}/`). Returns that folder, or `dir` itself when the
 * extracted tree has no single wrapper.
 */
async function treeRoot(dir: string): Promise<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  if (entries.length !== 1 || !entries[0].isDirectory()) return dir;
  return join(dir, entries[0].name);
}

/** Keeps a local copy of each repository under `<root>/<owner>/<repo>`. */
export class FileMirror {
  constructor(
    private readonly mirrorRoot: string,
    private readonly download: ArchiveDownloader,
    private readonly log: pino.Logger,
  ) {}

  localRepositoriesPath(owner: string): string {
    return join(this.mirrorRoot, owner);
  }

  targetPath(repo: Pick<RepositoryHandle, "owner" | "name">): string {
    return join(this.mirrorRoot, repo.owner, repo.name);
  }

  /**
   * Never throws: any failure leaves no partial tree behind and yields a
   * null path.
   */
  async mirror(repo: RepositoryHandle): Promise<MirrorResult> {
    const target = this.targetPath(repo);

    try {
      if (await hasContent(target)) {
        this.log.info({ repo: repo.fullName, target }, "Repository already mirrored, skipping");
        return { localPath: target, downloaded: false };
      }
    } catch (err) {
      this.log.error({ repo: repo.fullName, err }, "Cannot inspect mirror directory");
      return { localPath: null, downloaded: false };
    }

    let tempDir: string | undefined;
    let stagingDir: string | undefined;
    try {
      this.log.info({ repo: repo.fullName, ref: repo.defaultBranch }, "Downloading repository archive");
      const archive = await this.download(repo.owner, repo.name, repo.defaultBranch);

      tempDir = await mkdtemp(join(tmpdir(), "repofolio-"));
      const archivePath = join(tempDir, `${repo.name}.zip`);
      await writeFile(archivePath, archive);

      // Staged beside the target so the final rename stays on one filesystem.
      const ownerDir = this.localRepositoriesPath(repo.owner);
      await mkdir(ownerDir, { recursive: true });
      stagingDir = await mkdtemp(join(ownerDir, `.${repo.name}-`));
      new AdmZip(archivePath).extractAllTo(stagingDir, true);

      await rm(target, { recursive: true, force: true });
      await rename(await treeRoot(stagingDir), target);

      this.log.info({ repo: repo.fullName, target }, "Repository mirrored");
      return { localPath: target, downloaded: true };
    } catch (err) {
      this.log.error({ repo: repo.fullName, err }, "Failed to mirror repository");
      await rm(target, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
        this.log.warn({ target, err: cleanupErr }, "Could not remove partial mirror");
      });
      return { localPath: null, downloaded: false };
    } finally {
      if (stagingDir) {
        await rm(stagingDir, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
          this.log.warn({ stagingDir, err: cleanupErr }, "Could not remove staging directory");
        });
      }
      if (tempDir) {
        await rm(tempDir, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
          this.log.warn({ tempDir, err: cleanupErr }, "Could not remove temporary archive");
        });
      }
    }
  }
}
