import { mkdir, readFile, readdir, rename, stat, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type pino from "pino";
import { CACHE_SCHEMA_VERSION, cachedSnapshotSchema, type CachedSnapshot, type UserSnapshot } from "./schema.js";

const CACHE_SUFFIX = "_data.json";
const DAY_MS = 24 * 60 * 60 * 1000;

export interface SnapshotCacheOptions {
  cacheDir: string;
  maxAgeDays: number;
  logger: pino.Logger;
  now?: () => number;
}

export function cacheKey(username: string): string {
  return username.trim().toLowerCase();
}

/**
 * One JSON document per account. Reads never fail: a missing, stale,
 * corrupt or outdated file is a miss. The derived profile is not stored.
 */
export class SnapshotCache {
  private readonly cacheDir: string;
  private readonly maxAgeDays: number;
  private readonly log: pino.Logger;
  private readonly now: () => number;

  constructor(options: SnapshotCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.maxAgeDays = options.maxAgeDays;
    this.log = options.logger;
    this.now = options.now ?? Date.now;
  }

  filePath(username: string): string {
    return join(this.cacheDir, `${cacheKey(username)}${CACHE_SUFFIX}`);
  }

  async load(username: string): Promise<UserSnapshot | null> {
    const filePath = this.filePath(username);

    try {
      const info = await stat(filePath);
      if (this.now() - info.mtimeMs > this.maxAgeDays * DAY_MS) {
        this.log.info({ filePath, maxAgeDays: this.maxAgeDays }, "Cached snapshot is stale, ignoring");
        return null;
      }

      const content = await readFile(filePath, "utf-8");
      const parsed: unknown = JSON.parse(content);
      const result = cachedSnapshotSchema.safeParse(parsed);

      if (!result.success) {
        this.log.warn(
          { filePath, issues: result.error.issues },
          "Cached snapshot has invalid schema, treating as cache miss",
        );
        return null;
      }

      const { schemaVersion: _version, ...snapshot } = result.data;
      this.log.info({ filePath }, "Cached snapshot loaded");
      return { ...snapshot, profile: null };
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;

      if (error.code === "ENOENT") {
        this.log.debug({ filePath }, "No cached snapshot");
      } else {
        this.log.warn(
          { filePath, error: error.message },
          "Cached snapshot corrupt or unreadable, treating as cache miss",
        );
      }
      return null;
    }
  }

  async save(snapshot: UserSnapshot): Promise<string> {
    const filePath = this.filePath(snapshot.username);
    const { profile: _profile, ...fields } = snapshot;
    const document: CachedSnapshot = { schemaVersion: CACHE_SCHEMA_VERSION, ...fields };

    await mkdir(this.cacheDir, { recursive: true });
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(document, null, 2), "utf-8");
    await rename(tempPath, filePath);
    this.log.debug({ filePath }, "Snapshot saved atomically");
    return filePath;
  }

  /** Deletes cache files last written more than `days` ago; returns their keys. */
  async invalidateOlderThan(days: number): Promise<string[]> {
    const cutoff = this.now() - days * DAY_MS;
    let names: string[];
    try {
      names = await readdir(this.cacheDir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    const removed: string[] = [];
    for (const name of names) {
      if (!name.endsWith(CACHE_SUFFIX)) continue;
      const filePath = join(this.cacheDir, name);
      const info = await stat(filePath);
      if (info.mtimeMs < cutoff) {
        await unlink(filePath);
        removed.push(name.slice(0, -CACHE_SUFFIX.length));
        this.log.info({ file: name }, "Removed old cache file");
      }
    }
    return removed;
  }
}
