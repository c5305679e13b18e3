import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export const FETCH_SCOPES = ["single", "public", "all", "private"] as const;

export type FetchScope = (typeof FETCH_SCOPES)[number];

const DATA_ROOT = join(homedir(), ".repofolio");

function intInRange(fallback: string, min: number, max: number) {
  return z
    .string()
    .default(fallback)
    .transform((s) => parseInt(s, 10))
    .pipe(z.number().int().min(min).max(max));
}

const envSchema = z.object({
  GITHUB_TOKEN: z
    .string()
    .optional()
    .transform((s) => {
      const trimmed = s?.trim();
      return trimmed ? trimmed : undefined;
    }),
  CACHE_DIR: z.string().min(1).default(join(DATA_ROOT, "github_cache")),
  MIRROR_DIR: z.string().min(1).default(join(DATA_ROOT, "local_repos")),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  MAX_CACHE_AGE_DAYS: intInRange("7", 1, 365),
  FETCH_CONCURRENCY: intInRange("4", 1, 16),
  REQUEST_TIMEOUT_MS: intInRange("30000", 1000, 300000),
  REFRESH_CRON: z.string().min(1).default("0 */6 * * *"),
  REFRESH_USERNAMES: z
    .string()
    .default("")
    .transform((s) =>
      s
        .split(",")
        .map((u) => u.trim())
        .filter((u) => u.length > 0),
    ),
  REFRESH_SCOPE: z.enum(FETCH_SCOPES).default("public"),
});

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function parseConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }

  return Object.freeze(result.data);
}

export function loadConfig(): AppConfig {
  try {
    return parseConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error("Configuration validation failed:");
      for (const issue of err.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw err;
  }
}
