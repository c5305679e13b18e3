import { FETCH_SCOPES, type FetchScope } from "./config.js";
import { usernameSchema, type FetchOutcome } from "./fetch/orchestrator.js";

export const EXIT_CODES = {
  ok: 0,
  failed: 1,
  usage: 2,
  cancelled: 130,
} as const;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** True for errors that should print usage: ours, and `parseArgs` rejections. */
export function isUsageError(err: unknown): err is Error {
  return err instanceof UsageError || (err instanceof TypeError && "code" in err);
}

export function parseScope(raw: string | undefined): FetchScope {
  const scope = FETCH_SCOPES.find((s) => s === (raw ?? "public"));
  if (!scope) throw new UsageError(`Unknown scope '${raw}'`);
  return scope;
}

export function parseUsername(raw: string | undefined): string {
  if (raw === undefined) throw new UsageError("fetch needs a username");
  const parsed = usernameSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? "invalid username";
    throw new UsageError(`Invalid GitHub username '${raw}': ${reason}`);
  }
  return parsed.data;
}

export function exitCodeFor(outcome: FetchOutcome): number {
  switch (outcome.status) {
    case "done":
      return EXIT_CODES.ok;
    case "cancelled":
      return EXIT_CODES.cancelled;
    case "failed":
      return EXIT_CODES.failed;
  }
}
