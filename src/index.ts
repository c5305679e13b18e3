#!/usr/bin/env node
import { parseArgs } from "node:util";
import { EXIT_CODES, UsageError, exitCodeFor, isUsageError, parseScope, parseUsername } from "./cli.js";
import { loadConfig, type AppConfig } from "./config.js";
import { runRefreshCycle } from "./fetch/refresh.js";
import { createLogger } from "./logger.js";
import { rebuildProfile } from "./profile/aggregate.js";
import { formatSnapshotSummary } from "./report/summary.js";
import { startRefreshScheduler } from "./scheduler.js";
import { createServices } from "./services.js";
import type { UserSnapshot } from "./state/schema.js";

const log = createLogger("main");

const USAGE = `Usage:
  repofolio fetch <username> [--scope single|public|all|private] [--files] [--refresh] [--json]
  repofolio clean [--days N]
  repofolio watch`;

function printSnapshot(snapshot: UserSnapshot, asJson: boolean): void {
  const withProfile = snapshot.profile ? snapshot : rebuildProfile(snapshot);
  if (asJson) {
    console.log(JSON.stringify(withProfile, null, 2));
    return;
  }
  if (withProfile.profile) {
    console.log(formatSnapshotSummary(withProfile, withProfile.profile));
  }
}

async function fetchCommand(config: AppConfig, args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      scope: { type: "string" },
      files: { type: "boolean", default: false },
      refresh: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
    },
  });
  const username = parseUsername(positionals[0]);
  const scope = parseScope(values.scope);

  const { cache, orchestrator } = createServices(config);

  if (!values.refresh) {
    const cached = await cache.load(username);
    if (cached?.scope === scope) {
      log.info({ username, fetchedAt: cached.fetchedAt }, "Serving snapshot from cache");
      printSnapshot(cached, values.json);
      return EXIT_CODES.ok;
    }
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    log.warn("Interrupt received, cancelling after in-flight repositories finish");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const outcome = await orchestrator.run(
      { username, scope, includeFiles: values.files },
      {
        signal: controller.signal,
        onProgress: (message, percent) => log.info({ percent }, message),
      },
    );

    for (const warning of outcome.warnings) console.error(`warning: ${warning}`);

    switch (outcome.status) {
      case "done":
        printSnapshot(outcome.snapshot, values.json);
        break;
      case "cancelled":
        console.error(
          `Cancelled; ${outcome.snapshot?.repositories.length ?? 0} repositories were processed and nothing was cached.`,
        );
        break;
      case "failed": {
        const hint = outcome.error.retryable
          ? "This looks temporary; try again later."
          : "Check the username and token.";
        console.error(`Error: ${outcome.error.message}\n${hint}`);
        break;
      }
    }
    return exitCodeFor(outcome);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

async function cleanCommand(config: AppConfig, args: string[]): Promise<number> {
  const { values } = parseArgs({ args, options: { days: { type: "string" } } });
  const days = values.days === undefined ? config.MAX_CACHE_AGE_DAYS : Number(values.days);
  if (!Number.isInteger(days) || days < 0) throw new UsageError("--days must be a whole number");

  const { cache } = createServices(config);
  const removed = await cache.invalidateOlderThan(days);
  console.log(`Removed ${removed.length} cached snapshot(s)`);
  return EXIT_CODES.ok;
}

async function watchCommand(config: AppConfig): Promise<number> {
  if (config.REFRESH_USERNAMES.length === 0) {
    throw new UsageError("watch needs REFRESH_USERNAMES to name at least one account");
  }
  const { cache, orchestrator } = createServices(config);
  const plan = {
    usernames: config.REFRESH_USERNAMES,
    scope: config.REFRESH_SCOPE,
    maxCacheAgeDays: config.MAX_CACHE_AGE_DAYS,
  };
  const scheduler = startRefreshScheduler(config.REFRESH_CRON, async () => {
    await runRefreshCycle(orchestrator, cache, plan, createLogger("refresh"));
  });

  log.info(
    { usernames: plan.usernames, scope: plan.scope, cronExpression: config.REFRESH_CRON },
    "repofolio watching",
  );

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string) => {
      log.info({ signal }, "Shutdown signal received");
      resolve();
    };
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  });
  await scheduler.stop();
  return EXIT_CODES.ok;
}

async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  const config = loadConfig();

  try {
    switch (command) {
      case "fetch":
        return await fetchCommand(config, rest);
      case "clean":
        return await cleanCommand(config, rest);
      case "watch":
        return await watchCommand(config);
      default:
        throw new UsageError(command ? `Unknown command '${command}'` : "Missing command");
    }
  } catch (err) {
    if (isUsageError(err)) {
      console.error(`${err.message}\n\n${USAGE}`);
      return EXIT_CODES.usage;
    }
    throw err;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
