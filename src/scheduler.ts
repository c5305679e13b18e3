import cron from "node-cron";
import { createLogger } from "./logger.js";

const log = createLogger("scheduler");

export interface RefreshScheduler {
  stop(): Promise<void>;
}

export function startRefreshScheduler(
  cronExpression: string,
  refreshFn: () => Promise<void>,
): RefreshScheduler {
  const task = cron.schedule(
    cronExpression,
    async () => {
      log.info("Snapshot refresh starting");
      try {
        await refreshFn();
        log.info("Snapshot refresh completed");
      } catch (err) {
        log.error({ err }, "Snapshot refresh failed");
      }
    },
    { noOverlap: true, name: "repofolio-refresh" },
  );

  task.on("execution:overlap", () => {
    log.warn("Snapshot refresh skipped -- previous refresh still running");
  });

  log.info({ cronExpression }, "Scheduler started");

  return {
    async stop() {
      await task.stop();
      log.info("Scheduler stopped");
    },
  };
}
