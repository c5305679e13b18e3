import pino from "pino";
import { LOG_LEVELS } from "./config.js";

function resolveLevel(raw: string | undefined): pino.LevelWithSilent {
  return LOG_LEVELS.find((level) => level === raw) ?? "info";
}

const rootLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(module: string): pino.Logger {
  return rootLogger.child({ module });
}
