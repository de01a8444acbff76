import { type ILogObj, Logger } from "tslog";
import type { LogLevelName } from "./types";

export type EditorLogger = Logger<ILogObj>;

// tslog numbers its levels 0 (silly) through 6 (fatal)
const LOG_LEVEL_IDS: Record<LogLevelName, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6
};

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LOG_LEVEL_IDS, value);
}

export function createLogger(level: LogLevelName = "info"): EditorLogger {
  return new Logger<ILogObj>({
    name: "BlockEditor",
    minLevel: LOG_LEVEL_IDS[level],
    type: "pretty",
    hideLogPositionForProduction: true
  });
}

function initialLevel(): LogLevelName {
  const fromEnv = typeof process !== "undefined" ? process.env.BLOCK_EDITOR_LOG_LEVEL : undefined;
  return fromEnv && isLogLevelName(fromEnv) ? fromEnv : "info";
}

export const rootLogger: EditorLogger = createLogger(initialLevel());

export function setLogLevel(level: LogLevelName): void {
  rootLogger.settings.minLevel = LOG_LEVEL_IDS[level];
}
