import { pino } from "pino";
import type { DestinationStream, Logger, LevelWithSilent } from "pino";

export type { Logger } from "pino";
export type LogLevel = LevelWithSilent;

let rootLogger: Logger = pino({ level: "info", base: null });

/**
 * Replace the root logger. Loggers created afterwards inherit the new settings.
 */
export function configureLogger(options: { level?: LogLevel; destination?: DestinationStream }): Logger {
  const level = options.level ?? rootLogger.level;
  rootLogger = options.destination
    ? pino({ level, base: null }, options.destination)
    : pino({ level, base: null });
  return rootLogger;
}

export function getRootLogger(): Logger {
  return rootLogger;
}

/**
 * Tagged child logger, messages print as "[Tag] message"
 */
export function createLogger(tag: string, parent: Logger = rootLogger): Logger {
  return parent.child({}, { msgPrefix: `[${tag}] ` });
}
