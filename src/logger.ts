import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

function isLevel(value: string): value is pino.LevelWithSilent {
  return value === "silent" || Object.hasOwn(pino.levels.values, value);
}

/**
 * Unknown or empty levels fall back to "info".
 */
export function resolveLogLevel(
  value: string | undefined
): pino.LevelWithSilent {
  const level = value?.trim().toLowerCase() ?? "";
  return isLevel(level) ? level : "info";
}

const LOG_LEVEL = resolveLogLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const level: pino.Level = LOG_LEVEL === "silent" ? "fatal" : LOG_LEVEL;

  // Create streams for both stdout and file
  const streams: pino.StreamEntry[] = [
    { level, stream: process.stdout },
    {
      level,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: { service: "tagsync" },
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// For Fastify: export config that Fastify can use directly
export const fastifyLoggerConfig =
  destination !== undefined
    ? { level: LOG_LEVEL, stream: destination }
    : { level: LOG_LEVEL };

// Child loggers for different modules
export const directoryLogger = logger.child({ module: "directory" });
export const dbLogger = logger.child({ module: "database" });
export const syncLogger = logger.child({ module: "sync" });
export const serverLogger = logger.child({ module: "server" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
