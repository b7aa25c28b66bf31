import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LEVELS: readonly pino.LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function resolveLevel(raw: string | undefined): pino.LevelWithSilent {
  return LEVELS.find((level) => level === raw) ?? "info";
}

const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "" || LOG_LEVEL === "silent") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Log to stderr so CLI output on stdout stays machine-readable
  const streams: pino.StreamEntry[] = [
    { level: LOG_LEVEL, stream: process.stderr },
    {
      level: LOG_LEVEL,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger = pino(
  loggerOptions,
  destination ?? pino.destination({ dest: 2, sync: false })
);

// Child loggers for different modules
export const apiLogger = logger.child({ module: "entsoe-api" });
export const cliLogger = logger.child({ module: "cli" });

if (destination !== undefined && LOG_FILE !== undefined) {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
