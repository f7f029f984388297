/**
 * Structured logging via pino with automatic credential redaction.
 */

import pino from "pino";
import { join } from "node:path";
import { mkdirSync } from "node:fs";
import { getLogDir } from "./pathResolver.js";

const LOG_DIR = getLogDir();

function ensureLogDir(): boolean {
  try {
    mkdirSync(LOG_DIR, { recursive: true, mode: 0o700 });
    return true;
  } catch {
    return false;
  }
}

const REDACT_PATHS = [
  "password",
  "secret",
  "code",
  "cookie",
  "cookies",
  "token",
  "authorization",
  "*.password",
  "*.secret",
  "*.code",
  "*.cookie",
  "*.cookies",
  "*.token",
  "*.authorization",
];

const logToFile = process.env["NODE_ENV"] === "development" && ensureLogDir();

const logger = pino({
  name: "maskmail",
  level: process.env["MASKMAIL_LOG_LEVEL"] ?? "error",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
  ...(logToFile
    ? {
        transport: {
          target: "pino/file",
          options: { destination: join(LOG_DIR, "maskmail.log"), mkdir: true },
        },
      }
    : {}),
  timestamp: pino.stdTimeFunctions.isoTime,
});

export { logger };
