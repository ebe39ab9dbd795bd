// src/lib/logger.ts
import pino from "pino";
import { ConfigError } from "./errors";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(v: string | undefined): v is LogLevel {
  return LOG_LEVELS.some((l) => l === v);
}

// stdout carries the report, so logs go to stderr.
// An invalid LOG_LEVEL is reported by applyLogLevel; loading must not throw.
const initial = process.env.LOG_LEVEL;
export const log = pino({ level: isLogLevel(initial) ? initial : "info" }, process.stderr);

export function applyLogLevel(raw: string | undefined): void {
  if (!raw) return;
  if (!isLogLevel(raw)) {
    throw new ConfigError(`Invalid LOG_LEVEL '${raw}': expected one of ${LOG_LEVELS.join(", ")}`);
  }
  log.level = raw;
}
