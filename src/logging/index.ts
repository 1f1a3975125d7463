/**
 * Structured logging for validation and rendering.
 * JSON output by default; pino-pretty for interactive runs.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error (default: info)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";
import type { ValidationError } from "../errors";
import type { Flavor } from "../flavors/types";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function envLevel(): LogLevel {
  const v = process.env.LOG_LEVEL?.trim();
  return v !== undefined && isLogLevel(v) ? v : "info";
}

// The pretty transport runs in a worker thread; keep it out of production and test runs.
function envPretty(): boolean {
  return process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
}

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? envLevel(),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? envPretty();
  const logFile = process.env.LOG_FILE?.trim();

  const primary: pino.DestinationStream = pretty
    ? pino.transport({ target: "pino-pretty", options: { colorize: true } })
    : process.stdout;
  if (!logFile) {
    return pino(opts, primary);
  }
  return pino(
    opts,
    pino.multistream([{ stream: primary }, { stream: pino.destination({ dest: logFile, append: true, mkdir: true }) }])
  );
}

/** Log a successful validation. */
export function logValidation(log: pino.Logger, flavor: Flavor, nodeCount: number, durationMs?: number): void {
  log.debug({ event: "SSML_VALIDATED", flavor, nodeCount, durationMs }, "SSML validated");
}

/** Log a rejected document (the error's code, path and message; never the document text). */
export function logValidationFailure(log: pino.Logger, error: ValidationError): void {
  log.warn(
    { event: "SSML_VALIDATION_FAILED", flavor: error.flavor, code: error.code, element: error.element, path: error.path },
    error.message
  );
}

/** Log a render. */
export function logRender(log: pino.Logger, flavor: Flavor, outputLength: number, durationMs?: number): void {
  log.info({ event: "SSML_RENDERED", flavor, outputLength, durationMs }, "SSML rendered");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
