/**
 * Subsystem loggers.
 *
 * One pino root logger writes structured lines to stderr; each module asks for
 * a child bound to its subsystem name and logs with `(message, meta?)`.
 */

import pino, { type Logger } from "pino";
import { ENV_LOG_LEVEL } from "../config/paths.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

const DEFAULT_LEVEL: LogLevel = "warn";

let root: Logger | null = null;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the log level from SEALBOX_LOG_LEVEL, falling back to "warn".
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return DEFAULT_LEVEL;
}

function getRootLogger(): Logger {
  if (!root) {
    root = pino(
      {
        name: "sealbox",
        level: resolveLogLevel(),
        base: null,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2),
    );
  }
  return root;
}

/**
 * Replace the root logger (tests and embedding applications).
 * Passing null drops it so the next call rebuilds from the environment.
 */
export function setRootLogger(logger: Logger | null): void {
  root = logger;
}

/**
 * Normalize metadata so Error instances survive serialization.
 */
function toBindings(meta: LogMeta | undefined): LogMeta {
  if (!meta) {
    return {};
  }
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  // Resolved lazily so setRootLogger applies to loggers created at import time
  const child = (): Logger => getRootLogger().child({ subsystem });

  return {
    debug: (message, meta) => child().debug(toBindings(meta), message),
    info: (message, meta) => child().info(toBindings(meta), message),
    warn: (message, meta) => child().warn(toBindings(meta), message),
    error: (message, meta) => child().error(toBindings(meta), message),
  };
}
