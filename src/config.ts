// src/config.ts
import type { HostComparison } from "./types.js";

export const DEFAULT_MAX_REDIRECTS = 10;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RedirectFollowerConfig {
  maxRedirects: number;
  hostComparison: HostComparison;
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function parseNonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${name} must be an integer >= 0 (got ${JSON.stringify(raw)})`);
  }
  return n;
}

function parseHostComparison(env: Env): HostComparison {
  const raw = env.REDIRECT_HOST_COMPARISON;
  if (raw === undefined || raw === "") return "exact";
  if (raw === "exact" || raw === "normalized") return raw;
  throw new Error(`REDIRECT_HOST_COMPARISON must be "exact" or "normalized" (got ${JSON.stringify(raw)})`);
}

const LEVEL_NAMES: readonly string[] = LOG_LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.includes(value);
}

function parseLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.toLowerCase();
  if (raw === undefined || raw === "") return "warn";
  if (isLogLevel(raw)) return raw;
  throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got ${JSON.stringify(env.LOG_LEVEL)})`);
}

/** Read only LOG_LEVEL; a client's logger needs nothing else from the environment. */
export function loadLogLevel(env: Env = process.env): LogLevel {
  return parseLogLevel(env);
}

/**
 * Read defaults from the environment:
 * REDIRECT_MAX, REDIRECT_HOST_COMPARISON, REDIRECT_REQUEST_TIMEOUT_MS, LOG_LEVEL.
 */
export function loadConfig(env: Env = process.env): RedirectFollowerConfig {
  const requestTimeoutMs = parseNonNegativeInt(env, "REDIRECT_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS);
  if (requestTimeoutMs === 0) {
    throw new Error("REDIRECT_REQUEST_TIMEOUT_MS must be > 0");
  }
  return {
    maxRedirects: parseNonNegativeInt(env, "REDIRECT_MAX", DEFAULT_MAX_REDIRECTS),
    hostComparison: parseHostComparison(env),
    requestTimeoutMs,
    logLevel: loadLogLevel(env),
  };
}
