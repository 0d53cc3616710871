import winston from "winston";
import type { LogLevel } from "./config.js";

export type Logger = Pick<winston.Logger, "error" | "warn" | "info" | "debug">;

/**
 * Console logger for the redirect layer. Level "silent" keeps the logger
 * but drops every entry.
 */
export function createLogger(opts: { level: LogLevel; service?: string }): winston.Logger {
  return winston.createLogger({
    level: opts.level === "silent" ? "error" : opts.level,
    silent: opts.level === "silent",
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      winston.format.json()
    ),
    defaultMeta: { service: opts.service ?? "redirect-follower" },
    transports: [new winston.transports.Console()],
  });
}

export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    return { error: err.message, name: err.name, code };
  }
  return { error: String(err) };
}
