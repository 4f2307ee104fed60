/**
 * Structured logging with redaction and run correlation.
 *
 * Redaction policy:
 * - INFO never logs email bodies or credentials
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";
import { getCurrentContext } from "../core/correlation.js";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "mail-triage",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "apiKey",
        "api_key",
        "token",
        "body",
        "emailBody",
        "*.apiKey",
        "*.api_key",
        "*.body",
        "*.emailBody",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getCurrentContext();
      if (ctx) {
        return {
          runId: ctx.runId,
          ...(ctx.command ? { command: ctx.command } : {}),
        };
      }
      return {};
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });

  return logger;
}

export type Logger = pino.Logger;
