/**
 * Structured logging and tracing integration.
 *
 * Provides a compact console logger for the CLI, log level parsing, and a
 * span helper for tracing hot paths.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

/** Render one log line as `[HH:MM:SS.mmm] LEVEL message`. */
export function formatLogLine(date: Date, level: LogLevel.LogLevel, message: unknown): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  return `[${ts}] ${lvl} ${msg}`;
}

// Logs go to stderr so command output on stdout stays pipeable.
export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  console.error(formatLogLine(date, logLevel, message));
});

/** Replace the default logger and set the minimum level in one layer. */
export function loggingLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}
