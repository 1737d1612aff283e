import { stdout } from "node:process";

type Level = "info" | "warn" | "error" | "debug";

export type LogSink = (line: string) => void;

const SEVERITY: Record<Level, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLevel(value: string): value is Level {
  return value in SEVERITY;
}

function thresholdFrom(raw: string | undefined): number {
  const value = raw?.trim().toLowerCase();
  return value && isLevel(value) ? SEVERITY[value] : SEVERITY.info;
}

let sink: LogSink = (line) => {
  stdout.write(line);
};

/** Redirects log lines (each ending in `\n`); returns the sink it replaced. */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

export function log(level: Level, message: string, meta?: Record<string, unknown>) {
  if (SEVERITY[level] > thresholdFrom(process.env.LOG_LEVEL)) {
    return;
  }
  sink(`${JSON.stringify({ level, message, time: new Date().toISOString(), ...meta })}\n`);
}

export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}

export const logger = {
  info: (message: string, meta?: Record<string, unknown>) => log("info", message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log("warn", message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log("error", message, meta),
  debug: (message: string, meta?: Record<string, unknown>) => log("debug", message, meta),
};
