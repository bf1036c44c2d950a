// Structured event log.
//
// Every event lands in an in-memory ring buffer and, unless disabled, is
// appended as one JSON line to the log file. File writes go through a single
// promise chain so lines never interleave; a failed write is reported on
// stderr and never reaches the caller.

import fs from "node:fs/promises";
import path from "node:path";
import { getRuntimeConfigFromEnv } from "./config";

export type TelemetryLevel = "info" | "warn" | "error";

export interface TelemetryEvent {
  ts: string;
  level: TelemetryLevel;
  source: string;
  event: string;
  data?: unknown;
}

const MAX_BUFFER = 500;
const MAX_STRING_LENGTH = 500;
const MAX_ARRAY_ITEMS = 100;
const MAX_DEPTH = 4;
const SECRET_KEY_PATTERN = /token|authorization|api[_-]?key|secret|password/i;

const buffer: TelemetryEvent[] = [];
let writeChain: Promise<void> = Promise.resolve();

export function sanitizeTelemetryData(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) return "[truncated]";
  if (value === null || value === undefined) return value;

  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (typeof value === "string") {
    return value.length > MAX_STRING_LENGTH ? `${value.slice(0, MAX_STRING_LENGTH)}...` : value;
  }
  if (typeof value !== "object") return value;

  if (Buffer.isBuffer(value)) return `[data ${value.length} bytes]`;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.slice(0, MAX_ARRAY_ITEMS).map((item) => sanitizeTelemetryData(item, depth + 1));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    sanitized[key] = SECRET_KEY_PATTERN.test(key)
      ? "[redacted]"
      : sanitizeTelemetryData(entry, depth + 1);
  }
  return sanitized;
}

export function listTelemetry(limit = 100): TelemetryEvent[] {
  if (limit <= 0) return [];
  return buffer.slice(-limit);
}

export function clearTelemetry(): void {
  buffer.splice(0);
}

function writeLine(logPath: string, line: string): Promise<void> {
  writeChain = writeChain
    .then(async () => {
      await fs.mkdir(path.dirname(logPath), { recursive: true });
      await fs.appendFile(logPath, line, "utf8");
    })
    .catch((error: unknown) => {
      console.error("[telemetry] Failed to write log file:", error);
    });
  return writeChain;
}

export async function appendTelemetry(
  input: Omit<TelemetryEvent, "ts"> & { ts?: string }
): Promise<void> {
  const entry: TelemetryEvent = {
    ts: input.ts ?? new Date().toISOString(),
    level: input.level,
    source: input.source,
    event: input.event,
    data: sanitizeTelemetryData(input.data),
  };

  buffer.push(entry);
  if (buffer.length > MAX_BUFFER) {
    buffer.splice(0, buffer.length - MAX_BUFFER);
  }

  const { telemetryLogPath } = getRuntimeConfigFromEnv();
  if (!telemetryLogPath) return;
  await writeLine(telemetryLogPath, `${JSON.stringify(entry)}\n`);
}
