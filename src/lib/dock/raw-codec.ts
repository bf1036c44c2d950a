// Raw dock record values
//
// Dock preference records are property-list values: besides strings, numbers
// and nested dicts/arrays they carry binary payloads (aliases, bookmarks) and
// dates. Nothing here interprets them; values are normalized on the way in
// and encoded for JSON persistence with tagged wrappers:
//   Buffer -> { "$data": base64 }     Date -> { "$date": iso }
//   non-finite number -> { "$real": "NaN" | "Infinity" | "-Infinity" }
//   dict with a "$"-prefixed key -> { "$dict": { ...entries } }

import type { DockRecord, DockRecordValue } from "@/types";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isDockRecord(value: unknown): value is DockRecord {
  return isPlainObject(value);
}

/** Normalizes a parsed property-list value; returns undefined for anything unrepresentable. */
export function toDockRecordValue(value: unknown): DockRecordValue | undefined {
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Date) return new Date(value.getTime());
  if (Buffer.isBuffer(value)) return Buffer.from(value);
  if (value instanceof Uint8Array) return Buffer.from(value);
  if (Array.isArray(value)) {
    const items: DockRecordValue[] = [];
    for (const item of value) {
      const normalized = toDockRecordValue(item);
      if (normalized !== undefined) items.push(normalized);
    }
    return items;
  }
  if (isPlainObject(value)) {
    return toDockRecord(value);
  }
  return undefined;
}

export function toDockRecord(value: Record<string, unknown>): DockRecord {
  const record: DockRecord = {};
  for (const [key, entry] of Object.entries(value)) {
    const normalized = toDockRecordValue(entry);
    if (normalized !== undefined) record[key] = normalized;
  }
  return record;
}

export function cloneDockRecord(record: DockRecord): DockRecord {
  return toDockRecord(record);
}

function encodeRecordEntries(record: DockRecord): { [key: string]: JsonValue } {
  const encoded: { [key: string]: JsonValue } = {};
  for (const [key, entry] of Object.entries(record)) {
    encoded[key] = encodeDockRecordValue(entry);
  }
  return encoded;
}

export function encodeDockRecordValue(value: DockRecordValue): JsonValue {
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : { $real: String(value) };
  }
  if (value instanceof Date) return { $date: value.toISOString() };
  if (Buffer.isBuffer(value)) return { $data: value.toString("base64") };
  if (Array.isArray(value)) return value.map(encodeDockRecordValue);

  const entries = encodeRecordEntries(value);
  return Object.keys(value).some((key) => key.startsWith("$")) ? { $dict: entries } : entries;
}

function decodeRecordEntries(value: Record<string, unknown>): DockRecord {
  const record: DockRecord = {};
  for (const [key, entry] of Object.entries(value)) {
    const decoded = decodeDockRecordValue(entry);
    if (decoded !== undefined) record[key] = decoded;
  }
  return record;
}

export function decodeDockRecordValue(value: unknown): DockRecordValue | undefined {
  if (typeof value === "string" || typeof value === "boolean" || typeof value === "number") {
    return value;
  }
  if (Array.isArray(value)) {
    const items: DockRecordValue[] = [];
    for (const item of value) {
      const decoded = decodeDockRecordValue(item);
      if (decoded !== undefined) items.push(decoded);
    }
    return items;
  }
  if (!isPlainObject(value)) return undefined;

  const keys = Object.keys(value);
  if (keys.length === 1) {
    const tagged = value[keys[0]];
    switch (keys[0]) {
      case "$data":
        if (typeof tagged === "string") return Buffer.from(tagged, "base64");
        break;
      case "$date":
        if (typeof tagged === "string") {
          const date = new Date(tagged);
          if (!Number.isNaN(date.getTime())) return date;
        }
        break;
      case "$real":
        if (typeof tagged === "string") return Number(tagged);
        break;
      case "$dict":
        if (isPlainObject(tagged)) return decodeRecordEntries(tagged);
        break;
    }
  }
  return decodeRecordEntries(value);
}

export function decodeDockRecord(value: unknown): DockRecord | undefined {
  const decoded = decodeDockRecordValue(value);
  return isDockRecord(decoded) ? decoded : undefined;
}
