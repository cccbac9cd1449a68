import { createHash } from "crypto";
import { SerializationError } from "./errors";
import type { SessionRecord } from "../models/record.model";

type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Transport fields added by the logging pipeline. They describe how the
 * record travelled, not what happened in the session.
 */
export function isLegacyField(name: string): boolean {
  return name.startsWith("log_") || name === "time" || name === "system";
}

export function stripLegacyFields(record: SessionRecord): SessionRecord {
  const stripped: SessionRecord = { eventid: record.eventid };
  for (const [name, value] of Object.entries(record)) {
    if (!isLegacyField(name)) {
      stripped[name] = value;
    }
  }
  return stripped;
}

function canonicalize(
  value: unknown,
  path: string,
  ancestors: object[],
): JsonValue | undefined {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new SerializationError(path, `non-finite number ${value}`);
      }
      return value;
    case "undefined":
      return undefined;
    case "bigint":
    case "function":
    case "symbol":
      throw new SerializationError(path, `unsupported type ${typeof value}`);
  }

  if (value === null) return null;

  if (ancestors.includes(value)) {
    throw new SerializationError(path, "circular reference");
  }

  if ("toJSON" in value && typeof value.toJSON === "function") {
    return canonicalize(value.toJSON(), path, [...ancestors, value]);
  }

  const nested = [...ancestors, value];

  if (Array.isArray(value)) {
    return value.map((item, index) => {
      const result = canonicalize(item, `${path}[${index}]`, nested);
      return result === undefined ? null : result;
    });
  }

  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const result: { [key: string]: JsonValue } = {};
  for (const [key, item] of entries) {
    const canonical = canonicalize(item, `${path}.${key}`, nested);
    if (canonical !== undefined) {
      result[key] = canonical;
    }
  }
  return result;
}

/**
 * Compact JSON with object keys sorted at every depth, so equal records
 * always produce identical bytes.
 */
export function canonicalJson(value: unknown): string {
  const canonical = canonicalize(value, "$", []);
  if (canonical === undefined) {
    throw new SerializationError("$", "value has no JSON representation");
  }
  return JSON.stringify(canonical);
}

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export interface SerializedEvent {
  /** Staged file contents: the stripped record plus a trailing newline. */
  body: string;
  /** Hash of the full record, legacy fields included. */
  contentSha256: string;
}

export function serializeEvent(record: SessionRecord): SerializedEvent {
  const body = `${canonicalJson(stripLegacyFields(record))}\n`;
  const contentSha256 = sha256Hex(canonicalJson(record));
  return { body, contentSha256 };
}
