// src/serializer.ts
import { EncodingError } from "./errors.js";
import { CalendarDate, Decimal } from "./values.js";
import type { ScalarValue, WireObject, WireValue } from "./values.js";

/**
 * ISO-8601 to the second with no zone suffix. Dates are read in UTC, so
 * `new Date("2001-12-25T08:30:00Z")` becomes "2001-12-25T08:30:00".
 */
export function isoDateTime(value: Date | CalendarDate): string {
  if (value instanceof CalendarDate) return `${value.toString()}T00:00:00`;
  if (Number.isNaN(value.getTime())) throw new EncodingError(value, "Invalid Date has no wire representation");
  // toISOString switches to a six-digit signed year outside this range
  const year = value.getUTCFullYear();
  if (year < 1 || year > 9999) throw new EncodingError(value, "Date year must be 1..9999");
  return value.toISOString().slice(0, 19);
}

/** Encode a request body as JSON text. Throws EncodingError on anything outside WireValue. */
export function encodeBody(value: WireValue): string {
  return writeJson(value, new Set());
}

/**
 * Checks at run time that `value` is a WireValue, for input that did not
 * come through the type checker.
 */
export function assertWireValue(value: unknown): asserts value is WireValue {
  writeJson(value, new Set());
}

/** Text form used for query-string parameters. */
export function encodeScalar(value: ScalarValue): string {
  return scalarText(value);
}

export function assertScalarValue(value: unknown): asserts value is ScalarValue {
  scalarText(value);
}

function writeJson(value: unknown, seen: Set<object>): string {
  if (value === null) return "null";
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new EncodingError(value, "Non-finite number has no JSON representation");
    return JSON.stringify(value);
  }
  if (typeof value !== "object" || value === null) throw new EncodingError(value, "Unsupported type for JSON encoding");

  if (value instanceof Date || value instanceof CalendarDate) return JSON.stringify(isoDateTime(value));
  if (value instanceof Decimal) return value.toString();

  if (seen.has(value)) throw new EncodingError(value, "Circular structure cannot be encoded");
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const items: string[] = [];
      // indexed so holes in sparse arrays reach writeItem as undefined
      for (let i = 0; i < value.length; i++) items.push(writeItem(value[i], seen));
      return `[${items.join(",")}]`;
    }
    if (value instanceof Set) {
      return `[${Array.from(value, (item: unknown) => writeItem(item, seen)).join(",")}]`;
    }
    if (isPlainObject(value)) {
      const members: string[] = [];
      for (const [key, member] of Object.entries(value)) {
        if (member === undefined) continue;
        members.push(`${JSON.stringify(key)}:${writeJson(member, seen)}`);
      }
      return `{${members.join(",")}}`;
    }
  } finally {
    seen.delete(value);
  }

  throw new EncodingError(value, "Unsupported type for JSON encoding");
}

// Sequence members may not be undefined: JSON.stringify would silently write null.
function writeItem(item: unknown, seen: Set<object>): string {
  if (item === undefined) throw new EncodingError(item, "undefined inside a sequence has no JSON representation");
  return writeJson(item, seen);
}

function isPlainObject(value: object): value is WireObject {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function scalarText(value: unknown): string {
  switch (typeof value) {
    case "string":
      return value;
    case "boolean":
      return value ? "true" : "false";
    case "number":
      if (!Number.isFinite(value)) throw new EncodingError(value, "Cannot represent value in a query string");
      return String(value);
    case "bigint":
      return value.toString();
  }

  if (Array.isArray(value)) {
    const parts: string[] = [];
    for (let i = 0; i < value.length; i++) parts.push(scalarText(value[i]));
    return parts.join(",");
  }
  if (value instanceof Date || value instanceof CalendarDate) return isoDateTime(value);
  if (value instanceof Decimal) return value.toString();

  throw new EncodingError(value, "Cannot represent value in a query string");
}
