// src/decoder.ts
import { isInteger, isSafeNumber, parse } from "lossless-json";
import { AlreadyExistsError, HttpError, MalformedResponseError, NotFoundError } from "./errors.js";
import type { HttpMethod, JsonValue, TransportResponse } from "./types.js";

const ALREADY_EXISTS = /already_?exists/i;
const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?$/;

// Integers past 2^53 (64-bit ids, versions) stay exact as bigint.
function parseNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : Number(text);
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null) return null;
  if (typeof value === "boolean" || typeof value === "number" || typeof value === "string") return value;
  if (typeof value === "bigint") return value;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([k, v]): [string, JsonValue] => [k, toJsonValue(v)]));
  }
  throw new TypeError(`Unexpected ${typeof value} in parsed JSON`);
}

function parseJson(res: TransportResponse, node: string): JsonValue {
  const text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false });
  try {
    return toJsonValue(parse(text.decode(res.body), null, parseNumber));
  } catch (err) {
    throw new MalformedResponseError(res.status, res.body, node, err);
  }
}

function errorText(body: JsonValue): string {
  if (body === null || typeof body !== "object" || Array.isArray(body)) return "";
  const error = body.error;
  if (typeof error === "string") return error;
  if (error !== null && typeof error === "object" && !Array.isArray(error)) {
    return typeof error.type === "string" ? error.type : "";
  }
  return "";
}

/**
 * Turn one HTTP response into a decoded value or exactly one typed error.
 *
 * A body that is not JSON wins over the status: a 500 with an HTML page is a
 * MalformedResponseError, not an HttpError, so callers never have to guess
 * whether `body` was parsed. HEAD responses carry no body and decode to null.
 */
export function decodeResponse(res: TransportResponse, node: string, method?: HttpMethod): JsonValue {
  const body = method === "HEAD" && res.body.length === 0 ? null : parseJson(res, node);

  if (res.status >= 200 && res.status < 300) return body;

  if (res.status === 404) throw new NotFoundError(res.status, body, node);
  if (ALREADY_EXISTS.test(errorText(body))) throw new AlreadyExistsError(res.status, body, node);
  throw new HttpError(res.status, body, node);
}

export type RevivedValue = null | boolean | number | bigint | string | Date | RevivedValue[] | { [key: string]: RevivedValue };

/**
 * Rebuild Date values from the "YYYY-MM-DDTHH:MM:SS" strings the serializer
 * writes. Times without a zone are read as UTC, matching isoDateTime.
 */
export function reviveDates(value: JsonValue): RevivedValue {
  if (typeof value === "string") {
    const m = DATETIME_RE.exec(value);
    if (!m) return value;
    const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
    // setUTCFullYear keeps years 0..99 literal, where Date.UTC would add 1900
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, 0);
    const roundTrips =
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day &&
      date.getUTCHours() === hour &&
      date.getUTCMinutes() === minute &&
      date.getUTCSeconds() === second;
    return roundTrips ? date : value;
  }
  if (Array.isArray(value)) return value.map(reviveDates);
  if (value !== null && typeof value === "object") {
    const out: { [key: string]: RevivedValue } = {};
    for (const [k, v] of Object.entries(value)) out[k] = reviveDates(v);
    return out;
  }
  return value;
}
