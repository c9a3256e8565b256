// src/query.ts
import { ReservedQueryParamError } from "./errors.js";
import { encodeScalar } from "./serializer.js";
import type { PathSegment, QueryParams } from "./types.js";
import type { ScalarValue } from "./values.js";

/**
 * Join path segments into "/a/b/c", skipping empty ones. Each piece is
 * percent-escaped; list segments keep their separating commas literal.
 */
export function buildPath(segments: readonly PathSegment[]): string {
  const parts: string[] = [];
  for (const seg of segments) {
    if (seg === null || seg === undefined) continue;
    const piece =
      typeof seg === "string" || typeof seg === "number"
        ? encodeURIComponent(String(seg))
        : seg.filter((s) => s !== "").map(encodeURIComponent).join(",");
    if (piece !== "") parts.push(piece);
  }
  return `/${parts.join("/")}`;
}

/** "a=1&b=x%2Cy", or "" when nothing is set. Undefined values are skipped. */
export function buildQueryString(query: QueryParams | undefined): string {
  if (!query) return "";
  const params = new URLSearchParams();
  for (const [name, value] of Object.entries(query)) {
    if (value === undefined) continue;
    params.append(name, encodeScalar(value));
  }
  return params.toString();
}

export function buildUrl(node: string, path: readonly PathSegment[], query?: QueryParams): string {
  const qs = buildQueryString(query);
  return `${node}${buildPath(path)}${qs ? `?${qs}` : ""}`;
}

/**
 * Merge the query options an endpoint recognizes with caller-supplied extras.
 *
 * `recognized` lists the option names the endpoint forwards to the query
 * string; options outside it are ignored here because the endpoint consumes
 * them itself. Extras are forwarded verbatim so new server parameters can
 * be used before the client knows about them, but an extra may not reuse a
 * recognized name.
 */
export function buildQueryParams<K extends string>(
  recognized: readonly K[],
  options: Partial<Record<K, ScalarValue | undefined>> | undefined,
  extra?: QueryParams
): Record<string, ScalarValue> {
  const out: Record<string, ScalarValue> = {};
  const reserved: readonly string[] = recognized;

  if (extra) {
    for (const [name, value] of Object.entries(extra)) {
      if (reserved.includes(name)) throw new ReservedQueryParamError(name);
      if (value !== undefined) out[name] = value;
    }
  }

  if (options) {
    for (const name of recognized) {
      const value = options[name];
      if (value !== undefined) out[name] = value;
    }
  }

  return out;
}
