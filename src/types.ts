import type { Dispatcher } from "undici";
import type { ScalarValue, WireValue } from "./values.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/** What a node sends back once parsed. Integers beyond 2^53 arrive as bigint. */
export type JsonValue = null | boolean | number | bigint | string | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** One path piece; an array becomes a comma-joined list ("idx-a,idx-b"). */
export type PathSegment = string | number | readonly string[] | null | undefined;

export type RequestBody =
  | { readonly kind: "json"; readonly value: WireValue }
  | { readonly kind: "ndjson"; readonly lines: readonly WireValue[] };

export type QueryParams = Readonly<Record<string, ScalarValue | undefined>>;

/** A logical operation, independent of which node ends up serving it. */
export interface ClusterRequest {
  readonly method: HttpMethod;
  readonly path: readonly PathSegment[];
  readonly body?: RequestBody;
  readonly query?: QueryParams;
}

/** One physical HTTP round trip as handed to the transport. */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array; // raw; the decoder parses it
}

export interface TransportOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
}

/**
 * Performs exactly one round trip. Must throw `AttemptTimeoutError` when
 * `timeoutMs` elapses and rethrow the caller's abort reason untouched.
 */
export type Transport = (req: TransportRequest, opts: TransportOptions) => Promise<TransportResponse>;

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** How the pool picks when every node is marked dead. */
export type FallbackPolicy = "random" | "longest-dead";

export interface NodePoolOptions {
  revivalDelayMs: number;
  fallback?: FallbackPolicy;
  random?: () => number; // [0, 1)
}

export interface BasicAuth {
  username: string;
  password: string;
}

export interface ClientOptions {
  /** Base URLs, e.g. "http://search-1.internal:9200". */
  nodes: readonly string[];
  timeoutMs?: number;          // per attempt, default 60000
  maxRetries?: number;         // extra attempts after the first, default 0
  revivalDelayMs?: number;     // default 300000
  fallback?: FallbackPolicy;
  auth?: BasicAuth;
  logger?: Logger;

  dispatcher?: Dispatcher;
  transport?: Transport;
  clock?: () => number;
  random?: () => number;
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}
