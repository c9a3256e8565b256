// src/errors.ts
import { inspect } from "node:util";
import type { JsonValue } from "./types.js";

/** Root of every error this package throws. */
export class ClusterClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A single attempt ran past its deadline. Thrown by the transport and
 * consumed by the executor; callers see {@link RequestTimeoutError} instead.
 */
export class AttemptTimeoutError extends ClusterClientError {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
  }
}

/**
 * No attempt reached a node within the retry budget.
 * `cause` is the last underlying transport error.
 */
export class TransportFailureError extends ClusterClientError {
  constructor(
    message: string,
    public readonly nodesTried: readonly string[],
    cause: unknown
  ) {
    super(message, { cause });
  }
}

export class ConnectionFailedError extends TransportFailureError {
  constructor(nodesTried: readonly string[], cause: unknown) {
    super(`Could not reach any node after ${nodesTried.length} attempt(s): ${nodesTried.join(", ")}`, nodesTried, cause);
  }
}

export class RequestTimeoutError extends TransportFailureError {
  constructor(
    public readonly timeoutMs: number,
    nodesTried: readonly string[],
    cause: unknown
  ) {
    super(`Request timed out after ${nodesTried.length} attempt(s) of ${timeoutMs}ms: ${nodesTried.join(", ")}`, nodesTried, cause);
  }
}

/** The caller's AbortSignal fired. Never retried. */
export class RequestCancelledError extends ClusterClientError {
  constructor(
    public readonly node: string,
    cause: unknown
  ) {
    super(`Request to ${node} was cancelled`, { cause });
  }
}

/** A node answered with a status >= 400 and a JSON body. */
export class HttpError extends ClusterClientError {
  constructor(
    public readonly status: number,
    public readonly body: JsonValue,
    public readonly node: string
  ) {
    super(`Non-OK response returned (${status}): ${inspect(errorOf(body), { depth: 3, breakLength: Infinity })}`);
  }

  /** The `error` member of the body when present, else the whole body. */
  get error(): JsonValue {
    return errorOf(this.body);
  }
}

export class NotFoundError extends HttpError {}

export class AlreadyExistsError extends HttpError {}

/** A body that should have been JSON was not. */
export class MalformedResponseError extends ClusterClientError {
  constructor(
    public readonly status: number,
    public readonly raw: Uint8Array,
    public readonly node: string,
    cause?: unknown
  ) {
    super(`Invalid JSON returned from ${node} (status ${status}): ${inspect(preview(raw))}`, { cause });
  }

  get text(): string {
    return new TextDecoder().decode(this.raw);
  }
}

/** A value has no wire representation. Always a caller bug. */
export class EncodingError extends ClusterClientError {
  constructor(
    public readonly value: unknown,
    reason: string
  ) {
    super(`${reason}: ${inspect(value, { depth: 1, breakLength: Infinity })}`);
  }
}

export class ReservedQueryParamError extends ClusterClientError {
  constructor(public readonly param: string) {
    super(`Extra query parameter "${param}" collides with a recognized option of the same name`);
  }
}

/** One or more actions in a bulk request failed. */
export class BulkError extends ClusterClientError {
  constructor(
    public readonly errors: readonly JsonValue[],
    public readonly successes: readonly JsonValue[]
  ) {
    super(`${errors.length} of ${errors.length + successes.length} bulk actions failed.`);
  }
}

function errorOf(body: JsonValue): JsonValue {
  if (body !== null && typeof body === "object" && !Array.isArray(body) && body.error !== undefined) {
    return body.error;
  }
  return body;
}

function preview(raw: Uint8Array): string {
  const text = new TextDecoder().decode(raw.subarray(0, 200));
  return raw.length > 200 ? `${text}...` : text;
}
