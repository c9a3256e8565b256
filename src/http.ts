// src/http.ts
import { errors, request as undiciRequest } from "undici";
import type { Dispatcher } from "undici";
import { AttemptTimeoutError } from "./errors.js";
import type { TransportOptions, TransportRequest, TransportResponse } from "./types.js";

// Socket-level failures that say nothing about the request itself.
const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * True when `err` means the node could not be reached or stopped answering
 * mid-exchange. Anything else thrown by a transport is a bug or a bad
 * request and must not count against the node.
 */
export function isNetworkFailure(err: unknown): boolean {
  for (let cur = err, depth = 0; depth < 4; depth++) {
    if (cur instanceof AttemptTimeoutError) return true;
    if (
      cur instanceof errors.ConnectTimeoutError ||
      cur instanceof errors.SocketError ||
      cur instanceof errors.HeadersTimeoutError ||
      cur instanceof errors.BodyTimeoutError
    ) {
      return true;
    }
    if (typeof cur !== "object" || cur === null) return false;
    if ("code" in cur && typeof cur.code === "string" && NETWORK_ERROR_CODES.has(cur.code)) return true;
    if (!("cause" in cur)) return false;
    cur = cur.cause;
  }
  return false;
}

function normalizeHeaders(headers: Dispatcher.ResponseData["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (Array.isArray(v)) out[k.toLowerCase()] = v.join(", ");
    else if (typeof v === "string") out[k.toLowerCase()] = v;
  }
  return out;
}

/**
 * Execute a single HTTP request with a hard timeout using AbortController.
 * No retries. No node selection. Just raw outbound I/O with a timeout.
 *
 * The body is always read to the end so the connection goes back to the
 * dispatcher's pool before the caller moves on to another node.
 */
export async function doHttpRequest(req: TransportRequest, opts: TransportOptions): Promise<TransportResponse> {
  const ac = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    ac.abort(new AttemptTimeoutError(opts.timeoutMs));
  }, opts.timeoutMs);

  const caller = opts.signal;
  const onCallerAbort = (): void => ac.abort(caller?.reason);
  if (caller?.aborted) onCallerAbort();
  else caller?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const res = await undiciRequest(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: ac.signal,
      dispatcher: opts.dispatcher,
    });

    const body = await res.body.arrayBuffer();
    return {
      status: res.statusCode,
      headers: normalizeHeaders(res.headers),
      body: new Uint8Array(body),
    };
  } catch (err) {
    if (timedOut) throw new AttemptTimeoutError(opts.timeoutMs);
    if (caller?.aborted) throw caller.reason;
    throw err;
  } finally {
    clearTimeout(timer);
    caller?.removeEventListener("abort", onCallerAbort);
  }
}
