// src/executor.ts
import { EventEmitter } from "node:events";
import { resolveClientOptions } from "./config.js";
import type { ResolvedClientOptions } from "./config.js";
import { decodeResponse } from "./decoder.js";
import {
  AttemptTimeoutError,
  ConnectionFailedError,
  RequestCancelledError,
  RequestTimeoutError,
} from "./errors.js";
import type { AttemptEvent, AttemptResultEvent, NodeStateEvent, RequestFailureEvent } from "./events.js";
import { doHttpRequest, isNetworkFailure } from "./http.js";
import { NodePool } from "./pool.js";
import { buildUrl } from "./query.js";
import { encodeBody } from "./serializer.js";
import type { ExecutorSnapshot } from "./snapshot.js";
import type {
  CallOptions,
  ClientOptions,
  ClusterRequest,
  JsonValue,
  Logger,
  RequestBody,
  Transport,
  TransportRequest,
  TransportResponse,
} from "./types.js";

function genRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

function encodeRequestBody(body: RequestBody | undefined): { payload?: string; contentType?: string } {
  if (!body) return {};
  if (body.kind === "json") return { payload: encodeBody(body.value), contentType: "application/json" };
  // bulk endpoints want one JSON document per line and a trailing newline
  return {
    payload: body.lines.map((line) => `${encodeBody(line)}\n`).join(""),
    contentType: "application/x-ndjson",
  };
}

function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
}

function curlEquivalent(req: TransportRequest): string {
  const data = req.body === undefined ? "" : ` -d '${req.body.replace(/'/g, "'\\''")}'`;
  return `curl -X${req.method} '${req.url}'${data}`;
}

/**
 * Runs logical operations against a pool of interchangeable nodes.
 *
 * Each operation makes up to maxRetries + 1 sequential attempts. Only
 * network failures (refused or reset connections and attempt timeouts; see
 * isNetworkFailure) mark a node dead and move on to another node. An answer
 * from a node, good or bad, ends the operation, and so does any other error
 * the transport throws. There is no backoff between attempts.
 *
 * Events: attempt:start, attempt:success, attempt:failure, node:dead,
 * node:live, request:failure.
 */
export class RequestExecutor extends EventEmitter {
  private readonly pool: NodePool;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly opts: ResolvedClientOptions;
  private readonly authorization?: string;
  private inFlight = 0;

  constructor(options: ClientOptions) {
    super();
    this.opts = resolveClientOptions(options);

    this.pool = new NodePool(this.opts.nodes, {
      revivalDelayMs: this.opts.revivalDelayMs,
      fallback: this.opts.fallback,
      random: this.opts.random,
    });
    this.transport = this.opts.transport ?? doHttpRequest;
    this.logger = this.opts.logger;
    this.clock = this.opts.clock;
    if (this.opts.auth) this.authorization = basicAuthHeader(this.opts.auth.username, this.opts.auth.password);
  }

  get nodePool(): NodePool {
    return this.pool;
  }

  async execute(request: ClusterRequest, call: CallOptions = {}): Promise<JsonValue> {
    const timeoutMs = call.timeoutMs ?? this.opts.timeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) throw new Error(`timeoutMs must be > 0 (got ${timeoutMs})`);

    // Encoding errors are caller bugs; raise them before touching any node.
    const { payload, contentType } = encodeRequestBody(request.body);
    const headers: Record<string, string> = { accept: "application/json" };
    if (contentType) headers["content-type"] = contentType;
    if (this.authorization) headers.authorization = this.authorization;

    const requestId = genRequestId();
    const maxAttempts = this.opts.maxRetries + 1;
    const nodesTried: string[] = [];

    this.inFlight += 1;
    try {
      for (let attempt = 1; ; attempt++) {
        const { url: node, fromFallback } = this.pool.select(this.clock());
        const req: TransportRequest = {
          method: request.method,
          url: buildUrl(node, request.path, request.query),
          headers,
          body: payload,
        };
        const base: AttemptEvent = { request, requestId, node, attempt, fromFallback };

        this.logger.debug(`Making a request equivalent to this: ${curlEquivalent(req)}`, { requestId, attempt });
        this.emit("attempt:start", base);
        const start = this.clock();
        nodesTried.push(node);

        let res: TransportResponse;
        try {
          res = await this.transport(req, { timeoutMs, signal: call.signal, dispatcher: this.opts.dispatcher });
        } catch (err) {
          const failed: AttemptResultEvent = { ...base, durationMs: this.clock() - start, error: err };
          this.emit("attempt:failure", failed);

          if (call.signal?.aborted) {
            throw new RequestCancelledError(node, err);
          }
          // not a network failure: a transport bug or a rejected request, surfaced as is
          if (!isNetworkFailure(err)) throw err;

          this.markDead(node, requestId);

          if (attempt >= maxAttempts) {
            throw err instanceof AttemptTimeoutError
              ? new RequestTimeoutError(timeoutMs, nodesTried, err)
              : new ConnectionFailedError(nodesTried, err);
          }
          continue;
        }

        this.logger.debug(`response status: ${res.status}`, { requestId, node });
        const result: AttemptResultEvent = { ...base, durationMs: this.clock() - start, status: res.status };

        let value: JsonValue;
        try {
          value = decodeResponse(res, node, request.method);
        } catch (err) {
          this.emit("attempt:failure", { ...result, error: err });
          throw err;
        }

        if (this.pool.markLive(node)) {
          const live: NodeStateEvent = { node, requestId };
          this.logger.info(`${node} is answering again and was marked live`, { requestId });
          this.emit("node:live", live);
        }
        this.emit("attempt:success", result);
        this.logger.debug("got response", { requestId, node, body: value });
        return value;
      }
    } catch (err) {
      const failure: RequestFailureEvent = { request, requestId, attempts: nodesTried.length, error: err };
      this.emit("request:failure", failure);
      throw err;
    } finally {
      this.inFlight -= 1;
    }
  }

  snapshot(): ExecutorSnapshot {
    return { inFlight: this.inFlight, nodes: this.pool.snapshot(this.clock()) };
  }

  private markDead(node: string, requestId: string): void {
    const now = this.clock();
    if (!this.pool.markDead(node, now)) return;

    this.logger.info(`${node} marked as dead for ${this.opts.revivalDelayMs}ms.`, { requestId });
    const dead: NodeStateEvent = { node, requestId, deadSinceMs: now };
    this.emit("node:dead", dead);
  }
}
