// src/config.ts
import type { ClientOptions, FallbackPolicy, Logger } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_RETRIES = 0;
export const DEFAULT_REVIVAL_DELAY_MS = 300_000;

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type ResolvedClientOptions = Required<
  Pick<ClientOptions, "nodes" | "timeoutMs" | "maxRetries" | "revivalDelayMs" | "fallback" | "logger" | "clock">
> &
  Omit<ClientOptions, "nodes" | "timeoutMs" | "maxRetries" | "revivalDelayMs" | "fallback" | "logger" | "clock">;

/** Fill defaults and reject bad settings with a message naming the option. */
export function resolveClientOptions(opts: ClientOptions): ResolvedClientOptions {
  if (opts.nodes.length === 0) throw new Error("nodes must contain at least one URL");
  for (const node of opts.nodes) {
    let parsed: URL;
    try {
      parsed = new URL(node);
    } catch (err) {
      throw new Error(`nodes contains an invalid URL (got ${JSON.stringify(node)})`, { cause: err });
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new Error(`nodes must use http or https (got ${JSON.stringify(node)})`);
    }
    if (parsed.search || parsed.hash) {
      throw new Error(`nodes must not carry a query or fragment (got ${JSON.stringify(node)})`);
    }
  }

  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) throw new Error(`timeoutMs must be > 0 (got ${timeoutMs})`);

  const maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new Error(`maxRetries must be an integer >= 0 (got ${maxRetries})`);
  }

  const revivalDelayMs = opts.revivalDelayMs ?? DEFAULT_REVIVAL_DELAY_MS;
  if (!Number.isFinite(revivalDelayMs) || revivalDelayMs < 0) {
    throw new Error(`revivalDelayMs must be >= 0 (got ${revivalDelayMs})`);
  }

  const fallback: FallbackPolicy = opts.fallback ?? "random";
  if (fallback !== "random" && fallback !== "longest-dead") {
    throw new Error(`fallback must be "random" or "longest-dead" (got ${String(fallback)})`);
  }

  if (opts.auth && opts.auth.username.includes(":")) {
    throw new Error("auth.username must not contain ':'");
  }

  return {
    ...opts,
    timeoutMs,
    maxRetries,
    revivalDelayMs,
    fallback,
    logger: opts.logger ?? noopLogger,
    clock: opts.clock ?? Date.now,
  };
}

function numberFrom(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  if (Number.isNaN(n)) throw new Error(`${name} must be a number (got ${JSON.stringify(raw)})`);
  return n;
}

/**
 * Read client options from the environment:
 * SEARCH_NODES (comma separated), SEARCH_TIMEOUT_MS, SEARCH_MAX_RETRIES,
 * SEARCH_REVIVAL_DELAY_MS, SEARCH_FALLBACK, SEARCH_USERNAME, SEARCH_PASSWORD.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  const nodes = (env.SEARCH_NODES ?? "http://127.0.0.1:9200")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");

  const opts: ClientOptions = {
    nodes,
    timeoutMs: numberFrom(env, "SEARCH_TIMEOUT_MS"),
    maxRetries: numberFrom(env, "SEARCH_MAX_RETRIES"),
    revivalDelayMs: numberFrom(env, "SEARCH_REVIVAL_DELAY_MS"),
  };

  const fallback = env.SEARCH_FALLBACK;
  if (fallback === "random" || fallback === "longest-dead") opts.fallback = fallback;
  else if (fallback !== undefined && fallback !== "") {
    throw new Error(`SEARCH_FALLBACK must be "random" or "longest-dead" (got ${JSON.stringify(fallback)})`);
  }

  if (env.SEARCH_USERNAME) {
    opts.auth = { username: env.SEARCH_USERNAME, password: env.SEARCH_PASSWORD ?? "" };
  }

  return opts;
}
