// src/pool.ts
import type { FallbackPolicy, NodePoolOptions } from "./types.js";
import type { NodeSnapshot } from "./snapshot.js";

export interface NodeSelection {
  url: string;
  fromFallback: boolean; // true when every node was dead and the pool loosened its policy
}

/**
 * Process-local pool of interchangeable nodes with lazy dead-node tracking.
 * - select: uniform among nodes not marked dead; if all are dead, fall back to the whole set.
 * - markDead: records the first failure time; later failures do not push revival further out.
 * - A dead record older than revivalDelayMs is evicted on the next read; no timer runs.
 *
 * Every method is synchronous, so a call observes and mutates the dead map in one
 * turn of the event loop; concurrent callers cannot interleave inside it.
 */
export class NodePool {
  private readonly nodes: readonly string[];
  private readonly dead = new Map<string, number>(); // url -> deadSinceMs
  private readonly revivalDelayMs: number;
  private readonly fallback: FallbackPolicy;
  private readonly random: () => number;

  constructor(urls: readonly string[], opts: NodePoolOptions) {
    if (!Number.isFinite(opts.revivalDelayMs) || opts.revivalDelayMs < 0) {
      throw new Error(`revivalDelayMs must be >= 0 (got ${opts.revivalDelayMs})`);
    }
    const nodes = Array.from(new Set(urls.map(normalizeNodeUrl)));
    if (nodes.length === 0) throw new Error("at least one node URL is required");

    this.nodes = nodes;
    this.revivalDelayMs = opts.revivalDelayMs;
    this.fallback = opts.fallback ?? "random";
    this.random = opts.random ?? Math.random;
  }

  get size(): number {
    return this.nodes.length;
  }

  urls(): readonly string[] {
    return this.nodes;
  }

  select(nowMs: number = Date.now()): NodeSelection {
    this.revive(nowMs);

    const live = this.nodes.filter((url) => !this.dead.has(url));
    if (live.length > 0) {
      return { url: this.pick(live), fromFallback: false };
    }

    if (this.fallback === "longest-dead") {
      let oldest = this.nodes[0];
      let oldestSince = Infinity;
      for (const url of this.nodes) {
        const since = this.dead.get(url) ?? Infinity;
        if (since < oldestSince) {
          oldest = url;
          oldestSince = since;
        }
      }
      return { url: oldest, fromFallback: true };
    }

    return { url: this.pick(this.nodes), fromFallback: true };
  }

  /** Returns true if the node went from live to dead. */
  markDead(url: string, nowMs: number = Date.now()): boolean {
    const key = this.known(url);
    this.revive(nowMs);
    if (this.dead.has(key)) return false;
    this.dead.set(key, nowMs);
    return true;
  }

  /** Returns true if the node was dead. */
  markLive(url: string): boolean {
    return this.dead.delete(this.known(url));
  }

  isDead(url: string, nowMs: number = Date.now()): boolean {
    const key = this.known(url);
    this.revive(nowMs);
    return this.dead.has(key);
  }

  deadSince(url: string): number | undefined {
    return this.dead.get(this.known(url));
  }

  snapshot(nowMs: number = Date.now()): NodeSnapshot[] {
    this.revive(nowMs);
    return this.nodes.map((url) => {
      const deadSinceMs = this.dead.get(url);
      return deadSinceMs === undefined ? { url, dead: false } : { url, dead: true, deadSinceMs };
    });
  }

  private revive(nowMs: number): void {
    for (const [url, since] of this.dead) {
      if (nowMs - since >= this.revivalDelayMs) this.dead.delete(url);
    }
  }

  private pick(candidates: readonly string[]): string {
    const i = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
    return candidates[i];
  }

  private known(url: string): string {
    const key = normalizeNodeUrl(url);
    if (!this.nodes.includes(key)) throw new Error(`unknown node: ${url}`);
    return key;
  }
}

/** Node identity: the base URL without trailing slashes. */
export function normalizeNodeUrl(url: string): string {
  return url.replace(/\/+$/, "");
}
