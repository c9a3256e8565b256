// demo/loadgen.ts
import { SearchClient } from "../src/client.js";
import { optionsFromEnv } from "../src/config.js";
import {
  ConnectionFailedError,
  HttpError,
  MalformedResponseError,
  RequestTimeoutError,
} from "../src/errors.js";
import type { NodeStateEvent } from "../src/events.js";

const TOTAL = Number(process.env.TOTAL ?? 500);
const CONCURRENCY = Number(process.env.CONCURRENCY ?? 50);

const env = {
  SEARCH_NODES: "http://127.0.0.1:9201,http://127.0.0.1:9202,http://127.0.0.1:9203",
  SEARCH_TIMEOUT_MS: "200",
  SEARCH_MAX_RETRIES: "2",
  SEARCH_REVIVAL_DELAY_MS: "2000",
  ...process.env,
};

const client = new SearchClient(optionsFromEnv(env));

type Counters = Record<string, number>;
const c: Counters = {
  ok: 0,
  http: 0,
  timeout: 0,
  connection: 0,
  malformed: 0,
  otherErr: 0,
};

client.executor.on("node:dead", (e: NodeStateEvent) => {
  // eslint-disable-next-line no-console
  console.log(`[pool] ${e.node} -> dead`);
});
client.executor.on("node:live", (e: NodeStateEvent) => {
  // eslint-disable-next-line no-console
  console.log(`[pool] ${e.node} -> live`);
});

function classifyErr(err: unknown): keyof Counters {
  if (err instanceof RequestTimeoutError) return "timeout";
  if (err instanceof ConnectionFailedError) return "connection";
  if (err instanceof HttpError) return "http";
  if (err instanceof MalformedResponseError) return "malformed";
  return "otherErr";
}

async function worker(jobs: number[]) {
  for (const _ of jobs) {
    try {
      await client.search({ query: { match_all: {} } }, { index: "demo" });
      c.ok++;
    } catch (err) {
      const k = classifyErr(err);
      c[k]++;
    }

    if ((c.ok + c.http + c.timeout + c.connection + c.malformed + c.otherErr) % 50 === 0) {
      const snap = client.executor.snapshot();
      const dead = snap.nodes.filter((n) => n.dead).length;
      // eslint-disable-next-line no-console
      console.log(`[snap] inFlight=${snap.inFlight} dead=${dead} ok=${c.ok} http=${c.http} to=${c.timeout} conn=${c.connection}`);
    }
  }
}

function chunkIndices(total: number, workers: number): number[][] {
  const chunks: number[][] = Array.from({ length: workers }, () => []);
  for (let i = 0; i < total; i++) chunks[i % workers].push(i);
  return chunks;
}

async function main() {
  // eslint-disable-next-line no-console
  console.log(`[loadgen] nodes=${env.SEARCH_NODES} total=${TOTAL} concurrency=${CONCURRENCY}`);

  const chunks = chunkIndices(TOTAL, CONCURRENCY);
  await Promise.all(chunks.map((jobs) => worker(jobs)));

  // eslint-disable-next-line no-console
  console.log(`[done]`, c);

  // eslint-disable-next-line no-console
  console.log(`[final snapshot]`, client.executor.snapshot());
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
