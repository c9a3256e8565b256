// demo/upstream.ts
import http from "node:http";

const BASE_PORT = Number(process.env.UPSTREAM_PORT ?? 9201);
const NODES = Number(process.env.UPSTREAM_NODES ?? 3);

// Behavior knobs
const FAIL_RATE = Number(process.env.FAIL_RATE ?? 0.1);  // 10% 500s with a JSON error body
const SLOW_RATE = Number(process.env.SLOW_RATE ?? 0.1);  // 10% slow responses
const SLOW_MS = Number(process.env.SLOW_MS ?? 300);      // slow delay
const DOWN_NODE = Number(process.env.DOWN_NODE ?? -1);   // index of a node that drops every connection

function rand(): number {
  return Math.random();
}

function startNode(index: number): void {
  const port = BASE_PORT + index;

  const server = http.createServer((req, res) => {
    if (index === DOWN_NODE) {
      req.socket.destroy();
      return;
    }

    if (!req.url) {
      res.statusCode = 400;
      return res.end("bad request");
    }

    res.setHeader("content-type", "application/json");

    if (req.url.startsWith("/_cluster/health")) {
      res.statusCode = 200;
      return res.end(JSON.stringify({ status: "green", node: index }));
    }

    const r = rand();

    // Fail
    if (r < FAIL_RATE) {
      res.statusCode = 500;
      return res.end(JSON.stringify({ error: "EsRejectedExecutionException[rejected execution]", status: 500 }));
    }

    // Slow
    if (r < FAIL_RATE + SLOW_RATE) {
      setTimeout(() => {
        res.statusCode = 200;
        res.end(JSON.stringify({ took: SLOW_MS, node: index, hits: { total: 0, hits: [] } }));
      }, SLOW_MS);
      return;
    }

    // Normal
    res.statusCode = 200;
    res.end(JSON.stringify({ took: 1, node: index, hits: { total: 0, hits: [] } }));
  });

  server.listen(port, "127.0.0.1", () => {
    // eslint-disable-next-line no-console
    console.log(`[upstream] node ${index} listening on http://127.0.0.1:${port}${index === DOWN_NODE ? " (down)" : ""}`);
  });
}

for (let i = 0; i < NODES; i++) startNode(i);

// eslint-disable-next-line no-console
console.log(`[upstream] FAIL_RATE=${FAIL_RATE}, SLOW_RATE=${SLOW_RATE}, SLOW_MS=${SLOW_MS}, DOWN_NODE=${DOWN_NODE}`);
