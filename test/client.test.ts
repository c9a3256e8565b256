// test/client.test.ts
import { describe, expect, it } from "vitest";
import { deleteOp, indexOp } from "../src/bulk.js";
import { SearchClient } from "../src/client.js";
import { AlreadyExistsError, BulkError, ReservedQueryParamError } from "../src/errors.js";
import type { Transport, TransportRequest, TransportResponse } from "../src/types.js";

const NODE = "http://search.test:9200";

function stub(status: number, body: unknown) {
  const calls: TransportRequest[] = [];
  const transport: Transport = async (req): Promise<TransportResponse> => {
    calls.push(req);
    return { status, headers: {}, body: new TextEncoder().encode(JSON.stringify(body)) };
  };
  const client = new SearchClient({ nodes: [NODE], transport });
  return { client, calls };
}

describe("SearchClient", () => {
  it("index uses POST without an id and PUT with one", async () => {
    const { client, calls } = stub(201, { created: true });

    await client.index("docs", "doc", { title: "a" });
    await client.index("docs", "doc", { title: "b" }, { id: 5, refresh: true, forceInsert: true });

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `POST ${NODE}/docs/doc`,
      `PUT ${NODE}/docs/doc/5?refresh=true&op_type=create`,
    ]);
    expect(calls[1].body).toBe('{"title":"b"}');
  });

  it("surfaces AlreadyExistsError from a forced insert", async () => {
    const { client } = stub(409, { error: { type: "version_conflict_engine_exception" } });
    const conflict = stub(400, { error: "DocumentAlreadyExistsException[[docs][1] [doc][5]: document already exists]" });

    await expect(client.index("docs", "doc", {}, { id: 5, forceInsert: true })).rejects.not.toBeInstanceOf(AlreadyExistsError);
    await expect(conflict.client.index("docs", "doc", {}, { id: 5, forceInsert: true })).rejects.toBeInstanceOf(
      AlreadyExistsError
    );
  });

  it("refuses an extra op_type when forceInsert sets one", async () => {
    const { client, calls } = stub(201, { created: true });

    expect(() => client.index("docs", "doc", {}, { id: 5, forceInsert: true }, { extraParams: { op_type: "index" } })).toThrow(
      ReservedQueryParamError
    );
    await client.index("docs", "doc", {}, { id: 5 }, { extraParams: { op_type: "create" } });

    expect(calls.map((c) => c.url)).toEqual([`${NODE}/docs/doc/5?op_type=create`]);
  });

  it("update builds a partial body and requires script, doc or upsert", async () => {
    const { client, calls } = stub(200, { ok: true });

    await client.update("docs", "doc", 9, { script: "ctx._source.n += n", params: { n: 2 }, lang: "mvel" }, { retry_on_conflict: 3 });
    await client.update("docs", "doc", 9, { doc: { title: "x" }, lang: "mvel" });

    expect(calls.map((c) => `${c.method} ${c.url} ${c.body ?? ""}`)).toEqual([
      `POST ${NODE}/docs/doc/9/_update?retry_on_conflict=3 {"script":"ctx._source.n += n","lang":"mvel","params":{"n":2}}`,
      `POST ${NODE}/docs/doc/9/_update {"doc":{"title":"x"}}`,
    ]);
    expect(() => client.update("docs", "doc", 9, { params: { n: 1 } })).toThrow(TypeError);
  });

  it("get forwards recognized options and extra params", async () => {
    const { client, calls } = stub(200, { found: true });

    await client.get("docs", "doc", "a/b", { realtime: false, fields: ["x", "y"] }, { extraParams: { version: 3 } });

    expect(calls[0].url).toBe(`${NODE}/docs/doc/a%2Fb?version=3&realtime=false&fields=x%2Cy`);
  });

  it("refuses extra params that shadow recognized ones", async () => {
    const { client, calls } = stub(200, {});
    expect(() => client.get("docs", "doc", 1, {}, { extraParams: { routing: "r1" } })).toThrow(ReservedQueryParamError);
    expect(calls).toHaveLength(0);
  });

  it("search posts a DSL body or sends a q string", async () => {
    const { client, calls } = stub(200, { hits: { total: 0 } });

    await client.search({ query: { match_all: {} } }, { index: ["a", "b"], size: 5 });
    await client.search("title:hello", { index: "a" });
    await client.count("*", {});

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `POST ${NODE}/a,b/_search?size=5`,
      `GET ${NODE}/a/_search?q=title%3Ahello`,
      `GET ${NODE}/_count?q=*`,
    ]);
  });

  it("index administration paths", async () => {
    const { client, calls } = stub(200, { acknowledged: true });

    await client.createIndex("docs", { settings: { number_of_shards: 1 } });
    await client.deleteIndex(["old-1", "old-2"]);
    await client.refresh();
    await client.health("docs", { wait_for_status: "yellow" });

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `PUT ${NODE}/docs`,
      `DELETE ${NODE}/old-1,old-2`,
      `POST ${NODE}/_refresh`,
      `GET ${NODE}/_cluster/health/docs?wait_for_status=yellow`,
    ]);
    expect(() => client.deleteIndex([])).toThrow(/No indexes specified/);
  });

  it("mapping, settings and maintenance paths", async () => {
    const { client, calls } = stub(200, { acknowledged: true });

    await client.getMapping();
    await client.getMapping(["a", "b"], "doc");
    await client.putMapping("docs", "doc", { doc: { properties: {} } }, { ignore_conflicts: true });
    await client.openIndex("docs");
    await client.closeIndex("docs");
    await client.updateSettings(["a", "b"], { index: { number_of_replicas: 2 } });
    await client.updateAllSettings({ index: { refresh_interval: "1s" } });
    await client.flush("docs", { refresh: true });
    await client.optimize(undefined, { max_num_segments: 1 });
    await client.deleteByQuery("docs", "doc", { term: { user: "x" } }, { routing: "r1" });

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `GET ${NODE}/_mapping`,
      `GET ${NODE}/a,b/doc/_mapping`,
      `PUT ${NODE}/docs/doc/_mapping?ignore_conflicts=true`,
      `POST ${NODE}/docs/_open`,
      `POST ${NODE}/docs/_close`,
      `PUT ${NODE}/a,b/_settings`,
      `PUT ${NODE}/_settings`,
      `POST ${NODE}/docs/_flush?refresh=true`,
      `POST ${NODE}/_optimize?max_num_segments=1`,
      `DELETE ${NODE}/docs/doc/_query?routing=r1`,
    ]);
    expect(calls[9].body).toBe('{"term":{"user":"x"}}');
    expect(() => client.updateSettings([], {})).toThrow(/No indexes specified/);
  });

  it("drops _all from index lists", async () => {
    const { client, calls } = stub(200, { acknowledged: true });

    await client.refresh("_all");
    await client.search({ query: { match_all: {} } }, { index: ["_all", "docs"] });
    await client.deleteAllIndexes();

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      `POST ${NODE}/_refresh`,
      `POST ${NODE}/docs/_search`,
      `DELETE ${NODE}/`,
    ]);
  });

  it("refuses a q parameter alongside a query string", () => {
    const { client } = stub(200, {});
    expect(() => client.search("title:x", {}, { extraParams: { q: "other" } })).toThrow(ReservedQueryParamError);
  });

  it("bulk sends ndjson and returns the response when nothing failed", async () => {
    const { client, calls } = stub(200, { took: 1, errors: false, items: [] });

    const res = await client.bulk([indexOp({ a: 1 }, { id: 1 }), deleteOp(2)], { index: "docs", refresh: true });

    expect(res).toEqual({ took: 1, errors: false, items: [] });
    expect(calls[0].url).toBe(`${NODE}/docs/_bulk?refresh=true`);
    expect(calls[0].body).toBe('{"index":{"_id":1}}\n{"a":1}\n{"delete":{"_id":2}}\n');
  });

  it("bulk raises BulkError splitting failed and successful items", async () => {
    const ok = { index: { _id: "1", status: 201 } };
    const bad = { index: { _id: "2", status: 400, error: "MapperParsingException[failed to parse]" } };
    const { client } = stub(200, { took: 3, errors: true, items: [ok, bad] });

    const err = await client.bulk([indexOp({ a: 1 }, { id: 1 }), indexOp({ a: "x" }, { id: 2 })]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BulkError);
    if (!(err instanceof BulkError)) return;
    expect(err.errors).toEqual([bad]);
    expect(err.successes).toEqual([ok]);
    expect(err.message).toBe("1 of 2 bulk actions failed.");
  });
});
