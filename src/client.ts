// src/client.ts
import type { BulkAction } from "./bulk.js";
import { BulkError, ReservedQueryParamError } from "./errors.js";
import { RequestExecutor } from "./executor.js";
import { buildQueryParams } from "./query.js";
import type { CallOptions, ClientOptions, HttpMethod, JsonObject, JsonValue, PathSegment, QueryParams } from "./types.js";
import type { ScalarValue, WireObject, WireValue } from "./values.js";

type Params<T extends readonly string[]> = Partial<Record<T[number], ScalarValue>>;

const INDEX_PARAMS = ["routing", "parent", "timestamp", "ttl", "refresh", "timeout", "version"] as const;
const GET_PARAMS = ["realtime", "fields", "routing", "preference", "refresh"] as const;
const DELETE_PARAMS = ["routing", "parent", "refresh", "version"] as const;
const SEARCH_PARAMS = ["routing", "size", "from", "sort", "preference", "search_type"] as const;
const COUNT_PARAMS = ["routing", "df", "analyzer", "default_operator"] as const;
const UPDATE_PARAMS = ["routing", "parent", "timeout", "replication", "consistency", "percolate", "refresh", "retry_on_conflict"] as const;
const DELETE_BY_QUERY_PARAMS = ["q", "df", "analyzer", "default_operator", "source", "routing", "replication", "consistency"] as const;
const BULK_PARAMS = ["refresh", "routing", "timeout"] as const;
const PUT_MAPPING_PARAMS = ["ignore_conflicts"] as const;
const FLUSH_PARAMS = ["refresh"] as const;
const OPTIMIZE_PARAMS = ["max_num_segments", "only_expunge_deletes", "refresh", "flush", "wait_for_merge"] as const;
const HEALTH_PARAMS = ["level", "wait_for_status", "wait_for_nodes", "timeout"] as const;

export interface IndexOptions extends Params<typeof INDEX_PARAMS> {
  id?: string | number;
  /** Fail with AlreadyExistsError instead of overwriting an existing id. */
  forceInsert?: boolean;
}

export type GetOptions = Params<typeof GET_PARAMS>;

/** At least one of script, doc and upsert must be set. */
export interface UpdateBody {
  script?: string;
  params?: WireObject;
  /** Only sent along with a script. */
  lang?: string;
  doc?: WireObject;
  upsert?: WireObject;
}

export type UpdateOptions = Params<typeof UPDATE_PARAMS>;
export type DeleteByQueryOptions = Params<typeof DELETE_BY_QUERY_PARAMS>;
export type PutMappingOptions = Params<typeof PUT_MAPPING_PARAMS>;
export type FlushOptions = Params<typeof FLUSH_PARAMS>;
export type OptimizeOptions = Params<typeof OPTIMIZE_PARAMS>;
export type DeleteOptions = Params<typeof DELETE_PARAMS>;

export interface SearchOptions extends Params<typeof SEARCH_PARAMS> {
  index?: string | readonly string[];
  docType?: string | readonly string[];
}

export interface CountOptions extends Params<typeof COUNT_PARAMS> {
  index?: string | readonly string[];
  docType?: string | readonly string[];
}

export type BulkOptions = Params<typeof BULK_PARAMS>;
export type HealthOptions = Params<typeof HEALTH_PARAMS>;

/** Per-call transport settings plus server parameters the client has no name for yet. */
export interface RequestExtras extends CallOptions {
  extraParams?: QueryParams;
}

// "_all" is dropped: an empty index list already means every index.
function asList(value: string | readonly string[] | undefined): readonly string[] | undefined {
  if (value === undefined) return undefined;
  return (typeof value === "string" ? [value] : value).filter((item) => item !== "_all");
}

function noIndexes(value: string | readonly string[]): boolean {
  const list = typeof value === "string" ? [value] : value;
  return list.length === 0 || list.every((i) => i === "");
}

function isObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && value !== undefined && typeof value === "object" && !Array.isArray(value);
}

/**
 * Thin endpoint layer. Every method assembles a path and query string and
 * hands them to the shared executor, which owns node selection and retries.
 */
export class SearchClient {
  readonly executor: RequestExecutor;

  constructor(options: ClientOptions | RequestExecutor) {
    this.executor = options instanceof RequestExecutor ? options : new RequestExecutor(options);
  }

  /** Raw access for APIs the client does not wrap. */
  sendRequest(
    method: HttpMethod,
    path: readonly PathSegment[],
    body?: WireValue,
    query?: QueryParams,
    call?: CallOptions
  ): Promise<JsonValue> {
    return this.executor.execute(
      { method, path, query, body: body === undefined ? undefined : { kind: "json", value: body } },
      call
    );
  }

  index(index: string, docType: string, doc: WireObject, opts: IndexOptions = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    const query = buildQueryParams(INDEX_PARAMS, opts, extras.extraParams);
    if (opts.forceInsert) {
      if (query.op_type !== undefined) throw new ReservedQueryParamError("op_type");
      query.op_type = "create";
    }
    return this.sendRequest(opts.id === undefined ? "POST" : "PUT", [index, docType, opts.id], doc, query, extras);
  }

  get(index: string, docType: string, id: string | number, opts: GetOptions = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    const query = buildQueryParams(GET_PARAMS, opts, extras.extraParams);
    return this.sendRequest("GET", [index, docType, id], undefined, query, extras);
  }

  delete(index: string, docType: string, id: string | number, opts: DeleteOptions = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    if (String(id) === "") throw new Error("delete needs a non-empty id; use deleteIndex to drop a whole index");
    const query = buildQueryParams(DELETE_PARAMS, opts, extras.extraParams);
    return this.sendRequest("DELETE", [index, docType, id], undefined, query, extras);
  }

  update(
    index: string,
    docType: string,
    id: string | number,
    body: UpdateBody,
    opts: UpdateOptions = {},
    extras: RequestExtras = {}
  ): Promise<JsonValue> {
    if (!body.script && !body.doc && !body.upsert) {
      throw new TypeError("'script', 'doc' and 'upsert' cannot all be empty; set at least one");
    }
    const payload: Record<string, WireValue> = {};
    if (body.script) {
      payload.script = body.script;
      if (body.lang) payload.lang = body.lang;
    }
    if (body.doc) payload.doc = body.doc;
    if (body.upsert) payload.upsert = body.upsert;
    if (body.params) payload.params = body.params;
    const query = buildQueryParams(UPDATE_PARAMS, opts, extras.extraParams);
    return this.sendRequest("POST", [index, docType, id, "_update"], payload, query, extras);
  }

  deleteByQuery(
    index: string,
    docType: string,
    query: WireObject,
    opts: DeleteByQueryOptions = {},
    extras: RequestExtras = {}
  ): Promise<JsonValue> {
    const params = buildQueryParams(DELETE_BY_QUERY_PARAMS, opts, extras.extraParams);
    return this.sendRequest("DELETE", [index, docType, "_query"], query, params, extras);
  }

  search(query: WireObject | string, opts: SearchOptions = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    const params = buildQueryParams(SEARCH_PARAMS, opts, extras.extraParams);
    return this.searchOrCount("_search", query, params, opts, extras);
  }

  count(query: WireObject | string, opts: CountOptions = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    const params = buildQueryParams(COUNT_PARAMS, opts, extras.extraParams);
    return this.searchOrCount("_count", query, params, opts, extras);
  }

  createIndex(index: string, settings?: WireObject, extras: RequestExtras = {}): Promise<JsonValue> {
    return this.sendRequest("PUT", [index], settings, buildQueryParams([], {}, extras.extraParams), extras);
  }

  deleteIndex(index: string | readonly string[], extras: RequestExtras = {}): Promise<JsonValue> {
    if (noIndexes(index)) {
      throw new Error("No indexes specified. To delete all indexes, use deleteAllIndexes().");
    }
    return this.sendRequest("DELETE", [asList(index)], undefined, buildQueryParams([], {}, extras.extraParams), extras);
  }

  deleteAllIndexes(extras: RequestExtras = {}): Promise<JsonValue> {
    return this.deleteIndex("_all", extras);
  }

  openIndex(index: string, extras: RequestExtras = {}): Promise<JsonValue> {
    return this.sendRequest("POST", [index, "_open"], undefined, buildQueryParams([], {}, extras.extraParams), extras);
  }

  closeIndex(index: string, extras: RequestExtras = {}): Promise<JsonValue> {
    return this.sendRequest("POST", [index, "_close"], undefined, buildQueryParams([], {}, extras.extraParams), extras);
  }

  getMapping(
    index?: string | readonly string[],
    docType?: string | readonly string[],
    extras: RequestExtras = {}
  ): Promise<JsonValue> {
    const query = buildQueryParams([], {}, extras.extraParams);
    return this.sendRequest("GET", [asList(index), asList(docType), "_mapping"], undefined, query, extras);
  }

  putMapping(
    index: string | readonly string[],
    docType: string,
    mapping: WireObject,
    opts: PutMappingOptions = {},
    extras: RequestExtras = {}
  ): Promise<JsonValue> {
    const query = buildQueryParams(PUT_MAPPING_PARAMS, opts, extras.extraParams);
    return this.sendRequest("PUT", [asList(index), docType, "_mapping"], mapping, query, extras);
  }

  updateSettings(index: string | readonly string[], settings: WireObject, extras: RequestExtras = {}): Promise<JsonValue> {
    if (noIndexes(index)) {
      throw new Error("No indexes specified. To update all indexes, use updateAllSettings().");
    }
    const query = buildQueryParams([], {}, extras.extraParams);
    return this.sendRequest("PUT", [asList(index), "_settings"], settings, query, extras);
  }

  updateAllSettings(settings: WireObject, extras: RequestExtras = {}): Promise<JsonValue> {
    return this.sendRequest("PUT", ["_settings"], settings, buildQueryParams([], {}, extras.extraParams), extras);
  }

  flush(index?: string | readonly string[], opts: FlushOptions = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    const query = buildQueryParams(FLUSH_PARAMS, opts, extras.extraParams);
    return this.sendRequest("POST", [asList(index), "_flush"], undefined, query, extras);
  }

  optimize(index?: string | readonly string[], opts: OptimizeOptions = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    const query = buildQueryParams(OPTIMIZE_PARAMS, opts, extras.extraParams);
    return this.sendRequest("POST", [asList(index), "_optimize"], undefined, query, extras);
  }

  refresh(index?: string | readonly string[], extras: RequestExtras = {}): Promise<JsonValue> {
    return this.sendRequest("POST", [asList(index), "_refresh"], undefined, buildQueryParams([], {}, extras.extraParams), extras);
  }

  health(index?: string | readonly string[], opts: HealthOptions = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    const query = buildQueryParams(HEALTH_PARAMS, opts, extras.extraParams);
    return this.sendRequest("GET", ["_cluster", "health", asList(index)], undefined, query, extras);
  }

  /**
   * Send prepared actions (see indexOp / deleteOp) in one request. Throws
   * BulkError when the node reports any failed item.
   */
  async bulk(actions: Iterable<BulkAction>, opts: BulkOptions & { index?: string; docType?: string } = {}, extras: RequestExtras = {}): Promise<JsonValue> {
    const lines: WireValue[] = [];
    for (const action of actions) lines.push(...action);
    if (lines.length === 0) throw new Error("No actions provided for bulk request");

    const query = buildQueryParams(BULK_PARAMS, opts, extras.extraParams);
    const res = await this.executor.execute(
      { method: "POST", path: [opts.index, opts.docType, "_bulk"], body: { kind: "ndjson", lines }, query },
      extras
    );

    if (isObject(res) && res.errors === true && Array.isArray(res.items)) {
      const errors: JsonValue[] = [];
      const successes: JsonValue[] = [];
      for (const item of res.items) {
        const result = isObject(item) ? Object.values(item)[0] : undefined;
        if (isObject(result) && result.error !== undefined) errors.push(item);
        else successes.push(item);
      }
      throw new BulkError(errors, successes);
    }
    return res;
  }

  private searchOrCount(
    kind: "_search" | "_count",
    query: WireObject | string,
    params: Record<string, ScalarValue>,
    target: { index?: string | readonly string[]; docType?: string | readonly string[] },
    extras: RequestExtras
  ): Promise<JsonValue> {
    const path = [asList(target.index), asList(target.docType), kind];
    // A string is a Lucene query-string query and travels as ?q=
    if (typeof query === "string") {
      if (params.q !== undefined) throw new ReservedQueryParamError("q");
      return this.sendRequest("GET", path, undefined, { ...params, q: query }, extras);
    }
    return this.sendRequest("POST", path, query, params, extras);
  }
}
