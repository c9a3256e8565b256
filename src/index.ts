export { RequestExecutor } from "./executor.js";
export { SearchClient } from "./client.js";
export type {
  BulkOptions,
  CountOptions,
  DeleteByQueryOptions,
  DeleteOptions,
  FlushOptions,
  GetOptions,
  HealthOptions,
  IndexOptions,
  OptimizeOptions,
  PutMappingOptions,
  RequestExtras,
  SearchOptions,
  UpdateBody,
  UpdateOptions,
} from "./client.js";
export { NodePool, normalizeNodeUrl } from "./pool.js";
export type { NodeSelection } from "./pool.js";
export { doHttpRequest, isNetworkFailure } from "./http.js";
export { decodeResponse, reviveDates } from "./decoder.js";
export type { RevivedValue } from "./decoder.js";
export { encodeBody, encodeScalar, assertWireValue, assertScalarValue, isoDateTime } from "./serializer.js";
export { CalendarDate, Decimal } from "./values.js";
export type { ScalarValue, WireObject, WireValue } from "./values.js";
export { buildPath, buildQueryParams, buildQueryString, buildUrl } from "./query.js";
export { bulkChunks, deleteOp, encodedSize, indexOp } from "./bulk.js";
export type { BulkAction, BulkChunkOptions, IndexOpOptions } from "./bulk.js";
export {
  DEFAULT_MAX_RETRIES,
  DEFAULT_REVIVAL_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  noopLogger,
  optionsFromEnv,
  resolveClientOptions,
} from "./config.js";
export * from "./errors.js";
export type * from "./events.js";
export type * from "./snapshot.js";
export type * from "./types.js";
