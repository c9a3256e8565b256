// src/bulk.ts
import { encodeBody } from "./serializer.js";
import type { WireObject, WireValue } from "./values.js";

/** One bulk action: the action line plus, for index/create/update, its document line. */
export type BulkAction = readonly [WireObject] | readonly [WireObject, WireValue];

export interface IndexOpOptions {
  id?: string | number;
  index?: string;
  docType?: string;
  overwriteExisting?: boolean; // false -> "create", failing if the id exists
}

export function indexOp(doc: WireObject, opts: IndexOpOptions = {}): BulkAction {
  const meta: Record<string, WireValue> = {};
  if (opts.index !== undefined) meta._index = opts.index;
  if (opts.docType !== undefined) meta._type = opts.docType;
  if (opts.id !== undefined) meta._id = opts.id;
  const action = opts.overwriteExisting === false ? "create" : "index";
  return [{ [action]: meta }, doc];
}

export function deleteOp(id: string | number, opts: { index?: string; docType?: string } = {}): BulkAction {
  const meta: Record<string, WireValue> = { _id: id };
  if (opts.index !== undefined) meta._index = opts.index;
  if (opts.docType !== undefined) meta._type = opts.docType;
  return [{ delete: meta }];
}

/** The byte length of an action once encoded, newlines included. */
export function encodedSize(action: BulkAction): number {
  let bytes = 0;
  for (const line of action) bytes += Buffer.byteLength(encodeBody(line), "utf8") + 1;
  return bytes;
}

export interface BulkChunkOptions {
  docsPerChunk?: number | null;  // default 300; null disables the cap
  bytesPerChunk?: number | null; // default null
}

/**
 * Group actions into chunks for separate bulk requests.
 *
 * A chunk closes as soon as it reaches either cap, so the action that
 * crosses `bytesPerChunk` stays in the chunk it overflowed. With both caps
 * null every action lands in one chunk.
 */
export function* bulkChunks(actions: Iterable<BulkAction>, opts: BulkChunkOptions = {}): Generator<BulkAction[]> {
  const docsPerChunk = opts.docsPerChunk === undefined ? 300 : opts.docsPerChunk;
  const bytesPerChunk = opts.bytesPerChunk ?? null;
  if (docsPerChunk !== null && (!Number.isInteger(docsPerChunk) || docsPerChunk <= 0)) {
    throw new Error(`docsPerChunk must be a positive integer (got ${docsPerChunk})`);
  }
  if (bytesPerChunk !== null && (!Number.isFinite(bytesPerChunk) || bytesPerChunk <= 0)) {
    throw new Error(`bytesPerChunk must be > 0 (got ${bytesPerChunk})`);
  }

  let chunk: BulkAction[] = [];
  let bytes = 0;
  for (const action of actions) {
    chunk.push(action);
    if (bytesPerChunk !== null) bytes += encodedSize(action);

    const full =
      (docsPerChunk !== null && chunk.length >= docsPerChunk) || (bytesPerChunk !== null && bytes >= bytesPerChunk);
    if (full) {
      yield chunk;
      chunk = [];
      bytes = 0;
    }
  }
  if (chunk.length > 0) yield chunk;
}
