import type { ClusterRequest } from "./types.js";

export type ClusterEventName =
  | "attempt:start"
  | "attempt:success"
  | "attempt:failure"
  | "node:dead"
  | "node:live"
  | "request:failure";

export interface RequestEventBase {
  request: ClusterRequest;
  requestId: string; // generated per logical operation (no external deps)
}

export interface AttemptEvent extends RequestEventBase {
  node: string;
  attempt: number; // 1-based
  fromFallback: boolean;
}

export interface AttemptResultEvent extends AttemptEvent {
  durationMs: number;
  status?: number;     // set when the node answered
  error?: unknown;     // set on failure
}

export interface NodeStateEvent {
  node: string;
  requestId: string;
  deadSinceMs?: number; // set on node:dead
}

export interface RequestFailureEvent extends RequestEventBase {
  attempts: number;
  error: unknown;
}
