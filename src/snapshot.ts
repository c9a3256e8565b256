export interface NodeSnapshot {
  url: string;
  dead: boolean;
  deadSinceMs?: number;
}

export interface ExecutorSnapshot {
  inFlight: number;
  nodes: NodeSnapshot[];
}
