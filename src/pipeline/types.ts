// src/pipeline/types.ts

export interface ReceiptResult {
  accepted: number;
  forged: number;
  invalid: number;
  ids: number[];
}

export interface WorkerOptions {
  pollIntervalMs: number;
  batchSize: number;
  concurrency: number;
  retryBaseDelayMs: number;
  staleLockMs: number;
  shutdownGraceMs: number;
}

export type RowOutcome = 'stored' | 'duplicate' | 'deleted' | 'collection';

export interface WorkerStatus {
  running: boolean;
  inFlight: number;
  lastPollAt?: string;
}
