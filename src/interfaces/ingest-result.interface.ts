import type { EventRejection } from './run.interface';

export interface IngestResult {
  runId: string;
  /** New events written to the ledger by this call. */
  accepted: number;
  /** Re-delivered events, ignored. */
  deduplicated: number;
  /** Rejections raised during this call, including for events held from earlier batches. */
  rejected: number;
  /** Events applied to the tree during this call. */
  applied: number;
  /** Events still held behind a sequence gap. */
  pending: number;
  rejections: EventRejection[];
}

export interface IngestOptions {
  /** Epoch milliseconds the batch arrived. Default: now */
  receivedAt?: number;
}

export interface GapReleaseFailure {
  runId: string;
  error: string;
}

export interface GapReleaseSummary {
  runsScanned: number;
  runsReleased: number;
  eventsReleased: number;
  rejected: number;
  failures: GapReleaseFailure[];
}

export interface StoredRunReplaySummary {
  runsScanned: number;
  runsReplayed: number;
  failures: GapReleaseFailure[];
}
