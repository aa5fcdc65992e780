import type { HistoryEntry } from "../dedup/dedup-index.js";

/** The durable record written once per published story. */
export type PublishRecord = {
  link: string;
  title: string;
  contentHash: string;
  site: string;
  feedUrl: string;
  publishedAt: string;
  createdAt: string;
};

export type SaveOutcome = "created" | "conflict" | "error";

/**
 * Published-story history shared by every concurrent run. `save` is the
 * cross-process dedup gate: it must report a key conflict as `"conflict"`
 * rather than throw.
 */
export interface HistoryStore {
  loadRecent(limit: number, signal?: AbortSignal): Promise<HistoryEntry[]>;
  save(record: PublishRecord, signal?: AbortSignal): Promise<SaveOutcome>;
  /** Removes a record saved by this run whose delivery then failed. */
  release(contentHash: string, signal?: AbortSignal): Promise<boolean>;
}

export class HistoryStoreError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "HistoryStoreError";
    this.status = status;
  }
}

/** Store document ids are capped at 36 characters. */
export function historyKey(contentHash: string): string {
  return contentHash.slice(0, 36);
}
