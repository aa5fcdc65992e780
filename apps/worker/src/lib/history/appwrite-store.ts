import { z } from "zod";
import type { AppLogger } from "@ballotwire/logger";

import type { HistoryEntry } from "../dedup/dedup-index.js";
import {
  HistoryStoreError,
  historyKey,
  type HistoryStore,
  type PublishRecord,
  type SaveOutcome
} from "./history-store.js";

export type AppwriteStoreConfig = {
  endpoint: string;
  projectId: string;
  apiKey: string;
  databaseId: string;
  collectionId: string;
};

const documentSchema = z.object({
  link: z.string().catch(""),
  title: z.string().catch(""),
  content_hash: z.string().catch("")
});

const listResponseSchema = z.object({
  documents: z.array(z.unknown()).default([])
});

const FIELD_LIMITS = {
  link: 700,
  title: 300,
  contentHash: 128,
  site: 100,
  feedUrl: 500
} as const;

/**
 * History store backed by an Appwrite-style documents REST API.
 */
export class AppwriteHistoryStore implements HistoryStore {
  private readonly documentsUrl: string;
  private readonly headers: Record<string, string>;

  constructor(
    config: AppwriteStoreConfig,
    private readonly logger: AppLogger
  ) {
    const base = config.endpoint.replace(/\/+$/, "");
    this.documentsUrl = `${base}/databases/${encodeURIComponent(
      config.databaseId
    )}/collections/${encodeURIComponent(config.collectionId)}/documents`;
    this.headers = {
      "Content-Type": "application/json",
      "X-Appwrite-Project": config.projectId,
      "X-Appwrite-Key": config.apiKey
    };
  }

  /**
   * @throws HistoryStoreError on a non-2xx response or an unreadable body
   */
  async loadRecent(limit: number, signal?: AbortSignal): Promise<HistoryEntry[]> {
    const url = new URL(this.documentsUrl);
    url.searchParams.set("limit", String(limit));
    url.searchParams.set("orderType", "DESC");

    const response = await fetch(url, { headers: this.headers, signal });
    if (!response.ok) {
      throw new HistoryStoreError(
        `History load failed: HTTP ${response.status}`,
        response.status
      );
    }

    const body = listResponseSchema.safeParse(await response.json());
    if (!body.success) {
      throw new HistoryStoreError("History load returned an unexpected body");
    }

    const entries: HistoryEntry[] = [];
    for (const raw of body.data.documents) {
      const parsed = documentSchema.safeParse(raw);
      if (!parsed.success) continue;
      entries.push({
        link: parsed.data.link,
        title: parsed.data.title,
        contentHash: parsed.data.content_hash
      });
    }
    return entries;
  }

  async save(record: PublishRecord, signal?: AbortSignal): Promise<SaveOutcome> {
    try {
      const response = await fetch(this.documentsUrl, {
        method: "POST",
        headers: this.headers,
        signal,
        body: JSON.stringify({
          documentId: historyKey(record.contentHash),
          data: {
            link: record.link.slice(0, FIELD_LIMITS.link),
            title: record.title.slice(0, FIELD_LIMITS.title),
            content_hash: record.contentHash.slice(0, FIELD_LIMITS.contentHash),
            site: record.site.slice(0, FIELD_LIMITS.site),
            feed_url: record.feedUrl.slice(0, FIELD_LIMITS.feedUrl),
            published_at: record.publishedAt,
            created_at: record.createdAt
          }
        })
      });

      if (response.status === 200 || response.status === 201) {
        return "created";
      }
      if (response.status === 409) {
        this.logger.info(
          { key: historyKey(record.contentHash) },
          "History record already exists"
        );
        return "conflict";
      }

      this.logger.warn({ status: response.status }, "History save rejected");
      return "error";
    } catch (error) {
      this.logger.warn({ error }, "History save failed");
      return "error";
    }
  }

  async release(contentHash: string, signal?: AbortSignal): Promise<boolean> {
    const key = historyKey(contentHash);
    try {
      const response = await fetch(
        `${this.documentsUrl}/${encodeURIComponent(key)}`,
        { method: "DELETE", headers: this.headers, signal }
      );
      if (response.ok || response.status === 404) {
        return true;
      }
      this.logger.warn({ key, status: response.status }, "History release rejected");
      return false;
    } catch (error) {
      this.logger.warn({ key, error }, "History release failed");
      return false;
    }
  }
}
