import Parser from "rss-parser";

const USER_AGENT = "ballotwire-ingestor/0.1 (+rss relay)";

export type FeedItemExtras = {
  mediaContent?: unknown[];
  mediaThumbnail?: unknown[];
  summary?: string;
};

const parser = new Parser<Record<string, unknown>, FeedItemExtras>({
  customFields: {
    item: [
      ["media:content", "mediaContent", { keepArray: true }],
      ["media:thumbnail", "mediaThumbnail", { keepArray: true }]
    ]
  }
});

export type ParsedFeed = Awaited<ReturnType<typeof parser.parseString>>;
export type FeedItem = ParsedFeed["items"][number];

export type FeedFetchErrorKind =
  | "not_found"
  | "http_status"
  | "network"
  | "timeout"
  | "malformed"
  | "aborted";

const TRANSIENT_KINDS: ReadonlySet<FeedFetchErrorKind> = new Set([
  "http_status",
  "network",
  "timeout"
]);

export class FeedFetchError extends Error {
  readonly kind: FeedFetchErrorKind;
  readonly status?: number;

  constructor(
    kind: FeedFetchErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "FeedFetchError";
    this.kind = kind;
    this.status = options.status;
  }

  /** Worth another attempt: timeouts, connection failures, non-2xx. */
  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

export type FetchFeedOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * Downloads and parses one syndication document.
 *
 * @throws FeedFetchError classified so callers can decide whether to retry
 */
export async function fetchFeed(
  url: string,
  options: FetchFeedOptions = {}
): Promise<ParsedFeed> {
  const { timeoutMs = 10_000, signal } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  let xml: string;
  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        "user-agent": USER_AGENT,
        accept: "application/rss+xml, application/xml;q=0.9, */*;q=0.8"
      }
    });

    if (response.status === 404) {
      throw new FeedFetchError("not_found", "HTTP 404", { status: 404 });
    }
    if (!response.ok) {
      throw new FeedFetchError(
        "http_status",
        `HTTP ${response.status} ${response.statusText}`.trim(),
        { status: response.status }
      );
    }

    xml = await response.text();
  } catch (error) {
    if (error instanceof FeedFetchError) {
      throw error;
    }
    if (signal?.aborted) {
      throw new FeedFetchError("aborted", "Fetch abandoned", { cause: error });
    }
    if (controller.signal.aborted) {
      throw new FeedFetchError("timeout", `Timed out after ${timeoutMs}ms`, {
        cause: error
      });
    }
    throw new FeedFetchError(
      "network",
      error instanceof Error ? error.message : "Connection failed",
      { cause: error }
    );
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }

  try {
    return await parser.parseString(xml);
  } catch (error) {
    throw new FeedFetchError(
      "malformed",
      error instanceof Error ? error.message : "Unparseable feed",
      { cause: error }
    );
  }
}
