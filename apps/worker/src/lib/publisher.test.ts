import { describe, expect, it, vi } from "vitest";

import { FakeChannel, FakeHistoryStore } from "./__tests__/fakes.js";
import { makeScoredArticle, silentLogger, testRuleset } from "./__tests__/fixtures.js";
import type { ScoredArticle } from "./articles.js";
import { DeadlineBudget } from "./budget.js";
import type { HistoryStore } from "./history/history-store.js";
import type { DeliveryChannel } from "./platforms/channel.js";
import { ArticlePublisher, type ImageCollector } from "./publisher.js";

function createPublisher(options: {
  store: HistoryStore;
  channels: DeliveryChannel[];
  releaseOnDeliveryFailure?: boolean;
  collectImages?: ImageCollector;
}) {
  return new ArticlePublisher({
    store: options.store,
    channels: options.channels,
    ruleset: testRuleset,
    caption: { maxChars: 1024 },
    images: { maxImages: 3, pageTimeoutMs: 3_000 },
    historyTimeoutMs: 5_000,
    releaseOnDeliveryFailure: options.releaseOnDeliveryFailure ?? true,
    logger: silentLogger,
    collectImages:
      options.collectImages ?? vi.fn<ImageCollector>(async () => ["https://cdn.example.com/a.jpg"]),
    now: () => new Date("2025-01-06T12:00:00Z")
  });
}

describe("ArticlePublisher", () => {
  const article: ScoredArticle = makeScoredArticle();

  it("persists the record before delivering the caption to each channel", async () => {
    const store = new FakeHistoryStore();
    const telegram = new FakeChannel("telegram", true);
    const publisher = createPublisher({ store, channels: [telegram] });

    const outcome = await publisher.publish(article, new DeadlineBudget(60_000));

    expect(outcome.status).toBe("posted");
    expect(outcome.platforms).toEqual({
      telegram: { ok: true, form: "photo", retries: 0, fallbacks: 0 }
    });
    expect(store.saved).toEqual([
      {
        link: "https://news.example.com/1",
        title: "Election debate tonight",
        contentHash: article.fingerprint,
        site: "Example",
        feedUrl: "https://feeds.example.com/rss",
        publishedAt: "2025-01-06T11:00:00.000Z",
        createdAt: "2025-01-06T12:00:00.000Z"
      }
    ]);
    expect(telegram.posts).toEqual([
      {
        images: ["https://cdn.example.com/a.jpg"],
        caption: "💠 <b>Election debate tonight</b>\n\n#Election #Debate\n\n📰 Example"
      }
    ]);
  });

  it("stamps undated articles with the save time", async () => {
    const store = new FakeHistoryStore();
    const publisher = createPublisher({
      store,
      channels: [new FakeChannel("telegram", true)]
    });

    await publisher.publish(makeScoredArticle({ publishedAt: null }), new DeadlineBudget(60_000));

    expect(store.saved[0]?.publishedAt).toBe("2025-01-06T12:00:00.000Z");
  });

  it("never delivers an article another run already claimed", async () => {
    const collectImages = vi.fn<ImageCollector>(async () => []);
    const telegram = new FakeChannel("telegram", true);
    const publisher = createPublisher({
      store: new FakeHistoryStore("conflict"),
      channels: [telegram],
      collectImages
    });

    await expect(publisher.publish(article, new DeadlineBudget(60_000))).resolves.toEqual({
      status: "conflict",
      platforms: {},
      released: false
    });
    expect(collectImages).not.toHaveBeenCalled();
    expect(telegram.posts).toHaveLength(0);
  });

  it("treats one platform's failure as independent of the other", async () => {
    const store = new FakeHistoryStore();
    const publisher = createPublisher({
      store,
      channels: [new FakeChannel("telegram", true), new FakeChannel("bale", false)]
    });

    const outcome = await publisher.publish(article, new DeadlineBudget(60_000));

    expect(outcome.status).toBe("posted");
    expect(outcome.platforms.telegram?.ok).toBe(true);
    expect(outcome.platforms.bale).toEqual({ ok: false, retries: 2, fallbacks: 1 });
    expect(outcome.released).toBe(false);
    expect(store.released).toEqual([]);
  });

  it("releases the claim when every enabled platform fails", async () => {
    const store = new FakeHistoryStore();
    const publisher = createPublisher({
      store,
      channels: [new FakeChannel("telegram", false), new FakeChannel("bale", true, false)]
    });

    const outcome = await publisher.publish(article, new DeadlineBudget(60_000));

    expect(outcome.status).toBe("undelivered");
    expect(outcome.released).toBe(true);
    expect(outcome.platforms.bale).toEqual({ ok: true, retries: 0, fallbacks: 0 });
    expect(store.released).toEqual([article.fingerprint]);
  });

  it("keeps the claim when releasing is turned off", async () => {
    const store = new FakeHistoryStore();
    const publisher = createPublisher({
      store,
      channels: [new FakeChannel("telegram", false)],
      releaseOnDeliveryFailure: false
    });

    const outcome = await publisher.publish(article, new DeadlineBudget(60_000));

    expect(outcome.status).toBe("undelivered");
    expect(outcome.released).toBe(false);
    expect(store.released).toEqual([]);
  });

  it("counts a run with every platform disabled as posted", async () => {
    const bale = new FakeChannel("bale", true, false);
    const publisher = createPublisher({ store: new FakeHistoryStore(), channels: [bale] });

    const outcome = await publisher.publish(article, new DeadlineBudget(60_000));

    expect(outcome.status).toBe("posted");
    expect(bale.posts).toHaveLength(0);
  });

  it("reports store errors and thrown saves as persist failures", async () => {
    const telegram = new FakeChannel("telegram", true);

    for (const store of [new FakeHistoryStore("error"), new FakeHistoryStore(new Error("socket hang up"))]) {
      const publisher = createPublisher({ store, channels: [telegram] });
      const outcome = await publisher.publish(article, new DeadlineBudget(60_000));
      expect(outcome.status).toBe("persist_failed");
    }
    expect(telegram.posts).toHaveLength(0);
  });

  it("refuses to start without enough budget to persist", async () => {
    const store = new FakeHistoryStore();
    const publisher = createPublisher({
      store,
      channels: [new FakeChannel("telegram", true)]
    });

    const outcome = await publisher.publish(article, new DeadlineBudget(6_500));

    expect(outcome.status).toBe("no_budget");
    expect(store.saved).toHaveLength(0);
  });
});
