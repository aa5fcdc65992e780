import { describe, expect, it } from "vitest";

import {
  ConfigValidationError,
  loadConfig
} from "../../packages/config/src/load-config.js";

const baseEnv = {
  TELEGRAM_BOT_TOKEN: "test-token",
  TELEGRAM_CHANNEL_ID: "@test_channel",
  APPWRITE_PROJECT_ID: "test-project",
  APPWRITE_API_KEY: "test-secret",
  APPWRITE_DATABASE_ID: "test-db"
};

describe("loadConfig", () => {
  it("merges environment variables with defaults", () => {
    const config = loadConfig({
      env: {
        ...baseEnv,
        MONITORING_ENABLED: "false",
        MONITORING_METRICS_PORT: "9400",
        MONITORING_METRICS_HOST: "127.0.0.1",
        PUBLISH_BATCH_SIZE: "2"
      }
    });

    expect(config.telegram.botToken).toBe("test-token");
    expect(config.telegram.apiBase).toBe("https://api.telegram.org");
    expect(config.history.collectionId).toBe("history");
    expect(config.history.releaseOnDeliveryFailure).toBe(true);
    expect(config.monitoring.enabled).toBe(false);
    expect(config.monitoring.metricsPort).toBe(9400);
    expect(config.monitoring.metricsHost).toBe("127.0.0.1");
    expect(config.publishing.batchSize).toBe(2);
    expect(config.pipeline.deadlineMs).toBe(27_000);
    expect(config.pipeline.feedConcurrency).toBeUndefined();
    expect(config.scoring.trustBonusPromotesTier).toBe(false);
  });

  it("leaves the second platform unconfigured when its credentials are absent", () => {
    const config = loadConfig({ env: baseEnv });

    expect(config.bale.botToken).toBeUndefined();
    expect(config.bale.channelId).toBeUndefined();
  });

  it("parses boolean flags and turns escaped newlines in the footer into line breaks", () => {
    const config = loadConfig({
      env: {
        ...baseEnv,
        TRUST_BONUS_PROMOTES_TIER: "yes",
        HISTORY_RELEASE_ON_FAILURE: "0",
        CAPTION_FOOTER: "line one\\nline two"
      }
    });

    expect(config.scoring.trustBonusPromotesTier).toBe(true);
    expect(config.history.releaseOnDeliveryFailure).toBe(false);
    expect(config.publishing.captionFooter).toBe("line one\nline two");
  });

  it("lists every missing credential", () => {
    let caught: unknown;
    try {
      loadConfig({ env: { TELEGRAM_BOT_TOKEN: "test-token" } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;
    expect(caught.issues).toEqual([
      "telegram.channelId: TELEGRAM_CHANNEL_ID is required",
      "history.projectId: APPWRITE_PROJECT_ID is required",
      "history.apiKey: APPWRITE_API_KEY is required",
      "history.databaseId: APPWRITE_DATABASE_ID is required"
    ]);
  });

  it("rejects a medium threshold above the high threshold", () => {
    expect(() =>
      loadConfig({ env: { ...baseEnv, SCORE_HIGH: "2", SCORE_MEDIUM: "5" } })
    ).toThrow(ConfigValidationError);
  });
});
