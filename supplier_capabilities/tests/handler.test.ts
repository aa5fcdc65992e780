import { describe, expect, it } from "vitest";

import { main } from "../../apps/worker/src/handler.js";

describe("main", () => {
  it("returns an error summary when the configuration is invalid", async () => {
    const summary = await main({}, undefined, { env: {} });

    expect(summary.status).toBe("error");
    expect(summary.error).toBe("invalid_configuration");
    expect(summary.posted).toBe(0);
    expect(summary.dryRun).toBe(false);
  });

  it("carries the dry-run flag from the event", async () => {
    const summary = await main({ dryRun: true }, undefined, { env: {} });

    expect(summary.dryRun).toBe(true);
    expect(summary.status).toBe("error");
  });

  it("ignores a malformed event", async () => {
    const summary = await main("not an event", undefined, { env: {} });

    expect(summary.dryRun).toBe(false);
  });
});
