import { describe, expect, it, vi } from "vitest";
import { startRefreshScheduler } from "./scheduler.js";

describe("startRefreshScheduler", () => {
  it("stops cleanly before the first run", async () => {
    const refresh = vi.fn(async () => {});
    const scheduler = startRefreshScheduler("0 0 1 1 *", refresh);

    await expect(scheduler.stop()).resolves.toBeUndefined();
    expect(refresh).not.toHaveBeenCalled();
  });

  it("runs the refresh on schedule and contains its failures", async () => {
    const refresh = vi.fn(async () => {
      throw new Error("refresh failed");
    });
    const scheduler = startRefreshScheduler("* * * * * *", refresh);

    try {
      await vi.waitFor(() => expect(refresh).toHaveBeenCalled(), { timeout: 3000, interval: 50 });
    } finally {
      await scheduler.stop();
    }
  });
});
