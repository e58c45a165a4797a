import { describe, it, expect, vi } from "vitest";
import { poll } from "./polling.js";

describe("poll", () => {
  it("returns the first defined value", async () => {
    const fetch = vi
      .fn<() => string | undefined>()
      .mockReturnValueOnce(undefined)
      .mockReturnValueOnce(undefined)
      .mockReturnValueOnce("ready");
    const delay = vi.fn(async (_ms: number) => {});

    await expect(poll({ fetch, intervalMs: 250, maxAttempts: 5, delay })).resolves.toBe("ready");
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(delay).toHaveBeenCalledTimes(2);
    expect(delay).toHaveBeenCalledWith(250);
  });

  it("does not wait after the last attempt", async () => {
    const delay = vi.fn(async (_ms: number) => {});

    await expect(
      poll({ fetch: () => undefined, intervalMs: 100, maxAttempts: 3, delay })
    ).rejects.toThrow("Polling timed out");
    expect(delay).toHaveBeenCalledTimes(2);
  });

  it("throws the timeout error it is given", async () => {
    await expect(
      poll({
        fetch: async () => undefined,
        intervalMs: 100,
        maxAttempts: 1,
        delay: async () => {},
        onTimeout: () => new Error("No download appeared"),
      })
    ).rejects.toThrow("No download appeared");
  });
});
