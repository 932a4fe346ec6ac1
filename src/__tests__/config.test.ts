import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_FEEDS, createConfig } from "../config";

describe("createConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fills in defaults for an empty environment", () => {
    const config = createConfig({});

    expect(config).toMatchObject({
      port: 3000,
      env: "development",
      watchTickers: [],
      tickersFile: "config/tickers.json",
      feeds: DEFAULT_FEEDS,
      scoringStrategy: "LEXICAL",
      scoringTimeoutMs: 20000,
      concurrency: 3,
      topHeadlines: 5,
      scanSchedule: "5 16 * * 1-5",
      scheduleTimezone: "America/New_York",
    });
    expect(config.triggerToken).toBeUndefined();
  });

  it("reads lists, numbers and the strategy from the environment", () => {
    const config = createConfig({
      WATCH_TICKERS: "open, fig,,",
      SCORING_STRATEGY: "model",
      SCAN_CONCURRENCY: "5",
      RSS_FEEDS: "https://a.example.com/rss",
      TRIGGER_TOKEN: "test-secret",
    });

    expect(config.watchTickers).toEqual(["open", "fig"]);
    expect(config.scoringStrategy).toBe("MODEL");
    expect(config.concurrency).toBe(5);
    expect(config.feeds).toEqual(["https://a.example.com/rss"]);
    expect(config.triggerToken).toBe("test-secret");
  });

  it("exits on an invalid setting", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });

    expect(() => createConfig({ SCAN_CONCURRENCY: "0" })).toThrow("process.exit called");
    expect(errors).toHaveBeenCalledWith("  concurrency: Number must be greater than 0");
  });
});
