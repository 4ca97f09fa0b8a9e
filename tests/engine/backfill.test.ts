/**
 * Realized Volatility Backfill Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { rollingRvPoints, runBackfill, toPricePoints, type BackfillOptions } from "../../src/engine/backfill.js";
import { InMemoryPriceStore } from "../../src/storage/price-store.js";
import { ConfigurationMissingError, ProviderUnavailableError } from "../../src/utils/errors.js";
import { addDays } from "../../src/utils/validation.js";
import type { CandlePoint, CandleSeries } from "../../src/types/market.js";
import { FakeProvider, noSleep } from "../helpers/fake-provider.js";

/** One candle per calendar day from 2024-01-01 */
function candles(closes: (number | null)[]): CandlePoint[] {
  return closes.map((close, i) => ({ date: addDays("2024-01-01", i), close }));
}

function series(closes: (number | null)[]): CandleSeries {
  return { status: "ok", points: candles(closes) };
}

const ROLLING = [100, 102, 101, 104, 103, 106];

describe("rollingRvPoints", () => {
  it("should emit one population-variance row per complete window", () => {
    const points = rollingRvPoints("AAA", candles(ROLLING), 3);

    expect(points.map((p) => p.asofDate)).toEqual(["2024-01-04", "2024-01-05", "2024-01-06"]);
    expect(points.every((p) => p.ticker === "AAA" && p.window === 3)).toBe(true);
    expect(points[0]?.rv).toBeCloseTo(0.264555915842429, 9);
    expect(points[1]?.rv).toBeCloseTo(0.2920575686672213, 9);
    expect(points[2]?.rv).toBeCloseTo(0.28926903229172146, 9);
  });

  it("should emit nothing when the history is shorter than the window", () => {
    expect(rollingRvPoints("AAA", candles([100, 101, 102]), 3)).toEqual([]);
  });
});

describe("toPricePoints", () => {
  it("should keep positive closes only", () => {
    expect(toPricePoints("AAA", candles([100, null, 0, 101]))).toEqual([
      { ticker: "AAA", date: "2024-01-01", close: 100 },
      { ticker: "AAA", date: "2024-01-04", close: 101 },
    ]);
  });
});

describe("runBackfill", () => {
  let provider: FakeProvider;
  let store: InMemoryPriceStore;

  const options = (overrides: Partial<BackfillOptions> = {}): BackfillOptions => ({
    from: "2024-01-01",
    to: "2024-01-31",
    windows: [3],
    retry: { maxAttempts: 3, baseDelayMs: 1, rateLimitMultiplier: 1.5 },
    sleep: noSleep,
    ...overrides,
  });

  beforeEach(() => {
    provider = new FakeProvider();
    store = new InMemoryPriceStore();
  });

  describe("rolling mode", () => {
    it("should store closes and every rolling RV row", async () => {
      provider.candles.set("AAA", series(ROLLING));

      const summary = await runBackfill(provider, store, ["AAA"], options());

      expect(summary).toEqual({ mode: "rolling", ok: 1, noData: 0, failed: [], total: 1, lastDate: "2024-01-06" });
      expect((await store.readCloses("AAA")).map((p) => p.close)).toEqual(ROLLING);
      expect((await store.getRealizedVol("AAA", 3, "2024-01-04"))?.rv).toBeCloseTo(0.264555915842429, 9);
      expect((await store.getRealizedVol("AAA", 3, "2024-01-06"))?.rv).toBeCloseTo(0.28926903229172146, 9);
      expect(await store.getRealizedVol("AAA", 3, "2024-01-03", { maxAgeDays: 0 })).toBeNull();
    });

    it("should give the same store contents when run twice", async () => {
      provider.candles.set("AAA", series(ROLLING));

      await runBackfill(provider, store, ["AAA"], options());
      const closesOnce = await store.readCloses("AAA");
      const rvOnce = await store.getRealizedVol("AAA", 3, "2024-01-05", { maxAgeDays: 0 });

      await runBackfill(provider, store, ["AAA"], options());

      expect(await store.readCloses("AAA")).toEqual(closesOnce);
      expect(await store.getRealizedVol("AAA", 3, "2024-01-05", { maxAgeDays: 0 })).toEqual(rvOnce);
    });

    it("should write rows for every configured window", async () => {
      provider.candles.set("AAA", series(ROLLING));

      await runBackfill(provider, store, ["AAA"], options({ windows: [2, 3] }));

      expect(await store.getRealizedVol("AAA", 2, "2024-01-03", { maxAgeDays: 0 })).not.toBeNull();
      expect(await store.getRealizedVol("AAA", 3, "2024-01-03", { maxAgeDays: 0 })).toBeNull();
      expect(await store.getRealizedVol("AAA", 3, "2024-01-04", { maxAgeDays: 0 })).not.toBeNull();
    });

    it("should skip a zero close and null the windows that touch it", async () => {
      provider.candles.set("AAA", series([100, 102, 0, 104, 103, 106, 107, 108]));

      await runBackfill(provider, store, ["AAA"], options());

      expect((await store.readCloses("AAA")).map((p) => p.date)).not.toContain("2024-01-03");
      expect(await store.getRealizedVol("AAA", 3, "2024-01-06")).toBeNull();
      expect((await store.getRealizedVol("AAA", 3, "2024-01-07", { maxAgeDays: 0 }))?.rv).toBeCloseTo(0.24868112345494428, 9);
      expect((await store.getRealizedVol("AAA", 3, "2024-01-08", { maxAgeDays: 0 }))?.rv).toBeCloseTo(0.14490830762328077, 9);
    });
  });

  describe("store writes", () => {
    class CountingStore extends InMemoryPriceStore {
      persists = 0;
      protected override async persist(): Promise<void> {
        this.persists++;
      }
    }

    it("should persist once for a run shorter than the progress interval", async () => {
      const counting = new CountingStore();
      for (const t of ["AAA", "BBB", "CCC"]) provider.candles.set(t, series(ROLLING));

      await runBackfill(provider, counting, ["AAA", "BBB", "CCC"], options());

      expect(counting.persists).toBe(1);
      expect((await counting.readCloses("CCC")).length).toBe(6);
    });

    it("should flush at every progress line", async () => {
      const counting = new CountingStore();
      const tickers = ["A", "B", "C", "D", "E"];
      for (const t of tickers) provider.candles.set(t, series(ROLLING));

      await runBackfill(provider, counting, tickers, options({ progressEvery: 2 }));

      // after B, after D, then the final flush for E
      expect(counting.persists).toBe(3);
    });

    it("should not persist when nothing was written", async () => {
      const counting = new CountingStore();

      await runBackfill(provider, counting, ["NONE"], options());

      expect(counting.persists).toBe(0);
    });
  });

  describe("per-ticker outcomes", () => {
    it("should count no_data, record short history and errors, and carry on", async () => {
      provider.candles.set("AAA", series(ROLLING));
      provider.candles.set("SHORT", series([100, 101]));
      provider.onCandles = async (ticker) => {
        if (ticker === "BOOM") throw new Error("unexpected response");
        return provider.candles.get(ticker) ?? { status: "no_data" };
      };

      const summary = await runBackfill(provider, store, ["NONE", "SHORT", "BOOM", "AAA"], options());

      expect(summary).toEqual({
        mode: "rolling",
        ok: 1,
        noData: 1,
        failed: [
          { ticker: "SHORT", reason: "not_enough_data" },
          { ticker: "BOOM", reason: "unexpected response" },
        ],
        total: 4,
        lastDate: "2024-01-06",
      });
      expect(await store.readCloses("SHORT")).toEqual([]);
    });

    it("should retry transient candle failures", async () => {
      let calls = 0;
      provider.onCandles = async () => {
        calls++;
        if (calls === 1) throw new ProviderUnavailableError("HTTP 429", { status: 429, rateLimited: true });
        return series(ROLLING);
      };

      const summary = await runBackfill(provider, store, ["AAA"], options());

      expect(summary.ok).toBe(1);
      expect(provider.candleCalls).toEqual(["AAA", "AAA"]);
    });

    it("should abort the run on missing configuration", async () => {
      provider.onCandles = async () => {
        throw new ConfigurationMissingError("MARKETDATA_API_KEY");
      };

      await expect(runBackfill(provider, store, ["AAA", "BBB"], options())).rejects.toBeInstanceOf(
        ConfigurationMissingError
      );
      expect(provider.candleCalls).toEqual(["AAA"]);
    });

    it("should stop when aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        runBackfill(provider, store, ["AAA"], options({ signal: controller.signal }))
      ).rejects.toMatchObject({ name: "AbortError" });
      expect(provider.candleCalls).toEqual([]);
    });

    it("should require at least one window", async () => {
      await expect(runBackfill(provider, store, ["AAA"], options({ windows: [] }))).rejects.toThrow(
        "At least one RV window is required"
      );
    });
  });

  describe("snapshot mode", () => {
    it("should store one sample-variance row at the last candle date", async () => {
      provider.candles.set("AAA", series([100, 101, 99, 102, 100, 98, 103]));

      const summary = await runBackfill(provider, store, ["AAA"], options({ mode: "snapshot" }));

      expect(summary).toMatchObject({ mode: "snapshot", ok: 1, failed: [], lastDate: "2024-01-07" });
      const row = await store.getRealizedVol("AAA", 3, "2024-01-07", { variance: "sample", maxAgeDays: 0 });
      expect(row?.asofDate).toBe("2024-01-07");
      expect(row?.rv).toBeCloseTo(0.6394071280732397, 9);
      expect(await store.getRealizedVol("AAA", 3, "2024-01-06", { variance: "sample", maxAgeDays: 0 })).toBeNull();
    });

    it("should leave rolling rows for the same key untouched", async () => {
      const closes = [100, 101, 99, 102, 100, 98, 103];
      provider.candles.set("AAA", series(closes));

      await runBackfill(provider, store, ["AAA"], options());
      await runBackfill(provider, store, ["AAA"], options({ mode: "snapshot" }));

      const rolling = await store.getRealizedVol("AAA", 3, "2024-01-07", { variance: "population", maxAgeDays: 0 });
      const snapshot = await store.getRealizedVol("AAA", 3, "2024-01-07", { variance: "sample", maxAgeDays: 0 });
      expect(rolling?.rv).toBeCloseTo(0.5220737338926169, 9);
      expect(snapshot?.rv).toBeCloseTo(0.6394071280732397, 9);
    });

    it("should report rv_none when the trailing window has a bad close", async () => {
      provider.candles.set("AAA", series([100, 101, 0, 102]));

      const summary = await runBackfill(provider, store, ["AAA"], options({ mode: "snapshot" }));

      expect(summary.failed).toEqual([{ ticker: "AAA", reason: "rv_none" }]);
      expect(await store.readCloses("AAA")).toEqual([]);
    });
  });
});
