/**
 * Realized Volatility Backfill
 *
 * Pulls daily candles per ticker, stores the closes and the RV rows derived
 * from them. Two modes:
 *
 *   rolling  — one RV row per (window, date) over the whole history,
 *              population variance. Feeds the scanner.
 *   snapshot — a single RV row per ticker at the last candle date,
 *              sample variance over the trailing window.
 *
 * Every write is an upsert, so re-running a range is harmless. RV rows carry
 * their variance convention, so the two modes never overwrite each other.
 * Store writes are batched and flushed at each progress line.
 */

import { componentLogger } from "../utils/logger.js";
import { ConfigurationMissingError, errorMessage } from "../utils/errors.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryOptions, type RetryPolicy } from "../api/market-data/retry.js";
import { DEFAULT_TRADING_DAYS, estimateRealizedVol, rollingRealizedVol } from "../quant/realized-vol.js";
import type { MarketDataProvider } from "../api/market-data/provider.js";
import type { PriceSeriesStore } from "../storage/price-store.js";
import type { CandlePoint, PricePoint, RealizedVolPoint } from "../types/market.js";

const log = componentLogger("backfill");

export type BackfillMode = "rolling" | "snapshot";

export interface BackfillOptions {
  from: string;
  to: string;
  /** RV windows in trading days */
  windows: readonly number[];
  mode?: BackfillMode;
  tradingDays?: number;
  retry?: RetryPolicy;
  signal?: AbortSignal;
  sleep?: RetryOptions["sleep"];
  /** Progress line every N tickers */
  progressEvery?: number;
}

export interface BackfillSummary {
  mode: BackfillMode;
  ok: number;
  noData: number;
  /** not_enough_data, rv_none, or the error message */
  failed: { ticker: string; reason: string }[];
  total: number;
  /** Latest candle date written, null when nothing was stored */
  lastDate: string | null;
}

/** Rolling RV rows for every date where the window is complete */
export function rollingRvPoints(
  ticker: string,
  candles: readonly CandlePoint[],
  window: number,
  tradingDays: number = DEFAULT_TRADING_DAYS
): RealizedVolPoint[] {
  const series = rollingRealizedVol(
    candles.map((c) => c.close),
    window,
    { variance: "population", tradingDays }
  );

  const points: RealizedVolPoint[] = [];
  series.forEach((rv, i) => {
    const candle = candles[i];
    if (rv !== null && candle) {
      points.push({ ticker, window, variance: "population", asofDate: candle.date, rv });
    }
  });
  return points;
}

/** Candles with a usable close, as store rows */
export function toPricePoints(ticker: string, candles: readonly CandlePoint[]): PricePoint[] {
  const points: PricePoint[] = [];
  for (const c of candles) {
    if (c.close !== null && Number.isFinite(c.close) && c.close > 0) {
      points.push({ ticker, date: c.date, close: c.close });
    }
  }
  return points;
}

export async function runBackfill(
  provider: MarketDataProvider,
  store: PriceSeriesStore,
  tickers: readonly string[],
  options: BackfillOptions
): Promise<BackfillSummary> {
  const {
    from,
    to,
    windows,
    mode = "rolling",
    tradingDays = DEFAULT_TRADING_DAYS,
    retry = DEFAULT_RETRY_POLICY,
    signal,
    sleep,
    progressEvery = 25,
  } = options;

  const summary: BackfillSummary = { mode, ok: 0, noData: 0, failed: [], total: tickers.length, lastDate: null };
  if (windows.length === 0) throw new Error("At least one RV window is required");
  const minWindow = Math.min(...windows);

  log.info(`Backfill (${mode}) of ${tickers.length} tickers, ${from} → ${to}, windows=${windows.join(",")}`);

  await store.batch(async () => {
    for (const [i, ticker] of tickers.entries()) {
      signal?.throwIfAborted();

      try {
        const series = await withRetry(
          () => provider.fetchCandles(ticker, from, to, signal),
          retry,
          { label: `candles ${ticker}`, signal, sleep }
        );

        if (series.status === "no_data") {
          summary.noData++;
          log.debug(`[${i + 1}/${tickers.length}] ${ticker}: no_data`);
          continue;
        }

        const candles = series.points;
        const last = candles[candles.length - 1];
        if (!last || candles.length < minWindow + 1) {
          summary.failed.push({ ticker, reason: "not_enough_data" });
          continue;
        }

        const rvPoints =
          mode === "rolling"
            ? windows.flatMap((w) => rollingRvPoints(ticker, candles, w, tradingDays))
            : snapshotRvPoints(ticker, candles, windows, tradingDays);

        if (mode === "snapshot" && rvPoints.length === 0) {
          summary.failed.push({ ticker, reason: "rv_none" });
          continue;
        }

        await store.upsertCloses(toPricePoints(ticker, candles));
        await store.upsertRealizedVol(rvPoints);
        summary.ok++;
        if (summary.lastDate === null || last.date > summary.lastDate) summary.lastDate = last.date;
      } catch (err) {
        if (err instanceof ConfigurationMissingError || signal?.aborted) throw err;
        summary.failed.push({ ticker, reason: errorMessage(err) });
        log.warn(`[${i + 1}/${tickers.length}] ${ticker}: failed`, { error: errorMessage(err) });
      } finally {
        if ((i + 1) % progressEvery === 0) {
          await store.flush();
          log.info(
            `Progress: ${i + 1}/${tickers.length} | ok=${summary.ok}, no_data=${summary.noData}, ` +
              `failed=${summary.failed.length}`
          );
        }
      }
    }
  });

  log.info(
    `Backfill done | ok=${summary.ok}, no_data=${summary.noData}, ` +
      `failed=${summary.failed.length}`
  );
  return summary;
}

function snapshotRvPoints(
  ticker: string,
  candles: readonly CandlePoint[],
  windows: readonly number[],
  tradingDays: number
): RealizedVolPoint[] {
  const last = candles[candles.length - 1];
  if (!last) return [];

  const closes = candles.map((c) => c.close);
  const points: RealizedVolPoint[] = [];
  for (const window of windows) {
    const rv = estimateRealizedVol(closes, window, { variance: "sample", tradingDays });
    if (rv !== null) points.push({ ticker, window, variance: "sample", asofDate: last.date, rv });
  }
  return points;
}
