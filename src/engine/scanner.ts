/**
 * IV / RV Scan Orchestrator
 *
 * For every ticker in a universe, independently:
 *   1. spot price from the underlying quote
 *   2. option chain → bounded quote batch → ATM contract (delta ≈ 0.50)
 *   3. stored RV for (ticker, window, variance) as of the scan date
 *   4. gap / score
 *
 * Tickers run through a Bottleneck pool sized for the provider's rate
 * limits. Ranking starts only once every ticker has an entry, so the output
 * does not depend on completion order.
 *
 * Per-ticker failures become entries with a `reason`. Missing configuration
 * and aborts reject the whole scan.
 */

import Bottleneck from "bottleneck";
import { EventEmitter } from "eventemitter3";
import { componentLogger } from "../utils/logger.js";
import { ConfigurationMissingError, errorMessage } from "../utils/errors.js";
import { generateId } from "../utils/validation.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryOptions, type RetryPolicy } from "../api/market-data/retry.js";
import { QuoteBatchFetcher, type FailedChunk } from "../api/market-data/quote-batch.js";
import { spotFromQuote } from "../api/market-data/normalize.js";
import { selectAtm } from "../quant/atm.js";
import { DEFAULT_MAX_UNSCORED, rankScoreEntries, scoreIvGap } from "../quant/scoring.js";
import type { MarketDataProvider } from "../api/market-data/provider.js";
import type { PriceSeriesStore } from "../storage/price-store.js";
import type { AtmPick, ScanReport, ScoreEntry, ScoreReason } from "../types/options.js";
import type { VarianceMode } from "../types/market.js";

const log = componentLogger("scanner");

export interface ScanOrchestratorOptions {
  /** Tickers processed at once */
  maxConcurrent?: number;
  /** Minimum spacing between ticker starts, ms */
  minTimeMs?: number;
  chunkSize?: number;
  maxSymbols?: number;
  retry?: RetryPolicy;
  /** Stored RV older than this (calendar days before asof) is ignored */
  rvMaxAgeDays?: number;
  /** Variance convention of the RV rows to read */
  rvVariance?: VarianceMode;
  sleep?: RetryOptions["sleep"];
}

export interface RunScanOptions {
  top?: number;
  maxUnscored?: number;
  /** Overrides the orchestrator's rvVariance for this run */
  variance?: VarianceMode;
  signal?: AbortSignal;
}

interface ScanEvents {
  ticker_scanned: (entry: ScoreEntry) => void;
  chunk_failed: (ticker: string, chunk: FailedChunk) => void;
  scan_complete: (report: ScanReport) => void;
}

export class ScanOrchestrator extends EventEmitter<ScanEvents> {
  private readonly quotes: QuoteBatchFetcher;
  private readonly retry: RetryPolicy;
  private readonly sleep: RetryOptions["sleep"];
  private readonly maxConcurrent: number;
  private readonly minTimeMs: number;
  private readonly rvMaxAgeDays: number;
  private readonly rvVariance: VarianceMode;

  constructor(
    private readonly provider: MarketDataProvider,
    private readonly store: PriceSeriesStore,
    options: ScanOrchestratorOptions = {}
  ) {
    super();
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
    this.maxConcurrent = options.maxConcurrent ?? 4;
    this.minTimeMs = options.minTimeMs ?? 0;
    this.rvMaxAgeDays = options.rvMaxAgeDays ?? 7;
    this.rvVariance = options.rvVariance ?? "population";
    this.quotes = new QuoteBatchFetcher(provider, {
      chunkSize: options.chunkSize,
      maxSymbols: options.maxSymbols,
      retry: this.retry,
      sleep: this.sleep,
    });
  }

  /**
   * Rank a universe by IV/RV score.
   *
   * @param universe - Tickers to scan; duplicates are scanned once
   * @param window - RV window (trading days) to look up
   * @param asof - Scan date, YYYY-MM-DD
   */
  async runScan(
    universe: readonly string[],
    window: number,
    asof: string,
    options: RunScanOptions = {}
  ): Promise<ScanReport> {
    const { top = 50, maxUnscored = DEFAULT_MAX_UNSCORED, variance = this.rvVariance, signal } = options;
    const runId = generateId();
    const tickers = [...new Set(universe.map((t) => t.trim().toUpperCase()).filter((t) => t.length > 0))];

    log.info(`Scan ${runId} started: ${tickers.length} tickers, window=${window} (${variance}), asof=${asof}`);

    const limiter = new Bottleneck({
      maxConcurrent: this.maxConcurrent,
      minTime: this.minTimeMs,
    });

    let entries: ScoreEntry[];
    try {
      entries = await Promise.all(
        tickers.map((ticker) => limiter.schedule(() => this.scanTicker(ticker, window, variance, asof, signal)))
      );
    } finally {
      await limiter.stop({ dropWaitingJobs: true });
    }
    signal?.throwIfAborted();

    const report: ScanReport = {
      runId,
      asofDate: asof,
      window,
      variance,
      top,
      count: entries.length,
      ranked: rankScoreEntries(entries, { top, maxUnscored }),
    };

    const scored = entries.filter((e) => e.score !== null).length;
    log.info(`Scan ${runId} complete: ${scored}/${entries.length} scored`);
    this.emit("scan_complete", report);
    return report;
  }

  /** ATM contract and its IV for one ticker; failures are reported as reasons */
  async resolveAtmIv(ticker: string, signal?: AbortSignal): Promise<AtmPick> {
    const pick: AtmPick = { ticker, spot: null, symbol: null, iv: null, delta: null, reason: null };

    try {
      const quote = await withRetry(
        () => this.provider.fetchSpotQuote(ticker, signal),
        this.retry,
        { label: `spot ${ticker}`, signal, sleep: this.sleep }
      );
      const spot = quote ? spotFromQuote(quote) : null;
      if (spot === null) return { ...pick, reason: "no_spot" };
      pick.spot = spot;

      const chain = await this.quotes.fetchChainSymbols(ticker, signal);
      if (chain.length === 0) return { ...pick, reason: "no_chain" };

      const batch = await this.quotes.fetchQuotes(chain, signal);
      for (const failed of batch.failedChunks) {
        this.emit("chunk_failed", ticker, failed);
      }
      if (batch.quotes.size === 0) return { ...pick, reason: "no_quotes" };

      const atm = selectAtm(spot, batch.quotes);
      if (!atm) return { ...pick, reason: "no_iv" };

      return { ...pick, symbol: atm.symbol, iv: atm.iv, delta: atm.delta };
    } catch (err) {
      if (err instanceof ConfigurationMissingError || signal?.aborted) throw err;
      log.warn(`ATM IV lookup failed for ${ticker}`, { error: errorMessage(err) });
      return { ...pick, reason: "error" };
    }
  }

  // ─── Internals ────────────────────────────────────────────

  private async scanTicker(
    ticker: string,
    window: number,
    variance: VarianceMode,
    asof: string,
    signal?: AbortSignal
  ): Promise<ScoreEntry> {
    signal?.throwIfAborted();

    const [atm, rv] = await Promise.all([
      this.resolveAtmIv(ticker, signal),
      this.lookupRv(ticker, window, variance, asof),
    ]);

    const { gap, score } = scoreIvGap(atm.iv, rv.value);
    const entry: ScoreEntry = {
      ticker,
      spot: atm.spot,
      optionSymbol: atm.symbol,
      delta: atm.delta,
      iv: atm.iv,
      rv: rv.value,
      gap,
      score,
      reason: score === null ? explainMissingScore(atm, rv) : null,
    };

    this.emit("ticker_scanned", entry);
    return entry;
  }

  private async lookupRv(
    ticker: string,
    window: number,
    variance: VarianceMode,
    asof: string
  ): Promise<{ value: number | null; failed: boolean }> {
    try {
      const point = await this.store.getRealizedVol(ticker, window, asof, {
        variance,
        maxAgeDays: this.rvMaxAgeDays,
      });
      return { value: point?.rv ?? null, failed: false };
    } catch (err) {
      log.warn(`RV lookup failed for ${ticker}`, { error: errorMessage(err) });
      return { value: null, failed: true };
    }
  }
}

function explainMissingScore(atm: AtmPick, rv: { value: number | null; failed: boolean }): ScoreReason {
  if (atm.reason !== null) return atm.reason;
  if (rv.failed) return "error";
  if (rv.value === null) return "no_rv";
  return "zero_rv";
}
