/**
 * Express application for the scanner backend
 *
 * Exposes:
 *   GET  /api/health                    — liveness
 *   GET  /api/universe                  — stored ticker universe
 *   POST /api/universe/refresh          — reload universe from UNIVERSE_CSV
 *   POST /api/history/backfill_realized — on-demand RV snapshot backfill
 *   GET  /api/scan                      — ranked IV/RV scan
 *   GET  /api/stocks/price              — underlying quote and spot
 *   GET  /api/options/chain             — listed option symbols
 *   GET  /api/options/quotes_batch      — option quotes plus per-symbol failures
 *
 * Defaults for windows, `top` and the scan variance come from configuration.
 */

import express, { type Response } from "express";
import { ZodError } from "zod";
import { componentLogger } from "./utils/logger.js";
import { ConfigurationMissingError, ProviderUnavailableError, errorMessage } from "./utils/errors.js";
import {
  QuotesBatchParamsSchema,
  TickerParamsSchema,
  UniverseParamsSchema,
  addDays,
  backfillParamsSchema,
  scanParamsSchema,
  todayUtc,
} from "./utils/validation.js";
import { withRetry } from "./api/market-data/retry.js";
import { spotFromQuote } from "./api/market-data/normalize.js";
import { QuoteBatchFetcher } from "./api/market-data/quote-batch.js";
import { runBackfill } from "./engine/backfill.js";
import type { AppContext } from "./engine/context.js";

const log = componentLogger("server");

/** Trading-day lookback → calendar days, with room for holidays */
const CALENDAR_PER_TRADING_DAY = 1.5;

function sendError(res: Response, err: unknown, what: string): void {
  if (err instanceof ZodError) {
    res.status(400).json({ s: "error", msg: err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") });
    return;
  }
  if (err instanceof ConfigurationMissingError) {
    res.status(500).json({ s: "error", msg: err.message });
    return;
  }
  if (err instanceof ProviderUnavailableError) {
    log.warn(`${what}: provider unavailable`, { error: err.message });
    res.status(502).json({ s: "error", msg: err.message });
    return;
  }
  log.error(`${what} failed`, { error: errorMessage(err) });
  res.status(500).json({ s: "error", msg: errorMessage(err) });
}

function limitTickers(tickers: string[], limit: number): string[] {
  return limit > 0 ? tickers.slice(0, limit) : tickers;
}

export function createApp(ctx: AppContext): express.Express {
  const app = express();
  app.use(express.json());

  const ScanParams = scanParamsSchema({
    window: ctx.config.rv.defaultWindow,
    top: ctx.config.scan.top,
    variance: ctx.config.rv.scanVariance,
  });
  const BackfillParams = backfillParamsSchema({ window: ctx.config.rv.defaultWindow });

  // ── CORS for local development ──────────────────────────────
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ s: "ok" });
  });

  // ── Universe ────────────────────────────────────────────────

  app.get("/api/universe", (req, res) => {
    try {
      const { limit } = UniverseParamsSchema.parse(req.query);
      const tickers = limitTickers(ctx.universe.load(), limit);
      res.json({ s: "ok", tickers, count: tickers.length });
    } catch (err) {
      sendError(res, err, "Universe read");
    }
  });

  app.post("/api/universe/refresh", (_req, res) => {
    try {
      const doc = ctx.universe.refreshFromCsv(ctx.config.universeCsv);
      res.json({ s: "ok", count: doc.tickers.length, source: doc.source });
    } catch (err) {
      sendError(res, err, "Universe refresh");
    }
  });

  // ── Realized volatility & scan ──────────────────────────────

  /**
   * Snapshot mode: one sample-variance RV per ticker at its last candle date.
   * `asof_date` is the latest date written.
   */
  app.post("/api/history/backfill_realized", async (req, res) => {
    try {
      const params = BackfillParams.parse(req.query);
      const provider = ctx.provider();
      const tickers = limitTickers(ctx.universe.load(), params.limit);
      const to = todayUtc();
      const from = addDays(to, -Math.ceil(params.lookback_days * CALENDAR_PER_TRADING_DAY));

      const summary = await runBackfill(provider, ctx.store, tickers, {
        from,
        to,
        windows: [params.window],
        mode: "snapshot",
        tradingDays: ctx.config.rv.tradingDays,
        retry: ctx.retry,
      });

      res.json({
        s: "ok",
        window: params.window,
        variance: "sample",
        asof_date: summary.lastDate,
        done: summary.ok,
        no_data: summary.noData,
        failed: summary.failed,
        total: summary.total,
      });
    } catch (err) {
      sendError(res, err, "Backfill");
    }
  });

  app.get("/api/scan", async (req, res) => {
    try {
      const params = ScanParams.parse(req.query);
      const scanner = ctx.scanner();
      const tickers = limitTickers(ctx.universe.load(), params.limit);
      const asof = params.asof ?? todayUtc();

      const report = await scanner.runScan(tickers, params.window, asof, {
        top: params.top,
        maxUnscored: ctx.config.scan.maxUnscored,
        variance: params.variance,
      });
      res.json({ s: "ok", ...report });
    } catch (err) {
      sendError(res, err, "Scan");
    }
  });

  // ── Provider pass-through ───────────────────────────────────

  app.get("/api/stocks/price", async (req, res) => {
    try {
      const { ticker } = TickerParamsSchema.parse(req.query);
      const provider = ctx.provider();
      const quote = await withRetry(() => provider.fetchSpotQuote(ticker), ctx.retry, {
        label: `spot ${ticker}`,
      });
      const spot = quote ? spotFromQuote(quote) : null;
      if (!quote || spot === null) {
        res.status(404).json({ s: "error", msg: quote ? "no price fields found" : "no quote" });
        return;
      }
      res.json({ s: "ok", ticker, spot, mid: quote.mid, bid: quote.bid, ask: quote.ask, last: quote.last });
    } catch (err) {
      sendError(res, err, "Stock price");
    }
  });

  app.get("/api/options/chain", async (req, res) => {
    try {
      const { ticker } = TickerParamsSchema.parse(req.query);
      const fetcher = new QuoteBatchFetcher(ctx.provider(), { retry: ctx.retry });
      const optionSymbols = await fetcher.fetchChainSymbols(ticker);
      res.json({ s: "ok", ticker, optionSymbols, count: optionSymbols.length });
    } catch (err) {
      sendError(res, err, "Option chain");
    }
  });

  /**
   * Symbols of a chunk that failed after retries carry the chunk's error;
   * symbols the provider had nothing for carry "no_data".
   */
  app.get("/api/options/quotes_batch", async (req, res) => {
    try {
      const params = QuotesBatchParamsSchema.parse(req.query);
      const fetcher = new QuoteBatchFetcher(ctx.provider(), {
        chunkSize: ctx.config.quotes.chunkSize,
        maxSymbols: params.limit,
        retry: ctx.retry,
      });
      const batch = await fetcher.fetchQuotes(params.symbols);

      const failed: { symbol: string; error: string }[] = [];
      const inFailedChunk = new Set<string>();
      for (const chunk of batch.failedChunks) {
        for (const symbol of chunk.symbols) {
          inFailedChunk.add(symbol);
          failed.push({ symbol, error: chunk.error });
        }
      }
      for (const symbol of batch.requested) {
        if (!batch.quotes.has(symbol) && !inFailedChunk.has(symbol)) {
          failed.push({ symbol, error: "no_data" });
        }
      }

      res.json({ s: "ok", quotes: Object.fromEntries(batch.quotes), failed, count: batch.quotes.size });
    } catch (err) {
      sendError(res, err, "Quote batch");
    }
  });

  return app;
}
