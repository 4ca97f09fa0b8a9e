/**
 * MarketData.app REST client
 *
 * Endpoints used:
 *   - /stocks/candles/D/{ticker}/   daily closes for the RV backfill
 *   - /stocks/quotes/{ticker}/      underlying quote → spot price
 *   - /options/chain/{ticker}/      listed option symbols
 *   - /options/quotes/{symbol}/     per-contract iv / delta / bid / ask
 *
 * HTTP 200 and 203 (cached data) are both success. 429, 5xx, timeouts and
 * network errors raise ProviderUnavailableError; 404 and `s: "no_data"`
 * mean no data.
 */

import { componentLogger } from "../../utils/logger.js";
import { DataMalformedError, ProviderUnavailableError, errorMessage } from "../../utils/errors.js";
import type { MarketDataProvider } from "./provider.js";
import type { CandleSeries, SpotQuote } from "../../types/market.js";
import type { QuoteMap } from "../../types/options.js";
import {
  CandlesPayloadSchema,
  ChainPayloadSchema,
  OptionQuotePayloadSchema,
  StockQuotePayloadSchema,
  normalizeCandles,
  normalizeChainSymbols,
  normalizeOptionQuote,
  normalizeSpotQuote,
  parsePayload,
} from "./normalize.js";

const log = componentLogger("marketdata");

const SUCCESS_STATUSES = new Set([200, 203]);

export interface MarketDataClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class MarketDataAppClient implements MarketDataProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: MarketDataClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? "https://api.marketdata.app/v1").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
  }

  async fetchCandles(ticker: string, from: string, to: string, signal?: AbortSignal): Promise<CandleSeries> {
    const source = `candles ${ticker}`;
    const body = await this.getJson(`/stocks/candles/D/${encodeURIComponent(ticker)}/`, { from, to }, signal);
    if (body === null) return { status: "no_data" };

    try {
      const payload = parsePayload(CandlesPayloadSchema, body, source);
      if (payload.s !== "ok") return { status: "no_data" };
      const points = normalizeCandles(ticker, payload);
      return points.length > 0 ? { status: "ok", points } : { status: "no_data" };
    } catch (err) {
      return this.malformed(err, { status: "no_data" } as const);
    }
  }

  async fetchChainSymbols(ticker: string, signal?: AbortSignal): Promise<string[]> {
    const body = await this.getJson(`/options/chain/${encodeURIComponent(ticker)}/`, {}, signal);
    if (body === null) return [];

    try {
      const payload = parsePayload(ChainPayloadSchema, body, `chain ${ticker}`);
      if (payload.s !== "ok") return [];
      return normalizeChainSymbols(payload.optionSymbol);
    } catch (err) {
      return this.malformed(err, []);
    }
  }

  async fetchSpotQuote(ticker: string, signal?: AbortSignal): Promise<SpotQuote | null> {
    const body = await this.getJson(`/stocks/quotes/${encodeURIComponent(ticker)}/`, {}, signal);
    if (body === null) return null;

    try {
      const payload = parsePayload(StockQuotePayloadSchema, body, `quote ${ticker}`);
      if (payload.s !== "ok") return null;
      return normalizeSpotQuote(ticker, payload);
    } catch (err) {
      return this.malformed(err, null);
    }
  }

  /**
   * One request per symbol, sequentially. The first transient failure
   * rejects the whole chunk so that it can be retried as a unit.
   */
  async fetchQuotes(symbols: readonly string[], signal?: AbortSignal): Promise<QuoteMap> {
    const quotes: QuoteMap = new Map();

    for (const symbol of symbols) {
      const body = await this.getJson(`/options/quotes/${encodeURIComponent(symbol)}/`, {}, signal);
      if (body === null) continue;

      try {
        const payload = parsePayload(OptionQuotePayloadSchema, body, `option quote ${symbol}`);
        if (payload.s !== "ok") continue;
        quotes.set(symbol, normalizeOptionQuote(symbol, payload));
      } catch (err) {
        this.malformed(err, null);
      }
    }

    return quotes;
  }

  // ─── Internals ────────────────────────────────────────────

  /** JSON body on success, null when the provider has no data */
  private async getJson(
    path: string,
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        signal: combined,
      });
    } catch (err) {
      // caller-initiated aborts are not provider failures
      signal?.throwIfAborted();
      throw new ProviderUnavailableError(`GET ${path} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (res.status === 429) {
      throw new ProviderUnavailableError(`GET ${path} rate limited`, { status: 429, rateLimited: true });
    }
    if (res.status >= 500) {
      throw new ProviderUnavailableError(`GET ${path} returned HTTP ${res.status}`, { status: res.status });
    }
    if (!SUCCESS_STATUSES.has(res.status)) {
      if (res.status !== 404) {
        log.warn(`GET ${path} returned HTTP ${res.status}, treating as no data`);
      }
      return null;
    }

    try {
      const body: unknown = await res.json();
      return body;
    } catch (err) {
      log.warn(`GET ${path} returned a non-JSON body`, { error: errorMessage(err) });
      return null;
    }
  }

  /** Log a DataMalformedError and fall back; anything else is rethrown */
  private malformed<T>(err: unknown, fallback: T): T {
    if (err instanceof DataMalformedError) {
      log.warn(`Malformed provider payload, treating as no data`, { error: err.message });
      return fallback;
    }
    throw err;
  }
}
