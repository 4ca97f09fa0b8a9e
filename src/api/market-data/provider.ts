/**
 * Market data provider contract consumed by the scanner and the backfill.
 *
 * Implementations throw ProviderUnavailableError for transient failures and
 * report "no data" through their return values. Retrying is the caller's job.
 */

import type { CandleSeries, SpotQuote } from "../../types/market.js";
import type { QuoteMap } from "../../types/options.js";

export interface MarketDataProvider {
  /** Daily candles for [from, to], both YYYY-MM-DD */
  fetchCandles(ticker: string, from: string, to: string, signal?: AbortSignal): Promise<CandleSeries>;

  /** Listed option symbols; empty when the provider has no chain */
  fetchChainSymbols(ticker: string, signal?: AbortSignal): Promise<string[]>;

  /**
   * Quotes for one chunk of symbols. Symbols without data are left out of
   * the map. Throws when the chunk as a whole could not be fetched.
   */
  fetchQuotes(symbols: readonly string[], signal?: AbortSignal): Promise<QuoteMap>;

  /** Underlying quote, or null when the provider has none */
  fetchSpotQuote(ticker: string, signal?: AbortSignal): Promise<SpotQuote | null>;
}
