/**
 * Option quote and scan result type definitions.
 */

import type { VarianceMode } from "./market.js";

/** Normalized quote for one listed option symbol */
export interface OptionQuote {
  symbol: string;
  iv: number | null;
  delta: number | null;
  bid: number | null;
  ask: number | null;
  mid: number | null;
  last: number | null;
}

/**
 * Quotes keyed by symbol, in first-seen order.
 * A missing key means the provider returned nothing for that symbol.
 */
export type QuoteMap = Map<string, OptionQuote>;

/** Why a ticker has no ATM implied volatility */
export type AtmReason = "no_spot" | "no_chain" | "no_quotes" | "no_iv" | "error";

/** Why a ticker has no score */
export type ScoreReason = AtmReason | "no_rv" | "zero_rv";

/** ATM contract chosen for a ticker in one scan */
export interface AtmPick {
  ticker: string;
  spot: number | null;
  symbol: string | null;
  iv: number | null;
  delta: number | null;
  reason: AtmReason | null;
}

/** One row of a scan result */
export interface ScoreEntry {
  ticker: string;
  spot: number | null;
  optionSymbol: string | null;
  delta: number | null;
  iv: number | null;
  rv: number | null;
  /** iv - rv */
  gap: number | null;
  /** iv / rv - 1; higher means options priced rich versus realized movement */
  score: number | null;
  reason: ScoreReason | null;
}

/** Ranked scan output */
export interface ScanReport {
  runId: string;
  asofDate: string;
  window: number;
  /** Variance convention of the RV rows the scores use */
  variance: VarianceMode;
  top: number;
  /** Number of tickers scanned, before truncation */
  count: number;
  ranked: ScoreEntry[];
}
