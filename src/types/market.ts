/**
 * Market data type definitions.
 * Covers daily closes, realized volatility rows, and spot quotes.
 */

/** Daily closing price. At most one per (ticker, date). */
export interface PricePoint {
  ticker: string;
  /** YYYY-MM-DD, UTC */
  date: string;
  close: number;
}

/**
 * Variance divisor behind an RV value: "sample" divides by W − 1,
 * "population" by W. Rows of different conventions are never mixed.
 */
export type VarianceMode = "sample" | "population";

/** Realized volatility for one trailing window, keyed by (ticker, window, variance, asofDate) */
export interface RealizedVolPoint {
  ticker: string;
  /** Window length in trading days */
  window: number;
  variance: VarianceMode;
  asofDate: string;
  /** Annualized RV, null when the window had too few valid returns */
  rv: number | null;
}

/** Provider daily candle; close is null when the provider sent none */
export interface CandlePoint {
  date: string;
  close: number | null;
}

/** Result of a daily candle request, ascending by date */
export type CandleSeries =
  | { status: "ok"; points: CandlePoint[] }
  | { status: "no_data" };

/** Underlying quote used to derive a spot price */
export interface SpotQuote {
  ticker: string;
  mid: number | null;
  bid: number | null;
  ask: number | null;
  last: number | null;
}

/** Inclusive date range over stored closes */
export interface DateRange {
  from?: string;
  to?: string;
}
