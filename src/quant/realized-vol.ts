/**
 * Realized Volatility Estimator
 *
 * Annualized standard deviation of daily log returns over a trailing window:
 *
 *   rₜ = ln(Cₜ / Cₜ₋₁)
 *   RV = √(Var(r) · tradingDays)
 *
 * Two variance conventions are in use and both are kept:
 *   - "sample"      (÷ (W−1)): single-window estimate, on-demand snapshot path
 *   - "population"  (÷ W):     rolling per-row series, historical backfill path
 * They differ by a factor of √(W / (W−1)). Callers pick one explicitly and
 * stay with it.
 */

import type { VarianceMode } from "../types/market.js";

export interface RealizedVolOptions {
  variance?: VarianceMode;
  /** Annualization constant (trading days per year) */
  tradingDays?: number;
}

export const DEFAULT_TRADING_DAYS = 252;

function isValidClose(close: number | null | undefined): close is number {
  return typeof close === "number" && Number.isFinite(close) && close > 0;
}

/**
 * Log returns between consecutive closes.
 * An entry is null when either close is missing, non-finite or ≤ 0.
 */
export function logReturns(closes: ReadonlyArray<number | null>): (number | null)[] {
  const returns: (number | null)[] = [];
  for (let i = 1; i < closes.length; i++) {
    const c0 = closes[i - 1];
    const c1 = closes[i];
    returns.push(isValidClose(c0) && isValidClose(c1) ? Math.log(c1 / c0) : null);
  }
  return returns;
}

/**
 * Annualized volatility of exactly these returns.
 * Null if any return is invalid or the window is too short to divide by.
 */
function annualizedVol(
  window: ReadonlyArray<number | null>,
  variance: VarianceMode,
  tradingDays: number
): number | null {
  const n = window.length;
  if (n <= 1) return null;

  let sum = 0;
  for (const r of window) {
    if (r === null) return null;
    sum += r;
  }
  const mean = sum / n;

  let ss = 0;
  for (const r of window) {
    // nulls were rejected above
    if (r !== null) ss += (r - mean) ** 2;
  }

  const divisor = variance === "sample" ? n - 1 : n;
  return Math.sqrt((ss / divisor) * tradingDays);
}

/**
 * RV for the trailing `window` returns ending at the last close.
 *
 * Returns null when fewer than `window + 1` closes are given, when
 * `window ≤ 1`, or when any close feeding the trailing window is invalid.
 */
export function estimateRealizedVol(
  closes: ReadonlyArray<number | null>,
  window: number,
  options: RealizedVolOptions = {}
): number | null {
  const { variance = "sample", tradingDays = DEFAULT_TRADING_DAYS } = options;

  if (!Number.isInteger(window) || window <= 1) return null;
  if (closes.length < window + 1) return null;

  const trailing = logReturns(closes.slice(-(window + 1)));
  return annualizedVol(trailing, variance, tradingDays);
}

/**
 * Rolling RV aligned with `closes`: element i is the RV of the `window`
 * returns ending at close i, or null while fewer are available.
 * A bad close nulls every window whose returns touch it.
 */
export function rollingRealizedVol(
  closes: ReadonlyArray<number | null>,
  window: number,
  options: RealizedVolOptions = {}
): (number | null)[] {
  const { variance = "population", tradingDays = DEFAULT_TRADING_DAYS } = options;
  const out: (number | null)[] = closes.map(() => null);

  if (!Number.isInteger(window) || window <= 1) return out;

  const returns = logReturns(closes);
  // returns[j] ends at close j + 1
  for (let end = window; end <= returns.length; end++) {
    out[end] = annualizedVol(returns.slice(end - window, end), variance, tradingDays);
  }
  return out;
}
