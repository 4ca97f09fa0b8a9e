/**
 * At-the-money contract selection.
 *
 * Delta proximity to 0.50 is the sole ordering criterion (an ATM call
 * proxy); strike and expiry are not parsed.
 */

import type { QuoteMap } from "../types/options.js";

export const ATM_TARGET_DELTA = 0.5;

export interface AtmSelection {
  symbol: string;
  iv: number;
  delta: number;
}

/**
 * Pick the quote whose delta is closest to `targetDelta`.
 *
 * Quotes lacking iv or delta are skipped. Ties keep the first-seen quote.
 * Returns null when nothing is eligible (reported upstream as "no_iv").
 */
export function selectAtm(
  _spot: number,
  quotes: QuoteMap,
  targetDelta: number = ATM_TARGET_DELTA
): AtmSelection | null {
  let best: AtmSelection | null = null;
  let bestDist = Infinity;

  for (const [symbol, q] of quotes) {
    if (q.iv === null || q.delta === null) continue;

    const dist = Math.abs(q.delta - targetDelta);
    if (dist < bestDist) {
      bestDist = dist;
      best = { symbol, iv: q.iv, delta: q.delta };
    }
  }

  return best;
}
