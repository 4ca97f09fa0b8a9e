/**
 * IV / RV Gap Scoring
 *
 * Provides:
 *   - gap   = IV − RV
 *   - score = IV / RV − 1   (higher = options rich versus realized movement)
 *   - ranking with a fixed placement for entries that have no score
 */

import type { ScoreEntry } from "../types/options.js";

// ─── Interfaces ─────────────────────────────────────────

export interface GapScore {
  gap: number | null;
  score: number | null;
}

export interface RankOptions {
  /** Max scored entries kept */
  top: number;
  /** Max unscored entries appended after the scored ones */
  maxUnscored?: number;
}

export const DEFAULT_MAX_UNSCORED = 10;

// ─── Scoring ────────────────────────────────────────────

/**
 * Both outputs are null when either input is null or rv is 0.
 */
export function scoreIvGap(iv: number | null, rv: number | null): GapScore {
  if (iv === null || rv === null || rv === 0) {
    return { gap: null, score: null };
  }
  return { gap: iv - rv, score: iv / rv - 1 };
}

// ─── Ranking ────────────────────────────────────────────

/**
 * Descending by score; an absent score sorts after every present one.
 * Equal scores fall back to ticker so the order never depends on input order.
 */
export function compareScoreDesc(
  a: Pick<ScoreEntry, "ticker" | "score">,
  b: Pick<ScoreEntry, "ticker" | "score">
): number {
  if (a.score === null && b.score === null) return 0;
  if (a.score === null) return 1;
  if (b.score === null) return -1;
  if (a.score !== b.score) return b.score - a.score;
  return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
}

/**
 * Top `top` scored entries, then up to `maxUnscored` unscored entries in
 * their original order. The two groups are never interleaved.
 */
export function rankScoreEntries<T extends Pick<ScoreEntry, "ticker" | "score">>(
  entries: ReadonlyArray<T>,
  options: RankOptions
): T[] {
  const { top, maxUnscored = DEFAULT_MAX_UNSCORED } = options;

  const scored = entries.filter((e) => e.score !== null).sort(compareScoreDesc);
  const unscored = entries.filter((e) => e.score === null);

  return [...scored.slice(0, Math.max(0, top)), ...unscored.slice(0, Math.max(0, maxUnscored))];
}
