/**
 * Provider payload validation and normalization.
 *
 * Every MarketData response passes through here exactly once. Fields the
 * provider wraps in single-element arrays are unwrapped to scalars, and
 * anything the rest of the code relies on is checked for shape.
 */

import { z } from "zod";
import { DataMalformedError } from "../../utils/errors.js";
import type { OptionQuote } from "../../types/options.js";
import type { CandlePoint, SpotQuote } from "../../types/market.js";

// ── Schemas ─────────────────────────────────────────────────

const Scalar = z.union([z.number(), z.string(), z.null()]);
const MaybeList = z.union([Scalar, z.array(Scalar)]).optional();

const StatusSchema = z.object({
  s: z.string(),
  errmsg: z.string().optional(),
});

export const CandlesPayloadSchema = StatusSchema.extend({
  t: z.array(z.number()).optional(),
  c: z.array(z.number().nullable()).optional(),
});

export const ChainPayloadSchema = StatusSchema.extend({
  optionSymbol: z.array(z.unknown()).optional(),
});

export const StockQuotePayloadSchema = StatusSchema.extend({
  mid: MaybeList,
  bid: MaybeList,
  ask: MaybeList,
  last: MaybeList,
});

export const OptionQuotePayloadSchema = StatusSchema.extend({
  iv: MaybeList,
  delta: MaybeList,
  bid: MaybeList,
  ask: MaybeList,
  mid: MaybeList,
  last: MaybeList,
});

export type CandlesPayload = z.infer<typeof CandlesPayloadSchema>;
export type OptionQuotePayload = z.infer<typeof OptionQuotePayloadSchema>;
type MaybeListValue = z.infer<typeof MaybeList>;

/** Parse a payload or throw DataMalformedError naming the source */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown, source: string): z.infer<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "payload";
    throw new DataMalformedError(source, `${where}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

// ── Scalars ─────────────────────────────────────────────────

/**
 * First element of a list, or the value itself.
 * Empty lists, nulls and non-numeric strings give null.
 */
export function unwrapFirst(value: MaybeListValue): number | null {
  const v = Array.isArray(value) ? value[0] : value;
  if (v === undefined || v === null) return null;
  const n = typeof v === "number" ? v : Number(v);
  return Number.isFinite(n) && !(typeof v === "string" && v.trim() === "") ? n : null;
}

/** Epoch seconds (UTC) → YYYY-MM-DD */
export function epochToDate(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 10);
}

// ── Records ─────────────────────────────────────────────────

/** Out-of-range iv or delta is treated as absent */
export function normalizeOptionQuote(symbol: string, raw: OptionQuotePayload): OptionQuote {
  const iv = unwrapFirst(raw.iv);
  const delta = unwrapFirst(raw.delta);
  return {
    symbol,
    iv: iv !== null && iv >= 0 ? iv : null,
    delta: delta !== null && delta >= -1 && delta <= 1 ? delta : null,
    bid: unwrapFirst(raw.bid),
    ask: unwrapFirst(raw.ask),
    mid: unwrapFirst(raw.mid),
    last: unwrapFirst(raw.last),
  };
}

export function normalizeSpotQuote(
  ticker: string,
  raw: z.infer<typeof StockQuotePayloadSchema>
): SpotQuote {
  return {
    ticker,
    mid: unwrapFirst(raw.mid),
    bid: unwrapFirst(raw.bid),
    ask: unwrapFirst(raw.ask),
    last: unwrapFirst(raw.last),
  };
}

/** Spot = mid, else (bid + ask) / 2, else last */
export function spotFromQuote(quote: SpotQuote): number | null {
  if (quote.mid !== null) return quote.mid;
  if (quote.bid !== null && quote.ask !== null) return (quote.bid + quote.ask) / 2;
  return quote.last;
}

/**
 * Daily candles sorted by date. Throws on missing or mismatched t/c arrays.
 */
export function normalizeCandles(ticker: string, raw: CandlesPayload): CandlePoint[] {
  const times = raw.t;
  const closes = raw.c;
  if (!times || !closes) {
    throw new DataMalformedError(`candles ${ticker}`, "missing t or c");
  }
  if (times.length !== closes.length) {
    throw new DataMalformedError(
      `candles ${ticker}`,
      `t has ${times.length} entries, c has ${closes.length}`
    );
  }

  return times
    .map((t, i) => ({ t, close: closes[i] ?? null }))
    .sort((a, b) => a.t - b.t)
    .map(({ t, close }) => ({ date: epochToDate(t), close }));
}

/** Non-empty trimmed strings only */
export function normalizeChainSymbols(raw: unknown[] | undefined): string[] {
  if (!raw) return [];
  const out: string[] = [];
  for (const s of raw) {
    if (typeof s === "string" && s.trim().length > 0) out.push(s.trim());
  }
  return out;
}
