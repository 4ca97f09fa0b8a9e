/**
 * Input validation utilities.
 */

import { z } from "zod";
import type { VarianceMode } from "../types/market.js";

/** Equity ticker: letters, optionally a share-class suffix (BRK-B) */
export const TickerSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z]{1,6}(-[A-Z]{1,2})?$/, "Ticker must be 1-6 letters with an optional -X class suffix");

/** Calendar date in the store's key format */
export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

const VarianceSchema = z.enum(["population", "sample"]);

const LimitSchema = z.coerce.number().int().min(0).default(0);

/** Query parameters of a scan request; defaults come from configuration */
export function scanParamsSchema(defaults: { window: number; top: number; variance: VarianceMode }) {
  return z.object({
    window: z.coerce.number().int().min(2).default(defaults.window),
    top: z.coerce.number().int().positive().default(defaults.top),
    limit: LimitSchema,
    asof: IsoDateSchema.optional(),
    variance: VarianceSchema.default(defaults.variance),
  });
}

/** Query parameters of an on-demand snapshot backfill */
export function backfillParamsSchema(defaults: { window: number }) {
  return z.object({
    window: z.coerce.number().int().min(2).default(defaults.window),
    limit: LimitSchema,
    lookback_days: z.coerce.number().int().positive().default(260),
  });
}

export const UniverseParamsSchema = z.object({ limit: LimitSchema });

export const TickerParamsSchema = z.object({ ticker: TickerSchema });

/** `symbols` is a comma-separated list of option symbols */
export const QuotesBatchParamsSchema = z.object({
  symbols: z
    .string()
    .transform((raw) =>
      raw
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    )
    .pipe(z.array(z.string()).min(1, "no symbols provided")),
  limit: z.coerce.number().int().positive().default(50),
});

export type ScanParams = z.infer<ReturnType<typeof scanParamsSchema>>;
export type BackfillParams = z.infer<ReturnType<typeof backfillParamsSchema>>;

/** Generate a unique correlation ID for run tracking */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

/** Today's date in UTC as YYYY-MM-DD */
export function todayUtc(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

/** Shift a YYYY-MM-DD date by a number of calendar days */
export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}
