/**
 * Price & Realized Volatility Store
 *
 * Durable mapping (ticker, date) → close and (ticker, window, variance, asofDate) → RV.
 * Writes are upserts on those keys, so a retried backfill is idempotent.
 *
 * File: data/price-store.json (versioned document, atomic tmp + rename writes)
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { componentLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { addDays } from "../utils/validation.js";
import type { DateRange, PricePoint, RealizedVolPoint, VarianceMode } from "../types/market.js";

const log = componentLogger("price-store");

// ── Contract ────────────────────────────────────────────────

export interface RvLookupOptions {
  /** Variance convention of the rows to read (default "population") */
  variance?: VarianceMode;
  /** Calendar days before `asof` a row may be dated (default 7) */
  maxAgeDays?: number;
}

export interface PriceSeriesStore {
  /** Closes for one ticker, ascending by date, range inclusive */
  readCloses(ticker: string, range?: DateRange): Promise<PricePoint[]>;
  upsertCloses(points: readonly PricePoint[]): Promise<void>;
  upsertRealizedVol(points: readonly RealizedVolPoint[]): Promise<void>;
  /**
   * Latest non-null RV for (ticker, window, variance) dated on or before
   * `asof`, and no more than `maxAgeDays` calendar days older than it.
   */
  getRealizedVol(
    ticker: string,
    window: number,
    asof: string,
    options?: RvLookupOptions
  ): Promise<RealizedVolPoint | null>;
  /** Run `fn` with writes held back, then persist them once */
  batch<T>(fn: () => Promise<T>): Promise<T>;
  /** Persist pending writes now */
  flush(): Promise<void>;
}

// ── In-memory implementation ────────────────────────────────

const closeKey = (ticker: string, date: string) => `${ticker}|${date}`;
const rvKey = (p: Pick<RealizedVolPoint, "ticker" | "window" | "variance" | "asofDate">) =>
  `${p.ticker}|${p.window}|${p.variance}|${p.asofDate}`;

export class InMemoryPriceStore implements PriceSeriesStore {
  protected closes = new Map<string, PricePoint>();
  protected rvs = new Map<string, RealizedVolPoint>();
  private batchDepth = 0;
  private dirty = false;

  async readCloses(ticker: string, range: DateRange = {}): Promise<PricePoint[]> {
    const out: PricePoint[] = [];
    for (const p of this.closes.values()) {
      if (p.ticker !== ticker) continue;
      if (range.from !== undefined && p.date < range.from) continue;
      if (range.to !== undefined && p.date > range.to) continue;
      out.push(p);
    }
    return out.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }

  async upsertCloses(points: readonly PricePoint[]): Promise<void> {
    let skipped = 0;
    for (const p of points) {
      if (!Number.isFinite(p.close) || p.close <= 0) {
        skipped++;
        continue;
      }
      this.closes.set(closeKey(p.ticker, p.date), { ...p });
    }
    if (skipped > 0) log.warn(`Skipped ${skipped} non-positive closes`);
    await this.changed();
  }

  async upsertRealizedVol(points: readonly RealizedVolPoint[]): Promise<void> {
    for (const p of points) {
      this.rvs.set(rvKey(p), { ...p });
    }
    await this.changed();
  }

  async getRealizedVol(
    ticker: string,
    window: number,
    asof: string,
    options: RvLookupOptions = {}
  ): Promise<RealizedVolPoint | null> {
    const { variance = "population", maxAgeDays = 7 } = options;
    const oldest = addDays(asof, -maxAgeDays);
    let best: RealizedVolPoint | null = null;

    for (const p of this.rvs.values()) {
      if (p.ticker !== ticker || p.window !== window || p.variance !== variance || p.rv === null) continue;
      if (p.asofDate > asof || p.asofDate < oldest) continue;
      if (!best || p.asofDate > best.asofDate) best = p;
    }
    return best ? { ...best } : null;
  }

  async batch<T>(fn: () => Promise<T>): Promise<T> {
    this.batchDepth++;
    try {
      return await fn();
    } finally {
      this.batchDepth--;
      if (this.batchDepth === 0) await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (!this.dirty) return;
    this.dirty = false;
    await this.persist();
  }

  /** Hook for durable subclasses */
  protected async persist(): Promise<void> {}

  private async changed(): Promise<void> {
    this.dirty = true;
    if (this.batchDepth === 0) await this.flush();
  }
}

// ── JSON file implementation ────────────────────────────────

const StoreFileSchema = z.object({
  version: z.literal(1),
  lastUpdated: z.string(),
  closes: z.array(
    z.object({ ticker: z.string(), date: z.string(), close: z.number().positive() })
  ),
  realizedVol: z.array(
    z.object({
      ticker: z.string(),
      window: z.number().int().positive(),
      variance: z.enum(["sample", "population"]),
      asofDate: z.string(),
      rv: z.number().min(0).nullable(),
    })
  ),
});

type StoreFile = z.infer<typeof StoreFileSchema>;

export class JsonFilePriceStore extends InMemoryPriceStore {
  private readonly filePath: string;

  constructor(dataDir: string, fileName: string = "price-store.json") {
    super();
    this.filePath = path.resolve(dataDir, fileName);
    this.load();
  }

  /** Missing file starts empty; a corrupt one is refused rather than overwritten */
  private load(): void {
    if (!fs.existsSync(this.filePath)) return;

    const raw = fs.readFileSync(this.filePath, "utf-8");
    let parsed: StoreFile;
    try {
      parsed = StoreFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new Error(`Cannot read price store ${this.filePath}: ${errorMessage(err)}`);
    }

    for (const p of parsed.closes) this.closes.set(closeKey(p.ticker, p.date), p);
    for (const p of parsed.realizedVol) this.rvs.set(rvKey(p), p);
    log.info(`Loaded price store: ${this.closes.size} closes, ${this.rvs.size} RV rows`);
  }

  /** Synchronous tmp + rename, so overlapping upserts cannot interleave */
  protected override async persist(): Promise<void> {
    const doc: StoreFile = {
      version: 1,
      lastUpdated: new Date().toISOString(),
      closes: [...this.closes.values()],
      realizedVol: [...this.rvs.values()],
    };

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

    // Atomic write: write to tmp file, then rename
    const tmpFile = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpFile, JSON.stringify(doc), "utf-8");
    fs.renameSync(tmpFile, this.filePath);
  }
}
