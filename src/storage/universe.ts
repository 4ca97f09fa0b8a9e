/**
 * Ticker universe persistence — JSON file storage
 *
 * The universe is refreshed from a CSV (one ticker column, with or without a
 * header) and kept in data/universe.json between runs.
 */

import fs from "fs";
import path from "path";
import Papa from "papaparse";
import { z } from "zod";
import { componentLogger } from "../utils/logger.js";
import { TickerSchema } from "../utils/validation.js";

const log = componentLogger("universe");

const HEADER_COLUMNS = ["Symbol", "symbol", "Ticker", "ticker"];

const UniverseFileSchema = z.object({
  source: z.string(),
  updatedAt: z.string(),
  tickers: z.array(z.string()),
});

export type UniverseFile = z.infer<typeof UniverseFileSchema>;

/** BRK.B → BRK-B, upper-cased; null if it is not a ticker */
export function normalizeTicker(raw: string): string | null {
  const result = TickerSchema.safeParse(raw.replace(/\./g, "-"));
  return result.success ? result.data : null;
}

/**
 * Tickers from CSV text. Uses the Symbol/Ticker column when a header is
 * present, otherwise the first column of every row.
 */
export function parseUniverseCsv(text: string): string[] {
  const parsed = Papa.parse<string[]>(text.trim(), { skipEmptyLines: true });
  const rows = parsed.data;
  if (rows.length === 0) return [];

  const header = rows[0] ?? [];
  const columnIndex = header.findIndex((h) => HEADER_COLUMNS.includes(h.trim()));
  const hasHeader = columnIndex >= 0 || header.some((h) => h.trim().toLowerCase() === "name");
  const col = Math.max(columnIndex, 0);

  const seen = new Set<string>();
  const tickers: string[] = [];
  for (const row of hasHeader ? rows.slice(1) : rows) {
    const cell = row[col];
    if (cell === undefined) continue;
    const ticker = normalizeTicker(cell);
    if (ticker === null || seen.has(ticker)) continue;
    seen.add(ticker);
    tickers.push(ticker);
  }
  return tickers;
}

export class UniverseStore {
  private readonly filePath: string;

  constructor(dataDir: string) {
    this.filePath = path.resolve(dataDir, "universe.json");
  }

  /** Stored tickers; empty if the universe was never refreshed */
  load(): string[] {
    if (!fs.existsSync(this.filePath)) return [];
    const raw = fs.readFileSync(this.filePath, "utf-8");
    return UniverseFileSchema.parse(JSON.parse(raw)).tickers;
  }

  save(tickers: readonly string[], source: string): UniverseFile {
    const doc: UniverseFile = {
      source,
      updatedAt: new Date().toISOString(),
      tickers: [...tickers],
    };

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpFile = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpFile, JSON.stringify(doc, null, 2), "utf-8");
    fs.renameSync(tmpFile, this.filePath);
    return doc;
  }

  /** Replace the stored universe with the tickers of a CSV file */
  refreshFromCsv(csvPath: string): UniverseFile {
    const resolved = path.resolve(csvPath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Universe CSV not found: ${resolved}`);
    }
    const tickers = parseUniverseCsv(fs.readFileSync(resolved, "utf-8"));
    log.info(`Universe refreshed from ${resolved}: ${tickers.length} tickers`);
    return this.save(tickers, resolved);
  }
}
