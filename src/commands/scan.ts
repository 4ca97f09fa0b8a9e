/**
 * One-off scan of the stored universe, printed as a ranked table.
 *
 * Start: npm run scan
 */

import { config } from "../config/index.js";
import { componentLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { todayUtc } from "../utils/validation.js";
import { createContext } from "../engine/context.js";
import type { ScoreEntry } from "../types/options.js";

const log = componentLogger("scan-cmd");

const pct = (v: number | null) => (v === null ? "—" : `${(v * 100).toFixed(1)}%`);

function formatRow(rank: number, e: ScoreEntry): string {
  const score = e.score === null ? "—" : e.score.toFixed(3);
  return (
    `${String(rank).padStart(3)}  ${e.ticker.padEnd(7)} ` +
    `IV ${pct(e.iv).padStart(7)}  RV ${pct(e.rv).padStart(7)}  ` +
    `gap ${pct(e.gap).padStart(7)}  score ${score.padStart(7)}` +
    (e.reason ? `  (${e.reason})` : "")
  );
}

async function main(): Promise<void> {
  const ctx = createContext(config);
  const scanner = ctx.scanner();
  const tickers = ctx.universe.load();
  if (tickers.length === 0) {
    log.warn("Universe is empty; run the server's /api/universe/refresh or npm run backfill first");
    return;
  }

  scanner.on("chunk_failed", (ticker, chunk) => {
    log.warn(`${ticker}: ${chunk.symbols.length} quotes skipped`, { error: chunk.error });
  });

  const report = await scanner.runScan(tickers, config.rv.defaultWindow, todayUtc(), {
    top: config.scan.top,
    maxUnscored: config.scan.maxUnscored,
  });

  log.info(`Scan ${report.runId} — asof ${report.asofDate}, RV${report.window} (${report.variance}), ${report.count} tickers`);
  report.ranked.forEach((e, i) => log.info(formatRow(i + 1, e)));
}

main().catch((err) => {
  log.error("Scan failed", { error: errorMessage(err) });
  process.exit(1);
});
