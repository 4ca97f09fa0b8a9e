/**
 * Rolling RV backfill over the stored universe.
 *
 * Range: BACKFILL_LOOKBACK_DAYS calendar days up to yesterday (UTC).
 * Windows: RV_WINDOWS. Falls back to UNIVERSE_CSV when no universe is stored.
 *
 * Start: npm run backfill
 */

import { config } from "../config/index.js";
import { componentLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { addDays, todayUtc } from "../utils/validation.js";
import { createContext } from "../engine/context.js";
import { runBackfill } from "../engine/backfill.js";

const log = componentLogger("backfill-cmd");

async function main(): Promise<void> {
  const ctx = createContext(config);
  const provider = ctx.provider();

  let tickers = ctx.universe.load();
  if (tickers.length === 0) {
    log.info(`No stored universe, loading ${config.universeCsv}`);
    tickers = ctx.universe.refreshFromCsv(config.universeCsv).tickers;
  }

  const to = addDays(todayUtc(), -1);
  const from = addDays(to, -config.rv.lookbackDays);

  const summary = await runBackfill(provider, ctx.store, tickers, {
    from,
    to,
    windows: config.rv.windows,
    mode: "rolling",
    tradingDays: config.rv.tradingDays,
    retry: ctx.retry,
  });

  for (const f of summary.failed) {
    log.warn(`${f.ticker}: ${f.reason}`);
  }
}

main().catch((err) => {
  log.error("Backfill failed", { error: errorMessage(err) });
  process.exit(1);
});
