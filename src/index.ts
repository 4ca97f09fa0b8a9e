/**
 * IV/RV Scanner — public API
 *
 * Ranks equity tickers by how rich their at-the-money implied volatility is
 * against recent realized volatility:
 *
 *   score = IV / RV − 1
 */

export * from "./quant/index.js";
export * from "./types/market.js";
export * from "./types/options.js";

export { ScanOrchestrator, type ScanOrchestratorOptions, type RunScanOptions } from "./engine/scanner.js";
export { runBackfill, rollingRvPoints, toPricePoints, type BackfillOptions, type BackfillSummary } from "./engine/backfill.js";
export { createContext, type AppContext } from "./engine/context.js";
export { createApp } from "./app.js";

export { MarketDataAppClient, type MarketDataClientOptions } from "./api/market-data/marketdata.js";
export type { MarketDataProvider } from "./api/market-data/provider.js";
export { QuoteBatchFetcher, type QuoteBatchResult, type FailedChunk } from "./api/market-data/quote-batch.js";
export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY, type RetryPolicy } from "./api/market-data/retry.js";
export { spotFromQuote, unwrapFirst } from "./api/market-data/normalize.js";

export { InMemoryPriceStore, JsonFilePriceStore, type PriceSeriesStore } from "./storage/price-store.js";
export { UniverseStore, parseUniverseCsv } from "./storage/universe.js";

export { ConfigurationMissingError, ProviderUnavailableError, DataMalformedError } from "./utils/errors.js";
export { loadConfig, type Config } from "./config/index.js";
