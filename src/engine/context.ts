/**
 * Wires config into the provider, stores, scanner and backfill options.
 *
 * The provider is built lazily: it needs MARKETDATA_API_KEY, and reading the
 * stored universe or RV must keep working without it.
 */

import { config as defaultConfig, requireApiKey, type Config } from "../config/index.js";
import { MarketDataAppClient } from "../api/market-data/marketdata.js";
import type { MarketDataProvider } from "../api/market-data/provider.js";
import type { RetryPolicy } from "../api/market-data/retry.js";
import { JsonFilePriceStore, type PriceSeriesStore } from "../storage/price-store.js";
import { UniverseStore } from "../storage/universe.js";
import { ScanOrchestrator } from "./scanner.js";

export interface AppContext {
  config: Config;
  store: PriceSeriesStore;
  universe: UniverseStore;
  retry: RetryPolicy;
  /** Throws ConfigurationMissingError without an API key */
  provider(): MarketDataProvider;
  /** Throws ConfigurationMissingError without an API key */
  scanner(): ScanOrchestrator;
}

export function retryPolicyFrom(cfg: Config): RetryPolicy {
  return {
    maxAttempts: cfg.retry.maxAttempts,
    baseDelayMs: cfg.retry.baseDelayMs,
    rateLimitMultiplier: cfg.retry.rateLimitMultiplier,
  };
}

export function createContext(cfg: Config = defaultConfig): AppContext {
  const store = new JsonFilePriceStore(cfg.dataDir);
  const universe = new UniverseStore(cfg.dataDir);
  const retry = retryPolicyFrom(cfg);

  let provider: MarketDataProvider | null = null;
  let scanner: ScanOrchestrator | null = null;

  const getProvider = (): MarketDataProvider => {
    if (!provider) {
      provider = new MarketDataAppClient({
        apiKey: requireApiKey(cfg),
        baseUrl: cfg.marketData.baseUrl,
        timeoutMs: cfg.marketData.timeoutMs,
      });
    }
    return provider;
  };

  return {
    config: cfg,
    store,
    universe,
    retry,
    provider: getProvider,
    scanner: () => {
      if (!scanner) {
        scanner = new ScanOrchestrator(getProvider(), store, {
          maxConcurrent: cfg.scan.maxConcurrent,
          minTimeMs: cfg.scan.minTimeMs,
          chunkSize: cfg.quotes.chunkSize,
          maxSymbols: cfg.quotes.maxSymbols,
          retry,
          rvMaxAgeDays: cfg.rv.maxAgeDays,
          rvVariance: cfg.rv.scanVariance,
        });
      }
      return scanner;
    },
  };
}
