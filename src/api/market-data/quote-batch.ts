/**
 * Quote Batch Fetcher
 *
 * Turns a ticker's option chain into a bounded set of quotes:
 *   1. trim + dedupe symbols (first-seen order), cap at maxSymbols
 *   2. split into chunks of chunkSize
 *   3. fetch each chunk under the retry policy
 *   4. merge a chunk only once it has fully succeeded
 *
 * A chunk that still fails after its last attempt is recorded and skipped;
 * its symbols are simply absent from the result.
 */

import { componentLogger } from "../../utils/logger.js";
import { errorMessage } from "../../utils/errors.js";
import { DEFAULT_RETRY_POLICY, withRetry, type RetryOptions, type RetryPolicy } from "./retry.js";
import type { MarketDataProvider } from "./provider.js";
import type { QuoteMap } from "../../types/options.js";

const log = componentLogger("quote-batch");

export interface QuoteBatchOptions {
  chunkSize?: number;
  maxSymbols?: number;
  retry?: RetryPolicy;
  /** Overrides the retry sleep (tests) */
  sleep?: RetryOptions["sleep"];
}

export interface FailedChunk {
  symbols: string[];
  error: string;
}

export interface QuoteBatchResult {
  quotes: QuoteMap;
  /** Symbols actually requested, after dedupe and cap */
  requested: string[];
  failedChunks: FailedChunk[];
}

/** Trimmed, non-empty, first occurrence only */
export function dedupeSymbols(symbols: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of symbols) {
    const s = raw.trim();
    if (s.length === 0 || seen.has(s)) continue;
    seen.add(s);
    out.push(s);
  }
  return out;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new Error(`Chunk size must be positive, got ${size}`);
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export class QuoteBatchFetcher {
  private readonly chunkSize: number;
  private readonly maxSymbols: number;
  private readonly retry: RetryPolicy;
  private readonly sleep: RetryOptions["sleep"];

  constructor(
    private readonly provider: MarketDataProvider,
    options: QuoteBatchOptions = {}
  ) {
    this.chunkSize = options.chunkSize ?? 20;
    this.maxSymbols = options.maxSymbols ?? 80;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
  }

  /** Listed option symbols for a ticker, retried like any provider call */
  async fetchChainSymbols(ticker: string, signal?: AbortSignal): Promise<string[]> {
    return withRetry(
      () => this.provider.fetchChainSymbols(ticker, signal),
      this.retry,
      { label: `chain ${ticker}`, signal, sleep: this.sleep }
    );
  }

  async fetchQuotes(symbols: readonly string[], signal?: AbortSignal): Promise<QuoteBatchResult> {
    const requested = dedupeSymbols(symbols).slice(0, this.maxSymbols);
    const quotes: QuoteMap = new Map();
    const failedChunks: FailedChunk[] = [];

    for (const batch of chunk(requested, this.chunkSize)) {
      signal?.throwIfAborted();

      let received: QuoteMap;
      try {
        received = await withRetry(
          () => this.provider.fetchQuotes(batch, signal),
          this.retry,
          { label: `quotes chunk of ${batch.length}`, signal, sleep: this.sleep }
        );
      } catch (err) {
        if (signal?.aborted) throw err;
        const failed: FailedChunk = { symbols: batch, error: errorMessage(err) };
        failedChunks.push(failed);
        log.warn(`Skipping quote chunk of ${batch.length} symbols after retries`, {
          first: batch[0],
          error: failed.error,
        });
        continue;
      }

      // only symbols that were asked for in this chunk are merged
      for (const symbol of batch) {
        const q = received.get(symbol);
        if (q) quotes.set(symbol, q);
      }
    }

    log.debug(`Fetched ${quotes.size}/${requested.length} quotes`, {
      failedChunks: failedChunks.length,
    });
    return { quotes, requested, failedChunks };
  }
}
