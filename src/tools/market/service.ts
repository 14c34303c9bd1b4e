import { PRICE_CACHE_TTL_MS } from "../../config.js";
import { FetchResult, NormalizedQuote } from "./provider.js";

export const PRICE_UNAVAILABLE_TEXT = "Could not fetch coffee price. Please try again later.";

export interface QuoteFetcher {
  fetchQuote(): Promise<FetchResult>;
}

export function formatQuote(quote: NormalizedQuote): string {
  return `☕ Coffee Price (as of ${quote.tradingDate}): $${quote.pricePerKg.toFixed(3)} per kg`;
}

export function formatFetchResult(result: FetchResult): string {
  return result.status === "ok" ? formatQuote(result.quote) : PRICE_UNAVAILABLE_TEXT;
}

/**
 * Front of the fetcher for chat queries: successful quotes are reused for
 * `maxAgeMs`, and concurrent callers share one cascade.
 */
export class QuoteService {
  private cached: { result: FetchResult; fetchedAt: number } | null = null;
  private inFlight: Promise<FetchResult> | null = null;

  constructor(
    private fetcher: QuoteFetcher,
    private ttlMs = PRICE_CACHE_TTL_MS,
    private now: () => number = Date.now,
  ) {}

  async getQuote(opts?: { maxAgeMs?: number }): Promise<FetchResult> {
    const maxAgeMs = opts?.maxAgeMs ?? this.ttlMs;
    if (this.cached && this.now() - this.cached.fetchedAt <= maxAgeMs) {
      return this.cached.result;
    }

    if (this.inFlight) {
      return this.inFlight;
    }

    const promise = (async () => {
      const result = await this.fetcher.fetchQuote();
      if (result.status === "ok") {
        this.cached = { result, fetchedAt: this.now() };
      }
      return result;
    })().finally(() => {
      this.inFlight = null;
    });

    this.inFlight = promise;
    return promise;
  }

  async getQuoteText(opts?: { maxAgeMs?: number }): Promise<string> {
    return formatFetchResult(await this.getQuote(opts));
  }
}
