import type { DelayRange } from "../../config.js";
import { logger } from "../../logger.js";
import {
  FetchResult,
  NormalizedQuote,
  PriceSample,
  PriceSource,
  QuoteAttempt,
  SourceResult,
  SymbolRule,
  failure,
} from "./provider.js";

export const LB_PER_KG = 2.20462;

/** The direct endpoint is only ever queried for the front-month arabica contract. */
export const DIRECT_FALLBACK: SymbolRule = { symbol: "KC=F", unitMultiplier: 0.01 };

export type PriceFetcherOptions = {
  symbols: SymbolRule[];
  history: PriceSource;
  direct: PriceSource;
  maxAttempts: number;
  firstDelay: DelayRange;
  retryDelay: DelayRange;
  fallback?: SymbolRule;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function jitter(range: DelayRange, random: () => number): number {
  return Math.round(range.minMs + random() * (range.maxMs - range.minMs));
}

export function normalizeSample(
  sample: PriceSample,
  rule: SymbolRule,
  source: string,
): NormalizedQuote {
  const pricePerKg = sample.value * rule.unitMultiplier * LB_PER_KG;
  if (!Number.isFinite(pricePerKg)) {
    throw new Error(`price ${sample.value} does not normalize to a finite value`);
  }
  return {
    symbol: rule.symbol,
    source,
    pricePerKg,
    currency: "USD",
    tradingDate: formatTradingDate(sample.tradedAt, sample.timeZone),
  };
}

export function formatTradingDate(at: Date, timeZone: string): string {
  if (Number.isNaN(at.getTime())) {
    throw new RangeError("trading time is out of range");
  }
  let format: Intl.DateTimeFormat;
  try {
    format = new Intl.DateTimeFormat("en-CA", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
  } catch (err) {
    logger.warn({ err, timeZone }, "Unknown exchange timezone; using UTC");
    return at.toISOString().slice(0, 10);
  }
  const parts = format.formatToParts(at);
  const get = (type: string) => parts.find((part) => part.type === type)?.value ?? "";
  return `${get("year")}-${get("month")}-${get("day")}`;
}

/**
 * Walks the symbol list with a per-symbol attempt budget, then makes a single
 * attempt against the direct source. Never rejects: exhaustion yields
 * `{ status: "unavailable" }`.
 */
export class PriceFetcher {
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;
  private fallback: SymbolRule;

  constructor(private opts: PriceFetcherOptions) {
    if (opts.maxAttempts < 1) {
      throw new Error("maxAttempts must be at least 1");
    }
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
    this.fallback = opts.fallback ?? DIRECT_FALLBACK;
  }

  async fetchQuote(): Promise<FetchResult> {
    const attempts: QuoteAttempt[] = [];

    for (const rule of this.opts.symbols) {
      for (let attempt = 1; attempt <= this.opts.maxAttempts; attempt += 1) {
        const quote = await this.attempt(this.opts.history, rule, attempt, attempts);
        if (quote) return { status: "ok", quote, attempts };
      }
    }

    logger.warn(
      { symbols: this.opts.symbols.map((rule) => rule.symbol), fallback: this.fallback.symbol },
      "All symbols exhausted; trying direct endpoint",
    );
    const quote = await this.attempt(this.opts.direct, this.fallback, 1, attempts);
    if (quote) return { status: "ok", quote, attempts };

    logger.error({ attempts: attempts.length }, "Price unavailable after fallback");
    return { status: "unavailable", attempts };
  }

  private async attempt(
    source: PriceSource,
    rule: SymbolRule,
    attempt: number,
    attempts: QuoteAttempt[],
  ): Promise<NormalizedQuote | null> {
    await this.sleep(jitter(attempt === 1 ? this.opts.firstDelay : this.opts.retryDelay, this.random));

    let result: SourceResult;
    try {
      result = await source.fetchSample(rule.symbol);
    } catch (err) {
      result = failure("TransportError", describeError(err));
    }

    if (result.ok) {
      try {
        const quote = normalizeSample(result.sample, rule, source.name);
        attempts.push({ source: source.name, symbol: rule.symbol, attempt, result });
        logger.info(
          { source: source.name, symbol: rule.symbol, attempt, pricePerKg: quote.pricePerKg },
          "Price fetched",
        );
        return quote;
      } catch (err) {
        result = failure("MalformedResponse", describeError(err));
      }
    }

    attempts.push({ source: source.name, symbol: rule.symbol, attempt, result });
    logger.warn(
      { source: source.name, symbol: rule.symbol, attempt, kind: result.kind, reason: result.reason },
      "Price attempt failed",
    );
    return null;
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
