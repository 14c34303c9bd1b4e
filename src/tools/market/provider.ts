export type SymbolRule = {
  symbol: string;
  /** Factor that turns the provider's raw quote into USD per pound. */
  unitMultiplier: number;
};

export type PriceSample = {
  value: number;
  tradedAt: Date;
  /** IANA zone the trading date is read in. */
  timeZone: string;
};

export type SourceFailureKind = "NoData" | "TransportError" | "MalformedResponse";

export type SourceFailure = { ok: false; kind: SourceFailureKind; reason: string };

export type SourceResult = { ok: true; sample: PriceSample } | SourceFailure;

export interface PriceSource {
  readonly name: string;
  fetchSample(symbol: string): Promise<SourceResult>;
}

export type QuoteAttempt = {
  source: string;
  symbol: string;
  attempt: number;
  result: SourceResult;
};

export type NormalizedQuote = {
  symbol: string;
  source: string;
  pricePerKg: number;
  currency: "USD";
  tradingDate: string;
};

export type FetchResult =
  | { status: "ok"; quote: NormalizedQuote; attempts: QuoteAttempt[] }
  | { status: "unavailable"; attempts: QuoteAttempt[] };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export function failure(kind: SourceFailureKind, reason: string): SourceFailure {
  return { ok: false, kind, reason };
}
