import { FetchResult, NormalizedQuote } from "../src/tools/market/provider";
import {
  PRICE_UNAVAILABLE_TEXT,
  QuoteService,
  formatFetchResult,
  formatQuote,
} from "../src/tools/market/service";

const quote: NormalizedQuote = {
  symbol: "KC=F",
  source: "yahoo-history",
  pricePerKg: 8.4932985,
  currency: "USD",
  tradingDate: "2026-10-16",
};

const okResult: FetchResult = { status: "ok", quote, attempts: [] };

const unavailable: FetchResult = { status: "unavailable", attempts: [] };

describe("formatting", () => {
  it("renders three decimals per kilogram", () => {
    expect(formatQuote(quote)).toBe(
      "☕ Coffee Price (as of 2026-10-16): $8.493 per kg",
    );
  });

  it("renders the fixed text for an unavailable result", () => {
    expect(formatFetchResult(unavailable)).toBe("Could not fetch coffee price. Please try again later.");
    expect(PRICE_UNAVAILABLE_TEXT).toBe("Could not fetch coffee price. Please try again later.");
  });
});

describe("QuoteService", () => {
  it("reuses a successful quote within the TTL", async () => {
    let clock = 1_000;
    const fetchQuote = jest.fn(async () => okResult);
    const service = new QuoteService({ fetchQuote }, 55_000, () => clock);

    await service.getQuote();
    clock += 30_000;
    const second = await service.getQuote();

    expect(second).toBe(okResult);
    expect(fetchQuote).toHaveBeenCalledTimes(1);

    clock += 30_000;
    await service.getQuote();
    expect(fetchQuote).toHaveBeenCalledTimes(2);
  });

  it("does not cache an unavailable result", async () => {
    const fetchQuote = jest.fn(async () => unavailable);
    const service = new QuoteService({ fetchQuote }, 55_000, () => 1_000);

    expect(await service.getQuoteText()).toBe(PRICE_UNAVAILABLE_TEXT);
    await service.getQuoteText();

    expect(fetchQuote).toHaveBeenCalledTimes(2);
  });

  it("shares one cascade between concurrent callers", async () => {
    let resolve: (result: FetchResult) => void = () => undefined;
    const fetchQuote = jest.fn(
      () =>
        new Promise<FetchResult>((r) => {
          resolve = r;
        }),
    );
    const service = new QuoteService({ fetchQuote }, 55_000, () => 1_000);

    const first = service.getQuote();
    const second = service.getQuote();
    resolve(okResult);

    expect(await first).toBe(okResult);
    expect(await second).toBe(okResult);
    expect(fetchQuote).toHaveBeenCalledTimes(1);
  });
});
