import { FetchLike } from "../src/tools/market/provider";
import { YahooDirectSource, YahooHistorySource, requestJson } from "../src/tools/market/providers/yahoo";

function respondWith(body: unknown, status = 200): jest.Mock<ReturnType<FetchLike>, Parameters<FetchLike>> {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>(async () => new Response(text, { status }));
}

function chartBody(result: Record<string, unknown>) {
  return { chart: { result: [result], error: null } };
}

// 2026-10-14, 15 and 16 at 08:15 UTC
const TIMESTAMPS = [1791965700, 1792052100, 1792138500];

describe("YahooHistorySource", () => {
  it("requests the lookback window and returns the latest usable close", async () => {
    const fetchImpl = respondWith(
      chartBody({
        meta: { symbol: "KC=F", exchangeTimezoneName: "America/New_York" },
        timestamp: TIMESTAMPS,
        indicators: { quote: [{ close: [371.5, 378.25, null] }] },
      }),
    );
    const source = new YahooHistorySource({
      baseUrl: "https://history.test",
      range: "5d",
      timeoutMs: 1000,
      fetchImpl,
    });

    const result = await source.fetchSample("KC=F");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe("https://history.test/v8/finance/chart/KC%3DF?range=5d&interval=1d");
    expect(result).toEqual({
      ok: true,
      sample: {
        value: 378.25,
        tradedAt: new Date(1792052100 * 1000),
        timeZone: "America/New_York",
      },
    });
  });

  it("reports NoData when every close is null", async () => {
    const source = new YahooHistorySource({
      baseUrl: "https://history.test",
      range: "5d",
      timeoutMs: 1000,
      fetchImpl: respondWith(
        chartBody({ meta: {}, timestamp: TIMESTAMPS, indicators: { quote: [{ close: [null, null, null] }] } }),
      ),
    });

    expect(await source.fetchSample("KC=F")).toEqual({
      ok: false,
      kind: "NoData",
      reason: "no price points in 5d",
    });
  });

  it("reports NoData for a provider error body", async () => {
    const source = new YahooHistorySource({
      baseUrl: "https://history.test",
      range: "5d",
      timeoutMs: 1000,
      fetchImpl: respondWith({
        chart: { result: null, error: { code: "Not Found", description: "No data found, symbol may be delisted" } },
      }),
    });

    expect(await source.fetchSample("XX=F")).toEqual({
      ok: false,
      kind: "NoData",
      reason: "No data found, symbol may be delisted",
    });
  });

  it("reports MalformedResponse for an unexpected shape", async () => {
    const source = new YahooHistorySource({
      baseUrl: "https://history.test",
      range: "5d",
      timeoutMs: 1000,
      fetchImpl: respondWith({ quoteResponse: {} }),
    });

    const result = await source.fetchSample("KC=F");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.kind).toBe("MalformedResponse");
  });

  it("reports MalformedResponse for a timestamp outside the date range", async () => {
    const source = new YahooHistorySource({
      baseUrl: "https://history.test",
      range: "5d",
      timeoutMs: 1000,
      fetchImpl: respondWith(chartBody({ meta: {}, timestamp: [1e20], indicators: { quote: [{ close: [380] }] } })),
    });

    expect(await source.fetchSample("KC=F")).toEqual({
      ok: false,
      kind: "MalformedResponse",
      reason: "timestamp 100000000000000000000 is out of range",
    });
  });

  it("reports TransportError for a non-2xx status", async () => {
    const source = new YahooHistorySource({
      baseUrl: "https://history.test",
      range: "5d",
      timeoutMs: 1000,
      fetchImpl: respondWith("rate limited", 429),
    });

    expect(await source.fetchSample("KC=F")).toEqual({ ok: false, kind: "TransportError", reason: "HTTP 429" });
  });
});

describe("YahooDirectSource", () => {
  it("reads the regular market price and its epoch-second timestamp", async () => {
    const fetchImpl = respondWith(
      chartBody({
        meta: {
          symbol: "KC=F",
          exchangeTimezoneName: "America/New_York",
          regularMarketPrice: 390.1,
          regularMarketTime: 1792186200,
        },
      }),
    );
    const source = new YahooDirectSource({ baseUrl: "https://direct.test", timeoutMs: 1000, fetchImpl });

    const result = await source.fetchSample("KC=F");

    expect(fetchImpl.mock.calls[0][0]).toBe("https://direct.test/v8/finance/chart/KC%3DF?range=1d&interval=1m");
    expect(result).toEqual({
      ok: true,
      sample: {
        value: 390.1,
        tradedAt: new Date("2026-10-16T21:30:00Z"),
        timeZone: "America/New_York",
      },
    });
  });

  it("reports NoData when the price is missing", async () => {
    const source = new YahooDirectSource({
      baseUrl: "https://direct.test",
      timeoutMs: 1000,
      fetchImpl: respondWith(chartBody({ meta: { regularMarketTime: 1792186200 } })),
    });

    expect(await source.fetchSample("KC=F")).toEqual({
      ok: false,
      kind: "NoData",
      reason: "no regular market price",
    });
  });

  it("reports MalformedResponse for a market time outside the date range", async () => {
    const source = new YahooDirectSource({
      baseUrl: "https://direct.test",
      timeoutMs: 1000,
      fetchImpl: respondWith(chartBody({ meta: { regularMarketPrice: 390.1, regularMarketTime: 1e20 } })),
    });

    expect(await source.fetchSample("KC=F")).toEqual({
      ok: false,
      kind: "MalformedResponse",
      reason: "regular market time 100000000000000000000 is out of range",
    });
  });
});

describe("requestJson", () => {
  it("turns a rejected fetch into a TransportError", async () => {
    const fetchImpl: FetchLike = async () => {
      throw new Error("getaddrinfo ENOTFOUND history.test");
    };

    expect(await requestJson(fetchImpl, "https://history.test", 1000)).toEqual({
      ok: false,
      kind: "TransportError",
      reason: "getaddrinfo ENOTFOUND history.test",
    });
  });

  it("turns a non-JSON body into a MalformedResponse", async () => {
    expect(await requestJson(respondWith("<html>"), "https://history.test", 1000)).toEqual({
      ok: false,
      kind: "MalformedResponse",
      reason: "response body is not JSON",
    });
  });
});
