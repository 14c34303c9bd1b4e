import { z } from "zod";

import {
  FetchLike,
  PriceSource,
  SourceFailure,
  SourceResult,
  failure,
} from "../provider.js";

const USER_AGENT = "Mozilla/5.0 (compatible; beanwire/0.1)";

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string().optional(),
            exchangeTimezoneName: z.string().optional(),
            regularMarketPrice: z.number().nullable().optional(),
            regularMarketTime: z.number().nullable().optional(),
          }),
          timestamp: z.array(z.number().nullable()).optional(),
          indicators: z
            .object({
              quote: z.array(z.object({ close: z.array(z.number().nullable()).optional() })),
            })
            .optional(),
        }),
      )
      .nullable()
      .optional(),
    error: z
      .object({ code: z.string().optional(), description: z.string().nullable().optional() })
      .nullable()
      .optional(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof chartSchema>["chart"]["result"]>[number];

export type YahooSourceOptions = {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

/** One GET with a timeout; any transport or decoding problem becomes a typed failure. */
export async function requestJson(
  fetchImpl: FetchLike,
  url: string,
  timeoutMs: number,
): Promise<{ ok: true; body: unknown } | SourceFailure> {
  let res: Response;
  try {
    res = await fetchImpl(url, {
      headers: { Accept: "application/json", "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    return failure("TransportError", describeError(err));
  }
  if (!res.ok) {
    return failure("TransportError", `HTTP ${res.status}`);
  }

  let text: string;
  try {
    text = await res.text();
  } catch (err) {
    return failure("TransportError", describeError(err));
  }
  try {
    const body: unknown = JSON.parse(text);
    return { ok: true, body };
  } catch {
    return failure("MalformedResponse", "response body is not JSON");
  }
}

async function fetchChart(
  fetchImpl: FetchLike,
  url: string,
  timeoutMs: number,
): Promise<{ ok: true; result: ChartResult } | SourceFailure> {
  const res = await requestJson(fetchImpl, url, timeoutMs);
  if (!res.ok) return res;

  const parsed = chartSchema.safeParse(res.body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return failure("MalformedResponse", `${issue.path.join(".") || "body"}: ${issue.message}`);
  }
  const { chart } = parsed.data;
  if (chart.error) {
    return failure("NoData", chart.error.description || chart.error.code || "provider error");
  }
  const result = chart.result?.[0];
  if (!result) {
    return failure("NoData", "empty chart result");
  }
  return { ok: true, result };
}

/**
 * Daily closes for a symbol over a lookback window. The latest point that has
 * both a close and a timestamp is the sample.
 */
export class YahooHistorySource implements PriceSource {
  readonly name = "yahoo-history";
  private fetchImpl: FetchLike;

  constructor(private opts: YahooSourceOptions & { range: string }) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async fetchSample(symbol: string): Promise<SourceResult> {
    const url =
      `${this.opts.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}` +
      `?range=${encodeURIComponent(this.opts.range)}&interval=1d`;
    const chart = await fetchChart(this.fetchImpl, url, this.opts.timeoutMs);
    if (!chart.ok) return chart;

    const { meta, timestamp = [], indicators } = chart.result;
    const closes = indicators?.quote[0]?.close ?? [];
    for (let i = Math.min(timestamp.length, closes.length) - 1; i >= 0; i -= 1) {
      const ts = timestamp[i];
      const close = closes[i];
      if (typeof ts !== "number" || typeof close !== "number") continue;
      if (!Number.isFinite(ts) || !Number.isFinite(close)) continue;
      const tradedAt = new Date(ts * 1000);
      if (Number.isNaN(tradedAt.getTime())) {
        return failure("MalformedResponse", `timestamp ${ts} is out of range`);
      }
      return {
        ok: true,
        sample: {
          value: close,
          tradedAt,
          timeZone: meta.exchangeTimezoneName || "UTC",
        },
      };
    }
    return failure("NoData", `no price points in ${this.opts.range}`);
  }
}

/** Most recent market price from the quote metadata, timestamped in epoch seconds. */
export class YahooDirectSource implements PriceSource {
  readonly name = "yahoo-direct";
  private fetchImpl: FetchLike;

  constructor(private opts: YahooSourceOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async fetchSample(symbol: string): Promise<SourceResult> {
    const url = `${this.opts.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}?range=1d&interval=1m`;
    const chart = await fetchChart(this.fetchImpl, url, this.opts.timeoutMs);
    if (!chart.ok) return chart;

    const { regularMarketPrice: price, regularMarketTime: time, exchangeTimezoneName } =
      chart.result.meta;
    if (typeof price !== "number" || !Number.isFinite(price)) {
      return failure("NoData", "no regular market price");
    }
    if (typeof time !== "number" || !Number.isFinite(time)) {
      return failure("NoData", "no regular market time");
    }
    const tradedAt = new Date(time * 1000);
    if (Number.isNaN(tradedAt.getTime())) {
      return failure("MalformedResponse", `regular market time ${time} is out of range`);
    }
    return {
      ok: true,
      sample: {
        value: price,
        tradedAt,
        timeZone: exchangeTimezoneName || "UTC",
      },
    };
  }
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "TimeoutError" ? "request timed out" : err.message;
  }
  return String(err);
}
