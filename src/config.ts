import "./env.js";
import path from "path";

import type { SymbolRule } from "./tools/market/provider.js";

export const PROJECT_ROOT = process.cwd();
export const STORE_DIR = path.join(PROJECT_ROOT, "store");

export const LOG_LEVEL =
  process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info");

export const FEISHU_API_BASE = (process.env.FEISHU_API_BASE || "https://open.feishu.cn")
  .replace(/\/$/, "");
export const FEISHU_APP_ID = process.env.FEISHU_APP_ID || "";
export const FEISHU_APP_SECRET = process.env.FEISHU_APP_SECRET || "";
export const FEISHU_BOT_NAME = process.env.FEISHU_BOT_NAME || "";
export const FEISHU_BOT_OPEN_ID = process.env.FEISHU_BOT_OPEN_ID || "";
export const FEISHU_ENCRYPT_KEY = process.env.FEISHU_ENCRYPT_KEY || "";
export const FEISHU_SDK_LOG_LEVEL = process.env.FEISHU_SDK_LOG_LEVEL || "";

export const SUBSCRIBERS_PATH = path.resolve(
  PROJECT_ROOT,
  process.env.SUBSCRIBERS_PATH || path.join(STORE_DIR, "subscribers.json"),
);

export const PRICE_SYMBOLS = parseSymbolRules(
  process.env.PRICE_SYMBOLS || "KC=F:0.01,KCH27.NYB:0.01",
);
export const PRICE_LOOKBACK = process.env.PRICE_LOOKBACK || "5d";
export const PRICE_MAX_ATTEMPTS = parsePositive("PRICE_MAX_ATTEMPTS", process.env.PRICE_MAX_ATTEMPTS || "3");
export const PRICE_FIRST_DELAY_MS = parseRange(process.env.PRICE_FIRST_DELAY_MS || "250-1000");
export const PRICE_RETRY_DELAY_MS = parseRange(process.env.PRICE_RETRY_DELAY_MS || "2000-5000");
export const PRICE_REQUEST_TIMEOUT_MS = parsePositive(
  "PRICE_REQUEST_TIMEOUT_MS",
  process.env.PRICE_REQUEST_TIMEOUT_MS || "10000",
);
export const PRICE_CACHE_TTL_MS = parsePositive(
  "PRICE_CACHE_TTL_MS",
  process.env.PRICE_CACHE_TTL_MS || "55000",
);
export const YAHOO_HISTORY_BASE = (process.env.YAHOO_HISTORY_BASE || "https://query1.finance.yahoo.com")
  .replace(/\/$/, "");
export const YAHOO_DIRECT_BASE = (process.env.YAHOO_DIRECT_BASE || "https://query2.finance.yahoo.com")
  .replace(/\/$/, "");

export const BROADCAST_ENABLED = !["false", "0", "no"].includes(
  (process.env.BROADCAST_ENABLED || "true").toLowerCase(),
);
export const BROADCAST_DAYS = parseWeekdays(process.env.BROADCAST_DAYS || "1-5");
export const BROADCAST_TIME = parseClock(process.env.BROADCAST_TIME || "20:00");
export const BROADCAST_TIMEZONE = process.env.BROADCAST_TIMEZONE || "Europe/Rome";

export function parsePositive(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseList(raw: string): string[] {
  return raw
    .split(/[\n,]/)
    .map((item) => item.trim())
    .filter(Boolean);
}

/** `SYMBOL:multiplier` pairs, e.g. `KC=F:0.01` for a quote in cents per pound. */
export function parseSymbolRules(raw: string): SymbolRule[] {
  const rules = parseList(raw).map((item) => {
    const sep = item.lastIndexOf(":");
    if (sep <= 0) {
      throw new Error(`Invalid price symbol "${item}": expected SYMBOL:multiplier`);
    }
    const symbol = item.slice(0, sep).trim();
    const unitMultiplier = Number(item.slice(sep + 1));
    if (!symbol || !Number.isFinite(unitMultiplier) || unitMultiplier <= 0) {
      throw new Error(`Invalid price symbol "${item}": expected SYMBOL:multiplier`);
    }
    return { symbol, unitMultiplier };
  });
  if (rules.length === 0) {
    throw new Error("PRICE_SYMBOLS must name at least one symbol");
  }
  return rules;
}

export type DelayRange = { minMs: number; maxMs: number };

export function parseRange(raw: string): DelayRange {
  const match = raw.trim().match(/^(\d+)(?:\s*-\s*(\d+))?$/);
  if (!match) {
    throw new Error(`Invalid delay range "${raw}": expected MIN-MAX in milliseconds`);
  }
  const minMs = Number(match[1]);
  const maxMs = match[2] === undefined ? minMs : Number(match[2]);
  if (maxMs < minMs) {
    throw new Error(`Invalid delay range "${raw}": max is below min`);
  }
  return { minMs, maxMs };
}

/** ISO weekday numbers, 1 = Monday ... 7 = Sunday. Accepts `1-5` or `1,3,5`. */
export function parseWeekdays(raw: string): Set<number> {
  const days = new Set<number>();
  for (const part of parseList(raw)) {
    const match = part.match(/^([1-7])(?:-([1-7]))?$/);
    if (!match) {
      throw new Error(`Invalid weekday list "${raw}"`);
    }
    const from = Number(match[1]);
    const to = match[2] === undefined ? from : Number(match[2]);
    if (to < from) {
      throw new Error(`Invalid weekday list "${raw}"`);
    }
    for (let day = from; day <= to; day += 1) {
      days.add(day);
    }
  }
  if (days.size === 0) {
    throw new Error("BROADCAST_DAYS must name at least one weekday");
  }
  return days;
}

export type ClockTime = { hour: number; minute: number };

export function parseClock(raw: string): ClockTime {
  const match = raw.trim().match(/^(\d{1,2}):(\d{2})$/);
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new Error(`Invalid clock time "${raw}": expected HH:MM`);
  }
  return { hour, minute };
}
