import {
  BROADCAST_DAYS,
  BROADCAST_ENABLED,
  BROADCAST_TIME,
  BROADCAST_TIMEZONE,
  FEISHU_BOT_NAME,
  FEISHU_BOT_OPEN_ID,
  PRICE_FIRST_DELAY_MS,
  PRICE_LOOKBACK,
  PRICE_MAX_ATTEMPTS,
  PRICE_REQUEST_TIMEOUT_MS,
  PRICE_RETRY_DELAY_MS,
  PRICE_SYMBOLS,
  SUBSCRIBERS_PATH,
  YAHOO_DIRECT_BASE,
  YAHOO_HISTORY_BASE,
} from "./config.js";
import { sendFeishuMessage } from "./feishu/api.js";
import { FeishuRtmClient } from "./feishu/rtm.js";
import { logger } from "./logger.js";
import { PerChatQueue } from "./queue.js";
import { handleInbound } from "./router.js";
import { Broadcaster } from "./scheduler/broadcast.js";
import { createDailyPriceJob, startDailyScheduler } from "./scheduler/daily.js";
import { JsonSubscriberFile, SubscriberStore } from "./store/subscribers.js";
import { PriceFetcher } from "./tools/market/fetcher.js";
import { YahooDirectSource, YahooHistorySource } from "./tools/market/providers/yahoo.js";
import { QuoteService } from "./tools/market/service.js";
import { InboundMessage } from "./types.js";

async function main(): Promise<void> {
  const subscribers = await SubscriberStore.open(new JsonSubscriberFile(SUBSCRIBERS_PATH));

  const fetcher = new PriceFetcher({
    symbols: PRICE_SYMBOLS,
    history: new YahooHistorySource({
      baseUrl: YAHOO_HISTORY_BASE,
      range: PRICE_LOOKBACK,
      timeoutMs: PRICE_REQUEST_TIMEOUT_MS,
    }),
    direct: new YahooDirectSource({
      baseUrl: YAHOO_DIRECT_BASE,
      timeoutMs: PRICE_REQUEST_TIMEOUT_MS,
    }),
    maxAttempts: PRICE_MAX_ATTEMPTS,
    firstDelay: PRICE_FIRST_DELAY_MS,
    retryDelay: PRICE_RETRY_DELAY_MS,
  });
  const quotes = new QuoteService(fetcher);

  if (BROADCAST_ENABLED) {
    const broadcaster = new Broadcaster(subscribers, sendFeishuMessage);
    startDailyScheduler(
      { weekdays: BROADCAST_DAYS, time: BROADCAST_TIME, timeZone: BROADCAST_TIMEZONE },
      createDailyPriceJob(fetcher, broadcaster),
    );
  } else {
    logger.warn("BROADCAST_ENABLED is false; daily updates are off");
  }

  if (!FEISHU_BOT_NAME && !FEISHU_BOT_OPEN_ID) {
    logger.warn("FEISHU_BOT_NAME/FEISHU_BOT_OPEN_ID not set; group mention detection may fail.");
  }

  const rtm = new FeishuRtmClient();
  const queue = new PerChatQueue(async (msg) => {
    await handleInbound(msg, { sendMessage: sendFeishuMessage, subscribers, quotes });
  });

  rtm.on("message", (msg: InboundMessage) => {
    queue.enqueue(msg);
  });

  rtm.on("connected", () => {
    logger.info({ subscribers: subscribers.size }, "Feishu RTM ready");
  });

  await rtm.connect();
}

main().catch((err) => {
  logger.error({ err }, "Fatal error");
  process.exit(1);
});
