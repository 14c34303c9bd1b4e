import { logger } from "./logger.js";
import type { SubscriberId } from "./store/subscribers.js";
import type { FetchResult } from "./tools/market/provider.js";
import { formatFetchResult } from "./tools/market/service.js";
import { InboundMessage } from "./types.js";

export interface SubscriptionRegistry {
  add(id: SubscriberId): Promise<boolean>;
  remove(id: SubscriberId): Promise<boolean>;
}

export interface QuoteQuery {
  getQuote(): Promise<FetchResult>;
}

export interface RouterDeps {
  sendMessage: (chatId: string, text: string) => Promise<void>;
  subscribers: SubscriptionRegistry;
  quotes: QuoteQuery;
}

export const MESSAGES = {
  subscribed:
    "Welcome! You've been subscribed to daily coffee price updates. Use /coffeeprice to get the latest coffee price.\nUse /unsubscribe to stop receiving daily updates.",
  alreadySubscribed:
    "You're already subscribed to daily coffee price updates. Use /coffeeprice to get the latest coffee price.",
  subscribeFailed: "Sorry, your subscription could not be saved. Please try again later.",
  unsubscribed: "You've been unsubscribed from daily updates.",
  notSubscribed: "You're not currently subscribed to updates.",
  unsubscribeFailed: "Sorry, your unsubscribe request could not be saved. Please try again later.",
  unknownCommand: "Unknown command. Use /help to see available commands.",
  notACommand: "Send /coffeeprice for the latest coffee price or /help to see available commands.",
} as const;

export function buildHelpMessage(): string {
  const lines = [
    "Available commands:",
    "/start - Start the bot and subscribe to updates",
    "/coffeeprice - Get coffee price",
    "/unsubscribe - Stop receiving daily updates",
    "/help - Show this help message",
  ];
  return lines.join("\n");
}

export async function subscribeChat(
  subscribers: SubscriptionRegistry,
  chatId: SubscriberId,
): Promise<string> {
  try {
    const added = await subscribers.add(chatId);
    if (added) {
      logger.info({ chatId }, "Chat subscribed");
    }
    return added ? MESSAGES.subscribed : MESSAGES.alreadySubscribed;
  } catch (err) {
    logger.error({ err, chatId }, "Subscribe failed");
    return MESSAGES.subscribeFailed;
  }
}

export async function unsubscribeChat(
  subscribers: SubscriptionRegistry,
  chatId: SubscriberId,
): Promise<string> {
  try {
    const removed = await subscribers.remove(chatId);
    if (removed) {
      logger.info({ chatId }, "Chat unsubscribed");
    }
    return removed ? MESSAGES.unsubscribed : MESSAGES.notSubscribed;
  } catch (err) {
    logger.error({ err, chatId }, "Unsubscribe failed");
    return MESSAGES.unsubscribeFailed;
  }
}

export async function queryPrice(quotes: QuoteQuery): Promise<string> {
  return formatFetchResult(await quotes.getQuote());
}

export function parseCommand(text: string): { name: string; args: string[] } | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) return null;
  const parts = trimmed.split(/\s+/);
  // "/price@bot" style suffixes are dropped.
  const name = parts[0].slice(1).split("@")[0].toLowerCase();
  return { name, args: parts.slice(1) };
}

export async function handleInbound(msg: InboundMessage, deps: RouterDeps): Promise<void> {
  if (msg.isGroup && !msg.isMentioned) {
    return;
  }

  const command = parseCommand(stripMentions(msg.text));
  if (!command) {
    if (!msg.isGroup) {
      await deps.sendMessage(msg.chatId, MESSAGES.notACommand);
    }
    return;
  }

  const reply = await handleCommand(command.name, msg.chatId, deps);
  await deps.sendMessage(msg.chatId, reply);
}

async function handleCommand(name: string, chatId: string, deps: RouterDeps): Promise<string> {
  switch (name) {
    case "start":
    case "subscribe":
      return subscribeChat(deps.subscribers, chatId);
    case "unsubscribe":
      return unsubscribeChat(deps.subscribers, chatId);
    case "coffeeprice":
    case "price":
      return queryPrice(deps.quotes);
    case "help":
      return buildHelpMessage();
    default:
      return MESSAGES.unknownCommand;
  }
}

function stripMentions(text: string): string {
  return text.replace(/@_user_\d+/g, "").trim();
}
