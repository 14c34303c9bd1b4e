import { EventEmitter } from "events";
import * as Lark from "@larksuiteoapi/node-sdk";
import { z } from "zod";

import {
  FEISHU_BOT_NAME,
  FEISHU_BOT_OPEN_ID,
  FEISHU_ENCRYPT_KEY,
  FEISHU_SDK_LOG_LEVEL,
} from "../config.js";
import { logger } from "../logger.js";
import { InboundMessage } from "../types.js";
import { getSdkBaseConfig } from "./sdk.js";

const mentionSchema = z.object({
  key: z.string().optional(),
  name: z.string().optional(),
  id: z
    .object({
      open_id: z.string().optional(),
      user_id: z.string().optional(),
    })
    .optional(),
});

const receiveEventSchema = z.object({
  sender: z.object({
    sender_type: z.string().optional(),
    sender_id: z
      .object({
        open_id: z.string().optional(),
        user_id: z.string().optional(),
        union_id: z.string().optional(),
      })
      .optional(),
  }),
  message: z.object({
    chat_id: z.string().min(1),
    chat_type: z.string().optional(),
    message_type: z.string(),
    content: z.string().optional(),
    create_time: z.union([z.string(), z.number()]).optional(),
    mentions: z.array(mentionSchema).optional(),
  }),
});

export type BotIdentity = { name: string; openId: string };

export class FeishuRtmClient extends EventEmitter {
  private wsClient: Lark.WSClient | null = null;

  async connect(): Promise<void> {
    if (this.wsClient) return;

    const bot: BotIdentity = { name: FEISHU_BOT_NAME, openId: FEISHU_BOT_OPEN_ID };
    const dispatcher = new Lark.EventDispatcher({
      ...(FEISHU_ENCRYPT_KEY ? { encryptKey: FEISHU_ENCRYPT_KEY } : {}),
    }).register({
      "im.message.receive_v1": async (data) => {
        const inbound = parseInbound(data, bot);
        if (inbound) {
          this.emit("message", inbound);
        }
      },
    });

    const baseConfig = getSdkBaseConfig();
    logger.info({ domain: baseConfig.domain }, "Feishu SDK domain");
    const loggerLevel = resolveLoggerLevel(FEISHU_SDK_LOG_LEVEL);
    this.wsClient = new Lark.WSClient({
      appId: baseConfig.appId,
      appSecret: baseConfig.appSecret,
      domain: baseConfig.domain,
      ...(loggerLevel !== undefined ? { loggerLevel } : {}),
    });

    await this.wsClient.start({ eventDispatcher: dispatcher });
    logger.info("Feishu RTM (SDK) start requested");
    this.emit("connected");
  }
}

/** Text messages from users only; anything else is dropped. */
export function parseInbound(event: unknown, bot: BotIdentity): InboundMessage | null {
  const parsed = receiveEventSchema.safeParse(event);
  if (!parsed.success) {
    logger.debug({ issues: parsed.error.issues.length }, "Ignoring unrecognized Feishu event");
    return null;
  }
  const { sender, message } = parsed.data;

  if (sender.sender_type && sender.sender_type !== "user") return null;
  if (message.message_type !== "text") return null;

  const text = extractText(message.content);
  if (!text) return null;

  return {
    chatId: message.chat_id,
    senderId:
      sender.sender_id?.user_id ||
      sender.sender_id?.open_id ||
      sender.sender_id?.union_id ||
      "unknown",
    isGroup: message.chat_type === "group",
    isMentioned: detectMention(text, message.mentions ?? [], bot),
    text,
    timestamp: normalizeTimestamp(message.create_time),
  };
}

function extractText(content: string | undefined): string | null {
  if (!content) return null;
  try {
    const parsed = JSON.parse(content) as { text?: unknown };
    return typeof parsed.text === "string" ? parsed.text.trim() || null : null;
  } catch {
    return null;
  }
}

function detectMention(
  text: string,
  mentions: Array<z.infer<typeof mentionSchema>>,
  bot: BotIdentity,
): boolean {
  if (bot.openId) {
    for (const mention of mentions) {
      if (mention.id?.open_id === bot.openId) return true;
    }
  }

  if (bot.name) {
    if (text.includes(`@${bot.name}`)) return true;
    for (const mention of mentions) {
      if (mention.name === bot.name) return true;
    }
  }

  return false;
}

function resolveLoggerLevel(value: string): Lark.LoggerLevel | undefined {
  const level = value.trim().toLowerCase();
  if (!level) return undefined;
  switch (level) {
    case "debug":
      return Lark.LoggerLevel.debug;
    case "info":
      return Lark.LoggerLevel.info;
    case "warn":
    case "warning":
      return Lark.LoggerLevel.warn;
    case "error":
      return Lark.LoggerLevel.error;
    default:
      return undefined;
  }
}

function normalizeTimestamp(value: string | number | undefined): string {
  const raw = typeof value === "number" ? value : Number(value || NaN);
  if (!Number.isFinite(raw)) return new Date().toISOString();
  const ms = raw < 1_000_000_000_000 ? raw * 1000 : raw;
  return new Date(ms).toISOString();
}
