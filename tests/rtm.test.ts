import { parseInbound } from "../src/feishu/rtm";

const bot = { name: "Beanwire", openId: "ou_bot" };

function receiveEvent(overrides: { message?: Record<string, unknown>; sender?: Record<string, unknown> } = {}) {
  return {
    sender: {
      sender_type: "user",
      sender_id: { open_id: "ou_alice", user_id: "u_alice" },
      ...overrides.sender,
    },
    message: {
      chat_id: "oc_123",
      chat_type: "p2p",
      message_type: "text",
      content: JSON.stringify({ text: " /coffeeprice " }),
      create_time: "1792138500000",
      ...overrides.message,
    },
  };
}

describe("parseInbound", () => {
  it("maps a direct text message", () => {
    expect(parseInbound(receiveEvent(), bot)).toEqual({
      chatId: "oc_123",
      senderId: "u_alice",
      isGroup: false,
      isMentioned: false,
      text: "/coffeeprice",
      timestamp: "2026-10-16T08:15:00.000Z",
    });
  });

  it("detects a mention of the bot in a group", () => {
    const inbound = parseInbound(
      receiveEvent({
        message: {
          chat_type: "group",
          content: JSON.stringify({ text: "@_user_1 /start" }),
          mentions: [{ key: "@_user_1", name: "Beanwire", id: { open_id: "ou_bot" } }],
        },
      }),
      bot,
    );

    expect(inbound?.isGroup).toBe(true);
    expect(inbound?.isMentioned).toBe(true);
  });

  it("drops non-text messages, bot senders and malformed events", () => {
    expect(parseInbound(receiveEvent({ message: { message_type: "image" } }), bot)).toBeNull();
    expect(parseInbound(receiveEvent({ sender: { sender_type: "app" } }), bot)).toBeNull();
    expect(parseInbound(receiveEvent({ message: { content: "not json" } }), bot)).toBeNull();
    expect(parseInbound({ message: {} }, bot)).toBeNull();
  });
});
