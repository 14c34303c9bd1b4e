import { logger } from "./logger.js";
import { InboundMessage } from "./types.js";

/** Messages of one chat are handled in arrival order; chats do not wait on each other. */
export class PerChatQueue {
  private queues = new Map<string, InboundMessage[]>();
  private processing = new Set<string>();

  constructor(private handler: (msg: InboundMessage) => Promise<void>) {}

  enqueue(msg: InboundMessage): void {
    const list = this.queues.get(msg.chatId) || [];
    list.push(msg);
    this.queues.set(msg.chatId, list);
    if (!this.processing.has(msg.chatId)) {
      void this.processNext(msg.chatId);
    }
  }

  private async processNext(chatId: string): Promise<void> {
    const list = this.queues.get(chatId);
    const msg = list?.shift();
    if (!msg) {
      this.processing.delete(chatId);
      this.queues.delete(chatId);
      return;
    }

    this.processing.add(chatId);
    try {
      await this.handler(msg);
    } catch (err) {
      logger.error({ err, chatId }, "Message handler failed");
    } finally {
      setImmediate(() => void this.processNext(chatId));
    }
  }
}
