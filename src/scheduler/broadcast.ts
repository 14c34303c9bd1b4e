import { logger } from "../logger.js";
import type { SubscriberId } from "../store/subscribers.js";

export type SendMessage = (chatId: string, text: string) => Promise<void>;

export interface SubscriberSnapshotSource {
  snapshot(): SubscriberId[];
}

export type DeliveryReport = {
  attempted: number;
  succeeded: number;
  failed: number;
  failures: Array<{ chatId: SubscriberId; error: string }>;
};

export class Broadcaster {
  constructor(
    private subscribers: SubscriberSnapshotSource,
    private sendMessage: SendMessage,
  ) {}

  /** One send per recipient of the current snapshot; a failed send is recorded, not retried. */
  async broadcast(text: string): Promise<DeliveryReport> {
    const recipients = this.subscribers.snapshot();
    const report: DeliveryReport = { attempted: 0, succeeded: 0, failed: 0, failures: [] };

    for (const chatId of recipients) {
      report.attempted += 1;
      try {
        await this.sendMessage(chatId, text);
        report.succeeded += 1;
      } catch (err) {
        report.failed += 1;
        report.failures.push({ chatId, error: err instanceof Error ? err.message : String(err) });
        logger.warn({ err, chatId }, "Broadcast send failed");
      }
    }

    logger.info(
      { attempted: report.attempted, succeeded: report.succeeded, failed: report.failed },
      "Broadcast finished",
    );
    return report;
  }
}
