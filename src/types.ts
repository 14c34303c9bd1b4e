export type InboundMessage = {
  chatId: string;
  senderId: string;
  isGroup: boolean;
  isMentioned: boolean;
  text: string;
  timestamp: string;
};
