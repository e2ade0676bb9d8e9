import type { MessageSink } from './delivery';

export interface AttachmentRef {
  url: string;
  name: string;
  contentType?: string;
  size?: number;
}

/**
 * Platform-neutral view of an inbound chat message.
 */
export interface InboundMessage {
  id: string;
  authorId: string;
  authorName: string;
  /** Authored by the bot account itself */
  isSelf: boolean;
  content: string;
  mentionedUserIds: readonly string[];
  channelId: string;
  attachments: readonly AttachmentRef[];
}

/**
 * Outbound capabilities of the channel a turn replies into.
 */
export interface ChannelPort extends MessageSink {
  sendTyping(): Promise<unknown>;
}

export interface BotIdentity {
  userId: string;
  /** Lowercased trigger phrase, e.g. "hello lain" */
  wakePhrase: string;
  defaultPrompt: string;
}
