import type { InboundMessage } from './types';

/**
 * The parts of a discord.js `Message` the bots read.
 */
export interface DiscordMessageLike {
  id: string;
  content: string;
  channelId: string;
  author: { id: string; username: string };
  mentions: { users: { keys(): Iterable<string> } };
  attachments: {
    values(): Iterable<{ url: string; name: string; contentType: string | null; size: number }>;
  };
}

export function toInboundMessage(message: DiscordMessageLike, selfId: string | undefined): InboundMessage {
  return {
    id: message.id,
    authorId: message.author.id,
    authorName: message.author.username,
    isSelf: selfId !== undefined && message.author.id === selfId,
    content: message.content,
    mentionedUserIds: Array.from(message.mentions.users.keys()),
    channelId: message.channelId,
    attachments: Array.from(message.attachments.values(), (a) => ({
      url: a.url,
      name: a.name,
      contentType: a.contentType ?? undefined,
      size: a.size,
    })),
  };
}

/**
 * `!lain what is love` → `"what is love"`; returns null when the message is
 * not this command. Command names match case-insensitively.
 */
export function parseCommand(content: string, prefix: string, command: string): string | null {
  const text = content.trimStart();
  if (!text.startsWith(prefix)) return null;

  const rest = text.slice(prefix.length);
  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(rest);
  if (!match || match[1].toLowerCase() !== command.toLowerCase()) return null;

  return (match[2] ?? '').trim();
}
