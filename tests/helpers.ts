import pino from 'pino';
import { vi } from 'vitest';
import type { InboundMessage } from '../src/bot/types';
import type { Logger } from '../src/logger';

export function createTestLogger(): Logger {
  return pino({ level: 'silent' });
}

let messageCounter = 0;

export function createMessage(overrides: Partial<InboundMessage> = {}): InboundMessage {
  messageCounter++;
  return {
    id: `m${messageCounter}`,
    authorId: 'user-1',
    authorName: 'alice',
    isSelf: false,
    content: '',
    mentionedUserIds: [],
    channelId: 'channel-1',
    attachments: [],
    ...overrides,
  };
}

/**
 * In-process stand-in for a Discord text channel. `failOn` makes the
 * nth send (1-based) reject the way Discord rejects an invalid message.
 */
export function createChannel(options: { failOn?: number } = {}) {
  const sent: string[] = [];
  let attempts = 0;
  return {
    sent,
    send: vi.fn(async (text: string) => {
      attempts++;
      if (attempts === options.failOn) {
        throw new Error('Invalid Form Body');
      }
      sent.push(text);
    }),
    sendTyping: vi.fn(async () => {}),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
