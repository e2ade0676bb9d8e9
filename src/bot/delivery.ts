import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../logger';

export const DISCORD_MAX_LENGTH = 2000;

export interface MessageSink {
  send(text: string): Promise<unknown>;
}

export interface DeliveryOptions {
  logger: Logger;
  pacingMs: number;
  maxMessageLength?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface DeliveryReport {
  total: number;
  sent: number;
  failed: boolean;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Fixed-size split. Chunks concatenate back to `text` exactly; '' yields no chunks.
 * A chunk never ends between the two halves of a surrogate pair, so an emoji on
 * a boundary moves whole into the next chunk.
 */
export function splitMessage(text: string, maxLength = DISCORD_MAX_LENGTH): string[] {
  if (maxLength <= 0) {
    throw new RangeError(`maxLength must be positive, got ${maxLength}`);
  }

  const chunks: string[] = [];
  let offset = 0;
  while (offset < text.length) {
    let end = Math.min(offset + maxLength, text.length);
    if (end < text.length && end - offset > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
      end--;
    }
    chunks.push(text.slice(offset, end));
    offset = end;
  }
  return chunks;
}

/**
 * Send a response as sequential chunks, pausing `pacingMs` between them.
 * The first failed send ends the delivery; nothing is retried.
 */
export async function deliver(
  text: string,
  sink: MessageSink,
  options: DeliveryOptions,
): Promise<DeliveryReport> {
  const { logger, pacingMs } = options;
  const sleep = options.sleep ?? delay;

  if (!text.trim()) {
    logger.warn({ length: text.length }, 'Blank response, nothing to deliver');
    return { total: 0, sent: 0, failed: false };
  }

  const chunks = splitMessage(text, options.maxMessageLength ?? DISCORD_MAX_LENGTH);
  logger.debug({ length: text.length, chunks: chunks.length }, 'Delivering response');

  let sent = 0;
  for (const [index, chunk] of chunks.entries()) {
    try {
      await sink.send(chunk);
    } catch (err) {
      logger.error({ err, chunk: index + 1, total: chunks.length }, 'Failed to send message chunk');
      return { total: chunks.length, sent, failed: true };
    }
    sent++;

    if (index < chunks.length - 1) {
      logger.debug({ pacingMs, next: index + 2 }, 'Pacing before next chunk');
      await sleep(pacingMs);
    }
  }

  return { total: chunks.length, sent, failed: false };
}
