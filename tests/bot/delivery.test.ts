import { describe, expect, test, vi } from 'vitest';
import { deliver, splitMessage } from '../../src/bot/delivery';
import { createChannel, createTestLogger } from '../helpers';

// A chunk that starts with a low surrogate or ends with a high one holds half a character
const HALF_PAIR = /^[\uDC00-\uDFFF]|[\uD800-\uDBFF]$/;

function createSleep() {
  return vi.fn(async (_ms: number) => {});
}

describe('splitMessage', () => {
  test('returns no chunks for an empty string', () => {
    expect(splitMessage('')).toEqual([]);
  });

  test('keeps a short message whole', () => {
    expect(splitMessage('hello')).toEqual(['hello']);
  });

  test('splits at exactly 2000 characters', () => {
    const text = 'a'.repeat(2000) + 'b'.repeat(2000) + 'c'.repeat(500);
    const chunks = splitMessage(text);

    expect(chunks.map((c) => c.length)).toEqual([2000, 2000, 500]);
    expect(chunks[1]).toBe('b'.repeat(2000));
    expect(chunks.join('')).toBe(text);
  });

  test('a message of exactly the limit is one chunk', () => {
    expect(splitMessage('x'.repeat(2000))).toHaveLength(1);
  });

  test('preserves whitespace and newlines across chunk boundaries', () => {
    const text = 'ab\n \ncd  ';
    const chunks = splitMessage(text, 3);

    expect(chunks).toEqual(['ab\n', ' \nc', 'd  ']);
    expect(chunks.join('')).toBe(text);
  });

  test('chunk count is ceil(length / maxLength)', () => {
    for (const length of [1, 3999, 4000, 4001, 10_000]) {
      const chunks = splitMessage('z'.repeat(length));
      expect(chunks).toHaveLength(Math.ceil(length / 2000));
      expect(chunks.every((c) => c.length <= 2000)).toBe(true);
    }
  });

  test('rejects a non-positive maxLength', () => {
    expect(() => splitMessage('abc', 0)).toThrow(RangeError);
  });

  test('moves an emoji on the boundary whole into the next chunk', () => {
    const text = 'a'.repeat(1999) + '\u{1F600}' + 'tail';
    const chunks = splitMessage(text);

    expect(chunks.map((c) => c.length)).toEqual([1999, 6]);
    expect(chunks[1]).toBe('\u{1F600}tail');
    expect(chunks.join('')).toBe(text);
    expect(chunks.filter((c) => HALF_PAIR.test(c))).toEqual([]);
  });

  test('an emoji that ends exactly on the limit stays in its chunk', () => {
    const chunks = splitMessage('a'.repeat(1998) + '\u{1F600}' + 'b');

    expect(chunks.map((c) => c.length)).toEqual([2000, 1]);
    expect(chunks[0].endsWith('\u{1F600}')).toBe(true);
  });

  test('never splits surrogate pairs in a run of emoji', () => {
    const text = '\u{1F600}\u{1F680}\u{1F389}';
    const chunks = splitMessage(text, 3);

    expect(chunks).toEqual(['\u{1F600}', '\u{1F680}', '\u{1F389}']);
    expect(chunks.join('')).toBe(text);
  });
});

describe('deliver', () => {
  test('sends chunks in order with a pause between each', async () => {
    const channel = createChannel();
    const sleep = createSleep();
    const text = 'a'.repeat(2000) + 'b'.repeat(2000) + 'c'.repeat(10);

    const report = await deliver(text, channel, { logger: createTestLogger(), pacingMs: 15_000, sleep });

    expect(channel.sent).toEqual(['a'.repeat(2000), 'b'.repeat(2000), 'c'.repeat(10)]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[15_000], [15_000]]);
    expect(report).toEqual({ total: 3, sent: 3, failed: false });
  });

  test('does not pause after a single chunk', async () => {
    const channel = createChannel();
    const sleep = createSleep();

    await deliver('short answer', channel, { logger: createTestLogger(), pacingMs: 15_000, sleep });

    expect(channel.sent).toEqual(['short answer']);
    expect(sleep).not.toHaveBeenCalled();
  });

  test('stops at the first failed chunk without retrying', async () => {
    const channel = createChannel({ failOn: 2 });
    const sleep = createSleep();
    const logger = createTestLogger();
    const errorSpy = vi.spyOn(logger, 'error');
    const text = '1'.repeat(2000) + '2'.repeat(2000) + '3'.repeat(2000);

    const report = await deliver(text, channel, { logger, pacingMs: 15_000, sleep });

    expect(channel.send).toHaveBeenCalledTimes(2);
    expect(channel.send.mock.calls[1][0]).toBe('2'.repeat(2000));
    expect(channel.sent).toEqual(['1'.repeat(2000)]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(report).toEqual({ total: 3, sent: 1, failed: true });
  });

  test('sends nothing for an empty response', async () => {
    const channel = createChannel();

    const report = await deliver('', channel, { logger: createTestLogger(), pacingMs: 15_000, sleep: createSleep() });

    expect(channel.send).not.toHaveBeenCalled();
    expect(report).toEqual({ total: 0, sent: 0, failed: false });
  });

  test('sends nothing for a whitespace-only response', async () => {
    const channel = createChannel();

    const report = await deliver(' \n\t ', channel, {
      logger: createTestLogger(),
      pacingMs: 15_000,
      sleep: createSleep(),
    });

    expect(channel.send).not.toHaveBeenCalled();
    expect(report.failed).toBe(false);
  });

  test('honours a smaller maxMessageLength', async () => {
    const channel = createChannel();
    const sleep = createSleep();

    await deliver('abcdefg', channel, { logger: createTestLogger(), pacingMs: 5, maxMessageLength: 3, sleep });

    expect(channel.sent).toEqual(['abc', 'def', 'g']);
    expect(sleep.mock.calls).toEqual([[5], [5]]);
  });
});
