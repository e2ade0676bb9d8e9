import pino from 'pino';
import { describe, expect, test } from 'vitest';
import { baseLoggerOptions, createBotLogger } from '../src/logger';

function createCapturingLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(baseLoggerOptions({ level: 'debug' }), {
    write(line: string) {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

describe('logger', () => {
  test('redacts bot tokens wherever they appear', () => {
    const { logger, lines } = createCapturingLogger();

    logger.info({ bot: { id: 'lain', token: 'test-secret' } }, 'Bot config');
    logger.info({ token: 'test-secret' }, 'Login');
    logger.info({ bots: [{ id: 'syntax', token: 'test-secret' }] }, 'All bots');

    expect(lines.map((l) => l.msg)).toEqual(['Bot config', 'Login', 'All bots']);
    expect(lines[0].bot).toEqual({ id: 'lain', token: '[redacted]' });
    expect(lines[1].token).toBe('[redacted]');
    expect(lines[2].bots).toEqual([{ id: 'syntax', token: '[redacted]' }]);
  });

  test('bot loggers tag every line with the bot id', () => {
    const { logger, lines } = createCapturingLogger();

    createBotLogger(logger, 'satoshi').debug({ channelId: 'c1' }, 'Turn start');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ botId: 'satoshi', channelId: 'c1', msg: 'Turn start', level: 20 });
  });

  test('respects the configured level', () => {
    const lines: string[] = [];
    const logger = pino(baseLoggerOptions({ level: 'warn' }), { write: (line: string) => lines.push(line) });

    logger.info('quiet');
    logger.warn('loud');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).msg).toBe('loud');
  });
});
