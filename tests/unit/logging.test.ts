import { describe, it, expect } from 'vitest';
import type { DestinationStream } from 'pino';
import { PinoLoggerFactory } from '../../src/core/logging/index.js';

function capture(): { stream: DestinationStream; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  return {
    stream: { write: (msg: string) => void chunks.push(msg) },
    lines: () =>
      chunks
        .join('')
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe('PinoLoggerFactory', () => {
  it('tags component loggers', () => {
    const out = capture();
    new PinoLoggerFactory('info', out.stream).create('AssumeRole').info('no commands');

    expect(out.lines()).toHaveLength(1);
    expect(out.lines()[0]).toMatchObject({ component: 'AssumeRole', msg: 'no commands', level: 30 });
  });

  it('drops entries below the configured level', () => {
    const out = capture();
    const logger = new PinoLoggerFactory('info', out.stream).create('Test');

    logger.debug('hidden');
    logger.warn('shown');

    expect(out.lines().map((l) => l['msg'])).toEqual(['shown']);
  });

  it('redacts credential material', () => {
    const out = capture();
    new PinoLoggerFactory('debug', out.stream)
      .create('Test')
      .debug(
        {
          credentials: { accessKeyId: 'ASIAFAKE', secretAccessKey: 'test-secret' },
          sessionToken: 'test-token',
          tokenCode: '123456',
          roleArn: 'arn:aws:iam::111122223333:role/deployer',
        },
        'request'
      );

    expect(out.lines()[0]).toMatchObject({
      credentials: { accessKeyId: '[REDACTED]', secretAccessKey: '[REDACTED]' },
      sessionToken: '[REDACTED]',
      tokenCode: '[REDACTED]',
      roleArn: 'arn:aws:iam::111122223333:role/deployer',
    });
  });
});
