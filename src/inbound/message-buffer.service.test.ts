import { createMockConfigService } from '../test/mocks/config.mock';
import { createMockLogger } from '../test/mocks/pino-logger.mock';
import {
  createMockRedis,
  createMockRedisService,
} from '../test/mocks/redis.mock';
import { joinFragments, MessageBufferService } from './message-buffer.service';

const NOW = 1_700_000_000_000;

describe('MessageBufferService', () => {
  const redis = createMockRedis();
  let dispatcher: { dispatch: jest.Mock };
  let buffer: MessageBufferService;

  beforeEach(async () => {
    await redis.flushall();
    jest.spyOn(Date, 'now').mockReturnValue(NOW);
    dispatcher = { dispatch: jest.fn(() => Promise.resolve('job-1')) };
    buffer = new MessageBufferService(
      createMockLogger(),
      createMockRedisService(redis) as never,
      dispatcher as never,
      createMockConfigService({
        'buffer.quietMs': 5000,
        'buffer.ttlSeconds': 300,
      }) as never,
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('enqueue', () => {
    test('appends the fragment and refreshes the TTL', async () => {
      await buffer.enqueue('t1', 'c1', 'oi', 'm-1');

      expect(await redis.lrange('buffer:t1:c1', 0, -1)).toEqual([
        JSON.stringify({ text: 'oi', receivedAt: NOW, messageId: 'm-1' }),
      ]);
      expect(await redis.ttl('buffer:t1:c1')).toBe(300);
    });

    test('replaces the delayed trigger for the chat', async () => {
      await buffer.enqueue('t1', 'c1', 'oi');

      expect(dispatcher.dispatch).toHaveBeenCalledWith({
        queue: 'inbound-messages',
        jobName: 'flush',
        data: { tenantId: 't1', chatId: 'c1' },
        jobOptions: {
          deduplication: {
            id: 'buffer:t1:c1',
            ttl: 5000,
            extend: true,
            replace: true,
          },
          delay: 5000,
        },
      });
    });

    test('keeps tenants apart', async () => {
      await buffer.enqueue('t1', 'c1', 'oi');
      await buffer.enqueue('t2', 'c1', 'olá');

      expect(await redis.llen('buffer:t1:c1')).toBe(1);
      expect(await redis.llen('buffer:t2:c1')).toBe(1);
    });
  });

  describe('drain', () => {
    test('returns fragments in arrival order and deletes the buffer', async () => {
      await buffer.enqueue('t1', 'c1', 'oi');
      await buffer.enqueue('t1', 'c1', 'tudo bem?');

      const fragments = await buffer.drain('t1', 'c1');

      expect(fragments.map(f => f.text)).toEqual(['oi', 'tudo bem?']);
      expect(await redis.exists('buffer:t1:c1')).toBe(0);
    });

    test('a second drain finds nothing', async () => {
      await buffer.enqueue('t1', 'c1', 'oi');
      await buffer.drain('t1', 'c1');

      expect(await buffer.drain('t1', 'c1')).toEqual([]);
    });

    test('skips entries that are not fragments', async () => {
      await redis.rpush(
        'buffer:t1:c1',
        'not json',
        JSON.stringify({ text: 'oi', receivedAt: NOW }),
      );

      const fragments = await buffer.drain('t1', 'c1');

      expect(fragments).toEqual([{ text: 'oi', receivedAt: NOW }]);
    });
  });
});

describe('joinFragments', () => {
  test('joins texts with a single space', () => {
    expect(
      joinFragments([
        { text: 'oi', receivedAt: 1 },
        { text: ' tudo bem? ', receivedAt: 2 },
      ]),
    ).toBe('oi tudo bem?');
  });

  test('drops blank fragments', () => {
    expect(
      joinFragments([
        { text: '  ', receivedAt: 1 },
        { text: 'oi', receivedAt: 2 },
      ]),
    ).toBe('oi');
  });
});
