import { HealthIndicatorService } from '@nestjs/terminus';
import {
  createMockRedis,
  createMockRedisService,
} from '../test/mocks/redis.mock';
import { RedisHealthIndicator } from './redis.health';

describe('RedisHealthIndicator', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('is up when Redis answers PONG', async () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_000);
    const indicator = new RedisHealthIndicator(
      new HealthIndicatorService(),
      createMockRedisService(createMockRedis()) as never,
    );

    expect(await indicator.isHealthy('redis')).toEqual({
      redis: { status: 'up', latencyMs: 0 },
    });
  });

  test('is down when the ping fails', async () => {
    const client = {
      ping: jest.fn(() => Promise.reject(new Error('connect ECONNREFUSED'))),
    };
    const indicator = new RedisHealthIndicator(
      new HealthIndicatorService(),
      { getClient: () => client } as never,
    );

    expect(await indicator.isHealthy('redis')).toEqual({
      redis: {
        status: 'down',
        message: 'Redis ping failed: connect ECONNREFUSED',
      },
    });
  });
});
