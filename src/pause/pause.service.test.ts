import { TenantSettingsService } from '../tenants/tenant-settings.service';
import { createMockCache } from '../test/mocks/cache.mock';
import { createMockConfigService } from '../test/mocks/config.mock';
import { createMockLogger } from '../test/mocks/pino-logger.mock';
import {
  createMockRedis,
  createMockRedisService,
} from '../test/mocks/redis.mock';
import { PauseService } from './pause.service';

const NOW = 1_700_000_000_000;
const MINUTE_MS = 60_000;

describe('PauseService', () => {
  const redis = createMockRedis();
  let service: PauseService;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(async () => {
    await redis.flushall();
    jest.spyOn(Date, 'now').mockReturnValue(NOW);
    logger = createMockLogger();
    const redisService = createMockRedisService(redis);
    const tenantSettings = new TenantSettingsService(
      createMockLogger(),
      redisService as never,
      createMockConfigService() as never,
      createMockCache() as never,
    );
    service = new PauseService(logger, redisService as never, tenantSettings);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('a chat with no pause reads as absent', async () => {
    expect(await service.getState('c1')).toEqual({
      ok: true,
      value: { kind: 'absent' },
    });
    expect(await service.isPaused('c1')).toBe(false);
  });

  test('setPaused holds until the duration elapses', async () => {
    await service.setPaused('c1', 10 * MINUTE_MS);

    expect(await service.isPaused('c1')).toBe(true);
    expect(await service.getState('c1')).toEqual({
      ok: true,
      value: { kind: 'temporary', until: NOW + 10 * MINUTE_MS },
    });

    jest.spyOn(Date, 'now').mockReturnValue(NOW + 10 * MINUTE_MS + 1);

    expect(await service.isPaused('c1')).toBe(false);
  });

  test('setPaused stores a ttl equal to the duration', async () => {
    await service.setPaused('c1', 5000);

    const ttl = await redis.pttl('pause:c1');

    expect(ttl).toBeGreaterThan(0);
    expect(ttl).toBeLessThanOrEqual(5000);
  });

  test('setPaused rounds a fractional duration up', async () => {
    await service.setPaused('c1', 1500.2);

    expect(await service.getState('c1')).toEqual({
      ok: true,
      value: { kind: 'temporary', until: NOW + 1501 },
    });
  });

  test.each([0, -1000, Number.NaN])(
    'setPaused rejects a duration of %p',
    async durationMs => {
      await expect(service.setPaused('c1', durationMs)).rejects.toThrow(
        `Pause duration must be a positive number of milliseconds, got ${durationMs}`,
      );
      expect(await redis.exists('pause:c1')).toBe(0);
    },
  );

  test('a later setPaused replaces the earlier deadline', async () => {
    await service.setPaused('c1', 60 * MINUTE_MS);
    await service.setPaused('c1', MINUTE_MS);

    expect(await service.getState('c1')).toEqual({
      ok: true,
      value: { kind: 'temporary', until: NOW + MINUTE_MS },
    });
  });

  test('a permanent pause overwrites a temporary one and has no ttl', async () => {
    await service.setPaused('c1', MINUTE_MS);
    await service.setPausedPermanent('c1');

    expect(await redis.pttl('pause:c1')).toBe(-1);

    jest.spyOn(Date, 'now').mockReturnValue(NOW + 365 * 24 * 60 * MINUTE_MS);

    expect(await service.getState('c1')).toEqual({
      ok: true,
      value: { kind: 'permanent', since: NOW },
    });
  });

  test('clear removes either kind of pause', async () => {
    await service.setPausedPermanent('c1');

    expect(await service.clear('c1')).toBe(true);
    expect(await service.isPaused('c1')).toBe(false);
    expect(await service.clear('c1')).toBe(false);
  });

  test('pauses are keyed by chat only', async () => {
    await service.setPaused('c1', MINUTE_MS);

    expect(await redis.exists('pause:c1')).toBe(1);
    expect(await service.isPaused('c2')).toBe(false);
  });

  test('an unreadable store is logged and treated as not paused', async () => {
    const failing = new PauseService(
      logger,
      {
        getClient: () => ({
          get: jest.fn(() => Promise.reject(new Error('connection lost'))),
        }),
      } as never,
      {} as never,
    );

    const state = await failing.getState('c1');

    expect(state.ok).toBe(false);
    expect(await failing.isPaused('c1')).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  test('a corrupt pause value is reported as an error', async () => {
    await redis.set('pause:c1', 'true');

    const state = await service.getState('c1');

    expect(state.ok).toBe(false);
  });

  describe('handleOperatorMessage', () => {
    test('pauses for the tenant takeover window', async () => {
      await redis.set(
        'tenant:t1:settings',
        JSON.stringify({ humanTakeoverMinutes: 30 }),
      );

      const state = await service.handleOperatorMessage('t1', 'c1', 'Olá!');

      expect(state).toEqual({ kind: 'temporary', until: NOW + 30 * MINUTE_MS });
      expect(await service.isPaused('c1')).toBe(true);
    });

    test('falls back to sixty minutes without tenant settings', async () => {
      const state = await service.handleOperatorMessage('t1', 'c1', 'Olá!');

      expect(state).toEqual({ kind: 'temporary', until: NOW + 60 * MINUTE_MS });
    });

    test('pauses permanently on an opt-out trigger', async () => {
      await redis.set(
        'tenant:t1:settings',
        JSON.stringify({ optOut: { enabled: true, triggers: ['encerrar'] } }),
      );

      const state = await service.handleOperatorMessage(
        't1',
        'c1',
        'Vou encerrar o bot aqui',
      );

      expect(state).toEqual({ kind: 'permanent', since: NOW });
    });

    test('treats the stop sign as a trigger when opt-out is enabled', async () => {
      await redis.set(
        'tenant:t1:settings',
        JSON.stringify({ optOut: { enabled: true } }),
      );

      const state = await service.handleOperatorMessage('t1', 'c1', '🛑');

      expect(state.kind).toBe('permanent');
    });

    test('ignores triggers when opt-out is disabled', async () => {
      await redis.set('tenant:t1:settings', JSON.stringify({}));

      const state = await service.handleOperatorMessage('t1', 'c1', '🛑');

      expect(state.kind).toBe('temporary');
    });
  });
});
