import { CACHE_MANAGER, Cache } from '@nestjs/cache-manager';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { RedisService } from '../redis/redis.service';
import {
  type TenantLookup,
  type TenantSettings,
  TenantSettingsSchema,
} from './tenant.schemas';

const settingsKey = (tenantId: string) => `tenant:${tenantId}:settings`;
const cacheKey = (tenantId: string) => `tenant-settings:${tenantId}`;

/**
 * Reads per-tenant settings from Redis, validated with zod and cached
 * through the Nest cache manager. Store errors propagate to the caller.
 */
@Injectable()
export class TenantSettingsService {
  private readonly cacheTtlMs: number;

  constructor(
    private readonly logger: PinoLogger,
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
  ) {
    this.logger.setContext(TenantSettingsService.name);
    this.cacheTtlMs = this.configService.get<number>(
      'tenants.cacheTtlMs',
      60_000,
    );
  }

  async lookup(tenantId: string): Promise<TenantLookup> {
    const cached = await this.cache.get<TenantSettings>(cacheKey(tenantId));
    if (cached) {
      return { status: 'found', settings: cached };
    }

    const raw = await this.redisService
      .getClient()
      .get(settingsKey(tenantId));
    if (raw === null) {
      return { status: 'missing' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn({ tenantId }, 'Tenant settings are not valid JSON');
      return { status: 'invalid', reason: 'malformed JSON' };
    }

    const result = TenantSettingsSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(
        { tenantId, error: result.error.message },
        'Invalid tenant settings',
      );
      return { status: 'invalid', reason: result.error.message };
    }

    await this.cache.set(cacheKey(tenantId), result.data, this.cacheTtlMs);
    return { status: 'found', settings: result.data };
  }

  /**
   * Settings for a tenant, or null when missing or invalid.
   */
  async get(tenantId: string): Promise<TenantSettings | null> {
    const lookup = await this.lookup(tenantId);
    return lookup.status === 'found' ? lookup.settings : null;
  }
}
