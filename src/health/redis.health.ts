import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { attempt } from '../common/result';
import { RedisService } from '../redis/redis.service';

@Injectable()
export class RedisHealthIndicator {
  constructor(
    private readonly healthIndicatorService: HealthIndicatorService,
    private readonly redisService: RedisService,
  ) {}

  /**
   * PINGs the shared client and reports the round-trip time.
   */
  async isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);
    const startedAt = Date.now();

    const response = await attempt(() => this.redisService.getClient().ping());
    if (!response.ok) {
      return indicator.down({
        message: `Redis ping failed: ${response.error.message}`,
      });
    }
    if (response.value !== 'PONG') {
      return indicator.down({
        message: `Unexpected response: ${response.value}`,
      });
    }
    return indicator.up({ latencyMs: Date.now() - startedAt });
  }
}
