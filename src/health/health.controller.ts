import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { RedisHealthIndicator } from './redis.health';

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly redis: RedisHealthIndicator,
  ) {}

  /**
   * Liveness probe: is the process alive and accepting HTTP requests?
   * No dependency checks.
   */
  @Get('liveness')
  @HealthCheck()
  liveness() {
    return this.health.check([]);
  }

  /**
   * Readiness probe. Buffers, pauses, records, reminders and the job queues
   * all live in Redis, so Redis connectivity is the whole check.
   */
  @Get('readiness')
  @HealthCheck()
  readiness() {
    return this.health.check([() => this.redis.isHealthy('redis')]);
  }
}
