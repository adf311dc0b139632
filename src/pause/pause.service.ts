import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { attempt, type Result } from '../common/result';
import { RedisService } from '../redis/redis.service';
import { isOptOut } from '../tenants/opt-out';
import { TenantSettingsService } from '../tenants/tenant-settings.service';
import {
  type PauseState,
  type StoredPause,
  StoredPauseSchema,
} from './pause.schemas';

const MINUTE_MS = 60_000;
/** Used when the tenant has no readable settings */
const DEFAULT_TAKEOVER_MINUTES = 60;

/** Pause flags are keyed by chat only; chat ids are unique across tenants */
const pauseKey = (chatId: string) => `pause:${chatId}`;

/**
 * Pause/handoff state machine.
 *
 * absent → temporary (operator message, handoff, `#stop`) → absent on expiry
 * or `#ativar`; any state → permanent on opt-out. Writes are last-writer-wins.
 * While paused, fragments still buffer but no flush generates a reply.
 */
@Injectable()
export class PauseService {
  constructor(
    private readonly logger: PinoLogger,
    private readonly redisService: RedisService,
    private readonly tenantSettings: TenantSettingsService,
  ) {
    this.logger.setContext(PauseService.name);
  }

  /**
   * Pause for `durationMs`, replacing any existing pause. Fractions round up
   * to the next millisecond.
   */
  async setPaused(chatId: string, durationMs: number): Promise<StoredPause> {
    if (!Number.isFinite(durationMs) || durationMs <= 0) {
      throw new Error(
        `Pause duration must be a positive number of milliseconds, got ${durationMs}`,
      );
    }
    const ttlMs = Math.ceil(durationMs);
    const state: StoredPause = {
      kind: 'temporary',
      until: Date.now() + ttlMs,
    };
    await this.redisService
      .getClient()
      .set(pauseKey(chatId), JSON.stringify(state), 'PX', ttlMs);
    this.logger.info({ chatId, durationMs: ttlMs }, 'Automation paused');
    return state;
  }

  async setPausedPermanent(chatId: string): Promise<StoredPause> {
    const state: StoredPause = { kind: 'permanent', since: Date.now() };
    await this.redisService
      .getClient()
      .set(pauseKey(chatId), JSON.stringify(state));
    this.logger.info({ chatId }, 'Automation paused permanently');
    return state;
  }

  async clear(chatId: string): Promise<boolean> {
    const removed = await this.redisService.getClient().del(pauseKey(chatId));
    this.logger.info({ chatId, wasPaused: removed > 0 }, 'Pause cleared');
    return removed > 0;
  }

  /**
   * Read the current pause state. Temporary pauses past their deadline read
   * as absent even before the store expires the key.
   */
  async getState(chatId: string): Promise<Result<PauseState>> {
    return attempt(async () => {
      const raw = await this.redisService.getClient().get(pauseKey(chatId));
      if (raw === null) return { kind: 'absent' };

      const parsed = StoredPauseSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        throw new Error(`Unreadable pause state: ${parsed.error.message}`);
      }
      if (parsed.data.kind === 'temporary' && parsed.data.until <= Date.now()) {
        return { kind: 'absent' };
      }
      return parsed.data;
    });
  }

  /**
   * Point-in-time check. A failed read is logged and treated as not paused.
   */
  async isPaused(chatId: string): Promise<boolean> {
    const state = await this.getState(chatId);
    if (!state.ok) {
      this.logger.warn(
        { chatId, err: state.error },
        'Pause state unreadable, treating chat as not paused',
      );
      return false;
    }
    return state.value.kind !== 'absent';
  }

  /**
   * A human operator wrote in the chat. Pauses for the tenant's takeover
   * window, or permanently when the text carries an opt-out trigger.
   */
  async handleOperatorMessage(
    tenantId: string,
    chatId: string,
    text: string,
  ): Promise<PauseState> {
    const settings = await this.tenantSettings.get(tenantId);
    const takeoverMinutes =
      settings?.humanTakeoverMinutes ?? DEFAULT_TAKEOVER_MINUTES;

    if (settings && isOptOut(settings.optOut, text)) {
      this.logger.info({ tenantId, chatId }, 'Operator sent an opt-out trigger');
      return this.setPausedPermanent(chatId);
    }

    this.logger.debug({ tenantId, chatId }, 'Operator takeover detected');
    return this.setPaused(chatId, takeoverMinutes * MINUTE_MS);
  }
}
