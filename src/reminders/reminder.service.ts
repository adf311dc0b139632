import { randomBytes } from 'node:crypto';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { CONVERSATION_JUDGE, type ConversationJudge } from '../ai/ai.types';
import { ChannelGateway } from '../channels/channel.gateway';
import { AppClsService } from '../common/cls.service';
import { toError } from '../common/result';
import { ConversationService } from '../conversations/conversation.service';
import { PauseService } from '../pause/pause.service';
import { RedisService } from '../redis/redis.service';
import { TenantSettingsService } from '../tenants/tenant-settings.service';
import { type ReminderWhen, resolveReminderTime } from './relative-time';
import {
  type Reminder,
  ReminderSchema,
  type ReminderStatus,
  type ReminderSweepSummary,
  type ScheduleReminderResult,
} from './reminder.schemas';

/** Sorted set of pending reminder ids, scored by scheduledAt */
export const PENDING_REMINDERS_KEY = 'reminders:pending';
/** Number of random bytes for reminder ID generation (16-char hex string) */
const REMINDER_ID_BYTES = 8;

const reminderKey = (id: string) => `reminder:${id}`;
const chatRemindersKey = (tenantId: string, chatId: string) =>
  `reminders:chat:${tenantId}:${chatId}`;

/** Sent without consulting the judge when there is no history to judge */
export const defaultReminderMessage = (intent: string) =>
  `Olá! Estou retornando conforme combinamos. ${intent}`;

type DueOutcome = 'sent' | 'cancelled' | 'failed' | 'deferred' | 'skipped';

@Injectable()
export class ReminderService {
  private readonly batchSize: number;

  constructor(
    private readonly logger: PinoLogger,
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
    private readonly tenantSettings: TenantSettingsService,
    private readonly pauseService: PauseService,
    private readonly conversations: ConversationService,
    private readonly gateway: ChannelGateway,
    private readonly clsService: AppClsService,
    @Inject(CONVERSATION_JUDGE) private readonly judge: ConversationJudge,
  ) {
    this.logger.setContext(ReminderService.name);
    this.batchSize = this.configService.get<number>('reminders.batchSize', 50);
  }

  /**
   * Create a pending reminder. `when` is resolved once, now, and must land
   * in the future.
   */
  async scheduleReminder(
    tenantId: string,
    chatId: string,
    when: ReminderWhen,
    intent: string,
  ): Promise<ScheduleReminderResult> {
    const now = Date.now();
    const at = resolveReminderTime(when, new Date(now));
    if (!at) {
      return { scheduled: false, error: `Could not understand "${when}"` };
    }
    if (at.getTime() <= now) {
      return { scheduled: false, error: 'Reminder time must be in the future' };
    }

    const reminder: Reminder = {
      id: randomBytes(REMINDER_ID_BYTES).toString('hex'),
      tenantId,
      chatId,
      scheduledAt: at.getTime(),
      intent,
      status: 'pending',
      createdAt: now,
      updatedAt: now,
    };

    await this.redisService
      .getClient()
      .multi()
      .hset(reminderKey(reminder.id), {
        id: reminder.id,
        tenantId,
        chatId,
        scheduledAt: reminder.scheduledAt,
        intent,
        status: reminder.status,
        createdAt: now,
        updatedAt: now,
      })
      .zadd(PENDING_REMINDERS_KEY, reminder.scheduledAt, reminder.id)
      .sadd(chatRemindersKey(tenantId, chatId), reminder.id)
      .exec();

    this.logger.info(
      { reminderId: reminder.id, tenantId, chatId, scheduledAt: at },
      'Reminder scheduled',
    );
    return { scheduled: true, reminder };
  }

  /**
   * Cancel a pending reminder that belongs to the chat.
   */
  async cancelReminder(
    tenantId: string,
    chatId: string,
    reminderId: string,
  ): Promise<{ cancelled: boolean; error?: string }> {
    const reminder = await this.getReminder(reminderId);
    if (
      !reminder ||
      reminder.tenantId !== tenantId ||
      reminder.chatId !== chatId
    ) {
      return { cancelled: false, error: 'Reminder not found' };
    }

    const claimed = await this.redisService
      .getClient()
      .zrem(PENDING_REMINDERS_KEY, reminderId);
    if (claimed !== 1) {
      return { cancelled: false, error: 'Reminder is no longer pending' };
    }

    await this.setStatus(reminderId, 'cancelled', 'cancelled on request');
    return { cancelled: true };
  }

  /**
   * Every reminder ever created for a chat, soonest first.
   */
  async listReminders(tenantId: string, chatId: string): Promise<Reminder[]> {
    const ids = await this.redisService
      .getClient()
      .smembers(chatRemindersKey(tenantId, chatId));

    const reminders: Reminder[] = [];
    for (const id of ids) {
      const reminder = await this.getReminder(id);
      if (reminder) reminders.push(reminder);
    }
    return reminders.sort((a, b) => a.scheduledAt - b.scheduledAt);
  }

  async getReminder(reminderId: string): Promise<Reminder | null> {
    const hash = await this.redisService
      .getClient()
      .hgetall(reminderKey(reminderId));
    if (Object.keys(hash).length === 0) return null;

    const result = ReminderSchema.safeParse(hash);
    if (!result.success) {
      this.logger.error(
        { reminderId, error: result.error.message },
        'Invalid reminder data',
      );
      return null;
    }
    return result.data;
  }

  /**
   * Deliver due reminders, oldest first, up to the batch size.
   *
   * Each reminder is claimed by removing it from the pending index; only the
   * worker whose removal succeeds delivers it. One reminder's failure never
   * stops the others.
   */
  async sweep(now: number = Date.now()): Promise<ReminderSweepSummary> {
    const ids = await this.redisService
      .getClient()
      .zrangebyscore(
        PENDING_REMINDERS_KEY,
        '-inf',
        now,
        'LIMIT',
        0,
        this.batchSize,
      );

    const summary: ReminderSweepSummary = {
      due: ids.length,
      sent: 0,
      cancelled: 0,
      failed: 0,
      deferred: 0,
      skipped: 0,
    };

    for (const id of ids) {
      let outcome: DueOutcome;
      try {
        outcome = await this.processDue(id);
      } catch (error) {
        this.logger.error(
          { err: error, reminderId: id },
          'Reminder sweep step failed',
        );
        outcome = 'failed';
      }
      summary[outcome] += 1;
    }

    if (ids.length > 0) {
      this.logger.info(summary, 'Reminder sweep complete');
    }
    return summary;
  }

  private async processDue(reminderId: string): Promise<DueOutcome> {
    const redis = this.redisService.getClient();

    const reminder = await this.getReminder(reminderId);
    if (!reminder) {
      await redis.zrem(PENDING_REMINDERS_KEY, reminderId);
      this.logger.warn({ reminderId }, 'Dropped orphaned pending reminder');
      return 'skipped';
    }

    const { tenantId, chatId } = reminder;
    return this.clsService.runWithContext<DueOutcome>(
      { tenantId, chatId },
      async () => {
        const pause = await this.pauseService.getState(chatId);
        if (!pause.ok) {
          this.logger.warn(
            { err: pause.error, reminderId },
            'Pause state unreadable, treating chat as not paused',
          );
        } else if (pause.value.kind === 'temporary') {
          // Due again when the pause ends
          await redis.zadd(
            PENDING_REMINDERS_KEY,
            'XX',
            pause.value.until,
            reminderId,
          );
          this.logger.debug(
            { reminderId, until: pause.value.until },
            'Chat paused, reminder deferred',
          );
          return 'deferred';
        }

        const claimed = await redis.zrem(PENDING_REMINDERS_KEY, reminderId);
        if (claimed !== 1) return 'skipped';

        if (pause.ok && pause.value.kind === 'permanent') {
          await this.setStatus(reminderId, 'cancelled', 'automation paused');
          this.logger.info({ reminderId }, 'Chat opted out, reminder cancelled');
          return 'cancelled';
        }

        try {
          return await this.deliver(reminder);
        } catch (error) {
          const message = toError(error).message;
          this.logger.error({ err: error, reminderId }, 'Reminder failed');
          await this.setStatus(reminderId, 'error', message);
          return 'failed';
        }
      },
    );
  }

  private async deliver(reminder: Reminder): Promise<DueOutcome> {
    const { id, tenantId, chatId, intent } = reminder;

    const lookup = await this.tenantSettings.lookup(tenantId);
    if (lookup.status === 'missing') {
      await this.setStatus(id, 'cancelled', 'tenant not found');
      return 'cancelled';
    }
    if (lookup.status === 'invalid') {
      throw new Error(`Tenant settings invalid: ${lookup.reason}`);
    }
    if (!lookup.settings.automationEnabled) {
      await this.setStatus(id, 'cancelled', 'automation disabled');
      return 'cancelled';
    }

    const recentContext = await this.conversations.getContext(tenantId, chatId);
    let text: string;
    if (recentContext.length === 0) {
      text = defaultReminderMessage(intent);
    } else {
      const judgment = await this.judge.judge({
        tenantId,
        chatId,
        instruction: intent,
        recentContext,
      });
      if (judgment.verdict === 'suppress') {
        await this.setStatus(
          id,
          'cancelled',
          judgment.reason ?? 'suppressed by judge',
        );
        return 'cancelled';
      }
      text = judgment.text;
    }

    const sent = await this.gateway.sendText(tenantId, chatId, text);
    if (!sent.ok) {
      throw sent.error;
    }

    await this.setStatus(id, 'sent', text);
    this.logger.info({ reminderId: id }, 'Reminder sent');
    return 'sent';
  }

  private async setStatus(
    reminderId: string,
    status: ReminderStatus,
    notes: string,
  ): Promise<void> {
    await this.redisService.getClient().hset(reminderKey(reminderId), {
      status,
      notes,
      updatedAt: Date.now(),
    });
  }
}
