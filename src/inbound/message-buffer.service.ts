import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { z } from 'zod';
import { QueueDispatcher } from '../dispatcher';
import { RedisService } from '../redis/redis.service';
import {
  type FlushTriggerJob,
  INBOUND_QUEUE,
  type PendingFragment,
  PendingFragmentSchema,
} from './inbound.types';

const bufferKey = (tenantId: string, chatId: string) =>
  `buffer:${tenantId}:${chatId}`;

const RawEntriesSchema = z.array(z.string());

/**
 * Join a drained burst into one message: fragment texts in order, separated
 * by a single space.
 */
export function joinFragments(fragments: PendingFragment[]): string {
  return fragments
    .map(fragment => fragment.text.trim())
    .filter(text => text.length > 0)
    .join(' ');
}

/**
 * Per-chat debounce buffer.
 *
 * Fragments go to a Redis list; each enqueue replaces the chat's delayed
 * flush trigger (BullMQ deduplication in replace mode), so the flush runs
 * once the chat has been quiet for `buffer.quietMs`. The timer lives in
 * Redis, so any number of intake processes share it.
 */
@Injectable()
export class MessageBufferService {
  private readonly quietMs: number;
  private readonly ttlSeconds: number;

  constructor(
    private readonly logger: PinoLogger,
    private readonly redisService: RedisService,
    private readonly dispatcher: QueueDispatcher,
    private readonly configService: ConfigService,
  ) {
    this.logger.setContext(MessageBufferService.name);
    this.quietMs = this.configService.get<number>('buffer.quietMs', 5000);
    this.ttlSeconds = this.configService.get<number>('buffer.ttlSeconds', 300);
  }

  /**
   * Append a fragment and restart the chat's quiet period.
   * Returns as soon as the trigger is queued.
   */
  async enqueue(
    tenantId: string,
    chatId: string,
    text: string,
    messageId?: string,
  ): Promise<void> {
    const key = bufferKey(tenantId, chatId);
    const fragment: PendingFragment = {
      text,
      receivedAt: Date.now(),
      ...(messageId ? { messageId } : {}),
    };

    const results = await this.redisService
      .getClient()
      .multi()
      .rpush(key, JSON.stringify(fragment))
      .expire(key, this.ttlSeconds)
      .exec();
    const failure = results?.find(([error]) => error !== null)?.[0];
    if (!results || failure) {
      throw failure ?? new Error(`Buffer append for ${key} was aborted`);
    }

    await this.dispatcher.dispatch<FlushTriggerJob>({
      queue: INBOUND_QUEUE,
      jobName: 'flush',
      data: { tenantId, chatId },
      jobOptions: {
        deduplication: {
          id: key,
          ttl: this.quietMs,
          extend: true,
          replace: true,
        },
        delay: this.quietMs,
      },
    });

    this.logger.debug({ tenantId, chatId }, 'Fragment buffered');
  }

  /**
   * Atomically read and delete the chat's buffer.
   *
   * A second drain of the same burst finds the key gone and returns nothing.
   */
  async drain(tenantId: string, chatId: string): Promise<PendingFragment[]> {
    const key = bufferKey(tenantId, chatId);
    const results = await this.redisService
      .getClient()
      .multi()
      .lrange(key, 0, -1)
      .del(key)
      .exec();
    if (!results) {
      throw new Error(`Buffer drain for ${key} was aborted`);
    }

    const [error, raw] = results[0] ?? [null, []];
    if (error) throw error;

    const fragments: PendingFragment[] = [];
    for (const entry of RawEntriesSchema.parse(raw)) {
      const parsed = PendingFragmentSchema.safeParse(safeJson(entry));
      if (parsed.success) {
        fragments.push(parsed.data);
      } else {
        this.logger.warn({ tenantId, chatId }, 'Dropped unreadable fragment');
      }
    }
    return fragments;
  }
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
