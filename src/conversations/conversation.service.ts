import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { RedisService } from '../redis/redis.service';
import {
  assistantEntry,
  boundContext,
  tailBytes,
  userEntry,
} from './context-window';
import {
  type AdvanceStageOptions,
  type ConditionalUpdate,
  type ConversationRecord,
  ConversationRecordSchema,
  type ConversationRef,
  ConversationRefSchema,
  type Role,
} from './conversation.schemas';
import {
  ADVANCE_STAGE,
  MARK_FINISHED,
  RECORD_TURN,
} from './conversation.scripts';

/** Sorted set of records eligible for follow-up, scored by lastMessageAt */
export const CANDIDATES_KEY = 'followup:candidates';

const recordKey = (tenantId: string, chatId: string) =>
  `conversation:${tenantId}:${chatId}`;
const contextKey = (tenantId: string, chatId: string) =>
  `conversation:${tenantId}:${chatId}:context`;
const candidateMember = (tenantId: string, chatId: string) =>
  JSON.stringify([tenantId, chatId]);

function decodeMember(member: string): unknown {
  try {
    return JSON.parse(member);
  } catch {
    return null;
  }
}

/**
 * Conversation tracking record shared by the live reply path and the
 * follow-up sweep.
 *
 * Every mutation is a single server-side script: upserts are idempotent and
 * stage advances are conditional, so concurrent sweeps and replies resolve
 * without locks. A lost race shows up as `{ applied: false }`.
 */
@Injectable()
export class ConversationService {
  private readonly maxContextBytes: number;
  private readonly maxContextEntries: number;

  constructor(
    private readonly logger: PinoLogger,
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
  ) {
    this.logger.setContext(ConversationService.name);
    this.maxContextBytes = this.configService.get<number>(
      'context.maxBytes',
      2000,
    );
    this.maxContextEntries = this.configService.get<number>(
      'context.maxEntries',
      40,
    );
  }

  /**
   * The end user spoke: the conversation is active again and the follow-up
   * ladder restarts from stage 0.
   */
  async recordUserTurn(
    tenantId: string,
    chatId: string,
    text: string,
  ): Promise<number> {
    return this.recordTurn(tenantId, chatId, 'user', userEntry(text));
  }

  /**
   * The assistant replied: the conversation becomes a follow-up candidate.
   * The stage is left as it was (0 for a new record).
   */
  async recordAssistantTurn(
    tenantId: string,
    chatId: string,
    text: string,
  ): Promise<number> {
    return this.recordTurn(tenantId, chatId, 'assistant', assistantEntry(text));
  }

  /**
   * Move the ladder to `newStage`, only if the record is still an active,
   * assistant-last conversation at `newStage - 1` (and, with `observedAt`,
   * untouched since it was read).
   */
  async advanceStage(
    tenantId: string,
    chatId: string,
    newStage: number,
    options: AdvanceStageOptions = {},
  ): Promise<ConditionalUpdate> {
    const result = await this.redisService
      .getClient()
      .eval(
        ADVANCE_STAGE,
        3,
        recordKey(tenantId, chatId),
        contextKey(tenantId, chatId),
        CANDIDATES_KEY,
        newStage,
        Date.now(),
        options.observedAt ?? '',
        candidateMember(tenantId, chatId),
        options.sentText
          ? tailBytes(assistantEntry(options.sentText), this.maxContextBytes)
          : '',
        this.maxContextEntries,
      );

    const lastMessageAt = Number(result);
    if (lastMessageAt < 0) {
      this.logger.debug(
        { tenantId, chatId, newStage },
        'Stage advance skipped, record changed',
      );
      return { applied: false };
    }
    return { applied: true, lastMessageAt };
  }

  /**
   * Take the conversation out of the follow-up sweep.
   */
  async markFinished(
    tenantId: string,
    chatId: string,
    observedAt?: number,
  ): Promise<ConditionalUpdate> {
    const result = await this.redisService
      .getClient()
      .eval(
        MARK_FINISHED,
        2,
        recordKey(tenantId, chatId),
        CANDIDATES_KEY,
        observedAt ?? '',
        candidateMember(tenantId, chatId),
      );

    const applied = Number(result) === 1;
    if (!applied) {
      this.logger.debug({ tenantId, chatId }, 'Finish skipped, record changed');
    }
    return { applied };
  }

  async get(
    tenantId: string,
    chatId: string,
  ): Promise<ConversationRecord | null> {
    const hash = await this.redisService
      .getClient()
      .hgetall(recordKey(tenantId, chatId));
    if (Object.keys(hash).length === 0) return null;

    const parsed = ConversationRecordSchema.safeParse(hash);
    if (!parsed.success) {
      this.logger.warn(
        { tenantId, chatId, error: parsed.error.message },
        'Invalid conversation record',
      );
      return null;
    }
    return parsed.data;
  }

  /**
   * Recent turns as `User: …` / `AI: …` lines, newest last, bounded in bytes.
   */
  async getContext(tenantId: string, chatId: string): Promise<string> {
    const entries = await this.redisService
      .getClient()
      .lrange(contextKey(tenantId, chatId), 0, -1);
    return boundContext(entries, this.maxContextBytes);
  }

  async clearContext(tenantId: string, chatId: string): Promise<void> {
    await this.redisService.getClient().del(contextKey(tenantId, chatId));
    this.logger.info({ tenantId, chatId }, 'Conversation context cleared');
  }

  /**
   * Active, assistant-last conversations whose last message is no newer
   * than `lastMessageBefore`, oldest first.
   */
  async listFollowupCandidates(
    lastMessageBefore: number,
    limit: number,
    offset = 0,
  ): Promise<ConversationRef[]> {
    const members = await this.redisService
      .getClient()
      .zrangebyscore(
        CANDIDATES_KEY,
        '-inf',
        lastMessageBefore,
        'LIMIT',
        offset,
        limit,
      );

    const refs: ConversationRef[] = [];
    for (const member of members) {
      const parsed = ConversationRefSchema.safeParse(decodeMember(member));
      if (!parsed.success) {
        this.logger.warn({ member }, 'Unreadable follow-up candidate');
        continue;
      }
      const [tenantId, chatId] = parsed.data;
      refs.push({ tenantId, chatId });
    }
    return refs;
  }

  private async recordTurn(
    tenantId: string,
    chatId: string,
    role: Role,
    entry: string,
  ): Promise<number> {
    const result = await this.redisService
      .getClient()
      .eval(
        RECORD_TURN,
        3,
        recordKey(tenantId, chatId),
        contextKey(tenantId, chatId),
        CANDIDATES_KEY,
        tenantId,
        chatId,
        role,
        Date.now(),
        tailBytes(entry, this.maxContextBytes),
        this.maxContextEntries,
        candidateMember(tenantId, chatId),
      );

    const lastMessageAt = Number(result);
    this.logger.debug({ tenantId, chatId, role, lastMessageAt }, 'Turn recorded');
    return lastMessageAt;
  }
}
