import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MurLock } from 'murlock';
import { PinoLogger } from 'nestjs-pino';
import { CONVERSATION_JUDGE, type ConversationJudge } from '../ai/ai.types';
import { ChannelGateway } from '../channels/channel.gateway';
import { AppClsService } from '../common/cls.service';
import type { ConversationRef } from '../conversations/conversation.schemas';
import { ConversationService } from '../conversations/conversation.service';
import { PauseService } from '../pause/pause.service';
import { TenantSettingsService } from '../tenants/tenant-settings.service';
import type {
  FollowupOutcome,
  FollowupSweepSummary,
} from './followup.types';
import { isMessagingWindowOpen } from './messaging-window';

const MINUTE_MS = 60_000;
/** Longer than any sweep should take; the lock expires on its own after */
const SWEEP_LOCK_MS = 5 * MINUTE_MS;

const emptySummary = (provider: string): FollowupSweepSummary => ({
  provider,
  candidates: 0,
  sent: 0,
  finished: 0,
  waiting: 0,
  paused: 0,
  windowClosed: 0,
  exhausted: 0,
  skipped: 0,
  invalid: 0,
  lost: 0,
  failed: 0,
});

/**
 * Multi-stage follow-up ladder.
 *
 * Each sweep walks the conversations where the assistant spoke last and
 * sends the current stage's message once its delay has elapsed, unless the
 * chat is paused, the provider's messaging window is closed, or the judge
 * finds the conversation resolved. Sweeps are partitioned by provider and
 * locked per provider, so each conversation has one owner.
 */
@Injectable()
export class FollowupService {
  private readonly pageSize: number;
  private readonly windowHours: Record<string, number>;

  constructor(
    private readonly logger: PinoLogger,
    private readonly configService: ConfigService,
    private readonly conversations: ConversationService,
    private readonly pauseService: PauseService,
    private readonly tenantSettings: TenantSettingsService,
    private readonly gateway: ChannelGateway,
    private readonly clsService: AppClsService,
    @Inject(CONVERSATION_JUDGE) private readonly judge: ConversationJudge,
  ) {
    this.logger.setContext(FollowupService.name);
    this.pageSize = this.configService.get<number>('followup.pageSize', 200);
    this.windowHours = this.configService.get<Record<string, number>>(
      'followup.messagingWindowHours',
      {},
    );
  }

  /**
   * Run one sweep for `provider`. One conversation's failure never stops
   * the others.
   */
  @MurLock(SWEEP_LOCK_MS, 'provider')
  async sweep(provider: string): Promise<FollowupSweepSummary> {
    const now = Date.now();
    const candidates = await this.listCandidates(now);
    const summary = emptySummary(provider);
    summary.candidates = candidates.length;

    for (const ref of candidates) {
      let outcome: FollowupOutcome;
      try {
        outcome = await this.clsService.runWithContext<FollowupOutcome>(
          ref,
          () => this.followUp(provider, ref, now),
        );
      } catch (error) {
        this.logger.error(
          { err: error, tenantId: ref.tenantId, chatId: ref.chatId },
          'Follow-up failed',
        );
        outcome = 'failed';
      }
      summary[outcome] += 1;
    }

    if (summary.candidates > 0) {
      this.logger.info(summary, 'Follow-up sweep complete');
    }
    return summary;
  }

  /**
   * Snapshot the candidate index before any record is touched, so advances
   * during the sweep do not shift the pages.
   */
  private async listCandidates(now: number): Promise<ConversationRef[]> {
    const refs: ConversationRef[] = [];
    for (let offset = 0; ; offset += this.pageSize) {
      const page = await this.conversations.listFollowupCandidates(
        now,
        this.pageSize,
        offset,
      );
      refs.push(...page);
      if (page.length < this.pageSize) return refs;
    }
  }

  private async followUp(
    provider: string,
    ref: ConversationRef,
    now: number,
  ): Promise<FollowupOutcome> {
    const { tenantId, chatId } = ref;

    const lookup = await this.tenantSettings.lookup(tenantId);
    if (lookup.status !== 'found') {
      this.logger.warn(
        { tenantId, chatId, lookup: lookup.status },
        'Follow-up candidate without usable tenant settings',
      );
      return 'invalid';
    }
    const { settings } = lookup;
    if (settings.provider !== provider) return 'skipped';
    if (!settings.followup.enabled || !settings.automationEnabled) {
      return 'skipped';
    }

    if (await this.pauseService.isPaused(chatId)) return 'paused';

    const record = await this.conversations.get(tenantId, chatId);
    if (
      !record ||
      record.status !== 'active' ||
      record.lastRole !== 'assistant'
    ) {
      return 'skipped';
    }

    const stages = settings.followup.stages;
    const stageIndex = record.followupStage;
    if (stageIndex >= stages.length) {
      // Out of the sweep until the user writes again
      await this.conversations.markFinished(
        tenantId,
        chatId,
        record.lastMessageAt,
      );
      return 'exhausted';
    }
    const stage = stages[stageIndex];

    if (now - record.lastMessageAt < stage.delayMinutes * MINUTE_MS) {
      return 'waiting';
    }

    if (
      !isMessagingWindowOpen(
        this.windowHours[provider],
        record.lastUserMessageAt,
        now,
      )
    ) {
      this.logger.debug({ tenantId, chatId }, 'Messaging window closed');
      return 'windowClosed';
    }

    const recentContext = await this.conversations.getContext(
      tenantId,
      chatId,
    );
    const judgment = await this.judge.judge({
      tenantId,
      chatId,
      instruction: stage.instruction,
      recentContext,
    });

    if (judgment.verdict === 'suppress') {
      const finished = await this.conversations.markFinished(
        tenantId,
        chatId,
        record.lastMessageAt,
      );
      this.logger.info(
        { tenantId, chatId, reason: judgment.reason },
        'Conversation finished by judge',
      );
      return finished.applied ? 'finished' : 'lost';
    }

    const sent = await this.gateway.sendText(tenantId, chatId, judgment.text);
    if (!sent.ok) {
      // Stage stays put; the next sweep retries it
      this.logger.warn(
        { err: sent.error, tenantId, chatId, stage: stageIndex + 1 },
        'Follow-up send failed',
      );
      return 'failed';
    }

    const advanced = await this.conversations.advanceStage(
      tenantId,
      chatId,
      stageIndex + 1,
      { observedAt: record.lastMessageAt, sentText: judgment.text },
    );
    if (!advanced.applied) {
      this.logger.warn(
        { tenantId, chatId, stage: stageIndex + 1 },
        'Follow-up sent but the record moved on before the stage advanced',
      );
      return 'lost';
    }

    this.logger.info(
      { tenantId, chatId, stage: stageIndex + 1 },
      'Follow-up sent',
    );
    return 'sent';
  }
}
