import { z } from 'zod';

export const RoleSchema = z.enum(['user', 'assistant']);
export type Role = z.infer<typeof RoleSchema>;

export const ConversationStatusSchema = z.enum(['active', 'finished']);
export type ConversationStatus = z.infer<typeof ConversationStatusSchema>;

/**
 * Tracking record for one (tenant, chat) pair, stored as a Redis hash at
 * `conversation:{tenant}:{chat}`. Hash fields come back as strings, hence the
 * coercions.
 */
export const ConversationRecordSchema = z.object({
  tenantId: z.string(),
  chatId: z.string(),
  /** Strictly increasing per record */
  lastMessageAt: z.coerce.number(),
  /** Last time the end user wrote; drives provider messaging windows */
  lastUserMessageAt: z.coerce.number().optional(),
  lastRole: RoleSchema,
  status: ConversationStatusSchema,
  followupStage: z.coerce.number().int().nonnegative(),
});

export type ConversationRecord = z.infer<typeof ConversationRecordSchema>;

/**
 * Follow-up candidate index member: `[tenantId, chatId]` as JSON.
 */
export const ConversationRefSchema = z.tuple([z.string(), z.string()]);

export interface ConversationRef {
  tenantId: string;
  chatId: string;
}

export interface AdvanceStageOptions {
  /** Only apply when `lastMessageAt` still equals this observed value */
  observedAt?: number;
  /** Text sent for this stage, appended to the context as an AI turn */
  sentText?: string;
}

export interface ConditionalUpdate {
  applied: boolean;
  /** New `lastMessageAt` when applied */
  lastMessageAt?: number;
}
