import { z } from 'zod';

/** Queue holding the delayed flush trigger of each (tenant, chat) buffer */
export const INBOUND_QUEUE = 'inbound-messages';

/**
 * A fragment waiting in `buffer:{tenant}:{chat}` for the burst to go quiet.
 */
export const PendingFragmentSchema = z.object({
  text: z.string(),
  /** Unix timestamp (ms) when the fragment was buffered */
  receivedAt: z.number(),
  /** Provider message id, when the provider gives one */
  messageId: z.string().optional(),
});

export type PendingFragment = z.infer<typeof PendingFragmentSchema>;

/**
 * BullMQ job data for the inbound-messages queue.
 * Acts as a debounced trigger; the fragments themselves live in Redis lists.
 */
export interface FlushTriggerJob {
  tenantId: string;
  chatId: string;
}

/** Normalized intake body, whatever provider the message came from */
export const InboundMessageSchema = z.object({
  tenantId: z.string().min(1),
  chatId: z.string().min(1),
  text: z.string(),
  messageId: z.string().optional(),
  /** True when a human operator wrote the message from the business side */
  fromOperator: z.boolean().default(false),
});

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

export type IntakeOutcome =
  | 'buffered'
  | 'ignored'
  | 'reset'
  | 'reactivated'
  | 'paused'
  | 'optedOut'
  | 'operator';

export type FlushOutcome =
  | 'empty'
  | 'paused'
  | 'skipped'
  | 'disabled'
  | 'replied'
  | 'failed';
