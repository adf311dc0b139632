import { z } from 'zod';

/**
 * Event constants for cross-module communication via EventEmitter.
 *
 * Use EventEmitter for "do this now" operations between modules.
 * Use BullMQ for persistent/delayed jobs (debounce triggers, sweeps).
 */
export const Events = {
  /** Send a message to an end user through the tenant's channel */
  MESSAGE_BROADCAST: 'message.broadcast',
} as const;

// Event payload schemas

export const MessageBroadcastEventSchema = z.object({
  tenantId: z.string(),
  chatId: z.string(),
  content: z.string(),
});

// Inferred types

export type MessageBroadcastEvent = z.infer<typeof MessageBroadcastEventSchema>;
