import { z } from 'zod';

export const ReminderStatusSchema = z.enum([
  'pending',
  'sent',
  'cancelled',
  'error',
]);

export type ReminderStatus = z.infer<typeof ReminderStatusSchema>;

/**
 * A one-shot reminder, stored as a Redis hash at `reminder:{id}`.
 * Only `pending` reminders are indexed for the sweep; the other statuses are
 * terminal.
 */
export const ReminderSchema = z.object({
  id: z.string(),
  tenantId: z.string(),
  chatId: z.string(),
  scheduledAt: z.coerce.number(),
  intent: z.string(),
  status: ReminderStatusSchema,
  createdAt: z.coerce.number(),
  updatedAt: z.coerce.number(),
  /** Message sent, or why the reminder was cancelled or failed */
  notes: z.string().optional(),
});

export type Reminder = z.infer<typeof ReminderSchema>;

export type ScheduleReminderResult =
  | { scheduled: true; reminder: Reminder }
  | { scheduled: false; error: string };

/**
 * Per-outcome counts of one reminder sweep.
 */
export interface ReminderSweepSummary {
  due: number;
  sent: number;
  cancelled: number;
  failed: number;
  /** Left pending because the chat is paused */
  deferred: number;
  /** Claimed by another worker first */
  skipped: number;
}
