import { tool } from 'ai';
import { z } from 'zod';
import type { PauseService } from '../../pause/pause.service';
import type { ReminderService } from '../../reminders/reminder.service';

const MINUTE_MS = 60_000;

export interface ConversationToolDeps {
  pauseService: PauseService;
  reminderService: ReminderService;
}

export interface ConversationToolContext {
  tenantId: string;
  chatId: string;
  /** How long a handoff pauses automation */
  handoffMinutes: number;
}

/**
 * Creates the tools available while replying to one chat.
 *
 * Tenant and chat are bound here; the model never names the conversation
 * an action applies to.
 */
export function createConversationTools(
  deps: ConversationToolDeps,
  context: ConversationToolContext,
) {
  const { pauseService, reminderService } = deps;
  const { tenantId, chatId, handoffMinutes } = context;

  return {
    request_handoff: tool({
      description:
        'Hand the conversation to a human attendant. Automation stays silent in this chat for a while. Use when the customer asks for a person or the request is beyond what you can resolve.',
      inputSchema: z.object({
        reason: z
          .string()
          .default('Solicitação do cliente')
          .describe('Why the conversation is being handed off'),
      }),
      execute: async ({ reason }) => {
        const pause = await pauseService.setPaused(
          chatId,
          handoffMinutes * MINUTE_MS,
        );
        if (pause.kind !== 'temporary') {
          return 'Handoff requested.';
        }
        return `Handoff requested (${reason}). Automation paused until ${new Date(pause.until).toISOString()}. Tell the customer a human attendant will continue shortly.`;
      },
    }),

    disable_automation: tool({
      description:
        'Stop all automated messages in this chat, including follow-ups and reminders. Use only when the customer explicitly asks not to receive automated messages anymore.',
      inputSchema: z.object({}),
      execute: async () => {
        await pauseService.setPausedPermanent(chatId);
        return 'Automation disabled for this chat. Confirm to the customer that they will not receive automated messages.';
      },
    }),

    schedule_reminder: tool({
      description:
        'Schedule a message to this customer at a later time, e.g. when they ask to be contacted tomorrow. Accepts ISO 8601 timestamps or short expressions such as "amanhã às 14h", "daqui a 2 horas", "dia 15", "semana que vem".',
      inputSchema: z.object({
        when: z
          .string()
          .describe('When to get back to the customer'),
        intent: z
          .string()
          .describe('What the message should be about, e.g. "Enviar a proposta"'),
      }),
      execute: async ({ when, intent }) => {
        const result = await reminderService.scheduleReminder(
          tenantId,
          chatId,
          when,
          intent,
        );
        if (!result.scheduled) {
          return `Failed to schedule reminder: ${result.error}`;
        }
        return `Reminder scheduled for ${new Date(result.reminder.scheduledAt).toISOString()} (ID: ${result.reminder.id}).`;
      },
    }),

    list_reminders: tool({
      description:
        'List the reminders scheduled for this customer, with their IDs and status.',
      inputSchema: z.object({}),
      execute: async () => {
        const reminders = await reminderService.listReminders(tenantId, chatId);
        if (reminders.length === 0) {
          return 'No reminders scheduled for this customer.';
        }
        return reminders
          .map(
            (reminder, idx) =>
              `${idx + 1}. ${reminder.intent} (ID: ${reminder.id}, ${new Date(reminder.scheduledAt).toISOString()}, ${reminder.status})`,
          )
          .join('\n');
      },
    }),

    cancel_reminder: tool({
      description:
        'Cancel a pending reminder for this customer, e.g. when they no longer want to be contacted. Use list_reminders first to find the ID.',
      inputSchema: z.object({
        reminderId: z.string().describe('The reminder ID to cancel'),
      }),
      execute: async ({ reminderId }) => {
        const result = await reminderService.cancelReminder(
          tenantId,
          chatId,
          reminderId,
        );
        if (!result.cancelled) {
          return `Failed to cancel reminder: ${result.error}`;
        }
        return `Reminder ${reminderId} cancelled.`;
      },
    }),
  };
}
