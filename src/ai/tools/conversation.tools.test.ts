import { createConversationTools } from './conversation.tools';

const NOW = 1_700_000_000_000;
const CALL = { toolCallId: 'test', messages: [] };

describe('createConversationTools', () => {
  let pauseService: { setPaused: jest.Mock; setPausedPermanent: jest.Mock };
  let reminderService: {
    scheduleReminder: jest.Mock;
    listReminders: jest.Mock;
    cancelReminder: jest.Mock;
  };
  let tools: ReturnType<typeof createConversationTools>;

  beforeEach(() => {
    pauseService = {
      setPaused: jest.fn((_chatId: string, durationMs: number) =>
        Promise.resolve({ kind: 'temporary', until: NOW + durationMs }),
      ),
      setPausedPermanent: jest.fn(() =>
        Promise.resolve({ kind: 'permanent', since: NOW }),
      ),
    };
    reminderService = {
      scheduleReminder: jest.fn(() =>
        Promise.resolve({
          scheduled: true,
          reminder: { id: 'abc123', scheduledAt: NOW + 3_600_000 },
        }),
      ),
      listReminders: jest.fn(() =>
        Promise.resolve([
          {
            id: 'abc123',
            intent: 'Enviar proposta',
            scheduledAt: NOW,
            status: 'pending',
          },
          {
            id: 'def456',
            intent: 'Confirmar visita',
            scheduledAt: NOW + 3_600_000,
            status: 'sent',
          },
        ]),
      ),
      cancelReminder: jest.fn(() => Promise.resolve({ cancelled: true })),
    };

    tools = createConversationTools(
      {
        pauseService: pauseService as never,
        reminderService: reminderService as never,
      },
      { tenantId: 't1', chatId: 'c1', handoffMinutes: 30 },
    );
  });

  describe('request_handoff', () => {
    test('pauses the bound chat for the handoff duration', async () => {
      const result = await tools.request_handoff.execute?.(
        { reason: 'quer falar com vendedor' },
        CALL,
      );

      expect(pauseService.setPaused).toHaveBeenCalledWith('c1', 30 * 60_000);
      expect(result).toBe(
        `Handoff requested (quer falar com vendedor). Automation paused until ${new Date(NOW + 30 * 60_000).toISOString()}. Tell the customer a human attendant will continue shortly.`,
      );
    });
  });

  describe('disable_automation', () => {
    test('pauses the bound chat permanently', async () => {
      await tools.disable_automation.execute?.({}, CALL);

      expect(pauseService.setPausedPermanent).toHaveBeenCalledWith('c1');
    });
  });

  describe('schedule_reminder', () => {
    test('schedules for the bound tenant and chat', async () => {
      const result = await tools.schedule_reminder.execute?.(
        { when: 'daqui a 1 hora', intent: 'Enviar proposta' },
        CALL,
      );

      expect(reminderService.scheduleReminder).toHaveBeenCalledWith(
        't1',
        'c1',
        'daqui a 1 hora',
        'Enviar proposta',
      );
      expect(result).toBe(
        `Reminder scheduled for ${new Date(NOW + 3_600_000).toISOString()} (ID: abc123).`,
      );
    });

    test('reports scheduling errors to the model', async () => {
      reminderService.scheduleReminder.mockResolvedValue({
        scheduled: false,
        error: 'Reminder time must be in the future',
      });

      const result = await tools.schedule_reminder.execute?.(
        { when: 'ontem', intent: 'x' },
        CALL,
      );

      expect(result).toBe(
        'Failed to schedule reminder: Reminder time must be in the future',
      );
    });
  });

  describe('list_reminders', () => {
    test('lists the bound chat reminders', async () => {
      const result = await tools.list_reminders.execute?.({}, CALL);

      expect(reminderService.listReminders).toHaveBeenCalledWith('t1', 'c1');
      expect(result).toBe(
        [
          `1. Enviar proposta (ID: abc123, ${new Date(NOW).toISOString()}, pending)`,
          `2. Confirmar visita (ID: def456, ${new Date(NOW + 3_600_000).toISOString()}, sent)`,
        ].join('\n'),
      );
    });

    test('says so when there are none', async () => {
      reminderService.listReminders.mockResolvedValue([]);

      expect(await tools.list_reminders.execute?.({}, CALL)).toBe(
        'No reminders scheduled for this customer.',
      );
    });
  });

  describe('cancel_reminder', () => {
    test('cancels within the bound tenant and chat', async () => {
      const result = await tools.cancel_reminder.execute?.(
        { reminderId: 'abc123' },
        CALL,
      );

      expect(reminderService.cancelReminder).toHaveBeenCalledWith(
        't1',
        'c1',
        'abc123',
      );
      expect(result).toBe('Reminder abc123 cancelled.');
    });

    test('reports why a reminder could not be cancelled', async () => {
      reminderService.cancelReminder.mockResolvedValue({
        cancelled: false,
        error: 'Reminder not found',
      });

      expect(
        await tools.cancel_reminder.execute?.({ reminderId: 'nope' }, CALL),
      ).toBe('Failed to cancel reminder: Reminder not found');
    });
  });
});
