import type { Job } from 'bullmq';
import { createMockLogger } from '../test/mocks/pino-logger.mock';
import { ReminderSweepProcessor } from './reminder-sweep.processor';

describe('ReminderSweepProcessor', () => {
  test('runs one sweep per tick', async () => {
    const summary = {
      due: 1,
      sent: 1,
      cancelled: 0,
      failed: 0,
      deferred: 0,
      skipped: 0,
    };
    const reminderService = { sweep: jest.fn(() => Promise.resolve(summary)) };
    const processor = new ReminderSweepProcessor(
      createMockLogger(),
      reminderService as never,
    );

    const result = await processor.process({ id: 'tick-1', data: {} } as Job);

    expect(reminderService.sweep).toHaveBeenCalledTimes(1);
    expect(result).toEqual(summary);
  });
});
