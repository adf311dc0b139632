import { createMockLogger } from '../test/mocks/pino-logger.mock';
import { InboundService, OPT_OUT_CONFIRMATION } from './inbound.service';

describe('InboundService', () => {
  let buffer: { enqueue: jest.Mock };
  let pauseService: {
    clear: jest.Mock;
    setPaused: jest.Mock;
    setPausedPermanent: jest.Mock;
    handleOperatorMessage: jest.Mock;
  };
  let conversations: { clearContext: jest.Mock };
  let tenantSettings: { get: jest.Mock };
  let eventEmitter: { emit: jest.Mock };
  let service: InboundService;

  beforeEach(() => {
    buffer = { enqueue: jest.fn(() => Promise.resolve()) };
    pauseService = {
      clear: jest.fn(() => Promise.resolve(true)),
      setPaused: jest.fn(() => Promise.resolve({ kind: 'temporary', until: 1 })),
      setPausedPermanent: jest.fn(() =>
        Promise.resolve({ kind: 'permanent', since: 1 }),
      ),
      handleOperatorMessage: jest.fn(() =>
        Promise.resolve({ kind: 'temporary', until: 1 }),
      ),
    };
    conversations = { clearContext: jest.fn(() => Promise.resolve()) };
    tenantSettings = {
      get: jest.fn(() =>
        Promise.resolve({
          manualPauseMinutes: 30,
          optOut: { enabled: false, triggers: ['#desativar', '#parar'] },
        }),
      ),
    };
    eventEmitter = { emit: jest.fn() };

    service = new InboundService(
      createMockLogger(),
      buffer as never,
      pauseService as never,
      conversations as never,
      tenantSettings as never,
      eventEmitter as never,
    );
  });

  describe('onInboundFragment', () => {
    test('buffers ordinary text as received', async () => {
      const outcome = await service.onInboundFragment('t1', 'c1', 'oi ', 'm-1');

      expect(outcome).toBe('buffered');
      expect(buffer.enqueue).toHaveBeenCalledWith('t1', 'c1', 'oi ', 'm-1');
    });

    test('ignores blank text', async () => {
      expect(await service.onInboundFragment('t1', 'c1', '   ')).toBe('ignored');
      expect(buffer.enqueue).not.toHaveBeenCalled();
    });

    test('#ativar clears the pause without buffering', async () => {
      expect(await service.onInboundFragment('t1', 'c1', ' #ATIVAR ')).toBe(
        'reactivated',
      );
      expect(pauseService.clear).toHaveBeenCalledWith('c1');
      expect(buffer.enqueue).not.toHaveBeenCalled();
    });

    test.each(['#stop', '#pausa'])(
      '%s pauses for the tenant manual pause window',
      async command => {
        expect(await service.onInboundFragment('t1', 'c1', command)).toBe(
          'paused',
        );
        expect(pauseService.setPaused).toHaveBeenCalledWith('c1', 30 * 60_000);
      },
    );

    test('#stop falls back to a day without tenant settings', async () => {
      tenantSettings.get.mockResolvedValue(null);

      await service.onInboundFragment('t1', 'c1', '#stop');

      expect(pauseService.setPaused).toHaveBeenCalledWith(
        'c1',
        1440 * 60_000,
      );
    });

    test('#reset clears the conversation context', async () => {
      expect(await service.onInboundFragment('t1', 'c1', '#reset')).toBe(
        'reset',
      );
      expect(conversations.clearContext).toHaveBeenCalledWith('t1', 'c1');
      expect(buffer.enqueue).not.toHaveBeenCalled();
    });

    test('text that merely contains a command is buffered', async () => {
      await service.onInboundFragment('t1', 'c1', 'como uso o #stop?');

      expect(buffer.enqueue).toHaveBeenCalled();
      expect(pauseService.setPaused).not.toHaveBeenCalled();
    });
  });

  describe('end-user opt-out', () => {
    beforeEach(() => {
      tenantSettings.get.mockResolvedValue({
        manualPauseMinutes: 30,
        optOut: { enabled: true, triggers: ['#desativar', '#parar'] },
      });
    });

    test('a trigger pauses for good and confirms without buffering', async () => {
      const outcome = await service.onInboundFragment('t1', 'c1', '#desativar');

      expect(outcome).toBe('optedOut');
      expect(pauseService.setPausedPermanent).toHaveBeenCalledWith('c1');
      expect(buffer.enqueue).not.toHaveBeenCalled();
      expect(eventEmitter.emit).toHaveBeenCalledWith('message.broadcast', {
        tenantId: 't1',
        chatId: 'c1',
        content: OPT_OUT_CONFIRMATION,
      });
    });

    test('the stop sign counts even among other text', async () => {
      expect(
        await service.onInboundFragment('t1', 'c1', 'não quero mais 🛑'),
      ).toBe('optedOut');
    });

    test('triggers are ignored while opt-out is disabled', async () => {
      tenantSettings.get.mockResolvedValue({
        manualPauseMinutes: 30,
        optOut: { enabled: false, triggers: ['#desativar'] },
      });

      expect(await service.onInboundFragment('t1', 'c1', '#desativar')).toBe(
        'buffered',
      );
      expect(pauseService.setPausedPermanent).not.toHaveBeenCalled();
      expect(eventEmitter.emit).not.toHaveBeenCalled();
    });
  });

  test('onOperatorMessage hands the chat to the pause state machine', async () => {
    const outcome = await service.onOperatorMessage('t1', 'c1', 'Pode deixar');

    expect(outcome).toBe('operator');
    expect(pauseService.handleOperatorMessage).toHaveBeenCalledWith(
      't1',
      'c1',
      'Pode deixar',
    );
    expect(buffer.enqueue).not.toHaveBeenCalled();
  });
});
