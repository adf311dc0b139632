/**
 * Creates a mock MurlockService for testing.
 *
 * The MurLock decorator requires a `murlockServiceDecorator` property
 * to be injected into the service. This mock provides a no-op implementation
 * that allows the decorated methods to execute without actual locking.
 */
export function createMockMurlockService() {
  return {
    options: {
      lockKeyPrefix: 'test-lock',
      wait: 1000,
      maxAttempts: 3,
    },
    lock: jest.fn(async () => ({
      unlock: jest.fn(async () => undefined),
    })),
    // The callback comes last whatever options precede it
    runWithLock: jest.fn(async (...args: unknown[]): Promise<unknown> => {
      const callback = args[args.length - 1];
      if (typeof callback !== 'function') {
        throw new Error('runWithLock called without a callback');
      }
      return callback();
    }),
  };
}

/**
 * Injects the mock murlock service into a class instance.
 *
 * Usage:
 * ```ts
 * const service = new FollowupService(...);
 * injectMurlockService(service);
 * ```
 */
export function injectMurlockService<T extends object>(
  instance: T,
  murlockService = createMockMurlockService(),
): T {
  Object.assign(instance, { murlockServiceDecorator: murlockService });
  return instance;
}
