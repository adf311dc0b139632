/**
 * Creates a mock AppClsService for testing. Callbacks run inline.
 */
export function createMockClsService() {
  return {
    runWithContext: jest.fn(
      async <T>(
        _context: { tenantId: string; chatId: string },
        callback: () => Promise<T>,
      ): Promise<T> => callback(),
    ),
  };
}

export type MockClsService = ReturnType<typeof createMockClsService>;
