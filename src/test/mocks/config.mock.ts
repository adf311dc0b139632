/**
 * Creates a mock ConfigService. Unset keys fall back to the caller's default,
 * as the real `get(path, defaultValue)` does.
 */
export function createMockConfigService(values: Record<string, unknown> = {}) {
  return {
    get: jest.fn((key: string, fallback?: unknown) =>
      key in values ? values[key] : fallback,
    ),
  };
}
