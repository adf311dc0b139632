import { isMessagingWindowOpen } from './messaging-window';

const HOUR_MS = 3_600_000;
const NOW = 1_700_000_000_000;

describe('isMessagingWindowOpen', () => {
  test('is always open for providers without a window', () => {
    expect(isMessagingWindowOpen(undefined, undefined, NOW)).toBe(true);
    expect(isMessagingWindowOpen(undefined, NOW - 100 * HOUR_MS, NOW)).toBe(
      true,
    );
  });

  test('is open within the window after the last user message', () => {
    expect(isMessagingWindowOpen(24, NOW - 23 * HOUR_MS, NOW)).toBe(true);
  });

  test('closes once the window has passed', () => {
    expect(isMessagingWindowOpen(24, NOW - 24 * HOUR_MS, NOW)).toBe(false);
  });

  test('is closed when the user never wrote', () => {
    expect(isMessagingWindowOpen(24, undefined, NOW)).toBe(false);
  });
});
