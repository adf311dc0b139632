const HOUR_MS = 3_600_000;

/**
 * Whether a provider still accepts an unsolicited message.
 *
 * Providers with a customer-initiated window (e.g. 24 hours on the official
 * WhatsApp API) only allow business-initiated text within that many hours of
 * the customer's last message. `windowHours` undefined means no window.
 */
export function isMessagingWindowOpen(
  windowHours: number | undefined,
  lastUserMessageAt: number | undefined,
  now: number,
): boolean {
  if (windowHours === undefined) return true;
  if (lastUserMessageAt === undefined) return false;
  return now - lastUserMessageAt < windowHours * HOUR_MS;
}
