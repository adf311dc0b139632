import type { TenantSettings } from './tenant.schemas';

/** Always honoured as an opt-out trigger once opt-out is enabled */
export const STOP_SIGN = '🛑';

/**
 * Whether text carries one of the tenant's opt-out triggers.
 * Matching is a case-insensitive substring test.
 */
export function isOptOut(
  optOut: TenantSettings['optOut'],
  text: string,
): boolean {
  if (!optOut.enabled) return false;
  const haystack = text.toLowerCase();
  return (
    haystack.includes(STOP_SIGN) ||
    optOut.triggers.some(trigger => haystack.includes(trigger.toLowerCase()))
  );
}
