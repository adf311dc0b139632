import { z } from 'zod';

/**
 * Stored form of an active pause. Absence of the key means not paused.
 */
export const StoredPauseSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('temporary'), until: z.number() }),
  z.object({ kind: z.literal('permanent'), since: z.number() }),
]);

export type StoredPause = z.infer<typeof StoredPauseSchema>;

export type PauseState = { kind: 'absent' } | StoredPause;
