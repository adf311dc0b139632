import { z } from 'zod';

/**
 * Channel providers a tenant can be connected through.
 */
export const ProviderSchema = z.enum(['uazapi', 'meta', 'lancepilot']);

export type Provider = z.infer<typeof ProviderSchema>;

/**
 * One rung of the follow-up ladder: how long after the last message the
 * stage fires, and what the judge is asked to do.
 */
export const FollowupStageSchema = z.object({
  delayMinutes: z.number().int().positive().default(60),
  instruction: z
    .string()
    .min(1)
    .default('Pergunte se o cliente precisa de ajuda.'),
});

export type FollowupStage = z.infer<typeof FollowupStageSchema>;

/** Default opt-out triggers matched against end-user and operator text */
export const DEFAULT_OPT_OUT_TRIGGERS = ['#desativar', '#parar', '🛑'];

/**
 * Per-tenant settings, stored as JSON at `tenant:{id}:settings`.
 */
export const TenantSettingsSchema = z.object({
  provider: ProviderSchema.default('uazapi'),
  /** Tenant-wide kill switch for automated replies and reminders */
  automationEnabled: z.boolean().default(true),
  /** Pause applied when a human operator writes in the chat */
  humanTakeoverMinutes: z.number().int().positive().default(60),
  /** Pause applied by the `#stop` / `#pausa` commands */
  manualPauseMinutes: z.number().int().positive().default(1440),
  optOut: z
    .object({
      enabled: z.boolean().default(false),
      triggers: z.array(z.string().min(1)).default(DEFAULT_OPT_OUT_TRIGGERS),
    })
    .default({}),
  followup: z
    .object({
      enabled: z.boolean().default(false),
      stages: z.array(FollowupStageSchema).default([]),
    })
    .default({}),
  /** What the end user sees when reply generation fails */
  replyFailure: z.enum(['apologize', 'silent']).default('apologize'),
  outbound: z
    .object({
      url: z.string().url().optional(),
      token: z.string().optional(),
    })
    .default({}),
});

export type TenantSettings = z.infer<typeof TenantSettingsSchema>;

/**
 * Outcome of looking up a tenant's settings.
 */
export type TenantLookup =
  | { status: 'found'; settings: TenantSettings }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };
