/** Queue ticked by one job scheduler per provider */
export const FOLLOWUP_SWEEP_QUEUE = 'followup-sweeps';

export interface FollowupSweepJob {
  provider: string;
}

export type FollowupOutcome =
  /** Message sent and the ladder advanced */
  | 'sent'
  /** The judge saw the conversation as resolved */
  | 'finished'
  /** The current stage's delay has not elapsed */
  | 'waiting'
  | 'paused'
  /** The provider's messaging window is closed */
  | 'windowClosed'
  /** Every stage of the ladder has fired */
  | 'exhausted'
  /** Another provider, follow-ups off, automation off, or the record moved on */
  | 'skipped'
  /** Tenant settings missing or unreadable */
  | 'invalid'
  /** The record changed between read and write */
  | 'lost'
  | 'failed';

export type FollowupSweepSummary = Record<FollowupOutcome, number> & {
  provider: string;
  candidates: number;
};
