const int = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const list = (value: string | undefined, fallback: string): string[] =>
  (value || fallback)
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);

/** Hours a provider allows unsolicited sends after the last user message */
const messagingWindowHours = (): Record<string, number> => ({
  meta: int(process.env.MESSAGING_WINDOW_HOURS_META, 24),
  lancepilot: int(process.env.MESSAGING_WINDOW_HOURS_LANCEPILOT, 24),
});

export const configuration = () => ({
  port: int(process.env.PORT, 3000),
  anthropic: {
    apiKey: process.env.ANTHROPIC_API_KEY,
    model: process.env.ANTHROPIC_MODEL || 'claude-sonnet-4-20250514',
  },
  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: int(process.env.REDIS_PORT, 6379),
    password: process.env.REDIS_PASSWORD,
  },
  buffer: {
    quietMs: int(process.env.DEBOUNCE_QUIET_MS, 5000),
    ttlSeconds: int(process.env.BUFFER_TTL_SECONDS, 300),
  },
  context: {
    maxBytes: int(process.env.CONTEXT_MAX_BYTES, 2000),
    maxEntries: int(process.env.CONTEXT_MAX_ENTRIES, 40),
  },
  tenants: {
    cacheTtlMs: int(process.env.TENANT_CACHE_TTL_MS, 60_000),
  },
  followup: {
    providers: list(process.env.FOLLOWUP_PROVIDERS, 'uazapi'),
    sweepIntervalMs: int(process.env.FOLLOWUP_SWEEP_INTERVAL_MS, 60_000),
    pageSize: int(process.env.FOLLOWUP_PAGE_SIZE, 200),
    messagingWindowHours: messagingWindowHours(),
  },
  reminders: {
    sweepIntervalMs: int(process.env.REMINDER_SWEEP_INTERVAL_MS, 60_000),
    batchSize: int(process.env.REMINDER_BATCH_SIZE, 50),
  },
});

