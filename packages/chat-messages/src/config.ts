import { z } from 'zod';

/**
 * Environment configuration for the live message server
 *
 * Unset and empty variables fall back to their defaults; anything else that
 * fails validation is a startup error.
 */
const liveEnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),

  // Connection pool used for message fetches
  PG_POOL_MAX: z.coerce.number().int().positive().default(10),
  PG_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

  // Live update engine
  LIVE_REGISTRATION_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  LIVE_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(300_000),
  LIVE_KEEPALIVE_MS: z.coerce.number().int().positive().default(5_000),
  LIVE_RECONNECT_DELAY_MS: z.coerce.number().int().positive().default(1_000),
});

export interface LiveConfig {
  databaseUrl: string;
  port: number;
  poolMax: number;
  /** Client-side limit on a message fetch; a hung query fails instead of stalling its topic */
  queryTimeoutMs: number;
  registrationTimeoutMs: number;
  /** `0` keeps idle topic workers forever */
  idleTimeoutMs: number;
  keepAliveMs: number;
  reconnectDelayMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * @throws ConfigError listing every invalid variable
 */
export function loadLiveConfig(env: NodeJS.ProcessEnv = process.env): LiveConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = liveEnvSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    databaseUrl: values.DATABASE_URL,
    port: values.PORT,
    poolMax: values.PG_POOL_MAX,
    queryTimeoutMs: values.PG_QUERY_TIMEOUT_MS,
    registrationTimeoutMs: values.LIVE_REGISTRATION_TIMEOUT_MS,
    idleTimeoutMs: values.LIVE_IDLE_TIMEOUT_MS,
    keepAliveMs: values.LIVE_KEEPALIVE_MS,
    reconnectDelayMs: values.LIVE_RECONNECT_DELAY_MS,
  };
}
