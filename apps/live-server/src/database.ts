import type { LiveConfig } from '@parlor/chat-messages';
import type { ClientConfig, PoolConfig } from 'pg';

/**
 * Pool used for message fetches. `query_timeout` turns a hung fetch into an
 * error, so the topic's worker logs it and moves on.
 */
export function messagePoolConfig(config: LiveConfig): PoolConfig {
  return {
    connectionString: config.databaseUrl,
    max: config.poolMax,
    query_timeout: config.queryTimeoutMs,
  };
}

/**
 * Dedicated LISTEN connection. It sits idle between notifications, so it
 * carries no query timeout.
 */
export function listenClientConfig(config: LiveConfig): ClientConfig {
  return { connectionString: config.databaseUrl };
}
