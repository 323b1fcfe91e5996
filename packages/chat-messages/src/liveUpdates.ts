import { createLogger, type Logger } from '@parlor/chat-observability';
import { SubscriptionGateway, TopicRouter, type HealthCheckResult } from '@parlor/chat-eventhub';
import { ChatMessageRenderer } from './messageRenderer.js';
import type { ChatMessage, MessageSource } from './messageStore.js';
import { PgChangeFeed, type ListenClient } from './pgChangeFeed.js';

export interface LiveUpdatesOptions {
  source: MessageSource;
  createListenClient: () => ListenClient;
  registrationTimeoutMs?: number;
  idleTimeoutMs?: number;
  reconnectDelayMs?: number;
  /** Clock used for relative times in rendered messages */
  clock?: () => Date;
  logger?: Logger;
}

/**
 * The running live update engine for chat messages
 */
export interface LiveUpdates {
  gateway: SubscriptionGateway;
  router: TopicRouter<ChatMessage>;
  feed: PgChangeFeed;
  healthCheck(): HealthCheckResult;
  /** Stop listening, end every stream and wait for all loops */
  stop(): Promise<void>;
}

/**
 * Wire the change feed, topic router and subscription gateway together and
 * start them
 *
 * @throws When the change feed cannot connect
 */
export async function createLiveUpdates(options: LiveUpdatesOptions): Promise<LiveUpdates> {
  const logger = options.logger ?? createLogger('LiveUpdates');

  const feed = new PgChangeFeed({
    createClient: options.createListenClient,
    reconnectDelayMs: options.reconnectDelayMs,
    logger: logger.child({ component: 'PgChangeFeed' }),
  });
  await feed.start();

  const router = new TopicRouter<ChatMessage>({
    feed: feed.notifications,
    renderer: new ChatMessageRenderer(options.source, options.clock),
    idleTimeoutMs: options.idleTimeoutMs,
    logger: logger.child({ component: 'TopicRouter' }),
  });
  const loop = router.start();

  const gateway = new SubscriptionGateway(router.registrations, {
    registrationTimeoutMs: options.registrationTimeoutMs,
    logger: logger.child({ component: 'SubscriptionGateway' }),
  });

  let stopping: Promise<void> | null = null;

  return {
    gateway,
    router,
    feed,
    healthCheck() {
      if (!feed.connected) {
        return { healthy: false, error: 'Change feed is not connected' };
      }
      return { healthy: true };
    },
    stop() {
      stopping ??= (async () => {
        await feed.stop();
        await router.stop();
        await loop;
        logger.info('Live updates stopped');
      })();
      return stopping;
    },
  };
}
