/**
 * @parlor/chat-messages
 *
 * Chat message side of the live update engine: reading messages from
 * Postgres, rendering them for each viewer, listening for row changes and
 * serving the per-channel event stream.
 */

export { loadLiveConfig, ConfigError, type LiveConfig } from './config.js';
export { escapeHtml } from './html.js';
export { timestampFromUuid } from './uuidTimestamp.js';
export { PgMessageSource, type ChatMessage, type MessageSource, type QueryRunner } from './messageStore.js';
export {
  ChatMessageRenderer,
  renderDeletion,
  renderMessage,
  type RenderMessageOptions,
} from './messageRenderer.js';
export { PgChangeFeed, type ListenClient, type PgChangeFeedOptions } from './pgChangeFeed.js';
export {
  createMessageEventsRouteHandler,
  SseStreamWriter,
  DEFAULT_KEEP_ALIVE_MS,
  type LiveSubscriptions,
  type MessageEventsRouteOptions,
  type MessageEventsRouteParams,
} from './messageEventsRoute.js';
export { createLiveUpdates, type LiveUpdates, type LiveUpdatesOptions } from './liveUpdates.js';
