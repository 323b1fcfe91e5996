/**
 * Core types for the live update engine
 */

import type { OneShot } from './channels.js';

export type ChangeKind = 'insert' | 'update' | 'delete';

/**
 * Raw notification as delivered by the storage layer's change feed
 */
export interface ChangeNotification {
  channel: string;
  payload: string;
}

/**
 * A decoded row change on a chat message
 */
export interface ChangeEvent {
  readonly kind: ChangeKind;
  /** Id of the changed message */
  readonly entityId: string;
  /** Id of the chat channel the message belongs to */
  readonly topicId: string;
}

/**
 * A chat channel viewers can follow. The owning server id is carried so
 * rendered snippets can link back to the channel's routes.
 */
export interface Topic {
  readonly channelId: string;
  readonly serverId: string;
}

/**
 * SSE event names the engine produces
 */
export type LiveEventType = 'message';

/**
 * One change rendered for one viewer, ready for the push stream
 */
export interface RenderedEvent {
  event: LiveEventType;
  kind: ChangeKind;
  entityId: string;
  /** HTML fragment (or removal instruction for deletes) */
  data: string;
}

/**
 * Reader side of a subscriber's delivery channel
 */
export interface LiveStream<T> extends AsyncIterable<T> {
  readonly closed: boolean;
  /** Stop listening; the worker prunes the subscriber on its next delivery */
  close(): void;
}

export interface RegistrationRequest {
  topic: Topic;
  subscriberId: string;
  response: OneShot<LiveStream<RenderedEvent>>;
}

export interface RenderContext {
  viewerId: string;
  topic: Topic;
  kind: Exclude<ChangeKind, 'delete'>;
}

/**
 * Everything a fan-out worker needs to know about the entity behind a topic.
 *
 * `fetchEntity` is called once per insert/update event; `renderEntity` once
 * per subscriber and may throw a `RenderError` to skip that subscriber.
 */
export interface TopicRenderer<TEntity> {
  fetchEntity(entityId: string): Promise<TEntity | null>;
  renderEntity(entity: TEntity, context: RenderContext): string;
  renderDeletion(entityId: string, topic: Topic): string;
}

/**
 * Health check result for the live update engine
 */
export interface HealthCheckResult {
  healthy: boolean;
  error?: string;
}
