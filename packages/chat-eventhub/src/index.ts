/**
 * @parlor/chat-eventhub
 *
 * In-process live update engine: turns row change notifications into
 * per-viewer events for everyone watching the affected chat channel.
 *
 * Building blocks:
 * - Channels: bounded/unbounded channels, one-shot replies and `select`
 * - decodeChangeNotification: change feed payload → ChangeEvent
 * - TopicRouter: owns the topic → worker directory, routes events and registrations
 * - FanoutWorker: one per topic, fetches once and renders per subscriber
 * - SubscriptionGateway: what HTTP handlers call to get a live stream
 *
 * ## Usage
 *
 * ```typescript
 * const router = new TopicRouter({ feed, renderer });
 * const loop = router.start();
 * const gateway = new SubscriptionGateway(router.registrations);
 *
 * const stream = await gateway.subscribe({ channelId, serverId }, viewerId);
 * for await (const event of stream) {
 *   // push event.data to the browser
 * }
 *
 * await router.stop();
 * ```
 */

// Core types
export * from './types.js';
export * from './errors.js';

// Message passing
export * from './channels.js';

// Engine
export * from './changeEventDecoder.js';
export * from './subscriberSet.js';
export * from './topicDirectory.js';
export * from './fanoutWorker.js';
export * from './topicRouter.js';
export * from './subscriptionGateway.js';
