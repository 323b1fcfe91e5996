import { createLogger, requestContext, type Logger } from '@parlor/chat-observability';
import { ChannelClosedError, ReceiveTimeoutError, RegistrationError } from './errors.js';
import { OneShot, type Sender } from './channels.js';
import type { LiveStream, RegistrationRequest, RenderedEvent, Topic } from './types.js';

export const DEFAULT_REGISTRATION_TIMEOUT_MS = 5_000;

export interface SubscriptionGatewayOptions {
  /**
   * How long to wait for the topic's worker to hand back a delivery stream
   * @default 5000
   */
  registrationTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Entry point for HTTP handlers that want a topic's live events
 *
 * ## Usage
 *
 * ```typescript
 * const gateway = new SubscriptionGateway(router.registrations);
 *
 * const stream = await gateway.subscribe({ channelId, serverId }, viewerId);
 * request.signal.addEventListener('abort', () => stream.close());
 *
 * for await (const event of stream) {
 *   writer.send(event.event, event.data);
 * }
 * ```
 */
export class SubscriptionGateway {
  private readonly registrationTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly registrations: Sender<RegistrationRequest>,
    options: SubscriptionGatewayOptions = {},
  ) {
    this.registrationTimeoutMs = options.registrationTimeoutMs ?? DEFAULT_REGISTRATION_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('SubscriptionGateway');
  }

  /**
   * Register a viewer on a topic
   *
   * `registrationTimeoutMs` bounds the whole handshake: waiting for room in
   * the router's inbox and waiting for the worker's reply.
   *
   * @throws RegistrationError with reason `registration-channel-closed` when the
   *   router no longer accepts registrations, or `response-not-received` when
   *   no delivery stream arrives in time
   */
  async subscribe(topic: Topic, subscriberId: string): Promise<LiveStream<RenderedEvent>> {
    const normalizedTopic: Topic = {
      channelId: topic.channelId.toLowerCase(),
      serverId: topic.serverId.toLowerCase(),
    };
    const response = new OneShot<LiveStream<RenderedEvent>>();
    const timeoutMs = this.registrationTimeoutMs;
    const startedAt = Date.now();

    return requestContext.run({ topicId: normalizedTopic.channelId, subscriberId }, async () => {
      const deadline = new AbortController();
      const timer = setTimeout(() => deadline.abort(new ReceiveTimeoutError(timeoutMs)), timeoutMs);

      try {
        await this.registrations.send({ topic: normalizedTopic, subscriberId, response }, deadline.signal);
      } catch (error) {
        if (error instanceof ReceiveTimeoutError) {
          response.abandon();
          this.logger.error({ timeoutMs }, 'Router did not accept the registration in time');
          throw new RegistrationError('response-not-received', 'Live updates did not accept the registration in time', {
            cause: error,
          });
        }
        if (!(error instanceof ChannelClosedError)) throw error;
        this.logger.error('Router is not accepting registrations');
        throw new RegistrationError('registration-channel-closed', 'Live updates are not accepting registrations', {
          cause: error,
        });
      } finally {
        clearTimeout(timer);
      }

      try {
        const remainingMs = Math.max(0, startedAt + timeoutMs - Date.now());
        const stream = await response.receive(remainingMs);
        this.logger.debug('Subscribed to live updates');
        return stream;
      } catch (error) {
        if (error instanceof RegistrationError) throw error;
        if (!(error instanceof ReceiveTimeoutError) && !(error instanceof ChannelClosedError)) throw error;
        this.logger.error(
          { timedOut: error instanceof ReceiveTimeoutError },
          'No delivery stream received for registration',
        );
        throw new RegistrationError('response-not-received', 'No delivery stream received for registration', {
          cause: error,
        });
      }
    });
  }
}
