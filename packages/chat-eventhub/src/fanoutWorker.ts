import { createLogger, requestContext, type Logger } from '@parlor/chat-observability';
import { BoundedChannel, lane, select, type Lane } from './channels.js';
import { getErrorMessage } from './errors.js';
import { SubscriberSet } from './subscriberSet.js';
import type { ChangeEvent, RegistrationRequest, RenderedEvent, Topic, TopicRenderer } from './types.js';

export const DEFAULT_WORKER_INBOX_CAPACITY = 1;

export interface IdleReport<TEntity> {
  worker: FanoutWorker<TEntity>;
  /** Registrations this worker has taken from its inbox so far */
  handledRegistrations: number;
}

export interface FanoutWorkerConfig<TEntity> {
  topic: Topic;
  renderer: TopicRenderer<TEntity>;
  /**
   * Capacity of the event and registration inboxes
   * @default 1
   */
  inboxCapacity?: number;
  /**
   * After this long without traffic the worker sweeps closed subscribers and,
   * if none are left, reports itself idle. `0` disables the check.
   * @default 0
   */
  idleTimeoutMs?: number;
  onIdle?: (report: IdleReport<TEntity>) => void;
  logger?: Logger;
}

type WorkerMessage =
  | { type: 'event'; event: ChangeEvent }
  | { type: 'registration'; request: RegistrationRequest };

/**
 * Fan-out worker for a single topic
 *
 * Runs one loop that takes either a change event or a registration from its
 * inboxes, one message at a time. That loop is the only place the topic's
 * subscriber set is read or written, which is what gives per-topic ordering:
 * a registration handled before an event sees that event, one handled after
 * does not.
 *
 * For inserts and updates the changed entity is fetched once and rendered per
 * subscriber; deletes need no fetch. Subscribers whose stream is gone are
 * pruned after the full delivery pass.
 */
export class FanoutWorker<TEntity> {
  readonly topic: Topic;
  readonly events: BoundedChannel<ChangeEvent>;
  readonly registrations: BoundedChannel<RegistrationRequest>;

  private readonly renderer: TopicRenderer<TEntity>;
  private readonly subscribers: SubscriberSet<RenderedEvent>;
  private readonly idleTimeoutMs: number;
  private readonly onIdle?: (report: IdleReport<TEntity>) => void;
  private readonly logger: Logger;
  private handledRegistrations = 0;
  private idleReported = false;
  private loop: Promise<void> | null = null;

  constructor(config: FanoutWorkerConfig<TEntity>) {
    const capacity = config.inboxCapacity ?? DEFAULT_WORKER_INBOX_CAPACITY;
    const { channelId, serverId } = config.topic;

    this.topic = config.topic;
    this.renderer = config.renderer;
    this.idleTimeoutMs = config.idleTimeoutMs ?? 0;
    this.onIdle = config.onIdle;
    this.events = new BoundedChannel<ChangeEvent>(`topic:${channelId}:events`, capacity);
    this.registrations = new BoundedChannel<RegistrationRequest>(`topic:${channelId}:registrations`, capacity);
    this.subscribers = new SubscriberSet<RenderedEvent>(`topic:${channelId}:delivery`);
    this.logger = (config.logger ?? createLogger('FanoutWorker')).child({ topicId: channelId, serverId });
  }

  /**
   * Start the worker loop
   *
   * @returns Promise settling once both inboxes are closed and drained
   */
  start(): Promise<void> {
    if (!this.loop) {
      const { channelId, serverId } = this.topic;
      this.loop = requestContext.run({ topicId: channelId, serverId }, () => this.run());
    }
    return this.loop;
  }

  /**
   * Stop accepting messages; anything already queued is still processed
   */
  closeInboxes(): void {
    this.events.close();
    this.registrations.close();
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  get registrationsHandled(): number {
    return this.handledRegistrations;
  }

  hasSubscriber(subscriberId: string): boolean {
    return this.subscribers.has(subscriberId);
  }

  private async run(): Promise<void> {
    const lanes: Array<Lane<WorkerMessage>> = [
      lane(this.events, (event): WorkerMessage => ({ type: 'event', event })),
      lane(this.registrations, (request): WorkerMessage => ({ type: 'registration', request })),
    ];
    const selectOptions = this.idleTimeoutMs > 0 ? { timeoutMs: this.idleTimeoutMs } : {};

    this.logger.debug('Fan-out worker started');

    for (;;) {
      const selected = await select(lanes, selectOptions);
      if (selected.kind === 'closed') break;
      if (selected.kind === 'timeout') {
        this.handleIdle();
        continue;
      }

      this.idleReported = false;
      const message = selected.message;
      try {
        if (message.type === 'registration') {
          this.handleRegistration(message.request);
        } else {
          await this.handleEvent(message.event);
        }
      } catch (error) {
        this.logger.error({ err: error, messageType: message.type }, 'Unexpected failure in fan-out worker');
      }
    }

    const remaining = this.subscribers.size;
    this.subscribers.shutdown();
    this.logger.debug({ remainingSubscribers: remaining }, 'Fan-out worker stopped');
  }

  private handleRegistration({ subscriberId, response }: RegistrationRequest): void {
    this.handledRegistrations++;
    const channel = this.subscribers.add(subscriberId);

    if (!response.resolve(channel)) {
      // Caller stopped waiting: nobody will read this channel, so the next
      // delivery attempt fails and prunes the entry.
      channel.close();
      this.logger.debug({ subscriberId }, 'Registration response abandoned by caller');
      return;
    }

    this.logger.debug({ subscriberId, subscriberCount: this.subscribers.size }, 'Subscriber registered');
  }

  private async handleEvent(event: ChangeEvent): Promise<void> {
    const log = this.logger.child({ entityId: event.entityId, kind: event.kind });
    const stale =
      event.kind === 'delete'
        ? this.deliverDeletion(event.entityId)
        : await this.deliverEntity(event.entityId, event.kind, log);

    if (stale.length > 0) {
      this.subscribers.prune(stale);
      log.debug({ removed: stale, subscriberCount: this.subscribers.size }, 'Removed stale subscribers');
    }
  }

  /**
   * @returns Ids of subscribers whose stream is gone
   */
  private async deliverEntity(entityId: string, kind: 'insert' | 'update', log: Logger): Promise<string[]> {
    let entity: TEntity | null;
    try {
      entity = await this.renderer.fetchEntity(entityId);
    } catch (error) {
      log.error({ err: error }, 'Failed to fetch changed entity; skipping event');
      return [];
    }
    if (entity === null) {
      log.warn('Changed entity not found; skipping event');
      return [];
    }

    const fetched = entity;
    return this.subscribers.deliver((subscriberId) => {
      try {
        const data = this.renderer.renderEntity(fetched, { viewerId: subscriberId, topic: this.topic, kind });
        return { event: 'message', kind, entityId, data };
      } catch (error) {
        log.warn({ subscriberId, error: getErrorMessage(error) }, 'Render failed for subscriber; skipping');
        return null;
      }
    });
  }

  private deliverDeletion(entityId: string): string[] {
    const data = this.renderer.renderDeletion(entityId, this.topic);
    return this.subscribers.deliver(() => ({ event: 'message', kind: 'delete', entityId, data }));
  }

  private handleIdle(): void {
    const swept = this.subscribers.sweepClosed();
    if (swept.length > 0) {
      this.logger.debug({ removed: swept }, 'Removed subscribers whose stream closed');
    }

    if (this.subscribers.size > 0 || this.idleReported || !this.onIdle) {
      return;
    }

    this.idleReported = true;
    this.onIdle({ worker: this, handledRegistrations: this.handledRegistrations });
  }
}
