import { createLogger, type Logger } from '@parlor/chat-observability';
import {
  BoundedChannel,
  UnboundedChannel,
  lane,
  select,
  type Lane,
  type Receiver,
  type Sender,
} from './channels.js';
import { decodeChangeNotification } from './changeEventDecoder.js';
import { ChannelClosedError, RegistrationError } from './errors.js';
import { FanoutWorker, type IdleReport } from './fanoutWorker.js';
import { TopicDirectory } from './topicDirectory.js';
import type { ChangeEvent, ChangeNotification, RegistrationRequest, TopicRenderer } from './types.js';

export const DEFAULT_REGISTRATION_INBOX_CAPACITY = 4;

export interface TopicRouterConfig<TEntity> {
  /** Raw notifications from the change feed */
  feed: Receiver<ChangeNotification>;
  renderer: TopicRenderer<TEntity>;
  /** @default 4 */
  registrationCapacity?: number;
  /** Passed to every spawned worker */
  workerInboxCapacity?: number;
  /**
   * Idle time after which a worker without subscribers is retired; `0` keeps
   * workers for the life of the process.
   * @default 0
   */
  idleTimeoutMs?: number;
  logger?: Logger;
}

interface WorkerHandle<TEntity> {
  worker: FanoutWorker<TEntity>;
  /** Registrations sent into the worker's inbox */
  forwarded: number;
}

type ControlMessage<TEntity> = { type: 'retire'; report: IdleReport<TEntity> } | { type: 'stop' };

type RouterMessage<TEntity> =
  | { type: 'notification'; notification: ChangeNotification }
  | { type: 'registration'; request: RegistrationRequest }
  | { type: 'control'; control: ControlMessage<TEntity> };

/**
 * Topic router
 *
 * Owns the directory of per-topic fan-out workers and is the only code that
 * reads or writes it. Change events go to the worker of their topic (or are
 * dropped when nobody watches it); registrations spawn the topic's worker on
 * first use and are forwarded to it.
 *
 * Sending into a worker inbox waits while that inbox is full, so a slow
 * worker slows the router rather than growing an unbounded queue.
 */
export class TopicRouter<TEntity> {
  private readonly feed: Receiver<ChangeNotification>;
  private readonly renderer: TopicRenderer<TEntity>;
  private readonly registrationInbox: BoundedChannel<RegistrationRequest>;
  private readonly control = new UnboundedChannel<ControlMessage<TEntity>>('router:control');
  private readonly directory = new TopicDirectory<WorkerHandle<TEntity>>();
  private readonly workerLoops = new Set<Promise<void>>();
  private readonly workerInboxCapacity?: number;
  private readonly idleTimeoutMs: number;
  private readonly logger: Logger;
  /** Aborted by `stop()` to release a send blocked on a full worker inbox */
  private readonly stopping = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(config: TopicRouterConfig<TEntity>) {
    this.feed = config.feed;
    this.renderer = config.renderer;
    this.registrationInbox = new BoundedChannel<RegistrationRequest>(
      'router:registrations',
      config.registrationCapacity ?? DEFAULT_REGISTRATION_INBOX_CAPACITY,
    );
    this.workerInboxCapacity = config.workerInboxCapacity;
    this.idleTimeoutMs = config.idleTimeoutMs ?? 0;
    this.logger = config.logger ?? createLogger('TopicRouter');
  }

  /**
   * Where subscription gateways submit registrations
   */
  get registrations(): Sender<RegistrationRequest> {
    return this.registrationInbox;
  }

  get topicCount(): number {
    return this.directory.size;
  }

  hasTopic(channelId: string): boolean {
    return this.directory.has(channelId.toLowerCase());
  }

  /**
   * @returns Promise settling once the router and every worker have stopped
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this.loop;
  }

  /**
   * Stop routing, reject pending registrations and wait for all workers
   */
  async stop(): Promise<void> {
    if (!this.loop) {
      this.registrationInbox.close();
      this.control.close();
      this.dropQueuedRegistrations();
      return;
    }
    this.stopping.abort(new ChannelClosedError('router:stopping'));
    this.control.send({ type: 'stop' });
    await this.loop;
  }

  private async run(): Promise<void> {
    const lanes: Array<Lane<RouterMessage<TEntity>>> = [
      lane(this.control, (control): RouterMessage<TEntity> => ({ type: 'control', control })),
      lane(this.feed, (notification): RouterMessage<TEntity> => ({ type: 'notification', notification })),
      lane(this.registrationInbox, (request): RouterMessage<TEntity> => ({ type: 'registration', request })),
    ];

    this.logger.info('Topic router started');

    while (!this.stopping.signal.aborted) {
      const selected = await select(lanes);
      if (selected.kind !== 'message') break;

      const message = selected.message;
      if (message.type === 'control') {
        if (message.control.type === 'stop') break;
        this.retire(message.control.report);
      } else if (message.type === 'notification') {
        await this.routeNotification(message.notification);
      } else {
        await this.routeRegistration(message.request);
      }
    }

    await this.shutdown();
  }

  private async routeNotification(notification: ChangeNotification): Promise<void> {
    const decoded = decodeChangeNotification(notification);
    if (!decoded.ok) {
      this.logger.warn(
        { channel: notification.channel, reason: decoded.error.reason, payload: notification.payload },
        'Discarding undecodable change notification',
      );
      return;
    }
    await this.routeEvent(decoded.event);
  }

  private async routeEvent(event: ChangeEvent): Promise<void> {
    const handle = this.directory.get(event.topicId);
    if (!handle) {
      this.logger.debug(
        { topicId: event.topicId, entityId: event.entityId, kind: event.kind },
        'No worker for topic; dropping change event',
      );
      return;
    }

    try {
      await handle.worker.events.send(event, this.stopping.signal);
    } catch (error) {
      if (!(error instanceof ChannelClosedError)) throw error;
      if (this.stopping.signal.aborted) {
        this.logger.warn(
          { topicId: event.topicId, entityId: event.entityId, kind: event.kind },
          'Router stopping; change event not delivered',
        );
        return;
      }
      this.logger.error(
        { topicId: event.topicId, entityId: event.entityId, kind: event.kind },
        'Worker event inbox closed; change event lost',
      );
    }
  }

  private async routeRegistration(request: RegistrationRequest): Promise<void> {
    const topicId = request.topic.channelId;
    if (request.response.abandoned) {
      this.logger.debug({ topicId, subscriberId: request.subscriberId }, 'Caller gave up on registration; skipping');
      return;
    }

    const handle = this.directory.getOrCreate(topicId, () => this.spawn(request));

    try {
      await handle.worker.registrations.send(request, this.stopping.signal);
      handle.forwarded++;
    } catch (error) {
      if (!(error instanceof ChannelClosedError)) throw error;
      this.logger.error(
        { topicId, subscriberId: request.subscriberId },
        'Worker registration inbox closed; rejecting registration',
      );
      request.response.reject(
        new RegistrationError('registration-channel-closed', `Topic ${topicId} is not accepting registrations`, {
          cause: error,
        }),
      );
    }
  }

  private spawn(request: RegistrationRequest): WorkerHandle<TEntity> {
    const worker = new FanoutWorker<TEntity>({
      topic: request.topic,
      renderer: this.renderer,
      inboxCapacity: this.workerInboxCapacity,
      idleTimeoutMs: this.idleTimeoutMs,
      onIdle: (report) => {
        this.control.send({ type: 'retire', report });
      },
      logger: this.logger,
    });

    const loop: Promise<void> = worker.start().then(() => {
      this.workerLoops.delete(loop);
    });
    this.workerLoops.add(loop);
    this.logger.debug({ topicId: request.topic.channelId, topicCount: this.directory.size + 1 }, 'Spawned fan-out worker');
    return { worker, forwarded: 0 };
  }

  private retire({ worker, handledRegistrations }: IdleReport<TEntity>): void {
    const topicId = worker.topic.channelId;
    const handle = this.directory.get(topicId);
    if (!handle || handle.worker !== worker) {
      return;
    }

    if (handle.forwarded !== handledRegistrations) {
      this.logger.debug(
        { topicId, forwarded: handle.forwarded, handledRegistrations },
        'Registration in flight; keeping idle worker',
      );
      return;
    }

    this.directory.take(topicId);
    worker.closeInboxes();
    this.logger.debug({ topicId, topicCount: this.directory.size }, 'Retired idle fan-out worker');
  }

  private async shutdown(): Promise<void> {
    this.registrationInbox.close();
    this.control.close();

    const dropped = this.dropQueuedRegistrations();

    const topicCount = this.directory.size;
    await this.directory.shutdown(async (_topicId, handle) => {
      handle.worker.closeInboxes();
    });
    await Promise.all(this.workerLoops);

    this.logger.info({ topicCount, droppedRegistrations: dropped }, 'Topic router stopped');
  }

  /**
   * Reject registrations still waiting in the closed inbox
   * @returns How many were dropped
   */
  private dropQueuedRegistrations(): number {
    let dropped = 0;
    for (let next = this.registrationInbox.tryReceive(); next && !next.done; next = this.registrationInbox.tryReceive()) {
      next.value.response.drop(this.registrationInbox.name);
      dropped++;
    }
    return dropped;
  }
}
