import { createLogger, type Logger } from '@parlor/chat-observability';
import { CHANGE_CHANNEL_NAMES, UnboundedChannel, type ChangeNotification } from '@parlor/chat-eventhub';
import type { Notification } from 'pg';

/**
 * The part of a `pg` Client the change feed needs
 */
export interface ListenClient {
  connect(): Promise<void>;
  query(text: string): Promise<unknown>;
  on(event: 'notification', listener: (message: Notification) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  end(): Promise<void>;
}

export interface PgChangeFeedOptions {
  /** Creates a dedicated, unconnected client; called again on every reconnect */
  createClient: () => ListenClient;
  channels?: readonly string[];
  /** @default 1000 */
  reconnectDelayMs?: number;
  logger?: Logger;
}

/**
 * Postgres LISTEN/NOTIFY change feed
 *
 * Holds one dedicated connection that listens on the message change channels
 * and pushes every notification into `notifications`, which the topic router
 * reads. A broken connection is replaced after `reconnectDelayMs`;
 * notifications sent while disconnected are lost.
 */
export class PgChangeFeed {
  readonly notifications = new UnboundedChannel<ChangeNotification>('change-feed');

  private readonly createClient: () => ListenClient;
  private readonly channels: readonly string[];
  private readonly reconnectDelayMs: number;
  private readonly logger: Logger;
  private client: ListenClient | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;

  constructor(options: PgChangeFeedOptions) {
    this.createClient = options.createClient;
    this.channels = options.channels ?? CHANGE_CHANNEL_NAMES;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 1_000;
    this.logger = options.logger ?? createLogger('PgChangeFeed');
  }

  get connected(): boolean {
    return this.client !== null;
  }

  /**
   * Connect and start listening
   *
   * @throws The connection error when the first connection fails
   */
  async start(): Promise<void> {
    await this.connect();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.notifications.close();

    const client = this.client;
    this.client = null;
    if (!client) return;

    try {
      await client.query('UNLISTEN *');
    } catch (error) {
      this.logger.warn({ err: error }, 'UNLISTEN failed during shutdown');
    }
    await client.end();
    this.logger.info('Change feed stopped');
  }

  private async connect(): Promise<void> {
    const client = this.createClient();
    client.on('notification', (message) => {
      if (this.client !== client) return;
      this.notifications.send({ channel: message.channel, payload: message.payload ?? '' });
    });
    client.on('error', (error) => this.handleClientError(client, error));

    try {
      await client.connect();
      for (const channel of this.channels) {
        await client.query(`LISTEN "${channel}"`);
      }
    } catch (error) {
      await this.discard(client);
      throw error;
    }

    if (this.stopped) {
      await this.discard(client);
      return;
    }

    this.client = client;
    this.logger.info({ channels: this.channels }, 'Listening for message changes');
  }

  private handleClientError(client: ListenClient, error: Error): void {
    if (this.client !== client) {
      this.logger.debug({ err: error }, 'Error from a discarded listen client');
      return;
    }

    this.logger.error({ err: error }, 'Listen connection failed; reconnecting');
    this.client = null;
    void this.discard(client);
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return;

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((error: unknown) => {
        this.logger.error({ err: error, retryInMs: this.reconnectDelayMs }, 'Reconnect failed');
        this.scheduleReconnect();
      });
    }, this.reconnectDelayMs);
  }

  private async discard(client: ListenClient): Promise<void> {
    try {
      await client.end();
    } catch (error) {
      this.logger.debug({ err: error }, 'Ignoring error while closing listen client');
    }
  }
}
