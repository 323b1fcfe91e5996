import { UnboundedChannel } from './channels.js';

/**
 * Live subscribers of a single topic, owned by that topic's fan-out worker
 *
 * Each subscriber id maps to the writer side of its delivery channel. The set
 * is only ever touched from the worker loop, so it needs no locking.
 *
 * ## Usage
 *
 * ```typescript
 * const subscribers = new SubscriberSet<RenderedEvent>();
 *
 * const channel = subscribers.add('user-1');
 * const stale = subscribers.deliver((subscriberId) => render(subscriberId));
 * subscribers.prune(stale);
 * ```
 */
export class SubscriberSet<TEvent> {
  private readonly channels = new Map<string, UnboundedChannel<TEvent>>();

  constructor(private readonly channelPrefix = 'delivery') {}

  /**
   * Open a delivery channel for a subscriber
   *
   * A subscriber registering again replaces its previous channel; the old
   * one is closed so its reader's stream ends.
   */
  add(subscriberId: string): UnboundedChannel<TEvent> {
    this.channels.get(subscriberId)?.close();
    const channel = new UnboundedChannel<TEvent>(`${this.channelPrefix}:${subscriberId}`);
    this.channels.set(subscriberId, channel);
    return channel;
  }

  has(subscriberId: string): boolean {
    return this.channels.has(subscriberId);
  }

  get size(): number {
    return this.channels.size;
  }

  subscriberIds(): string[] {
    return Array.from(this.channels.keys());
  }

  /**
   * Send one event to every subscriber
   *
   * @param build Produces the event for a subscriber, or `null` to skip it
   * @returns Ids whose channel refused the event because the reader is gone
   */
  deliver(build: (subscriberId: string) => TEvent | null): string[] {
    const stale: string[] = [];
    for (const [subscriberId, channel] of this.channels) {
      const event = build(subscriberId);
      if (event === null) continue;
      if (!channel.send(event)) {
        stale.push(subscriberId);
      }
    }
    return stale;
  }

  /**
   * Remove subscribers after a delivery pass
   */
  prune(subscriberIds: readonly string[]): void {
    for (const subscriberId of subscriberIds) {
      this.channels.delete(subscriberId);
    }
  }

  /**
   * Remove subscribers whose reader already closed its stream
   *
   * @returns The removed ids
   */
  sweepClosed(): string[] {
    const closed = Array.from(this.channels)
      .filter(([, channel]) => channel.closed)
      .map(([subscriberId]) => subscriberId);
    this.prune(closed);
    return closed;
  }

  /**
   * Close every delivery channel and forget all subscribers
   */
  shutdown(): void {
    for (const channel of this.channels.values()) {
      channel.close();
    }
    this.channels.clear();
  }
}
