import { describe, expect, it } from 'vitest';
import { SubscriberSet } from './subscriberSet.js';

describe('SubscriberSet', () => {
  it('should open one delivery channel per subscriber', () => {
    const subscribers = new SubscriberSet<string>('topic:t1:delivery');
    const channel = subscribers.add('u1');

    expect(channel.name).toBe('topic:t1:delivery:u1');
    expect(subscribers.has('u1')).toBe(true);
    expect(subscribers.size).toBe(1);
  });

  it('should close the previous channel when a subscriber registers again', () => {
    const subscribers = new SubscriberSet<string>();
    const first = subscribers.add('u1');
    const second = subscribers.add('u1');

    expect(first.closed).toBe(true);
    expect(second.closed).toBe(false);
    expect(subscribers.subscriberIds()).toEqual(['u1']);
  });

  it('should build a separate event for each subscriber', () => {
    const subscribers = new SubscriberSet<string>();
    const u1 = subscribers.add('u1');
    const u2 = subscribers.add('u2');

    const stale = subscribers.deliver((subscriberId) => `hello ${subscriberId}`);

    expect(stale).toEqual([]);
    expect(u1.tryReceive()).toEqual({ done: false, value: 'hello u1' });
    expect(u2.tryReceive()).toEqual({ done: false, value: 'hello u2' });
  });

  it('should skip subscribers the builder returns null for', () => {
    const subscribers = new SubscriberSet<string>();
    const u1 = subscribers.add('u1');
    const u2 = subscribers.add('u2');

    const stale = subscribers.deliver((subscriberId) => (subscriberId === 'u1' ? null : 'event'));

    expect(stale).toEqual([]);
    expect(u1.tryReceive()).toBeNull();
    expect(u2.tryReceive()).toEqual({ done: false, value: 'event' });
    expect(subscribers.size).toBe(2);
  });

  it('should report closed channels without removing them during the pass', () => {
    const subscribers = new SubscriberSet<string>();
    subscribers.add('u1').close();
    const u2 = subscribers.add('u2');

    const stale = subscribers.deliver(() => 'event');

    expect(stale).toEqual(['u1']);
    expect(subscribers.has('u1')).toBe(true);
    expect(u2.tryReceive()).toEqual({ done: false, value: 'event' });

    subscribers.prune(stale);
    expect(subscribers.subscriberIds()).toEqual(['u2']);
  });

  it('should sweep closed channels', () => {
    const subscribers = new SubscriberSet<string>();
    subscribers.add('u1');
    subscribers.add('u2').close();

    expect(subscribers.sweepClosed()).toEqual(['u2']);
    expect(subscribers.subscriberIds()).toEqual(['u1']);
  });

  it('should close everything on shutdown', () => {
    const subscribers = new SubscriberSet<string>();
    const u1 = subscribers.add('u1');

    subscribers.shutdown();

    expect(u1.closed).toBe(true);
    expect(subscribers.size).toBe(0);
  });
});
