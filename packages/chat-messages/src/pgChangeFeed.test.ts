import { describe, expect, it, vi } from 'vitest';
import { PgChangeFeed } from './pgChangeFeed.js';
import { FakeListenClient, fakeClientFactory } from './__tests__/fakeListenClient.js';

describe('PgChangeFeed', () => {
  it('should listen on the message change channels', async () => {
    const factory = fakeClientFactory();
    const feed = new PgChangeFeed({ createClient: factory.create });

    await feed.start();

    expect(factory.clients).toHaveLength(1);
    expect(factory.clients[0].queries).toEqual([
      'LISTEN "insert_message"',
      'LISTEN "update_message"',
      'LISTEN "delete_message"',
    ]);
    expect(feed.connected).toBe(true);
    await feed.stop();
  });

  it('should forward notifications to the channel', async () => {
    const factory = fakeClientFactory();
    const feed = new PgChangeFeed({ createClient: factory.create });
    await feed.start();

    factory.clients[0].notify('insert_message', 'payload-1');
    factory.clients[0].emit('notification', { processId: 1, channel: 'delete_message' });

    expect(feed.notifications.tryReceive()).toEqual({
      done: false,
      value: { channel: 'insert_message', payload: 'payload-1' },
    });
    expect(feed.notifications.tryReceive()).toEqual({
      done: false,
      value: { channel: 'delete_message', payload: '' },
    });
    await feed.stop();
  });

  it('should fail to start when the first connection fails', async () => {
    const client = new FakeListenClient();
    client.connectError = new Error('ECONNREFUSED');
    const feed = new PgChangeFeed({ createClient: () => client });

    await expect(feed.start()).rejects.toThrow('ECONNREFUSED');
    expect(client.ended).toBe(true);
    expect(feed.connected).toBe(false);
  });

  it('should reconnect after the connection breaks', async () => {
    vi.useFakeTimers();
    try {
      const factory = fakeClientFactory();
      const feed = new PgChangeFeed({ createClient: factory.create, reconnectDelayMs: 100 });
      await feed.start();

      factory.clients[0].fail();
      expect(feed.connected).toBe(false);
      expect(factory.clients[0].ended).toBe(true);

      await vi.waitFor(() => expect(feed.connected).toBe(true));

      expect(factory.clients).toHaveLength(2);

      factory.clients[1].notify('update_message', 'payload-2');
      expect(feed.notifications.tryReceive()).toEqual({
        done: false,
        value: { channel: 'update_message', payload: 'payload-2' },
      });
      await feed.stop();
    } finally {
      vi.useRealTimers();
    }
  });

  it('should keep retrying while reconnects fail', async () => {
    vi.useFakeTimers();
    try {
      const clients: FakeListenClient[] = [];
      const feed = new PgChangeFeed({
        createClient: () => {
          const client = new FakeListenClient();
          if (clients.length === 1) client.connectError = new Error('ECONNREFUSED');
          clients.push(client);
          return client;
        },
        reconnectDelayMs: 50,
      });
      await feed.start();

      clients[0].fail();
      await vi.waitFor(() => expect(feed.connected).toBe(true));

      expect(clients).toHaveLength(3);
      expect(clients[1].ended).toBe(true);
      expect(clients[2].connected).toBe(true);
      await feed.stop();
    } finally {
      vi.useRealTimers();
    }
  });

  it('should ignore notifications from a client it already replaced', async () => {
    vi.useFakeTimers();
    try {
      const factory = fakeClientFactory();
      const feed = new PgChangeFeed({ createClient: factory.create, reconnectDelayMs: 10 });
      await feed.start();

      factory.clients[0].fail();
      factory.clients[0].notify('insert_message', 'stale');

      expect(feed.notifications.tryReceive()).toBeNull();
      await feed.stop();
    } finally {
      vi.useRealTimers();
    }
  });

  it('should unlisten, close the channel and stop reconnecting on stop', async () => {
    vi.useFakeTimers();
    try {
      const factory = fakeClientFactory();
      const feed = new PgChangeFeed({ createClient: factory.create, reconnectDelayMs: 10 });
      await feed.start();
      const client = factory.clients[0];

      await feed.stop();

      expect(client.queries.at(-1)).toBe('UNLISTEN *');
      expect(client.ended).toBe(true);
      expect(feed.notifications.closed).toBe(true);

      await vi.advanceTimersByTimeAsync(50);
      expect(factory.clients).toHaveLength(1);
    } finally {
      vi.useRealTimers();
    }
  });
});
