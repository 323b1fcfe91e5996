import type { LiveStream, RenderedEvent, Topic } from '@parlor/chat-eventhub';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLiveUpdates, type LiveUpdates } from '../liveUpdates.js';
import { renderDeletion, renderMessage } from '../messageRenderer.js';
import type { ChatMessage, MessageSource } from '../messageStore.js';
import { fakeClientFactory } from './fakeListenClient.js';

const MESSAGE_ID = '0190a1b2-c3d4-7e5f-8a9b-0c1d2e3f4a5b';
const NOW = new Date('2024-07-11T12:14:25.716Z');
const topic: Topic = {
  serverId: 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa',
  channelId: '11111111-1111-4111-8111-111111111111',
};

const stored: ChatMessage = {
  id: MESSAGE_ID,
  content: 'hello there',
  updated: new Date('2024-07-11T12:09:25.716Z'),
  authorId: 'user-ada',
  authorName: 'Ada',
};

async function nextEvent(stream: LiveStream<RenderedEvent>): Promise<RenderedEvent | undefined> {
  const result = await stream[Symbol.asyncIterator]().next();
  return result.done ? undefined : result.value;
}

describe('createLiveUpdates', () => {
  let factory: ReturnType<typeof fakeClientFactory>;
  let source: MessageSource;
  let live: LiveUpdates;

  beforeEach(async () => {
    factory = fakeClientFactory();
    source = { fetchMessage: vi.fn(async (id: string) => (id === MESSAGE_ID ? stored : null)) };
    live = await createLiveUpdates({
      source,
      createListenClient: factory.create,
      registrationTimeoutMs: 1_000,
      reconnectDelayMs: 60_000,
      clock: () => NOW,
    });
  });

  afterEach(async () => {
    await live.stop();
  });

  it('should push rendered inserts to channel viewers', async () => {
    const ada = await live.gateway.subscribe(topic, 'user-ada');
    const bob = await live.gateway.subscribe(topic, 'user-bob');

    factory.clients[0].notify('insert_message', MESSAGE_ID + topic.channelId);

    expect(await nextEvent(ada)).toEqual({
      event: 'message',
      kind: 'insert',
      entityId: MESSAGE_ID,
      data: renderMessage(stored, { viewerId: 'user-ada', topic, swapOob: false, now: NOW }),
    });
    expect(await nextEvent(bob)).toEqual({
      event: 'message',
      kind: 'insert',
      entityId: MESSAGE_ID,
      data: renderMessage(stored, { viewerId: 'user-bob', topic, swapOob: false, now: NOW }),
    });
    expect(source.fetchMessage).toHaveBeenCalledTimes(1);
  });

  it('should push removal instructions for deletes', async () => {
    const ada = await live.gateway.subscribe(topic, 'user-ada');

    factory.clients[0].notify('delete_message', MESSAGE_ID + topic.channelId);

    expect(await nextEvent(ada)).toEqual({
      event: 'message',
      kind: 'delete',
      entityId: MESSAGE_ID,
      data: renderDeletion(MESSAGE_ID),
    });
    expect(source.fetchMessage).not.toHaveBeenCalled();
  });

  it('should report health from the change feed connection', () => {
    expect(live.healthCheck()).toEqual({ healthy: true });

    factory.clients[0].fail();

    expect(live.healthCheck()).toEqual({ healthy: false, error: 'Change feed is not connected' });
  });

  it('should end open streams and release the listener on stop', async () => {
    const ada = await live.gateway.subscribe(topic, 'user-ada');

    await live.stop();

    expect(await nextEvent(ada)).toBeUndefined();
    expect(factory.clients[0].ended).toBe(true);
    expect(live.router.topicCount).toBe(0);
  });
});
