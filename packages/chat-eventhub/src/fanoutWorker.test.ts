import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OneShot } from './channels.js';
import { FanoutWorker } from './fanoutWorker.js';
import type { ChangeEvent, ChangeKind, LiveStream, RenderedEvent } from './types.js';
import { FakeRenderer, MESSAGE_1, MESSAGE_2, TOPIC_1, type FakeMessage } from './__tests__/fakeRenderer.js';

function change(kind: ChangeKind, entityId: string): ChangeEvent {
  return { kind, entityId, topicId: TOPIC_1.channelId };
}

async function nextEvent(stream: LiveStream<RenderedEvent>): Promise<RenderedEvent | undefined> {
  const result = await stream[Symbol.asyncIterator]().next();
  return result.done ? undefined : result.value;
}

describe('FanoutWorker', () => {
  let renderer: FakeRenderer;
  let worker: FanoutWorker<FakeMessage>;
  let loop: Promise<void>;

  const register = async (subscriberId: string): Promise<LiveStream<RenderedEvent>> => {
    const response = new OneShot<LiveStream<RenderedEvent>>();
    await worker.registrations.send({ topic: TOPIC_1, subscriberId, response });
    return response.receive();
  };

  beforeEach(() => {
    renderer = new FakeRenderer();
    renderer.add({ id: MESSAGE_1, authorId: 'u1', content: 'hello' });
    renderer.add({ id: MESSAGE_2, authorId: 'u2', content: 'hi' });
    worker = new FanoutWorker({ topic: TOPIC_1, renderer });
    loop = worker.start();
  });

  afterEach(async () => {
    worker.closeInboxes();
    await loop;
  });

  it('should hand a delivery stream back to a registering subscriber', async () => {
    const stream = await register('u1');

    expect(stream.closed).toBe(false);
    expect(worker.subscriberCount).toBe(1);
    expect(worker.registrationsHandled).toBe(1);
  });

  it('should render an insert once per subscriber with their own ownership flag', async () => {
    const s1 = await register('u1');
    const s2 = await register('u2');

    await worker.events.send(change('insert', MESSAGE_1));

    expect(await nextEvent(s1)).toEqual({ event: 'message', kind: 'insert', entityId: MESSAGE_1, data: 'hello|own' });
    expect(await nextEvent(s2)).toEqual({ event: 'message', kind: 'insert', entityId: MESSAGE_1, data: 'hello|other' });
    expect(renderer.fetchEntity).toHaveBeenCalledTimes(1);
    expect(renderer.fetchEntity).toHaveBeenCalledWith(MESSAGE_1);
  });

  it('should tag updates with their kind', async () => {
    const s1 = await register('u2');

    await worker.events.send(change('update', MESSAGE_2));

    expect(await nextEvent(s1)).toEqual({ event: 'message', kind: 'update', entityId: MESSAGE_2, data: 'hi|own' });
  });

  it('should deliver a delete identically without fetching', async () => {
    const s1 = await register('u1');
    const s2 = await register('u2');

    await worker.events.send(change('delete', MESSAGE_1));

    const expected: RenderedEvent = { event: 'message', kind: 'delete', entityId: MESSAGE_1, data: `delete:${MESSAGE_1}` };
    expect(await nextEvent(s1)).toEqual(expected);
    expect(await nextEvent(s2)).toEqual(expected);
    expect(renderer.fetchEntity).not.toHaveBeenCalled();
  });

  it('should deliver events for the topic in feed order', async () => {
    const stream = await register('u1');

    await worker.events.send(change('insert', MESSAGE_1));
    await worker.events.send(change('insert', MESSAGE_2));

    expect((await nextEvent(stream))?.entityId).toBe(MESSAGE_1);
    expect((await nextEvent(stream))?.entityId).toBe(MESSAGE_2);
  });

  it('should not deliver events handled before a registration', async () => {
    const early = await register('u1');
    await worker.events.send(change('insert', MESSAGE_1));
    expect((await nextEvent(early))?.entityId).toBe(MESSAGE_1);

    const late = await register('u2');
    await worker.events.send(change('delete', MESSAGE_2));

    expect(await nextEvent(late)).toEqual({
      event: 'message',
      kind: 'delete',
      entityId: MESSAGE_2,
      data: `delete:${MESSAGE_2}`,
    });
  });

  it('should prune a subscriber whose stream was closed and keep serving the rest', async () => {
    const s1 = await register('u1');
    const s2 = await register('u2');
    s1.close();

    await worker.events.send(change('insert', MESSAGE_1));
    expect((await nextEvent(s2))?.data).toBe('hello|other');

    await vi.waitFor(() => expect(worker.hasSubscriber('u1')).toBe(false));
    expect(worker.subscriberCount).toBe(1);

    await worker.events.send(change('insert', MESSAGE_2));
    expect((await nextEvent(s2))?.data).toBe('hi|own');
  });

  it('should skip an event whose entity no longer exists', async () => {
    const stream = await register('u1');

    await worker.events.send(change('update', 'ffffffff-ffff-4fff-8fff-ffffffffffff'));
    await worker.events.send(change('delete', MESSAGE_1));

    expect((await nextEvent(stream))?.kind).toBe('delete');
  });

  it('should skip an event when the fetch fails', async () => {
    const stream = await register('u1');
    renderer.fetchError = new Error('connection reset');

    await worker.events.send(change('insert', MESSAGE_1));
    await worker.events.send(change('delete', MESSAGE_1));

    expect((await nextEvent(stream))?.kind).toBe('delete');
    expect(worker.hasSubscriber('u1')).toBe(true);
  });

  it('should skip only the subscriber whose render fails', async () => {
    const s1 = await register('u1');
    const s2 = await register('u2');
    renderer.failingViewers.add('u1');

    await worker.events.send(change('insert', MESSAGE_1));
    expect((await nextEvent(s2))?.data).toBe('hello|other');

    renderer.failingViewers.clear();
    await worker.events.send(change('insert', MESSAGE_2));

    expect((await nextEvent(s1))?.entityId).toBe(MESSAGE_2);
    expect(worker.hasSubscriber('u1')).toBe(true);
  });

  it('should end the previous stream when a subscriber registers again', async () => {
    const first = await register('u1');
    const second = await register('u1');

    expect(first.closed).toBe(true);
    expect(await nextEvent(first)).toBeUndefined();

    await worker.events.send(change('insert', MESSAGE_1));
    expect((await nextEvent(second))?.data).toBe('hello|own');
    expect(worker.subscriberCount).toBe(1);
  });

  it('should drop the entry of a caller that stopped waiting on the next delivery', async () => {
    const response = new OneShot<LiveStream<RenderedEvent>>();
    response.abandon();
    await worker.registrations.send({ topic: TOPIC_1, subscriberId: 'u1', response });
    const s2 = await register('u2');

    await worker.events.send(change('delete', MESSAGE_1));
    await nextEvent(s2);

    await vi.waitFor(() => expect(worker.hasSubscriber('u1')).toBe(false));
    expect(worker.registrationsHandled).toBe(2);
  });

  it('should end every stream once its inboxes are closed', async () => {
    const stream = await register('u1');

    worker.closeInboxes();
    await loop;

    expect(await nextEvent(stream)).toBeUndefined();
    expect(worker.subscriberCount).toBe(0);
  });
});

describe('FanoutWorker idle reporting', () => {
  it('should report idle once its last subscriber is gone', async () => {
    const onIdle = vi.fn();
    const worker = new FanoutWorker({ topic: TOPIC_1, renderer: new FakeRenderer(), idleTimeoutMs: 10, onIdle });
    const loop = worker.start();

    const response = new OneShot<LiveStream<RenderedEvent>>();
    await worker.registrations.send({ topic: TOPIC_1, subscriberId: 'u1', response });
    const stream = await response.receive();
    stream.close();

    await vi.waitFor(() => expect(onIdle).toHaveBeenCalledTimes(1));
    expect(onIdle).toHaveBeenCalledWith({ worker, handledRegistrations: 1 });
    expect(worker.subscriberCount).toBe(0);

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(onIdle).toHaveBeenCalledTimes(1);

    worker.closeInboxes();
    await loop;
  });

  it('should not report idle while a subscriber is connected', async () => {
    const onIdle = vi.fn();
    const worker = new FanoutWorker({ topic: TOPIC_1, renderer: new FakeRenderer(), idleTimeoutMs: 10, onIdle });
    const loop = worker.start();

    const response = new OneShot<LiveStream<RenderedEvent>>();
    await worker.registrations.send({ topic: TOPIC_1, subscriberId: 'u1', response });
    await response.receive();

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(onIdle).not.toHaveBeenCalled();

    worker.closeInboxes();
    await loop;
  });

  it('should never report idle when the timeout is disabled', async () => {
    const onIdle = vi.fn();
    const worker = new FanoutWorker({ topic: TOPIC_1, renderer: new FakeRenderer(), onIdle });
    const loop = worker.start();

    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(onIdle).not.toHaveBeenCalled();

    worker.closeInboxes();
    await loop;
  });
});
