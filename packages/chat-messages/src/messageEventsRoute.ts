import { createLogger, requestContext, type Logger } from '@parlor/chat-observability';
import { RegistrationError, type LiveStream, type RenderedEvent, type Topic } from '@parlor/chat-eventhub';
import { ReadableStream, type ReadableStreamDefaultController } from 'node:stream/web';
import { z } from 'zod';

export const DEFAULT_KEEP_ALIVE_MS = 5_000;

export interface LiveSubscriptions {
  subscribe(topic: Topic, subscriberId: string): Promise<LiveStream<RenderedEvent>>;
}

export interface MessageEventsRouteOptions {
  gateway: LiveSubscriptions;
  /** Authenticated viewer of the request, or `null` when signed out */
  resolveViewerId: (request: Request) => string | null | Promise<string | null>;
  /** Interval between `: heartbeat` comments */
  keepAliveMs?: number;
  logger?: Logger;
}

export interface MessageEventsRouteParams {
  serverId: string;
  channelId: string;
}

const routeParamsSchema = z.object({
  serverId: z.string().uuid(),
  channelId: z.string().uuid(),
});

/**
 * Writes Server-Sent Events frames to a stream controller
 *
 * Multi-line payloads are split over several `data:` lines so the browser
 * reassembles them with the original line breaks.
 */
export class SseStreamWriter {
  private readonly encoder = new TextEncoder();
  private closed = false;

  constructor(private readonly controller: ReadableStreamDefaultController<Uint8Array>) {}

  send(event: string, data: string): void {
    const lines = data.split(/\r\n|\r|\n/).map((line) => `data: ${line}\n`);
    this.write(`event: ${event}\n${lines.join('')}\n`);
  }

  comment(text: string): void {
    this.write(`: ${text}\n\n`);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.controller.close();
  }

  private write(chunk: string): void {
    if (this.closed) return;
    this.controller.enqueue(this.encoder.encode(chunk));
  }
}

function jsonError(status: number, code: string, message: string): Response {
  return new Response(JSON.stringify({ error: { code, message } }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Creates the handler for `GET /servers/:serverId/channels/:channelId/messages/events`
 *
 * The response is an event stream of rendered message changes for the viewer
 * until the client disconnects.
 *
 * @example
 * ```typescript
 * const handler = createMessageEventsRouteHandler({ gateway, resolveViewerId });
 * app.get('/servers/:serverId/channels/:channelId/messages/events', (c) =>
 *   handler(c.req.raw, { serverId: c.req.param('serverId'), channelId: c.req.param('channelId') }),
 * );
 * ```
 */
export function createMessageEventsRouteHandler(options: MessageEventsRouteOptions) {
  const keepAliveMs = options.keepAliveMs ?? DEFAULT_KEEP_ALIVE_MS;
  const logger = options.logger ?? createLogger('MessageEventsRoute');

  return async function handleMessageEvents(request: Request, params: MessageEventsRouteParams): Promise<Response> {
    const viewerId = await options.resolveViewerId(request);
    if (!viewerId) {
      return jsonError(401, 'UNAUTHENTICATED', 'Sign in to receive live updates');
    }

    const parsed = routeParamsSchema.safeParse(params);
    if (!parsed.success) {
      return jsonError(400, 'INVALID_ROUTE_PARAMS', 'Server and channel ids must be UUIDs');
    }
    const topic: Topic = {
      serverId: parsed.data.serverId.toLowerCase(),
      channelId: parsed.data.channelId.toLowerCase(),
    };

    return requestContext.run({ topicId: topic.channelId, serverId: topic.serverId, subscriberId: viewerId }, async () => {
      let live: LiveStream<RenderedEvent>;
      try {
        live = await options.gateway.subscribe(topic, viewerId);
      } catch (error) {
        if (!(error instanceof RegistrationError)) throw error;
        logger.warn({ reason: error.reason }, 'Live updates unavailable for viewer');
        return jsonError(503, 'LIVE_UPDATES_UNAVAILABLE', 'Live updates are unavailable');
      }

      const events = live[Symbol.asyncIterator]();
      let writer: SseStreamWriter | null = null;
      let heartbeat: ReturnType<typeof setInterval> | undefined;

      const finish = () => {
        clearInterval(heartbeat);
        live.close();
        writer?.close();
      };

      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          writer = new SseStreamWriter(controller);
          heartbeat = setInterval(() => writer?.comment('heartbeat'), keepAliveMs);
          if (request.signal.aborted) {
            finish();
            return;
          }
          request.signal.addEventListener('abort', finish, { once: true });
        },
        async pull() {
          const next = await events.next();
          if (next.done) {
            finish();
            return;
          }
          writer?.send(next.value.event, next.value.data);
        },
        cancel() {
          clearInterval(heartbeat);
          live.close();
          logger.debug('Live update stream cancelled by client');
        },
      });

      logger.debug('Live update stream opened');
      return new Response(body, {
        headers: {
          'Content-Type': 'text/event-stream; charset=utf-8',
          Connection: 'keep-alive',
          'Cache-Control': 'no-cache, no-transform',
        },
      });
    });
  };
}
