import type { HealthCheckResult } from '@parlor/chat-eventhub';
import type { MessageEventsRouteParams } from '@parlor/chat-messages';
import { Hono } from 'hono';

export interface LiveServerAppOptions {
  handleMessageEvents: (request: Request, params: MessageEventsRouteParams) => Promise<Response>;
  healthCheck: () => HealthCheckResult;
}

/**
 * Hono app factory for the live update server
 */
export function createApp({ handleMessageEvents, healthCheck }: LiveServerAppOptions): Hono {
  const app = new Hono();

  app.get('/servers/:serverId/channels/:channelId/messages/events', (c) =>
    handleMessageEvents(c.req.raw, {
      serverId: c.req.param('serverId'),
      channelId: c.req.param('channelId'),
    }),
  );

  app.get('/health', (c) => {
    const result = healthCheck();
    if (!result.healthy) {
      return c.json({ status: 'unhealthy', error: result.error ?? 'unknown' }, 503);
    }
    return c.json({ status: 'ok' });
  });

  return app;
}
