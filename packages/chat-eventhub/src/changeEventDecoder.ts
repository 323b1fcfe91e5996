import { z } from 'zod';
import { DecodeError } from './errors.js';
import type { ChangeEvent, ChangeKind, ChangeNotification } from './types.js';

/**
 * Notification channels the message table triggers publish on
 */
export const CHANGE_CHANNELS: ReadonlyMap<string, ChangeKind> = new Map<string, ChangeKind>([
  ['insert_message', 'insert'],
  ['update_message', 'update'],
  ['delete_message', 'delete'],
]);

export const CHANGE_CHANNEL_NAMES: readonly string[] = Array.from(CHANGE_CHANNELS.keys());

/** Length of a canonical textual UUID */
export const IDENTIFIER_LENGTH = 36;

const identifierSchema = z.string().uuid();

export type DecodeResult = { ok: true; event: ChangeEvent } | { ok: false; error: DecodeError };

/**
 * Decode a change notification
 *
 * The payload is the message id immediately followed by its channel id,
 * both in canonical 36-character form with no separator.
 */
export function decodeChangeNotification({ channel, payload }: ChangeNotification): DecodeResult {
  const kind = CHANGE_CHANNELS.get(channel);
  if (!kind) {
    return { ok: false, error: new DecodeError('unknown-channel', channel, payload) };
  }

  if (payload.length !== IDENTIFIER_LENGTH * 2) {
    return { ok: false, error: new DecodeError('malformed-length', channel, payload) };
  }

  const entityId = identifierSchema.safeParse(payload.slice(0, IDENTIFIER_LENGTH));
  const topicId = identifierSchema.safeParse(payload.slice(IDENTIFIER_LENGTH));
  if (!entityId.success || !topicId.success) {
    return { ok: false, error: new DecodeError('malformed-identifier', channel, payload) };
  }

  return {
    ok: true,
    event: {
      kind,
      entityId: entityId.data.toLowerCase(),
      topicId: topicId.data.toLowerCase(),
    },
  };
}
