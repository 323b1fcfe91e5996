/**
 * Error classes for the live update engine
 *
 * Usage:
 * ```typescript
 * throw new RegistrationError('response-not-received', 'No delivery stream', { cause: error });
 * ```
 */

/**
 * Base error class for all live update errors
 */
export class LiveUpdateError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LiveUpdateError';
  }
}

export type DecodeErrorReason = 'unknown-channel' | 'malformed-length' | 'malformed-identifier';

/**
 * A change notification that could not be turned into a change event
 */
export class DecodeError extends LiveUpdateError {
  public readonly reason: DecodeErrorReason;
  public readonly channel: string;
  public readonly payload: string;

  constructor(reason: DecodeErrorReason, channel: string, payload: string) {
    super(`Cannot decode notification on "${channel}": ${reason}`);
    this.name = 'DecodeError';
    this.reason = reason;
    this.channel = channel;
    this.payload = payload;
  }
}

export type RegistrationErrorReason = 'registration-channel-closed' | 'response-not-received';

/**
 * A viewer could not be attached to a topic's live feed
 */
export class RegistrationError extends LiveUpdateError {
  public readonly reason: RegistrationErrorReason;

  constructor(reason: RegistrationErrorReason, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RegistrationError';
    this.reason = reason;
  }
}

/**
 * Send on a channel whose receiving side is gone, or a receive whose sender is gone
 */
export class ChannelClosedError extends LiveUpdateError {
  public readonly channelName: string;

  constructor(channelName: string) {
    super(`Channel "${channelName}" is closed`);
    this.name = 'ChannelClosedError';
    this.channelName = channelName;
  }
}

export class ReceiveTimeoutError extends LiveUpdateError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No value received within ${timeoutMs}ms`);
    this.name = 'ReceiveTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Reading a changed entity from the store failed
 */
export class MessageStoreError extends LiveUpdateError {
  public readonly entityId: string;

  constructor(entityId: string, options?: ErrorOptions) {
    super(`Failed to fetch message ${entityId}`, options);
    this.name = 'MessageStoreError';
    this.entityId = entityId;
  }
}

/**
 * An entity could not be rendered for a particular viewer
 */
export class RenderError extends LiveUpdateError {
  public readonly entityId: string;

  constructor(entityId: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RenderError';
    this.entityId = entityId;
  }
}

/**
 * Type guard to check if an error is a LiveUpdateError
 */
export function isLiveUpdateError(error: unknown): error is LiveUpdateError {
  return error instanceof LiveUpdateError;
}

/**
 * Extract a printable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
