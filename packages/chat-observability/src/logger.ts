import pino, { type DestinationStream, type LoggerOptions } from 'pino';
import { trace } from '@opentelemetry/api';
import { requestContext } from './requestContext.js';

export type Logger = pino.Logger;

export type LoggerBindings = {
  component?: string;
  destination?: DestinationStream;
} & Record<string, unknown>;

// Track all logger instances for graceful shutdown
const loggerInstances = new Set<pino.Logger>();

const buildCorrelationFields = () => {
  const correlation: Record<string, unknown> = {};
  const spanContext = trace.getActiveSpan()?.spanContext();

  if (spanContext && trace.isSpanContextValid(spanContext)) {
    correlation.trace_id = spanContext.traceId;
    correlation.span_id = spanContext.spanId;
  }

  Object.entries(requestContext.get()).forEach(([key, value]) => {
    if (value !== undefined) {
      correlation[key] = value;
    }
  });

  return correlation;
};

export const createLogger = (scope: string, bindings: LoggerBindings = {}): Logger => {
  const { destination, component, ...staticBindings } = bindings;
  const level = process.env.LOG_LEVEL ?? 'info';

  const options: LoggerOptions = {
    level,
    base: {
      scope,
      component: component ?? scope,
      ...staticBindings,
    },
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (value) => value,
    },
    mixin() {
      return buildCorrelationFields();
    },
  };

  // Async destination keeps log writes off the event loop's hot path
  const logger = pino(options, destination ?? pino.destination({ sync: false }));

  loggerInstances.add(logger);

  return logger;
};

/**
 * Flushes all logger instances so buffered lines reach their destination.
 * Call during graceful shutdown.
 */
export const flushLoggers = async (): Promise<void> => {
  const flushPromises = Array.from(loggerInstances).map(
    (logger) =>
      new Promise<void>((resolve) => {
        logger.flush((err) => {
          if (err) {
            // Never block shutdown on a failed flush
            console.error('Failed to flush logger:', err);
          }
          resolve();
        });
      }),
  );

  await Promise.all(flushPromises);
};
