import { AsyncLocalStorage } from 'node:async_hooks';
import { trace, type Span } from '@opentelemetry/api';

export interface RequestContextValues {
  requestId?: string;
  topicId?: string;
  serverId?: string;
  subscriberId?: string;
  [key: string]: string | undefined;
}

const attributeMap: Record<string, string> = {
  requestId: 'app.request.id',
  topicId: 'app.topic.id',
  serverId: 'app.server.id',
  subscriberId: 'app.subscriber.id',
};

const requestContextStorage = new AsyncLocalStorage<RequestContextValues>();

const setSpanAttributes = (span: Span | undefined, values: Partial<RequestContextValues>) => {
  if (!span) return;

  Object.entries(values).forEach(([key, value]) => {
    const attribute = attributeMap[key];
    if (attribute && value) {
      span.setAttribute(attribute, value);
    }
  });
};

const mergeWithStore = (values: RequestContextValues) => ({
  ...(requestContextStorage.getStore() ?? {}),
  ...values,
});

export const requestContext = {
  run<T>(values: RequestContextValues, fn: () => T): T {
    const merged = mergeWithStore(values);
    setSpanAttributes(trace.getActiveSpan(), values);

    return requestContextStorage.run(merged, fn);
  },
  get(): RequestContextValues {
    return requestContextStorage.getStore() ?? {};
  },
  applyToSpan(span: Span | undefined): void {
    setSpanAttributes(span, requestContextStorage.getStore() ?? {});
  },
};
