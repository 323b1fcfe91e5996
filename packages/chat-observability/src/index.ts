export { createLogger, flushLoggers } from './logger.js';
export type { Logger, LoggerBindings } from './logger.js';
export { requestContext, type RequestContextValues } from './requestContext.js';
