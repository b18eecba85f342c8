export { createLogger, type Logger } from './logger';
export { httpLoggerMiddleware } from './http-logger';
export { requestIdMiddleware } from './request-id';
