import pino from 'pino';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function createLogger(name: string) {
  const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
  return pino({
    name,
    level: resolveLevel(),
    transport: pretty
      ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss' } }
      : undefined,
  });
}

export type Logger = ReturnType<typeof createLogger>;

