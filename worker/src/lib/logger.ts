import pino, { type Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const pretty = options.pretty ?? isDevelopment;

  return pino({
    level: options.level ?? (isDevelopment ? 'debug' : 'info'),
    transport: pretty ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}

// Shared no-op logger for callers that do not pass one
export const silentLogger: Logger = pino({ level: 'silent' });
