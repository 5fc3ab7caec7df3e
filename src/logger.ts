import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export function createLogger(options: { level?: string; pretty?: boolean } = {}): Logger {
  const level = options.level || process.env.LOG_LEVEL || 'info';
  const pretty = options.pretty ?? process.env.LOG_PRETTY === '1';

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true }
      }
    });
  }

  return pino({ level });
}

// Silent logger for components constructed without one (tests, scripts).
export const silentLogger: Logger = pino({ level: 'silent' });
