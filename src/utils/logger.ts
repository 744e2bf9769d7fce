import pino from 'pino';

let correlationId: string | undefined;

export function setCorrelationId(id: string): void {
  correlationId = id;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const satisfies readonly pino.LevelWithSilent[];

/** LOG_LEVEL is read only here; an unknown or empty value falls back to info. */
export function resolveLogLevel(value: string | undefined): pino.LevelWithSilent {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

// Logs go to stderr: stdout carries the report for `journal summary`.
function buildBaseLogger(): pino.Logger {
  const requested = process.env.LOG_LEVEL;
  const level = resolveLogLevel(requested);
  const logger = buildPinoLogger(level);
  if (requested && requested !== level) {
    logger.warn({ requested }, `Unknown LOG_LEVEL; logging at ${level}`);
  }
  return logger;
}

function buildPinoLogger(level: pino.LevelWithSilent): pino.Logger {
  if (process.env.NODE_ENV === 'development') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }
  return pino({ level }, pino.destination(2));
}

let baseLogger: pino.Logger | undefined;

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  baseLogger ??= buildBaseLogger();

  const correlationIdValue = correlationId || generateCorrelationId();
  if (!correlationId) {
    setCorrelationId(correlationIdValue);
  }

  return baseLogger.child({
    correlationId: correlationIdValue,
    ...context,
  });
}
