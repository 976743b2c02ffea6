import pino from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** `LOG_LEVEL` when it names a pino level; tests default to silent, everything else to info. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env['LOG_LEVEL']?.trim().toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  return env['VITEST'] ? 'silent' : 'info';
}

export const logger = pino({
  name: 'spurn',
  level: resolveLogLevel(),
  // Query text is user speech and is censored at every level.
  redact: { paths: ['text', 'input.text'], censor: '[query text]' },
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
