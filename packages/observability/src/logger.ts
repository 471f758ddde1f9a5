import pino, { type DestinationStream, type Logger } from 'pino';

export interface CreateLoggerOptions {
  service: string;
  env: string;
  level?: string | undefined;
  /** Defaults to stdout. CLIs that print results pass stderr. */
  destination?: DestinationStream | undefined;
}

export type { Logger };

const REDACTED_KEYS = [
  'email',
  'recipientEmail',
  'recipient_email',
  'password',
  'apiKey',
  'token',
  'authorization',
];

export const REDACT_PATHS = [
  ...REDACTED_KEYS,
  ...REDACTED_KEYS.map((key) => `*.${key}`),
  'req.headers.authorization',
];

export function createLogger(options: CreateLoggerOptions): Logger {
  const loggerOptions = {
    name: options.service,
    level: options.level ?? 'info',
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    base: {
      service: options.service,
      env: options.env,
    },
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
