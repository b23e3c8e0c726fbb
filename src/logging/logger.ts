import pino, { type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export const REDACT_KEYS = [
  'authorization',
  'headers.authorization',
  'headers.Authorization',
  'credential',
  'secret',
  'token',
];

export type LoggerOptions = Readonly<{
  level?: LevelWithSilent;
  destination?: DestinationStream;
}>;

/**
 * Root logger for the gate. Components take a child with a `component` binding.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const config = {
    level: options.level ?? 'info',
    base: { service: 'mcp-security-gate' },
    redact: { paths: REDACT_KEYS, censor: '[REDACTED]' },
  };
  return options.destination ? pino(config, options.destination) : pino(config);
};

export const silentLogger = (): Logger => pino({ level: 'silent' });
