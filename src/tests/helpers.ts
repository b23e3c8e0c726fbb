import { createLogger, type Logger } from '../logging/logger.js';

export type LogLine = Record<string, unknown>;

const isLogLine = (value: unknown): value is LogLine =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export type CapturedLogger = Readonly<{
  logger: Logger;
  lines: () => readonly LogLine[];
}>;

/**
 * pino logger writing into memory; `lines()` returns every parsed JSON line so far.
 */
export const captureLogger = (level: 'debug' | 'info' = 'debug'): CapturedLogger => {
  const raw: string[] = [];
  const logger = createLogger({
    level,
    destination: {
      write: (msg: string) => {
        raw.push(msg);
      },
    },
  });
  const lines = (): readonly LogLine[] =>
    raw.map((line): unknown => JSON.parse(line)).filter(isLogLine);
  return { logger, lines };
};

export type ManualClock = Readonly<{
  now: () => Date;
  advance: (ms: number) => void;
}>;

export const manualClock = (start: string): ManualClock => {
  let current = new Date(start);
  return {
    now: () => current,
    advance: (ms) => {
      current = new Date(current.getTime() + ms);
    },
  };
};

export const sequentialIds = (prefix = 'evt_test_'): (() => string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}${next}`;
  };
};
