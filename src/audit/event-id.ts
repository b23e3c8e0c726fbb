import crypto from 'node:crypto';

export type EventIdGenerator = () => string;

export const EVENT_ID_PREFIX = 'evt_';

/**
 * Audit event ids are random v4 UUIDs with an `evt_` prefix, unique per event.
 */
export const createEventIdGenerator =
  (randomUUID: () => string = () => crypto.randomUUID()): EventIdGenerator =>
  () =>
    `${EVENT_ID_PREFIX}${randomUUID()}`;
