/**
 * Audit sink.
 *
 * Every authentication attempt, authorization decision and completed operation
 * becomes exactly one structured line tagged `audit: true`. Recording never
 * throws into the request path; write failures are reported on the operational
 * logger and dropped.
 */

import { AuditWriteError } from '../gate/errors.js';
import type { Logger } from '../logging/logger.js';
import { createEventIdGenerator, type EventIdGenerator } from './event-id.js';

export type AuditEventType = 'authentication' | 'authorization' | 'operation';

export type AuditResult = 'success' | 'failure' | 'granted' | 'denied';

export type AuditEvent = Readonly<{
  timestamp?: Date;
  eventId?: string;
  eventType: AuditEventType;
  user: string;
  action: string;
  resource: string;
  namespace?: string;
  result: AuditResult;
  errorMessage?: string;
  durationMs?: number;
  metadata?: Readonly<Record<string, unknown>>;
}>;

/**
 * Wire shape of one audit line, as parsed by downstream log shippers.
 */
export type AuditRecord = Readonly<{
  timestamp: string;
  event_id: string;
  event_type: AuditEventType;
  user: string;
  action: string;
  resource: string;
  namespace?: string;
  result: AuditResult;
  error_message?: string;
  metadata?: Readonly<Record<string, unknown>>;
  duration_ms: number;
}>;

export type AuditSinkOptions = Readonly<{
  /** Logger whose destination is the audit stream. */
  writer: Logger;
  /** Operational logger for sink failures. */
  logger: Logger;
  now?: () => Date;
  generateId?: EventIdGenerator;
}>;

export type AuthenticationAudit = Readonly<{
  user: string;
  scheme: string;
  success: boolean;
  error?: string;
  metadata?: Readonly<Record<string, unknown>>;
}>;

export type AuthorizationAudit = Readonly<{
  user: string;
  action: string;
  resource: string;
  namespace: string;
  granted: boolean;
  permission: string;
  reason?: string;
  metadata?: Readonly<Record<string, unknown>>;
}>;

export type OperationAudit = Readonly<{
  user: string;
  action: string;
  resource: string;
  namespace: string;
  startedAt: Date;
  error?: string;
  metadata?: Readonly<Record<string, unknown>>;
}>;

export class AuditSink {
  private readonly writer: Logger;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: EventIdGenerator;

  constructor(options: AuditSinkOptions) {
    this.writer = options.writer;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? createEventIdGenerator();
  }

  /**
   * Returns the emitted record, or `undefined` when the write failed.
   */
  record(event: AuditEvent): AuditRecord | undefined {
    try {
      const record: AuditRecord = {
        timestamp: (event.timestamp ?? this.now()).toISOString(),
        event_id: event.eventId || this.generateId(),
        event_type: event.eventType,
        user: event.user,
        action: event.action,
        resource: event.resource,
        ...(event.namespace ? { namespace: event.namespace } : {}),
        result: event.result,
        ...(event.errorMessage ? { error_message: event.errorMessage } : {}),
        ...(event.metadata ? { metadata: event.metadata } : {}),
        duration_ms: event.durationMs ?? 0,
      };
      this.writer.info({ audit: true, ...record }, `audit ${record.event_type} ${record.result}`);
      return record;
    } catch (error) {
      this.reportFailure(error);
      return undefined;
    }
  }

  recordAuthentication(entry: AuthenticationAudit): AuditRecord | undefined {
    return this.record({
      eventType: 'authentication',
      user: entry.user,
      action: 'authenticate',
      resource: '',
      result: entry.success ? 'success' : 'failure',
      errorMessage: entry.error,
      metadata: { auth_type: entry.scheme, ...entry.metadata },
    });
  }

  recordAuthorization(entry: AuthorizationAudit): AuditRecord | undefined {
    return this.record({
      eventType: 'authorization',
      user: entry.user,
      action: entry.action,
      resource: entry.resource,
      namespace: entry.namespace,
      result: entry.granted ? 'granted' : 'denied',
      errorMessage: entry.reason,
      metadata: { permission_check: true, permission: entry.permission, ...entry.metadata },
    });
  }

  recordOperation(entry: OperationAudit): AuditRecord | undefined {
    return this.record({
      eventType: 'operation',
      user: entry.user,
      action: entry.action,
      resource: entry.resource,
      namespace: entry.namespace,
      result: entry.error ? 'failure' : 'success',
      errorMessage: entry.error,
      durationMs: Math.max(0, this.now().getTime() - entry.startedAt.getTime()),
      metadata: { protocol: 'mcp', version: '1.0', ...entry.metadata },
    });
  }

  /**
   * Hook for asynchronous destinations that surface failures as `error` events.
   */
  reportFailure(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    const failure = new AuditWriteError(message, { cause: error });
    try {
      this.logger.error({ err: failure }, 'Failed to write audit event');
    } catch {
      process.emitWarning(failure);
    }
  }
}
