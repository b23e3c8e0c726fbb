import test from 'ava';

import { AuditSink } from '../audit/sink.js';
import { createLogger } from '../logging/logger.js';
import { captureLogger, manualClock, sequentialIds } from './helpers.js';

const setup = () => {
  const clock = manualClock('2024-06-01T12:00:00.000Z');
  const audit = captureLogger('info');
  const ops = captureLogger();
  const sink = new AuditSink({
    writer: audit.logger,
    logger: ops.logger,
    now: clock.now,
    generateId: sequentialIds(),
  });
  return { sink, clock, auditLines: audit.lines, opsLines: ops.lines };
};

test('record writes one line tagged audit with generated id and timestamp', (t) => {
  const { sink, auditLines } = setup();

  const record = sink.record({
    eventType: 'operation',
    user: 'alice',
    action: 'k8s_list_pods',
    resource: 'pods',
    namespace: 'default',
    result: 'success',
  });

  t.deepEqual(record, {
    timestamp: '2024-06-01T12:00:00.000Z',
    event_id: 'evt_test_1',
    event_type: 'operation',
    user: 'alice',
    action: 'k8s_list_pods',
    resource: 'pods',
    namespace: 'default',
    result: 'success',
    duration_ms: 0,
  });
  const lines = auditLines();
  t.is(lines.length, 1);
  t.like(lines[0], { audit: true, ...record, msg: 'audit operation success' });
});

test('explicit event ids and timestamps are kept', (t) => {
  const { sink } = setup();

  const record = sink.record({
    eventId: 'evt_fixed',
    timestamp: new Date('2023-01-01T00:00:00.000Z'),
    eventType: 'authentication',
    user: 'bob',
    action: 'authenticate',
    resource: '',
    result: 'failure',
  });

  t.is(record?.event_id, 'evt_fixed');
  t.is(record?.timestamp, '2023-01-01T00:00:00.000Z');
});

test('recordAuthentication carries the scheme and error detail', (t) => {
  const { sink } = setup();

  t.deepEqual(
    sink.recordAuthentication({
      user: 'unknown',
      scheme: 'key',
      success: false,
      error: 'invalid credential',
      metadata: { remote_addr: '127.0.0.1' },
    }),
    {
      timestamp: '2024-06-01T12:00:00.000Z',
      event_id: 'evt_test_1',
      event_type: 'authentication',
      user: 'unknown',
      action: 'authenticate',
      resource: '',
      result: 'failure',
      error_message: 'invalid credential',
      metadata: { auth_type: 'key', remote_addr: '127.0.0.1' },
      duration_ms: 0,
    },
  );
});

test('recordAuthorization marks permission checks', (t) => {
  const { sink } = setup();

  t.like(
    sink.recordAuthorization({
      user: 'alice',
      action: 'list',
      resource: 'pods',
      namespace: 'staging',
      granted: true,
      permission: 'k8s:pods:list',
    }),
    {
      event_type: 'authorization',
      result: 'granted',
      metadata: { permission_check: true, permission: 'k8s:pods:list' },
    },
  );
});

test('recordOperation measures the duration since the start', (t) => {
  const { sink, clock } = setup();
  const startedAt = clock.now();
  clock.advance(250);

  t.like(
    sink.recordOperation({
      user: 'alice',
      action: 'k8s_scale_deployment',
      resource: 'deployments',
      namespace: 'production',
      startedAt,
      error: 'boom',
    }),
    {
      event_type: 'operation',
      result: 'failure',
      error_message: 'boom',
      duration_ms: 250,
      timestamp: '2024-06-01T12:00:00.250Z',
      metadata: { protocol: 'mcp', version: '1.0' },
    },
  );
});

test('a failing destination is reported on the operational logger and swallowed', (t) => {
  const ops = captureLogger();
  const sink = new AuditSink({
    writer: createLogger({
      destination: {
        write: () => {
          throw new Error('disk full');
        },
      },
    }),
    logger: ops.logger,
  });

  const record = sink.recordAuthentication({ user: 'alice', scheme: 'token', success: true });

  t.is(record, undefined);
  const failure = ops.lines().find((line) => line.msg === 'Failed to write audit event');
  t.like(failure, { level: 50, err: { message: 'audit write failed: disk full' } });
});

test('reportFailure logs asynchronous destination errors', (t) => {
  const { sink, opsLines } = setup();

  sink.reportFailure(new Error('EACCES'));

  t.like(opsLines().at(-1), {
    msg: 'Failed to write audit event',
    err: { type: 'AuditWriteError', message: 'audit write failed: EACCES' },
  });
});
