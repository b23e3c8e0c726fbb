import test from 'ava';

import { normalizeConfig } from '../config/load-config.js';
import { argumentsFromQuery } from '../http/server.js';
import { createGateApp } from '../index.js';
import { silentLogger } from '../logging/logger.js';
import { parsePolicy } from '../rbac/policy.js';
import { captureLogger, manualClock } from './helpers.js';

const policy = parsePolicy({
  roles: [
    {
      name: 'developer',
      permissions: ['k8s:pods:list', 'k8s:identity:get'],
      namespaces: ['staging'],
    },
  ],
});

const setup = () => {
  const clock = manualClock('2024-06-01T12:00:00.000Z');
  const audit = captureLogger('info');
  const gateApp = createGateApp({
    config: normalizeConfig({ jwt: { secret: 'test-secret' } }),
    policy,
    logger: silentLogger(),
    auditWriter: audit.logger,
    now: clock.now,
  });
  gateApp.store.add('demo-admin-key', {
    id: 'admin-key',
    name: 'Admin Key',
    permissions: ['k8s:*'],
    createdAt: clock.now(),
  });
  gateApp.store.add('demo-dev-key', {
    id: 'user-key',
    name: 'Developer Key',
    permissions: ['developer'],
    createdAt: clock.now(),
  });
  return { ...gateApp, auditLines: audit.lines };
};

type HelpResult = { result: { tools: Array<{ name: string }> } };

test('GET /health reports ok', async (t) => {
  const { app } = setup();
  const response = await app.inject({ method: 'GET', url: '/health' });

  t.is(response.statusCode, 200);
  t.deepEqual(response.json(), { status: 'ok', timestamp: '2024-06-01T12:00:00.000Z' });
});

test('a tool call without the tool parameter is a bad request', async (t) => {
  const { app } = setup();
  const response = await app.inject({
    method: 'POST',
    url: '/mcp/tools',
    headers: { authorization: 'ApiKey demo-admin-key' },
  });

  t.is(response.statusCode, 400);
  t.deepEqual(response.json(), { error: 'missing tool parameter' });
});

test('an admin key can list the gate tools', async (t) => {
  const { app } = setup();
  const response = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=mcp_help',
    headers: { authorization: 'ApiKey demo-admin-key' },
  });

  t.is(response.statusCode, 200);
  const body = response.json<HelpResult & { success: boolean; message: string }>();
  t.true(body.success);
  t.is(body.message, 'mcp_help completed');
  t.deepEqual(
    body.result.tools.map((tool) => tool.name),
    ['mcp_help', 'auth_whoami', 'auth_list_keys', 'auth_revoke_key'],
  );
});

test('requests without credentials get a generic 401', async (t) => {
  const { app, auditLines } = setup();
  const response = await app.inject({ method: 'POST', url: '/mcp/tools?tool=mcp_help' });

  t.is(response.statusCode, 401);
  t.deepEqual(response.json(), { error: 'authentication failed' });
  t.like(auditLines()[0], {
    event_type: 'authentication',
    error_message: 'missing authorization header',
    metadata: { remote_addr: '127.0.0.1' },
  });
});

test('denied calls get 403 with the permission and namespace', async (t) => {
  const { app } = setup();
  const response = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=auth_list_keys&namespace=staging',
    headers: { authorization: 'ApiKey demo-dev-key' },
  });

  t.is(response.statusCode, 403);
  t.deepEqual(response.json(), {
    error: 'access denied',
    permission: 'k8s:keys:list',
    namespace: 'staging',
  });
});

test('a bearer token identifies its caller through auth_whoami', async (t) => {
  const { app, tokens } = setup();
  const token = tokens.issueToken({ userId: 'u-1', username: 'dev', permissions: ['developer'] });

  const response = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=auth_whoami&namespace=staging',
    headers: { authorization: `Bearer ${token}` },
  });

  t.is(response.statusCode, 200);
  t.deepEqual(response.json<{ result: unknown }>().result, {
    scheme: 'token',
    subject: 'dev',
    permissions: ['developer'],
    checkedAt: '2024-06-01T12:00:00.000Z',
  });
});

test('revoking a key through the gate locks that key out', async (t) => {
  const { app } = setup();

  const revoked = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=auth_revoke_key',
    headers: { authorization: 'ApiKey demo-admin-key' },
    payload: { id: 'user-key' },
  });
  t.is(revoked.statusCode, 200);
  t.deepEqual(revoked.json<{ result: unknown }>().result, { revoked: 'user-key' });

  const after = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=auth_whoami&namespace=staging',
    headers: { authorization: 'ApiKey demo-dev-key' },
  });
  t.is(after.statusCode, 401);
});

test('tool failures map to 500 with the execution error', async (t) => {
  const { app } = setup();
  const response = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=auth_revoke_key',
    headers: { authorization: 'ApiKey demo-admin-key' },
    payload: { id: 'nope' },
  });

  t.is(response.statusCode, 500);
  t.deepEqual(response.json(), { error: 'tool execution failed: credential not found: nope' });
});

test('unknown tools fail after authorization', async (t) => {
  const { app } = setup();
  const response = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=k8s_list_pods',
    headers: { authorization: 'ApiKey demo-admin-key' },
  });

  t.is(response.statusCode, 500);
  t.deepEqual(response.json(), { error: 'tool execution failed: unknown tool: k8s_list_pods' });
});

test('a non-object JSON body is rejected', async (t) => {
  const { app } = setup();
  const response = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=mcp_help',
    headers: { authorization: 'ApiKey demo-admin-key' },
    payload: [1, 2, 3],
  });

  t.is(response.statusCode, 400);
  t.deepEqual(response.json(), { error: 'request body must be a JSON object' });
});

test('a non-string namespace in the body is rejected before authorization', async (t) => {
  const { app, auditLines } = setup();
  const response = await app.inject({
    method: 'POST',
    url: '/mcp/tools?tool=auth_whoami',
    headers: { authorization: 'ApiKey demo-dev-key' },
    payload: { namespace: ['production'] },
  });

  t.is(response.statusCode, 400);
  t.deepEqual(response.json(), { error: 'namespace must be a string' });
  t.deepEqual(auditLines(), []);
});

test('only namespace and name are taken from the query', (t) => {
  t.deepEqual(argumentsFromQuery({ tool: 'auth_whoami', namespace: 'prod', name: 'web-1' }), {
    namespace: 'prod',
    name: 'web-1',
  });
  t.deepEqual(argumentsFromQuery({}), {});
});
