import test from 'ava';

import { findAuthorizationHeader, parseAuthorizationHeader } from '../gate/header.js';

test('the header name is matched case-insensitively', (t) => {
  t.is(findAuthorizationHeader({ Authorization: 'Bearer abc' }), 'Bearer abc');
  t.is(findAuthorizationHeader({ AUTHORIZATION: ['ApiKey one', 'ApiKey two'] }), 'ApiKey one');
  t.is(findAuthorizationHeader({ 'x-other': 'value' }), undefined);
});

test('scheme tokens map onto internal scheme names case-insensitively', (t) => {
  t.deepEqual(parseAuthorizationHeader('Bearer abc.def.ghi'), {
    ok: true,
    scheme: 'token',
    credential: 'abc.def.ghi',
  });
  t.deepEqual(parseAuthorizationHeader('apikey test-key'), {
    ok: true,
    scheme: 'key',
    credential: 'test-key',
  });
  t.deepEqual(parseAuthorizationHeader('  APIKEY   test-key  '), {
    ok: true,
    scheme: 'key',
    credential: 'test-key',
  });
});

test('a missing or blank header is reported as missing', (t) => {
  t.deepEqual(parseAuthorizationHeader(undefined), {
    ok: false,
    error: 'missing authorization header',
  });
  t.deepEqual(parseAuthorizationHeader('   '), { ok: false, error: 'missing authorization header' });
});

test('anything but exactly two parts is malformed', (t) => {
  t.deepEqual(parseAuthorizationHeader('Bearer'), { ok: false, error: 'malformed header' });
  t.deepEqual(parseAuthorizationHeader('Bearer '), { ok: false, error: 'malformed header' });
  t.deepEqual(parseAuthorizationHeader('Bearer a b'), { ok: false, error: 'malformed header' });
});

test('unknown scheme tokens are reported with the token', (t) => {
  t.deepEqual(parseAuthorizationHeader('Basic dXNlcjpwYXNz'), {
    ok: false,
    error: 'unsupported scheme: Basic',
    schemeToken: 'Basic',
  });
});
