import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import 'dotenv/config';
import pino from 'pino';
import type { FastifyInstance } from 'fastify';

import { AuditSink } from './audit/sink.js';
import { InMemoryCredentialStore } from './auth/credential-store.js';
import { AuthenticatorDispatcher } from './auth/dispatcher.js';
import { ApiKeyAuthenticator } from './auth/key-authenticator.js';
import { TokenAuthenticator } from './auth/token-authenticator.js';
import { loadCredentialsFile, seedCredentialStore } from './config/credentials.js';
import { loadConfigWithSource, type AppConfig } from './config/load-config.js';
import { buildRegistry, type ToolRegistry } from './core/registry.js';
import type { ToolFactory } from './core/types.js';
import { createRegistryExecutor } from './gate/executor.js';
import { SecurityGate } from './gate/orchestrator.js';
import { createHttpServer } from './http/server.js';
import { createLogger, type Logger } from './logging/logger.js';
import { AuthorizationEngine } from './rbac/enforcer.js';
import { loadPolicyFile, type PermissionPolicy } from './rbac/policy.js';
import { help } from './tools/help.js';
import { whoami } from './tools/identity.js';
import { listKeys, revokeKey } from './tools/keys.js';

export { AuditSink } from './audit/sink.js';
export { InMemoryCredentialStore } from './auth/credential-store.js';
export { AuthenticatorDispatcher } from './auth/dispatcher.js';
export { ApiKeyAuthenticator } from './auth/key-authenticator.js';
export { TokenAuthenticator } from './auth/token-authenticator.js';
export type { AuthResult, Authenticator, Identity } from './auth/types.js';
export { loadConfig, type AppConfig } from './config/load-config.js';
export * from './gate/errors.js';
export type { ToolExecutor, ToolResult } from './gate/executor.js';
export { SecurityGate } from './gate/orchestrator.js';
export { createHttpServer } from './http/server.js';
export { AuthorizationEngine } from './rbac/enforcer.js';
export { PermissionPolicy, loadPolicyFile, parsePolicy } from './rbac/policy.js';

export type GateAppOptions = Readonly<{
  config: AppConfig;
  policy: PermissionPolicy;
  logger: Logger;
  // Logger whose destination is the audit stream.
  auditWriter: Logger;
  store?: InMemoryCredentialStore;
  tools?: readonly ToolFactory[];
  now?: () => Date;
}>;

export type GateApp = Readonly<{
  app: FastifyInstance;
  gate: SecurityGate;
  audit: AuditSink;
  store: InMemoryCredentialStore;
  tokens: TokenAuthenticator;
  engine: AuthorizationEngine;
  registry: ToolRegistry;
}>;

const resolveJwtSecret = (config: AppConfig, logger: Logger): string => {
  if (config.jwt.secret) return config.jwt.secret;
  logger.warn('JWT_SECRET is not set; using a random secret, tokens will not survive a restart');
  return crypto.randomBytes(32).toString('hex');
};

/**
 * Wires the credential store, authenticators, RBAC engine, audit sink and the
 * built-in tools behind one security gate and its HTTP surface.
 */
export const createGateApp = (options: GateAppOptions): GateApp => {
  const { config, logger } = options;
  const now = options.now ?? (() => new Date());

  const store =
    options.store ??
    new InMemoryCredentialStore({ logger: logger.child({ component: 'keys' }), now });
  const tokens = new TokenAuthenticator({
    secret: resolveJwtSecret(config, logger),
    issuer: config.jwt.issuer,
    algorithm: config.jwt.algorithm,
    ttlSeconds: config.jwt.ttlSeconds,
    logger: logger.child({ component: 'auth' }),
    now,
  });
  const dispatcher = new AuthenticatorDispatcher()
    .register('key', new ApiKeyAuthenticator(store))
    .register('token', tokens);

  const engine = new AuthorizationEngine({
    roleReferences: config.roleReferences,
    logger: logger.child({ component: 'rbac' }),
  });
  engine.reloadPolicy(options.policy);

  const audit = new AuditSink({
    writer: options.auditWriter,
    logger: logger.child({ component: 'audit' }),
    now,
  });

  const factories = options.tools ?? [help, whoami, listKeys(store), revokeKey(store)];
  const registry = buildRegistry(factories, { env: process.env, now });

  const gate = new SecurityGate({
    dispatcher,
    engine,
    executor: createRegistryExecutor(registry),
    audit,
    logger: logger.child({ component: 'gate' }),
    now,
  });

  const app = createHttpServer({ gate, logger, now });
  return { app, gate, audit, store, tokens, engine, registry };
};

export const main = async (): Promise<void> => {
  const { config, source } = loadConfigWithSource(process.env);
  const logger = createLogger({ level: config.logLevel });
  logger.info(
    { config_source: source.type === 'file' ? source.path : source.type },
    'Starting MCP security gate',
  );

  // a broken policy is fatal
  const policy = loadPolicyFile(path.resolve(config.policyPath));

  const auditDestination = config.auditLogPath
    ? pino.destination({
        dest: path.resolve(config.auditLogPath),
        append: true,
        mkdir: true,
        sync: false,
      })
    : pino.destination(1);
  const auditWriter = createLogger({ level: 'info', destination: auditDestination });

  const { app, audit, store } = createGateApp({ config, policy, logger, auditWriter });
  auditDestination.on('error', (error: unknown) => audit.reportFailure(error));

  if (config.credentialsPath) {
    const seeds = loadCredentialsFile(path.resolve(config.credentialsPath));
    const seeded = seedCredentialStore(store, seeds, new Date());
    logger.info({ keys_count: seeded }, 'API keys loaded');
  } else {
    logger.warn('No API key seed file configured; only signed tokens can authenticate');
  }

  await app.listen({ host: config.host, port: config.port });
  logger.info({ host: config.host, port: config.port }, 'MCP security gate listening');

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Received signal, initiating graceful shutdown');
    app
      .close()
      .then(() => {
        auditDestination.end();
        logger.info('Server shutdown complete');
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Server forced to shutdown');
        process.exitCode = 1;
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

const shouldRunMain = (): boolean => {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return pathToFileURL(fs.realpathSync(entry)).href === import.meta.url;
};

if (shouldRunMain()) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
