#!/usr/bin/env node
import fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import 'dotenv/config';

import { TokenAuthenticator } from '../auth/token-authenticator.js';
import { loadConfig } from '../config/load-config.js';
import { createLogger } from '../logging/logger.js';

export type IssueTokenOptions = {
  user?: string;
  username?: string;
  permissions: string[];
  ttl?: number;
};

const USAGE = `Usage: mcp-gate-issue-token --user <id> [options]

Prints a signed bearer token for the gate. The signing secret, issuer and
algorithm come from the gate configuration (JWT_SECRET, mcp-gate.json).

Options:
  -u, --user <id>          Subject (sub claim), required
  -n, --username <name>    Display name used as the audited subject
  -p, --permission <perm>  Permission or role reference; repeat for more
  -t, --ttl <seconds>      Token lifetime (default: configured ttlSeconds)
  -c, --config <path>      Path to mcp-gate.json
  -h, --help               Show this help message
`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parses CLI flags. Returns `null` when help was requested.
 */
export const parseIssueTokenArgs = (args: readonly string[]): IssueTokenOptions | null => {
  const options: IssueTokenOptions = { permissions: [] };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const nextArg = (): string => {
      const value = args[i + 1];
      if (value === undefined) {
        throw new UsageError(`Missing value for ${arg}`);
      }
      i += 1;
      return value;
    };

    switch (arg) {
      case '-u':
      case '--user':
        options.user = nextArg();
        break;
      case '-n':
      case '--username':
        options.username = nextArg();
        break;
      case '-p':
      case '--permission':
        options.permissions.push(nextArg());
        break;
      case '-t':
      case '--ttl': {
        const next = nextArg();
        const parsed = Number.parseInt(next, 10);
        if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== next) {
          throw new UsageError(`Invalid ttl: ${next}`);
        }
        options.ttl = parsed;
        break;
      }
      case '-c':
      case '--config':
        // consumed by loadConfig
        nextArg();
        break;
      case '-h':
      case '--help':
        return null;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!options.user) {
    throw new UsageError('--user is required');
  }
  return options;
};

const main = (): void => {
  const args = process.argv.slice(2);
  let options: IssueTokenOptions | null;
  try {
    options = parseIssueTokenArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    console.error(USAGE);
    process.exit(1);
  }
  if (!options?.user) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(process.env, process.argv);
  if (!config.jwt.secret) {
    console.error('JWT_SECRET must be set to issue tokens the gate will accept');
    process.exit(1);
  }

  const tokens = new TokenAuthenticator({
    secret: config.jwt.secret,
    issuer: config.jwt.issuer,
    algorithm: config.jwt.algorithm,
    ttlSeconds: config.jwt.ttlSeconds,
    logger: createLogger({ level: 'silent' }),
  });

  console.log(
    tokens.issueToken({
      userId: options.user,
      username: options.username,
      permissions: options.permissions,
      lifetimeSeconds: options.ttl,
    }),
  );
};

/**
 * True when `entry` (normally `process.argv[1]`) resolves to the module at
 * `moduleUrl`. npm installs bins as symlinks, so the entry is resolved first.
 */
export const isEntryPoint = (entry: string | undefined, moduleUrl: string): boolean => {
  if (!entry || !fs.existsSync(entry)) return false;
  return pathToFileURL(fs.realpathSync(entry)).href === moduleUrl;
};

if (isEntryPoint(process.argv[1], import.meta.url)) {
  main();
}
