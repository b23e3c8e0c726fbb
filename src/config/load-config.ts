import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { DEFAULT_TOKEN_ISSUER, HMAC_ALGORITHMS } from '../auth/token-authenticator.js';

export const CONFIG_FILE_NAME = 'mcp-gate.json';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const JwtConfig = z
  .object({
    // absent means a random per-process secret
    secret: z.string().min(1).optional(),
    issuer: z.string().min(1).default(DEFAULT_TOKEN_ISSUER),
    algorithm: z.enum(HMAC_ALGORITHMS).default('HS256'),
    ttlSeconds: z.number().int().positive().default(3600),
  })
  .strict();

const Config = z
  .object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(8080),
    policyPath: z.string().min(1).default('config/rbac-policies.json'),
    credentialsPath: z.string().min(1).nullable().default(null),
    jwt: JwtConfig.default({}),
    auditLogPath: z.string().min(1).nullable().default(null),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    roleReferences: z.enum(['inferred', 'prefixed']).default('inferred'),
  })
  .strict();

export const ConfigSchema = Config;

export type AppConfig = z.infer<typeof Config>;

export type ConfigSource =
  | Readonly<{ type: 'file'; path: string }>
  | Readonly<{ type: 'default' }>;

export type LoadedConfig = Readonly<{
  config: AppConfig;
  source: ConfigSource;
}>;

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readJsonFileSync = (p: string): unknown => {
  const raw = fs.readFileSync(p, 'utf8');
  return JSON.parse(raw);
};

const findUpSync = (start: string, fileName: string): string | null => {
  let dir = path.resolve(start);
  const root = path.parse(dir).root;
  for (let i = 0; i < 100; i++) {
    const candidate = path.join(dir, fileName);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
    if (dir === root) break;
    dir = path.dirname(dir);
  }
  return null;
};

export const getArgValue = (
  argv: readonly string[],
  flag: string,
  short: string,
): string | undefined => {
  const idx = argv.indexOf(flag);
  if (idx >= 0 && argv[idx + 1]) return argv[idx + 1];
  const sidx = argv.indexOf(short);
  if (sidx >= 0 && argv[sidx + 1]) return argv[sidx + 1];
  // support --config=path
  const eq = argv.find((a) => a.startsWith(`${flag}=`));
  if (eq) return eq.slice(flag.length + 1);
  return undefined;
};

export const findConfigPath = (cwd: string = process.cwd()): string | null =>
  findUpSync(cwd, CONFIG_FILE_NAME);

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');

const defined = (entries: Record<string, unknown>): JsonObject =>
  Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined));

const numberFromEnv = (value: string | undefined): number | undefined =>
  value === undefined || value.trim() === '' ? undefined : Number(value);

/**
 * Environment overrides. Numbers that do not parse come through as NaN and are
 * rejected by the schema.
 */
const fromEnv = (env: NodeJS.ProcessEnv): JsonObject =>
  defined({
    host: env.MCP_HOST,
    port: numberFromEnv(env.MCP_PORT),
    policyPath: env.MCP_RBAC_POLICY_PATH,
    credentialsPath: env.MCP_API_KEYS_PATH,
    auditLogPath: env.MCP_AUDIT_LOG_PATH,
    logLevel: env.LOG_LEVEL,
    roleReferences: env.MCP_ROLE_REFERENCES,
    jwt: defined({
      secret: env.JWT_SECRET,
      issuer: env.JWT_ISSUER,
      algorithm: env.JWT_ALGORITHM,
      ttlSeconds: numberFromEnv(env.JWT_TTL_SECONDS),
    }),
  });

const merge = (file: JsonObject, overrides: JsonObject): JsonObject => {
  const fileJwt = isJsonObject(file.jwt) ? file.jwt : {};
  const envJwt = isJsonObject(overrides.jwt) ? overrides.jwt : {};
  return { ...file, ...overrides, jwt: { ...fileJwt, ...envJwt } };
};

export const normalizeConfig = (input: unknown): AppConfig => {
  const parsed = Config.safeParse(input ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const createDefaultConfig = (): AppConfig => normalizeConfig({});

const readConfigFile = (filePath: string): JsonObject => {
  let raw: unknown;
  try {
    raw = readJsonFileSync(filePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read config ${filePath}: ${message}`, { cause: error });
  }
  if (!isJsonObject(raw)) {
    throw new Error(`Invalid configuration: ${filePath} must contain a JSON object`);
  }
  return raw;
};

/**
 * Load config synchronously. The file is located by:
 * 1) --config / -c path (relative to cwd)
 * 2) MCP_GATE_CONFIG
 * 3) nearest mcp-gate.json from cwd upward
 *
 * Environment variables override file values; anything left unset takes its default.
 */
export const loadConfigWithSource = (
  env: NodeJS.ProcessEnv,
  argv: readonly string[] = process.argv,
  cwd: string = process.cwd(),
): LoadedConfig => {
  const explicit = (getArgValue(argv, '--config', '-c') ?? env.MCP_GATE_CONFIG)?.replace(
    /^['"]|['"]$/g,
    '',
  );
  const filePath = explicit ? path.resolve(cwd, explicit) : findConfigPath(cwd);

  const file = filePath ? readConfigFile(filePath) : {};
  const config = normalizeConfig(merge(file, fromEnv(env)));
  return {
    config,
    source: filePath ? { type: 'file', path: filePath } : { type: 'default' },
  };
};

export const loadConfig = (
  env: NodeJS.ProcessEnv,
  argv: readonly string[] = process.argv,
  cwd: string = process.cwd(),
): AppConfig => loadConfigWithSource(env, argv, cwd).config;
