/**
 * Signed-token (JWT) authentication.
 *
 * Tokens are HMAC-signed with a pre-shared secret. The header algorithm is
 * checked before verification and expiry is re-checked against our own clock
 * after the library has accepted the token.
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import { authenticated, rejected, type AuthResult, type Authenticator } from './types.js';

export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];

export const DEFAULT_TOKEN_ISSUER = 'mcp-security-gate';

const isHmacAlgorithm = (value: unknown): value is HmacAlgorithm =>
  typeof value === 'string' && HMAC_ALGORITHMS.some((alg) => alg === value);

const TokenClaims = z
  .object({
    sub: z.string().min(1),
    username: z.string().min(1).optional(),
    permissions: z.array(z.string()).default([]),
    iat: z.number().optional(),
    nbf: z.number().optional(),
    exp: z.number(),
    iss: z.string().optional(),
  })
  .passthrough();

export type TokenClaims = z.infer<typeof TokenClaims>;

export type TokenAuthenticatorConfig = Readonly<{
  secret: string;
  issuer?: string;
  algorithm?: HmacAlgorithm;
  ttlSeconds?: number;
  logger: Logger;
  now?: () => Date;
}>;

export type IssueTokenRequest = Readonly<{
  userId: string;
  username?: string;
  permissions: readonly string[];
  lifetimeSeconds?: number;
}>;

const toSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

export class TokenAuthenticator implements Authenticator {
  private readonly secret: string;
  private readonly issuer: string;
  private readonly algorithm: HmacAlgorithm;
  private readonly ttlSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: TokenAuthenticatorConfig) {
    if (config.secret.length === 0) {
      throw new Error('token signing secret must not be empty');
    }
    this.secret = config.secret;
    this.issuer = config.issuer ?? DEFAULT_TOKEN_ISSUER;
    this.algorithm = config.algorithm ?? 'HS256';
    this.ttlSeconds = config.ttlSeconds ?? 3600;
    this.logger = config.logger;
    this.now = config.now ?? (() => new Date());
  }

  async authenticate(token: string): Promise<AuthResult> {
    const decoded = jwt.decode(token, { complete: true });
    if (!decoded) {
      this.logger.warn('JWT token could not be decoded');
      return rejected('invalid token: malformed');
    }

    // reject algorithm substitution (none, RS*/ES* with the secret as a public key)
    const alg = decoded.header.alg;
    if (!isHmacAlgorithm(alg)) {
      this.logger.warn({ alg }, 'JWT token uses unexpected signing algorithm');
      return rejected(`unexpected signing algorithm: ${alg}`);
    }

    const now = this.now();
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [...HMAC_ALGORITHMS],
        issuer: this.issuer,
        clockTimestamp: toSeconds(now),
      });
    } catch (error) {
      return rejected(this.describeVerifyFailure(error));
    }

    const parsed = TokenClaims.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn('Invalid JWT token claims');
      return rejected('invalid token claims');
    }

    const claims = parsed.data;
    if (claims.exp * 1000 <= now.getTime()) {
      this.logger.warn({ username: claims.username ?? claims.sub }, 'Expired JWT token attempted');
      return rejected('token expired');
    }

    this.logger.info({ user_id: claims.sub, username: claims.username }, 'JWT authentication successful');

    return authenticated({
      scheme: 'token',
      subject: claims.username ?? claims.sub,
      permissions: claims.permissions,
      attributes: {
        user_id: claims.sub,
        issued_at: claims.iat,
        expires_at: new Date(claims.exp * 1000).toISOString(),
      },
    });
  }

  issueToken(request: IssueTokenRequest): string {
    const issuedAt = toSeconds(this.now());
    const lifetime = request.lifetimeSeconds ?? this.ttlSeconds;
    if (!Number.isFinite(lifetime) || lifetime <= 0) {
      throw new Error(`token lifetime must be positive, got ${lifetime}`);
    }

    const claims: TokenClaims = {
      sub: request.userId,
      username: request.username,
      permissions: [...request.permissions],
      iat: issuedAt,
      nbf: issuedAt,
      exp: issuedAt + lifetime,
      iss: this.issuer,
    };

    return jwt.sign(claims, this.secret, { algorithm: this.algorithm });
  }

  private describeVerifyFailure(error: unknown): string {
    if (error instanceof jwt.TokenExpiredError) {
      this.logger.warn('Expired JWT token attempted');
      return 'token expired';
    }
    if (error instanceof jwt.NotBeforeError) {
      this.logger.warn('JWT token used before its not-before time');
      return 'token not yet valid';
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn({ err: message }, 'JWT token validation failed');
    return `invalid token: ${message}`;
  }
}
