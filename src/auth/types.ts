/**
 * Shared Authentication Types
 *
 * Identity records and the authenticator contract used by every credential scheme.
 */

/**
 * Internal scheme names. Header scheme tokens are mapped onto these by the gate.
 */
export type AuthScheme = 'key' | 'token';

/**
 * Normalized result of a successful credential check.
 *
 * `attributes` is informational only; authorization reads `permissions` alone.
 */
export type Identity = Readonly<{
  scheme: AuthScheme;
  subject: string;
  permissions: readonly string[];
  attributes: Readonly<Record<string, unknown>>;
}>;

/**
 * Outcome of an authentication attempt. `reason` is detail for the audit trail
 * and must never be echoed to an unauthenticated caller.
 */
export type AuthResult =
  | Readonly<{ success: true; identity: Identity }>
  | Readonly<{ success: false; reason: string }>;

export interface Authenticator {
  authenticate(credential: string): Promise<AuthResult>;
}

export const authenticated = (identity: Identity): AuthResult => ({ success: true, identity });

export const rejected = (reason: string): AuthResult => ({ success: false, reason });
