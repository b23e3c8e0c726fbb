/**
 * Error taxonomy of the security gate.
 */

export const AUTHENTICATION_FAILED = 'authentication failed';

/**
 * Caller-facing message is always generic; `detail` is for the audit trail only.
 */
export class AuthFailedError extends Error {
  constructor(readonly detail: string) {
    super(AUTHENTICATION_FAILED);
    this.name = 'AuthFailedError';
  }
}

export class AuthzDeniedError extends Error {
  constructor(
    readonly permission: string,
    readonly namespace: string,
  ) {
    super(`access denied: ${permission} in namespace ${namespace}`);
    this.name = 'AuthzDeniedError';
  }
}

export class PolicyLoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`failed to load RBAC policy: ${message}`, options);
    this.name = 'PolicyLoadError';
  }
}

export class ExecutionError extends Error {
  constructor(readonly reason: string) {
    super(`tool execution failed: ${reason}`);
    this.name = 'ExecutionError';
  }
}

export class AuditWriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(`audit write failed: ${message}`, options);
    this.name = 'AuditWriteError';
  }
}
