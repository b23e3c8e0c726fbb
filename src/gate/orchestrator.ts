/**
 * Security gate for tool calls.
 *
 * Start → ExtractCredential → Authenticate → Authorize → Execute → LogOutcome.
 * The first failure ends the request; every decision is audited before the
 * caller sees the result. The executor is held by reference and only reached
 * after a grant.
 */

import type { AuditSink } from '../audit/sink.js';
import type { AuthenticatorDispatcher } from '../auth/dispatcher.js';
import type { Identity } from '../auth/types.js';
import type { Logger } from '../logging/logger.js';
import type { AuthorizationEngine } from '../rbac/enforcer.js';
import { AuthFailedError, AuthzDeniedError, ExecutionError } from './errors.js';
import type { ToolExecutor, ToolResult } from './executor.js';
import { findAuthorizationHeader, parseAuthorizationHeader } from './header.js';
import { actionToPermission } from './permission-map.js';
import { resolveToolRequest } from './tool-request.js';

export const UNKNOWN_SUBJECT = 'unknown';

export type RequestHeaders = Readonly<Record<string, string | readonly string[] | undefined>>;

export type ToolCallRequest = Readonly<{
  headers: RequestHeaders;
  tool: string;
  args: Readonly<Record<string, unknown>>;
  signal?: AbortSignal;
  remoteAddress?: string;
  userAgent?: string;
}>;

export type ToolCallResponse = Readonly<{
  identity: Identity;
  message: string;
  data?: unknown;
}>;

export type SecurityGateOptions = Readonly<{
  dispatcher: AuthenticatorDispatcher;
  engine: AuthorizationEngine;
  executor: ToolExecutor;
  audit: AuditSink;
  logger: Logger;
  now?: () => Date;
}>;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class SecurityGate {
  private readonly dispatcher: AuthenticatorDispatcher;
  private readonly engine: AuthorizationEngine;
  private readonly executor: ToolExecutor;
  private readonly audit: AuditSink;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SecurityGateOptions) {
    this.dispatcher = options.dispatcher;
    this.engine = options.engine;
    this.executor = options.executor;
    this.audit = options.audit;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Authenticates the request headers. Throws `AuthFailedError` after auditing.
   */
  async authenticate(
    request: Pick<ToolCallRequest, 'headers' | 'remoteAddress' | 'userAgent'>,
  ): Promise<Identity> {
    const client = clientMetadata(request);
    const header = parseAuthorizationHeader(findAuthorizationHeader(request.headers));
    if (!header.ok) {
      this.audit.recordAuthentication({
        user: UNKNOWN_SUBJECT,
        scheme: header.schemeToken?.toLowerCase() ?? 'none',
        success: false,
        error: header.error,
        metadata: client,
      });
      throw new AuthFailedError(header.error);
    }

    const result = await this.dispatcher.authenticate(header.scheme, header.credential);
    if (!result.success) {
      this.audit.recordAuthentication({
        user: UNKNOWN_SUBJECT,
        scheme: header.scheme,
        success: false,
        error: result.reason,
        metadata: client,
      });
      throw new AuthFailedError(result.reason);
    }

    this.audit.recordAuthentication({
      user: result.identity.subject,
      scheme: header.scheme,
      success: true,
      metadata: client,
    });
    return result.identity;
  }

  /**
   * Runs one tool call through the whole gate.
   */
  async handleToolCall(request: ToolCallRequest): Promise<ToolCallResponse> {
    const startedAt = this.now();

    let identity: Identity;
    try {
      identity = await this.authenticate(request);
    } catch (error) {
      this.logger.warn({ tool: request.tool, err: errorMessage(error) }, 'Authentication failed');
      throw error;
    }

    const { action, resource, namespace } = resolveToolRequest(
      request.tool,
      request.args,
      this.executor.describe?.(request.tool),
    );
    const permission = actionToPermission(action, resource);
    const decision = this.engine.check(identity.permissions, permission, namespace);

    this.audit.recordAuthorization({
      user: identity.subject,
      action,
      resource,
      namespace,
      granted: decision.granted,
      permission,
      reason: decision.granted ? undefined : decision.reason,
      metadata: { tool: request.tool },
    });

    if (!decision.granted) {
      const denied = new AuthzDeniedError(permission, namespace);
      this.logger.warn(
        { user: identity.subject, tool: request.tool, err: denied.message },
        'Authorization failed',
      );
      this.audit.recordOperation({
        user: identity.subject,
        action: request.tool,
        resource,
        namespace,
        startedAt,
        error: denied.message,
      });
      throw denied;
    }

    let result: ToolResult;
    try {
      result = await this.executor.execute(
        { identity, signal: request.signal },
        request.tool,
        request.args,
      );
    } catch (error) {
      result = { success: false, message: `${request.tool} failed`, error: errorMessage(error) };
    }

    this.audit.recordOperation({
      user: identity.subject,
      action: request.tool,
      resource,
      namespace,
      startedAt,
      error: result.success ? undefined : result.error,
    });

    if (!result.success) {
      this.logger.error(
        { user: identity.subject, tool: request.tool, err: result.error },
        'Tool execution failed',
      );
      throw new ExecutionError(result.error);
    }
    return { identity, message: result.message, data: result.data };
  }
}

const clientMetadata = (
  request: Pick<ToolCallRequest, 'remoteAddress' | 'userAgent'>,
): Readonly<Record<string, string>> => ({
  ...(request.remoteAddress ? { remote_addr: request.remoteAddress } : {}),
  ...(request.userAgent ? { user_agent: request.userAgent } : {}),
});
