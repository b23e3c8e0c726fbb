/**
 * Authorization engine.
 *
 * Evaluates held permissions and role references against a single required
 * permission in a namespace. Evaluation order is fixed: direct permissions
 * (exact, wildcard, superuser) before roles, and a role only grants when its
 * namespace list admits the requested namespace.
 */

import type { Logger } from '../logging/logger.js';
import {
  matchPatterns,
  parseGrants,
  roleNames,
  type PatternMatch,
  type RoleReferenceMode,
} from './permission.js';
import { PermissionPolicy, type Role } from './policy.js';

export type AuthorizationDecision =
  | Readonly<{
      granted: true;
      via: PatternMatch;
      grant: string;
      role?: string;
    }>
  | Readonly<{
      granted: false;
      permission: string;
      namespace: string;
      reason: string;
    }>;

export type AuthorizationEngineOptions = Readonly<{
  policy?: PermissionPolicy;
  roleReferences?: RoleReferenceMode;
  logger: Logger;
}>;

export const NAMESPACE_WILDCARD = '*';

export const roleAdmitsNamespace = (role: Role, namespace: string): boolean =>
  role.namespaces.length === 0 ||
  role.namespaces.some((allowed) => allowed === namespace || allowed === NAMESPACE_WILDCARD);

export class AuthorizationEngine {
  private policy: PermissionPolicy;
  private readonly roleReferences: RoleReferenceMode;
  private readonly logger: Logger;

  constructor(options: AuthorizationEngineOptions) {
    this.policy = options.policy ?? PermissionPolicy.empty();
    this.roleReferences = options.roleReferences ?? 'inferred';
    this.logger = options.logger;
  }

  /**
   * Replaces the whole policy. In-flight checks keep the policy they started with.
   */
  reloadPolicy(policy: PermissionPolicy): void {
    this.policy = policy;
    this.logger.info({ roles_count: policy.size }, 'RBAC policy loaded');
  }

  get roleCount(): number {
    return this.policy.size;
  }

  check(held: readonly string[], required: string, namespace: string): AuthorizationDecision {
    const policy = this.policy;

    if (held.length === 0) {
      return this.deny(held, required, namespace, 'no permissions held');
    }

    const grants = parseGrants(held, this.roleReferences);
    const direct = matchPatterns(grants, required);
    if (direct) {
      this.logger.debug(
        { [`${direct.match}_permission`]: direct.grant, namespace },
        'Direct permission granted',
      );
      return { granted: true, via: direct.match, grant: direct.grant };
    }

    let namespaceBlocked: string | undefined;
    for (const name of roleNames(grants)) {
      const role = policy.findRole(name);
      if (!role) {
        continue;
      }

      const match = matchPatterns(parseGrants(role.permissions, this.roleReferences), required);
      if (!match) {
        continue;
      }

      if (!roleAdmitsNamespace(role, namespace)) {
        namespaceBlocked = role.name;
        continue;
      }

      this.logger.debug({ role: role.name, permission: required, namespace }, 'Permission granted');
      return { granted: true, via: match.match, grant: match.grant, role: role.name };
    }

    const reason = namespaceBlocked
      ? `role ${namespaceBlocked} is not permitted in namespace ${namespace}`
      : 'no matching permission';
    return this.deny(held, required, namespace, reason);
  }

  private deny(
    held: readonly string[],
    required: string,
    namespace: string,
    reason: string,
  ): AuthorizationDecision {
    this.logger.warn(
      { user_permissions: held, required_permission: required, namespace, reason },
      'Permission denied',
    );
    return { granted: false, permission: required, namespace, reason };
  }
}
