/**
 * Permission grammar.
 *
 * A held entry is either a permission pattern or a reference to a role. The
 * distinction is made once, here, and carried as a tagged `Grant`.
 */

export const SUPERUSER_PERMISSION = '*';
export const WILDCARD_SUFFIX = ':*';
export const ROLE_PREFIX = 'role:';

/**
 * `inferred` treats any colon-free entry as a role name as well as `role:<name>`.
 * `prefixed` only accepts the explicit `role:` form.
 */
export type RoleReferenceMode = 'inferred' | 'prefixed';

export type Grant =
  | Readonly<{ kind: 'permission'; permission: string }>
  | Readonly<{ kind: 'wildcard'; pattern: string; prefix: string }>
  | Readonly<{ kind: 'superuser' }>
  | Readonly<{ kind: 'role'; role: string }>;

export const parseGrant = (entry: string, mode: RoleReferenceMode = 'inferred'): Grant => {
  if (entry === SUPERUSER_PERMISSION) {
    return { kind: 'superuser' };
  }
  if (entry.startsWith(ROLE_PREFIX)) {
    return { kind: 'role', role: entry.slice(ROLE_PREFIX.length) };
  }
  if (entry.endsWith(WILDCARD_SUFFIX)) {
    // keep the trailing colon so `k8s:*` cannot match `k8sx:pods:list`
    return { kind: 'wildcard', pattern: entry, prefix: entry.slice(0, -1) };
  }
  if (mode === 'inferred' && !entry.includes(':')) {
    return { kind: 'role', role: entry };
  }
  return { kind: 'permission', permission: entry };
};

export const parseGrants = (
  entries: readonly string[],
  mode: RoleReferenceMode = 'inferred',
): readonly Grant[] => entries.map((entry) => parseGrant(entry, mode));

export type PatternMatch = 'direct' | 'wildcard' | 'superuser';

/**
 * Steps 1-3 of an authorization check: exact, then wildcard, then superuser.
 * Each step scans every grant before the next one runs. Role grants are ignored.
 */
export const matchPatterns = (
  grants: readonly Grant[],
  required: string,
): Readonly<{ match: PatternMatch; grant: string }> | undefined => {
  for (const grant of grants) {
    if (grant.kind === 'permission' && grant.permission === required) {
      return { match: 'direct', grant: grant.permission };
    }
  }
  for (const grant of grants) {
    if (grant.kind === 'wildcard' && required.startsWith(grant.prefix)) {
      return { match: 'wildcard', grant: grant.pattern };
    }
  }
  for (const grant of grants) {
    if (grant.kind === 'superuser') {
      return { match: 'superuser', grant: SUPERUSER_PERMISSION };
    }
  }
  return undefined;
};

export const roleNames = (grants: readonly Grant[]): readonly string[] =>
  grants.flatMap((grant) => (grant.kind === 'role' ? [grant.role] : []));
