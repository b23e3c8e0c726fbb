/**
 * Declarative RBAC policy: a list of named roles, each bundling permissions and
 * an optional namespace allow-list. Loaded once and never mutated.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { PolicyLoadError } from '../gate/errors.js';

const RoleSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    permissions: z.array(z.string().min(1)).default([]),
    // empty means every namespace
    namespaces: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const PolicySchema = z
  .object({
    roles: z.array(RoleSchema).default([]),
  })
  .strict();

export type Role = Readonly<{
  name: string;
  description: string;
  permissions: readonly string[];
  namespaces: readonly string[];
}>;

export class PermissionPolicy {
  private readonly byName: ReadonlyMap<string, Role>;

  constructor(readonly roles: readonly Role[]) {
    const byName = new Map<string, Role>();
    for (const role of roles) {
      if (byName.has(role.name)) {
        throw new PolicyLoadError(`duplicate role name: ${role.name}`);
      }
      byName.set(
        role.name,
        Object.freeze({
          ...role,
          permissions: Object.freeze([...role.permissions]),
          namespaces: Object.freeze([...role.namespaces]),
        }),
      );
    }
    this.byName = byName;
  }

  findRole(name: string): Role | undefined {
    return this.byName.get(name);
  }

  get size(): number {
    return this.byName.size;
  }

  static empty(): PermissionPolicy {
    return new PermissionPolicy([]);
  }
}

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');

export const parsePolicy = (input: unknown): PermissionPolicy => {
  const parsed = PolicySchema.safeParse(input);
  if (!parsed.success) {
    throw new PolicyLoadError(formatIssues(parsed.error));
  }
  return new PermissionPolicy(parsed.data.roles);
};

export const parsePolicyText = (text: string): PermissionPolicy => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PolicyLoadError(error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
  return parsePolicy(raw);
};

/**
 * Reads and validates a policy file. Any failure is a `PolicyLoadError`; callers
 * at startup let it terminate the process.
 */
export const loadPolicyFile = (filePath: string): PermissionPolicy => {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new PolicyLoadError(`cannot read ${filePath}`, { cause: error });
  }
  return parsePolicyText(text);
};
