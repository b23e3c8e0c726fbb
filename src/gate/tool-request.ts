/**
 * Resolves the action, resource and namespace a tool call is authorized as.
 */

import { normalizeToolId, toolIdSegments } from '../core/tool-ids.js';
import type { ToolAccess, ToolSpec } from '../core/types.js';
import { PERMISSION_DOMAIN } from './permission-map.js';

export const DEFAULT_NAMESPACE = 'default';

export type ResolvedToolRequest = Readonly<{
  action: string;
  resource: string;
  namespace: string;
}>;

const RESOURCE_KEYWORDS: ReadonlyArray<readonly [keyword: string, resource: string]> = [
  ['pod', 'pods'],
  ['deployment', 'deployments'],
  ['service', 'services'],
  ['secret', 'secrets'],
  ['configmap', 'configmaps'],
];

// checked in order; `logs` before `get` so `get_pod_logs` resolves to logs
const ACTION_KEYWORDS: readonly string[] = [
  'list',
  'logs',
  'get',
  'scale',
  'restart',
  'delete',
  'create',
];

export const resourceFromToolName = (toolName: string): string => {
  const normalized = normalizeToolId(toolName);
  const hit = RESOURCE_KEYWORDS.find(([keyword]) => normalized.includes(keyword));
  return hit ? hit[1] : 'unknown';
};

/**
 * `k8s_<action>_<resource>` names carry the action in the second segment;
 * other names are matched by keyword.
 */
export const actionFromToolName = (toolName: string): string => {
  const segments = toolIdSegments(toolName);
  const [domain, action] = segments;
  if (segments.length >= 3 && domain === PERMISSION_DOMAIN && action) {
    return segments.includes('logs') ? 'logs' : action;
  }
  const normalized = normalizeToolId(toolName);
  return ACTION_KEYWORDS.find((keyword) => normalized.includes(keyword)) ?? 'unknown';
};

export const namespaceFromArgs = (args: Readonly<Record<string, unknown>>): string => {
  const { namespace } = args;
  return typeof namespace === 'string' && namespace.trim().length > 0
    ? namespace.trim()
    : DEFAULT_NAMESPACE;
};

export const resolveToolRequest = (
  toolName: string,
  args: Readonly<Record<string, unknown>>,
  spec?: ToolSpec,
): ResolvedToolRequest => {
  const access: ToolAccess = spec?.access ?? {
    action: actionFromToolName(toolName),
    resource: resourceFromToolName(toolName),
  };
  return { ...access, namespace: namespaceFromArgs(args) };
};
