/**
 * Maps a requested action/resource pair onto the permission it requires.
 */

export const PERMISSION_DOMAIN = 'k8s';

export const Permissions = {
  listPods: 'k8s:pods:list',
  getPodLogs: 'k8s:pods:logs',
  restartPod: 'k8s:pods:restart',
  deletePods: 'k8s:pods:delete',
  scaleDeployment: 'k8s:deployments:scale',
  listDeployments: 'k8s:deployments:list',
  listServices: 'k8s:services:list',
  manageSecrets: 'k8s:secrets:manage',
  createResources: 'k8s:resources:create',
} as const;

const ACTION_PERMISSIONS: Readonly<Record<string, string>> = {
  'list/pods': Permissions.listPods,
  'logs/pods': Permissions.getPodLogs,
  'get_logs/pods': Permissions.getPodLogs,
  'restart/pods': Permissions.restartPod,
  'delete/pods': Permissions.deletePods,
  'scale/deployments': Permissions.scaleDeployment,
  'list/deployments': Permissions.listDeployments,
  'list/services': Permissions.listServices,
};

/**
 * Unmapped pairs fall back to `k8s:<resource>:<action>`.
 */
export const actionToPermission = (action: string, resource: string): string =>
  ACTION_PERMISSIONS[`${action}/${resource}`] ?? `${PERMISSION_DOMAIN}:${resource}:${action}`;
