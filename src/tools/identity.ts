import type { ToolCall, ToolFactory, ToolSpec } from '../core/types.js';

export const whoami: ToolFactory = (ctx) => {
  const spec = {
    name: 'auth_whoami',
    description: 'Describe the identity the current call was authenticated as.',
    access: { action: 'get', resource: 'identity' },
    stability: 'stable',
    since: '0.1.0',
  } satisfies ToolSpec;

  const invoke = async (_args: Readonly<Record<string, unknown>>, call: ToolCall) => ({
    scheme: call.identity.scheme,
    subject: call.identity.subject,
    permissions: call.identity.permissions,
    checkedAt: ctx.now().toISOString(),
  });

  return { spec, invoke };
};
