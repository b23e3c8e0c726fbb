import { z } from 'zod';

import type { ToolFactory, ToolSpec } from '../core/types.js';

type HelpToolEntry = Readonly<{
  name: string;
  description: string;
  stability: NonNullable<ToolSpec['stability']>;
  since: string | null;
  access: ToolSpec['access'] | null;
  arguments: readonly string[];
  notes: string;
}>;

export const help: ToolFactory = (ctx) => {
  const Schema = z.object({
    includeDeprecated: z.boolean().optional(),
    namespace: z.string().optional(),
  });

  const spec = {
    name: 'mcp_help',
    description: 'List available tools with their arguments and the access they require.',
    inputSchema: Schema.shape,
    access: { action: 'list', resource: 'tools' },
    stability: 'stable',
    since: '0.1.0',
  } satisfies ToolSpec;

  const invoke = async (raw: Readonly<Record<string, unknown>>) => {
    const parsed = Schema.parse(raw);
    const includeDeprecated = parsed.includeDeprecated ?? false;

    const registry = ctx.listTools?.() ?? [];
    const tools: readonly HelpToolEntry[] = registry.reduce<HelpToolEntry[]>((entries, tool) => {
      const stability = tool.spec.stability ?? 'experimental';
      if (!includeDeprecated && stability === 'deprecated') {
        return entries;
      }

      entries.push({
        name: tool.spec.name,
        description: tool.spec.description,
        stability,
        since: tool.spec.since ?? null,
        access: tool.spec.access ?? null,
        arguments: Object.keys(tool.spec.inputSchema ?? {}),
        notes: tool.spec.notes ?? '',
      });
      return entries;
    }, []);
    return { tools };
  };

  return { spec, invoke };
};
