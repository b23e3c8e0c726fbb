import type { Tool, ToolContext, ToolFactory } from './types.js';

export type ToolRegistry = Readonly<{
  list: () => readonly Tool[];
  get: (name: string) => Tool | undefined;
}>;

export const buildRegistry = (factories: readonly ToolFactory[], ctx: ToolContext): ToolRegistry => {
  const list = (): readonly Tool[] => tools;
  const ctxWithRegistry: ToolContext = {
    ...ctx,
    listTools: list,
  };

  const tools: readonly Tool[] = factories.map((f) => f(ctxWithRegistry));
  const byName = new Map<string, Tool>();
  for (const tool of tools) {
    if (byName.has(tool.spec.name)) {
      throw new Error(`duplicate tool name: ${tool.spec.name}`);
    }
    byName.set(tool.spec.name, tool);
  }
  return Object.freeze({
    list,
    get: (name: string) => byName.get(name),
  });
};
