/**
 * Downstream executor boundary. The gate only looks at `success`; the payload
 * is passed through untouched.
 */

import type { ToolRegistry } from '../core/registry.js';
import type { ToolCall, ToolSpec } from '../core/types.js';

export type ToolResult =
  | Readonly<{ success: true; message: string; data?: unknown }>
  | Readonly<{ success: false; message: string; error: string }>;

export interface ToolExecutor {
  execute(
    call: ToolCall,
    tool: string,
    args: Readonly<Record<string, unknown>>,
  ): Promise<ToolResult>;
  /** Declared metadata for a tool, used to resolve its action and resource. */
  describe?(tool: string): ToolSpec | undefined;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const createRegistryExecutor = (registry: ToolRegistry): ToolExecutor => ({
  describe: (tool) => registry.get(tool)?.spec,

  async execute(call, name, args) {
    const tool = registry.get(name);
    if (!tool) {
      return { success: false, message: `unknown tool ${name}`, error: `unknown tool: ${name}` };
    }
    if (call.signal?.aborted) {
      return { success: false, message: `${name} cancelled`, error: 'request aborted' };
    }
    try {
      const data = await tool.invoke(args, call);
      return { success: true, message: `${name} completed`, data };
    } catch (error) {
      return { success: false, message: `${name} failed`, error: errorMessage(error) };
    }
  },
});
