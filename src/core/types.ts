import type { ZodRawShape } from 'zod';
import type { Identity } from '../auth/types.js';

// Action/resource pair a tool call is authorized as.
export type ToolAccess = Readonly<{
  action: string;
  resource: string;
}>;

// Piece of metadata about a tool.
export type ToolSpec = Readonly<{
  name: string;
  description: string;
  inputSchema?: ZodRawShape;
  // When absent the gate derives action/resource from the tool name.
  access?: ToolAccess;
  stability?: 'stable' | 'experimental' | 'deprecated';
  since?: string;
  notes?: string;
}>;

// Per-call data handed to a tool: who is calling and how to cancel.
export type ToolCall = Readonly<{
  identity: Identity;
  signal?: AbortSignal;
}>;

// Runtime instance of a tool.
export type Tool = Readonly<{
  spec: ToolSpec;
  invoke: (args: Readonly<Record<string, unknown>>, call: ToolCall) => Promise<unknown>;
}>;

// Tool context carried into each factory.
export type ToolContext = Readonly<{
  env: Readonly<Record<string, string | undefined>>;
  now: () => Date;
  listTools?: () => readonly Tool[];
}>;

// Factory that creates a tool given the runtime context.
export type ToolFactory = (ctx: ToolContext) => Tool;
