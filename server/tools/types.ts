import { z } from 'zod';
import type { RedmineClient } from '../redmine/client.js';
import type { RedmineConfig } from '../../shared/types.js';

export interface ToolContext {
  client: RedmineClient;
  config: RedmineConfig;
}

export interface ToolImage {
  type: 'image';
  /** base64 */
  data: string;
  mimeType: string;
  caption: string;
}

export type ToolOutput = string | ToolImage;

/** Bad or incomplete tool input; the message is shown to the caller as-is. */
export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolInputError';
  }
}

export type ToolArgs<S extends z.ZodRawShape> = z.output<z.ZodObject<S, 'strip'>>;

export interface ToolSpec<S extends z.ZodRawShape> {
  name: string;
  /** Shown in error lines: "<label> failed: ..." */
  label: string;
  description: string;
  inputSchema: S;
  readOnly?: boolean;
  execute(args: ToolArgs<S>, ctx: ToolContext): Promise<ToolOutput>;
}

export interface Tool {
  name: string;
  label: string;
  description: string;
  inputSchema: z.ZodRawShape;
  readOnly: boolean;
  run(args: unknown, ctx: ToolContext): Promise<ToolOutput>;
}

export interface ToolModule {
  domain: string;
  tools: Tool[];
}

export function defineTool<S extends z.ZodRawShape>(def: ToolSpec<S>): Tool {
  const schema = z.object(def.inputSchema);
  return {
    name: def.name,
    label: def.label,
    description: def.description,
    inputSchema: def.inputSchema,
    readOnly: def.readOnly ?? false,
    run: async (args, ctx) => def.execute(schema.parse(args ?? {}), ctx),
  };
}
