import { ZodError } from 'zod';
import { createLogger } from '../log.js';
import { RedmineApiError, describeError } from '../redmine/errors.js';
import { formatIssues } from '../redmine/validation.js';
import { attachmentTools } from './attachments.js';
import { enumerationTools } from './enumerations.js';
import { issueTools } from './issues.js';
import { journalTools } from './journals.js';
import { projectTools } from './projects.js';
import { systemTools } from './system.js';
import { ToolInputError, type Tool, type ToolContext, type ToolModule, type ToolOutput } from './types.js';
import { userTools } from './users.js';

export { ToolInputError } from './types.js';
export type { Tool, ToolContext, ToolImage, ToolModule, ToolOutput } from './types.js';

const log = createLogger('tools');

// ─── Module Registry ────────────────────────────────────────────────────────

const MODULES: ToolModule[] = [
  systemTools,
  enumerationTools,
  projectTools,
  issueTools,
  userTools,
  journalTools,
  attachmentTools,
];

const toolMap = new Map<string, Tool>();
for (const mod of MODULES) {
  for (const tool of mod.tools) {
    if (toolMap.has(tool.name)) throw new Error(`Duplicate tool name: ${tool.name}`);
    toolMap.set(tool.name, tool);
  }
}

export function getAllTools(): Tool[] {
  return MODULES.flatMap(m => m.tools);
}

export function getToolModules(): ToolModule[] {
  return MODULES;
}

export function getTool(name: string): Tool | undefined {
  return toolMap.get(name);
}

// ─── Execution ──────────────────────────────────────────────────────────────

export interface ToolResult {
  output: ToolOutput;
  isError: boolean;
}

export function renderToolError(tool: Tool, err: unknown): string {
  if (err instanceof ToolInputError) return err.message;
  if (err instanceof ZodError) return `Invalid arguments for ${tool.name}: ${formatIssues(err).join('; ')}`;
  if (err instanceof RedmineApiError) return `${tool.label} failed: ${err.message}`;
  return `System error: ${describeError(err)}`;
}

/** Never throws: every failure becomes one line of text flagged as an error. */
export async function executeTool(name: string, args: unknown, ctx: ToolContext): Promise<ToolResult> {
  const tool = toolMap.get(name);
  if (!tool) return { output: `Unknown tool: ${name}`, isError: true };

  const start = Date.now();
  try {
    const output = await tool.run(args, ctx);
    log.debug(`${name} completed in ${Date.now() - start}ms`);
    return { output, isError: false };
  } catch (err) {
    const message = renderToolError(tool, err);
    if (err instanceof RedmineApiError || err instanceof ToolInputError || err instanceof ZodError) {
      log.info(`${name}: ${message}`);
    } else {
      log.error(`${name} crashed:`, err);
    }
    return { output: message, isError: true };
  }
}
