import { Hono } from 'hono';
import { serve, type HttpBindings, type ServerType } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createLogger } from './log.js';
import { describeError } from './redmine/errors.js';
import { executeTool, getAllTools, type ToolContext, type ToolResult } from './tools/index.js';

const log = createLogger('mcp');

export const SERVER_NAME = 'redmine-mcp';
export const SERVER_VERSION = '0.1.0';

// ─── MCP Server ─────────────────────────────────────────────────────────────

export function toCallToolResult(result: ToolResult): CallToolResult {
  const { output, isError } = result;
  if (typeof output === 'string') {
    return { content: [{ type: 'text', text: output }], isError };
  }
  return {
    content: [
      { type: 'text', text: output.caption },
      { type: 'image', data: output.data, mimeType: output.mimeType },
    ],
    isError,
  };
}

export function createMcpServer(ctx: ToolContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  for (const tool of getAllTools()) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputSchema,
        annotations: { readOnlyHint: tool.readOnly },
      },
      async args => toCallToolResult(await executeTool(tool.name, args, ctx)),
    );
  }
  return server;
}

export async function startStdioServer(ctx: ToolContext): Promise<McpServer> {
  const server = createMcpServer(ctx);
  await server.connect(new StdioServerTransport());
  log.info(`Serving ${getAllTools().length} tools on stdio for ${ctx.config.domain}`);
  return server;
}

// ─── HTTP Transport ─────────────────────────────────────────────────────────

function rpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

/**
 * Stateless Streamable HTTP: every POST gets its own server and transport, torn down when the
 * response closes.
 */
export function createHttpApp(ctx: ToolContext): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();

  app.get('/health', c =>
    c.json({
      ok: true,
      name: SERVER_NAME,
      version: SERVER_VERSION,
      domain: ctx.config.domain,
      tools: getAllTools().length,
      cache: ctx.client.cache.status().state,
      uptime: process.uptime(),
    }),
  );

  app.post('/mcp', async c => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(rpcError(-32700, 'Parse error: request body is not valid JSON'), 400);
    }

    const { incoming, outgoing } = c.env;
    const server = createMcpServer(ctx);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    outgoing.on('close', () => {
      transport.close().catch(err => log.warn(`Closing transport failed: ${describeError(err)}`));
      server.close().catch(err => log.warn(`Closing server failed: ${describeError(err)}`));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(incoming, outgoing, body);
    } catch (err) {
      log.error('MCP request failed:', err);
      if (!outgoing.headersSent) {
        outgoing.writeHead(500, { 'Content-Type': 'application/json' });
        outgoing.end(JSON.stringify(rpcError(-32603, 'Internal server error')));
      }
    }
    return RESPONSE_ALREADY_SENT;
  });

  const methodNotAllowed = rpcError(-32000, 'Method not allowed: this server is stateless, use POST /mcp');
  app.get('/mcp', c => c.json(methodNotAllowed, 405));
  app.delete('/mcp', c => c.json(methodNotAllowed, 405));

  return app;
}

export function startHttpServer(ctx: ToolContext, options: { host: string; port: number }): ServerType {
  const app = createHttpApp(ctx);
  return serve({ fetch: app.fetch, hostname: options.host, port: options.port }, info => {
    log.info(`Serving ${getAllTools().length} tools on http://${options.host}:${info.port}/mcp for ${ctx.config.domain}`);
  });
}
