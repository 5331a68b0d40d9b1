import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { SERVER_NAME, SERVER_VERSION, createHttpApp, createMcpServer, toCallToolResult } from '../../server/index.js';
import { setLogLevel } from '../../server/log.js';
import type { ToolContext } from '../../server/tools/index.js';
import { DOMAIN, FakeRedmine, makeTempDir, removeTempDir, testContext } from '../helpers/fake-redmine.js';

describe('toCallToolResult', () => {
  it('wraps text output', () => {
    expect(toCallToolResult({ output: 'Done.', isError: false })).toEqual({
      content: [{ type: 'text', text: 'Done.' }],
      isError: false,
    });
  });

  it('puts the caption before the image', () => {
    const result = toCallToolResult({
      output: { type: 'image', data: 'AQID', mimeType: 'image/png', caption: 'Attachment #4: shot.png (3 B)' },
      isError: false,
    });
    expect(result.content).toEqual([
      { type: 'text', text: 'Attachment #4: shot.png (3 B)' },
      { type: 'image', data: 'AQID', mimeType: 'image/png' },
    ]);
  });
});

describe('server wiring', () => {
  let dir: string;
  let fake: FakeRedmine;
  let ctx: ToolContext;

  beforeAll(() => setLogLevel('error'));

  beforeEach(async () => {
    dir = await makeTempDir();
    fake = new FakeRedmine();
    ctx = testContext(fake, dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('MCP server', () => {
    async function connect(): Promise<Client> {
      const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
      await createMcpServer(ctx).connect(serverTransport);
      const client = new Client({ name: 'test-client', version: '1.0.0' });
      await client.connect(clientTransport);
      return client;
    }

    it('advertises every tool with its read-only hint', async () => {
      const client = await connect();

      const { tools } = await client.listTools();

      expect(tools).toHaveLength(26);
      expect(tools.find(t => t.name === 'get_issue')?.annotations?.readOnlyHint).toBe(true);
      expect(tools.find(t => t.name === 'close_issue')?.annotations?.readOnlyHint).toBe(false);
      expect(tools.find(t => t.name === 'get_issue')?.inputSchema.required).toEqual(['issue_id']);
      await client.close();
    });

    it('runs a tool call', async () => {
      fake.on('GET', '/projects.json', { json: { projects: [] } });
      const client = await connect();

      const result = await client.callTool({ name: 'get_projects', arguments: {} });

      expect(result.content).toEqual([{ type: 'text', text: 'No projects found.' }]);
      expect(result.isError).toBe(false);
      await client.close();
    });

    it('flags failed calls', async () => {
      const client = await connect();

      const result = await client.callTool({ name: 'get_issue', arguments: { issue_id: 9 } });

      expect(result.content).toEqual([{ type: 'text', text: 'Fetching issue failed: Issue not found (HTTP 404)' }]);
      expect(result.isError).toBe(true);
      await client.close();
    });
  });

  describe('HTTP app', () => {
    it('answers health checks', async () => {
      const res = await createHttpApp(ctx).request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        ok: true,
        name: SERVER_NAME,
        version: SERVER_VERSION,
        domain: DOMAIN,
        tools: 26,
        cache: 'unloaded',
        uptime: expect.any(Number),
      });
    });

    it('rejects GET on the stateless endpoint', async () => {
      const res = await createHttpApp(ctx).request('/mcp');

      expect(res.status).toBe(405);
      expect(await res.json()).toEqual({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Method not allowed: this server is stateless, use POST /mcp' },
        id: null,
      });
    });

    it('rejects a body that is not JSON', async () => {
      const res = await createHttpApp(ctx).request('/mcp', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{not json',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        jsonrpc: '2.0',
        error: { code: -32700, message: 'Parse error: request body is not valid JSON' },
        id: null,
      });
    });
  });
});
