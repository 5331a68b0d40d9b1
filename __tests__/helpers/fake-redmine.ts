import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { createRedmineClient } from '../../server/redmine/client.js';
import type { FetchLike } from '../../server/redmine/request.js';
import type { ToolContext } from '../../server/tools/types.js';
import type { RedmineConfig } from '../../shared/types.js';

export interface RecordedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: Headers;
  body: unknown;
}

export interface Reply {
  status?: number;
  json?: unknown;
  text?: string;
  binary?: Uint8Array;
  contentType?: string;
}

export type Route = Reply | Error | ((req: RecordedRequest) => Reply | Error);

/**
 * In-process stand-in for a Redmine server. Routes are keyed by "METHOD /path"; anything
 * unmatched answers 404 with an empty body.
 */
export class FakeRedmine {
  readonly requests: RecordedRequest[] = [];
  private routes = new Map<string, Route>();

  on(method: string, pathname: string, route: Route): this {
    this.routes.set(`${method} ${pathname}`, route);
    return this;
  }

  calls(method: string, pathname: string): RecordedRequest[] {
    return this.requests.filter(r => r.method === method && r.path === pathname);
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const method = init?.method ?? 'GET';
    const body = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    const req: RecordedRequest = {
      method,
      path: url.pathname,
      query: url.searchParams,
      headers: new Headers(init?.headers),
      body,
    };
    this.requests.push(req);

    const route = this.routes.get(`${method} ${url.pathname}`);
    const reply = typeof route === 'function' ? route(req) : route;
    if (reply instanceof Error) throw reply;
    if (!reply) return new Response(null, { status: 404 });
    return toResponse(reply);
  };
}

function toResponse(reply: Reply): Response {
  const status = reply.status ?? 200;
  if (reply.binary !== undefined) {
    return new Response(reply.binary, { status, headers: { 'Content-Type': reply.contentType ?? 'application/octet-stream' } });
  }
  if (reply.json !== undefined) {
    return new Response(JSON.stringify(reply.json), { status, headers: { 'Content-Type': 'application/json' } });
  }
  if (status === 204) return new Response(null, { status });
  return new Response(reply.text ?? '', { status });
}

// ─── Fixtures ───────────────────────────────────────────────────────────────

export const DOMAIN = 'https://redmine.test';

export function testConfig(cacheDir: string, overrides: Partial<RedmineConfig> = {}): RedmineConfig {
  return {
    domain: DOMAIN,
    apiKey: 'test-secret',
    timeoutSeconds: 5,
    transport: 'stdio',
    host: '127.0.0.1',
    port: 8000,
    logLevel: 'error',
    cacheDir,
    ...overrides,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'redmine-mcp-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export const PRIORITIES = [
  { id: 1, name: 'Low' },
  { id: 2, name: 'Normal', is_default: true },
  { id: 3, name: 'High' },
];

export const STATUSES = [
  { id: 1, name: 'New', is_closed: false },
  { id: 2, name: 'In Progress', is_closed: false },
  { id: 5, name: 'Closed', is_closed: true },
  { id: 6, name: 'Rejected', is_closed: true },
];

export const TRACKERS = [
  { id: 1, name: 'Bug' },
  { id: 2, name: 'Feature' },
];

export const ACTIVITIES = [
  { id: 8, name: 'Design' },
  { id: 9, name: 'Development', is_default: true },
];

export const USERS = [
  { id: 5, login: 'jdoe', firstname: 'Jane', lastname: 'Doe', mail: 'jane@example.test', status: 1 },
  { id: 6, login: 'rroe', firstname: 'Rich', lastname: 'Roe', mail: 'rich@example.test', status: 1 },
  { id: 7, login: 'bot', firstname: '', lastname: '', mail: '', status: 1 },
];

/** Registers the five read-only endpoints a cache refresh calls. */
export function withEnumerations(fake: FakeRedmine): FakeRedmine {
  return fake
    .on('GET', '/enumerations/issue_priorities.json', { json: { issue_priorities: PRIORITIES } })
    .on('GET', '/issue_statuses.json', { json: { issue_statuses: STATUSES } })
    .on('GET', '/trackers.json', { json: { trackers: TRACKERS } })
    .on('GET', '/enumerations/time_entry_activities.json', { json: { time_entry_activities: ACTIVITIES } })
    .on('GET', '/users.json', { json: { users: USERS } });
}

export function issuePayload(id: number, overrides: Record<string, unknown> = {}) {
  return {
    id,
    subject: `Issue ${id}`,
    description: '',
    project: { id: 1, name: 'Website' },
    tracker: { id: 1, name: 'Bug' },
    status: { id: 1, name: 'New' },
    priority: { id: 2, name: 'Normal' },
    author: { id: 5, name: 'Jane Doe' },
    done_ratio: 0,
    ...overrides,
  };
}

/** Tool context wired to the fake server. */
export function testContext(fake: FakeRedmine, cacheDir: string, options: { now?: () => number } = {}): ToolContext {
  const config = testConfig(cacheDir);
  return { config, client: createRedmineClient(config, { fetch: fake.fetch, now: options.now }) };
}
