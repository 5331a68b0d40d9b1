import { apiHeaders } from '../config.js';
import { createLogger } from '../log.js';
import type { HttpMethod, JsonObject, QueryParams } from '../../shared/types.js';
import {
  RedmineApiError,
  describeError,
  inferContext,
  translateFailure,
  type ErrorContext,
  type TransportFailure,
} from './errors.js';

const log = createLogger('redmine');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestExecutorOptions {
  baseUrl: string;
  apiKey: string;
  timeoutSeconds: number;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}

export interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
}

export interface DownloadResult {
  content: Buffer;
  contentType?: string;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const url = `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  if (!query) return url;

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    params.append(key, Array.isArray(value) ? value.join(',') : String(value));
  }
  const qs = params.toString();
  return qs ? `${url}?${qs}` : url;
}

function hasName(err: unknown, ...names: string[]): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string' && names.includes(err.name);
}

/** undici reports network failures as TypeError('fetch failed') with the socket error as cause. */
function connectionDetail(err: TypeError): string {
  const cause: unknown = err.cause;
  return cause === undefined ? err.message : describeError(cause);
}

export function classifyError(err: unknown): TransportFailure {
  if (hasName(err, 'TimeoutError', 'AbortError')) return { kind: 'timeout' };
  if (err instanceof TypeError) return { kind: 'connection', detail: connectionDetail(err) };
  return { kind: 'unknown', detail: describeError(err) };
}

function parseJsonQuietly(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ─── Executor ───────────────────────────────────────────────────────────────

/**
 * Issues HTTP calls against the Redmine base URL. This is the only place that performs network
 * I/O, so every failure is translated the same way.
 */
export class RequestExecutor {
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: RequestExecutorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutSeconds * 1000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async execute(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<JsonObject> {
    const url = buildUrl(this.baseUrl, path, options.query);
    log.debug(`${method} ${url}`);

    const response = await this.send(url, {
      method,
      headers: apiHeaders({ apiKey: this.apiKey }),
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const text = await this.read(response, r => r.text());

    if (!response.ok) {
      const body = parseJsonQuietly(text);
      const message = translateFailure({ kind: 'http', status: response.status, body }, inferContext(path));
      log.debug(`${method} ${url} -> ${response.status}`);
      throw new RedmineApiError(message, response.status, body);
    }

    if (!text.trim()) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new RedmineApiError(translateFailure({ kind: 'decode', detail: describeError(err) }, 'response'));
    }
    if (!isJsonObject(parsed)) {
      throw new RedmineApiError(translateFailure({ kind: 'decode', detail: 'expected a JSON object' }, 'response'));
    }
    return parsed;
  }

  /** Fetches binary content from an absolute URL (attachment downloads). */
  async download(url: string): Promise<DownloadResult> {
    log.debug(`GET ${url} (binary)`);
    const response = await this.send(url, { method: 'GET', headers: { 'X-Redmine-API-Key': this.apiKey } });

    if (!response.ok) {
      const body = parseJsonQuietly(await this.read(response, r => r.text()));
      throw new RedmineApiError(translateFailure({ kind: 'http', status: response.status, body }, 'request'), response.status, body);
    }

    const content = Buffer.from(await this.read(response, r => r.arrayBuffer()));
    return { content, contentType: response.headers.get('content-type') ?? undefined };
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw this.toApiError(err, url);
    }
  }

  /** The body stream is still under the request's timeout signal. */
  private async read<T>(response: Response, reader: (r: Response) => Promise<T>): Promise<T> {
    try {
      return await reader(response);
    } catch (err) {
      throw this.toApiError(err, response.url);
    }
  }

  private toApiError(err: unknown, url: string): RedmineApiError {
    const failure = classifyError(err);
    const context: ErrorContext = failure.kind === 'connection' ? 'connection' : 'request';
    log.warn(`Request to ${url} failed (${failure.kind}): ${describeError(err)}`);
    return new RedmineApiError(translateFailure(failure, context));
  }
}
