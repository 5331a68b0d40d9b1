// ─── Configuration ──────────────────────────────────────────────────────────

export type Transport = 'stdio' | 'http';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RedmineConfig {
  /** Base URL of the Redmine instance, no trailing slash */
  domain: string;
  apiKey: string;
  timeoutSeconds: number;
  transport: Transport;
  host: string;
  port: number;
  logLevel: LogLevel;
  /** Directory holding the per-domain resolution cache files */
  cacheDir: string;
}

// ─── Resolution Cache ───────────────────────────────────────────────────────

export type EnumerationCategory = 'priorities' | 'statuses' | 'trackers' | 'time_entry_activities';

export type UserCategory = 'users_by_name' | 'users_by_login';

export type ResolutionCategory = EnumerationCategory | UserCategory;

export type NameIndex = Record<string, number>;

export interface ResolutionCacheData {
  domain: string;
  /** Unix epoch seconds of the last successful refresh; 0 for the empty fallback */
  cache_time: number;
  priorities: NameIndex;
  statuses: NameIndex;
  trackers: NameIndex;
  time_entry_activities: NameIndex;
  users_by_name: NameIndex;
  users_by_login: NameIndex;
}

export type CacheState = 'unloaded' | 'fresh' | 'stale' | 'empty';

export interface CacheStatus {
  state: CacheState;
  domain: string;
  filePath: string;
  cachedAt: Date | null;
  counts: Record<ResolutionCategory, number>;
}

export type RefreshResult =
  | { ok: true; data: ResolutionCacheData }
  | { ok: false; reason: string; data: ResolutionCacheData };

// ─── Requests ───────────────────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | Array<string | number> | undefined;

export type QueryParams = Record<string, QueryValue>;

export type JsonObject = Record<string, unknown>;
