/**
 * Resolution Cache: maps human-readable names (statuses, priorities, trackers, time entry
 * activities, users) to Redmine's numeric IDs.
 *
 * One JSON file per Redmine domain, rebuilt when older than 24 hours or when it was written for a
 * different domain. The in-memory copy wins once loaded; disk is only read on the first load.
 * Refresh is all-or-nothing: a failed refresh keeps the previous entry for this domain if there
 * is one, otherwise it installs an empty entry with cache_time = 0 so the next access retries.
 */

import { createHash, randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { createLogger } from '../log.js';
import { describeError } from './errors.js';
import type {
  CacheStatus,
  NameIndex,
  RefreshResult,
  ResolutionCacheData,
  ResolutionCategory,
} from '../../shared/types.js';

const log = createLogger('cache');

export const CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const USER_SNAPSHOT_LIMIT = 100;

// ─── Source ─────────────────────────────────────────────────────────────────

export interface NamedItem {
  id: number;
  name: string;
}

export interface UserSummary {
  id: number;
  login: string;
  firstname: string;
  lastname: string;
}

/** Read-only enumeration calls. Must never depend on the cache itself. */
export interface EnumerationSource {
  getPriorities(): Promise<NamedItem[]>;
  getIssueStatuses(): Promise<NamedItem[]>;
  getTrackers(): Promise<NamedItem[]>;
  getTimeEntryActivities(): Promise<NamedItem[]>;
  listUsers(options: { limit: number }): Promise<UserSummary[]>;
}

export interface ResolutionCacheOptions {
  domain: string;
  cacheDir: string;
  source: EnumerationSource;
  ttlMs?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

// ─── File Format ────────────────────────────────────────────────────────────

const nameIndexSchema = z.record(z.number());

const cacheDataSchema = z.object({
  domain: z.string(),
  cache_time: z.number(),
  priorities: nameIndexSchema,
  statuses: nameIndexSchema,
  trackers: nameIndexSchema,
  time_entry_activities: nameIndexSchema,
  users_by_name: nameIndexSchema,
  users_by_login: nameIndexSchema,
});

/** First 32 bits of SHA-256, so the same domain always maps to the same file. */
export function domainHash(domain: string): number {
  return parseInt(createHash('sha256').update(domain).digest('hex').slice(0, 8), 16);
}

export function cacheFileName(domain: string): string {
  const safe = domain.replace('://', '_').replace(/\//g, '_').replace(/:/g, '_');
  return `cache_${safe}_${domainHash(domain)}.json`;
}

export function emptyCacheData(domain: string): ResolutionCacheData {
  return {
    domain,
    cache_time: 0,
    priorities: {},
    statuses: {},
    trackers: {},
    time_entry_activities: {},
    users_by_name: {},
    users_by_login: {},
  };
}

function indexByName(items: NamedItem[]): NameIndex {
  const index: NameIndex = {};
  for (const item of items) index[item.name] = item.id;
  return index;
}

function indexUsers(users: UserSummary[]): { byName: NameIndex; byLogin: NameIndex } {
  const byName: NameIndex = {};
  const byLogin: NameIndex = {};
  for (const user of users) {
    const fullName = `${user.firstname} ${user.lastname}`.trim();
    if (fullName) byName[fullName] = user.id;
    if (user.login) byLogin[user.login] = user.id;
  }
  return { byName, byLogin };
}

function lookupIn(index: NameIndex, name: string): number | undefined {
  return Object.hasOwn(index, name) ? index[name] : undefined;
}

// ─── Cache ──────────────────────────────────────────────────────────────────

export class ResolutionCache {
  readonly domain: string;
  readonly filePath: string;
  private source: EnumerationSource;
  private ttlMs: number;
  private now: () => number;
  private data: ResolutionCacheData | null = null;
  private pending: Promise<ResolutionCacheData> | null = null;

  constructor(options: ResolutionCacheOptions) {
    this.domain = options.domain;
    this.filePath = path.join(options.cacheDir, cacheFileName(options.domain));
    this.source = options.source;
    this.ttlMs = options.ttlMs ?? CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /** Returns the current entry, reading disk or refreshing first when needed. */
  async load(): Promise<ResolutionCacheData> {
    if (this.data && !this.needsRefresh(this.data)) return this.data;
    if (!this.pending) {
      this.pending = this.loadOnce().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  async refresh(): Promise<RefreshResult> {
    try {
      const priorities = await this.source.getPriorities();
      const statuses = await this.source.getIssueStatuses();
      const trackers = await this.source.getTrackers();
      const activities = await this.source.getTimeEntryActivities();
      const users = indexUsers(await this.source.listUsers({ limit: USER_SNAPSHOT_LIMIT }));

      const next: ResolutionCacheData = {
        domain: this.domain,
        cache_time: this.now() / 1000,
        priorities: indexByName(priorities),
        statuses: indexByName(statuses),
        trackers: indexByName(trackers),
        time_entry_activities: indexByName(activities),
        users_by_name: users.byName,
        users_by_login: users.byLogin,
      };

      await this.persist(next);
      this.data = next;
      log.debug(`Refreshed ${this.domain} -> ${this.filePath}`);
      return { ok: true, data: next };
    } catch (err) {
      const reason = describeError(err);
      log.warn(`Refresh failed for ${this.domain}: ${reason}`);
      if (!this.data || this.data.domain !== this.domain || this.data.cache_time === 0) {
        this.data = emptyCacheData(this.domain);
      }
      return { ok: false, reason, data: this.data };
    }
  }

  /** A miss is a plain "not found"; it never triggers a refresh on its own. */
  async lookup(category: ResolutionCategory, name: string): Promise<number | undefined> {
    const data = await this.load();
    return lookupIn(data[category], name);
  }

  /** Full display name first, then login. */
  async resolveUser(identifier: string): Promise<number | undefined> {
    const data = await this.load();
    return lookupIn(data.users_by_name, identifier) ?? lookupIn(data.users_by_login, identifier);
  }

  async entries(category: ResolutionCategory): Promise<NameIndex> {
    const data = await this.load();
    return { ...data[category] };
  }

  snapshot(): ResolutionCacheData | null {
    return this.data;
  }

  status(): CacheStatus {
    const data = this.data;
    const count = (category: ResolutionCategory) => (data ? Object.keys(data[category]).length : 0);
    const counts: Record<ResolutionCategory, number> = {
      priorities: count('priorities'),
      statuses: count('statuses'),
      trackers: count('trackers'),
      time_entry_activities: count('time_entry_activities'),
      users_by_name: count('users_by_name'),
      users_by_login: count('users_by_login'),
    };

    let state: CacheStatus['state'] = 'unloaded';
    if (data) state = data.cache_time === 0 ? 'empty' : this.isStale(data) ? 'stale' : 'fresh';

    return {
      state,
      domain: this.domain,
      filePath: this.filePath,
      cachedAt: data && data.cache_time > 0 ? new Date(data.cache_time * 1000) : null,
      counts,
    };
  }

  /** Drops the in-memory copy; the next access reads disk again. */
  reset(): void {
    this.data = null;
    this.pending = null;
  }

  /** Drops the in-memory copy and deletes the file. */
  async clear(): Promise<void> {
    this.reset();
    await rm(this.filePath, { force: true });
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private isStale(data: ResolutionCacheData): boolean {
    return this.now() - data.cache_time * 1000 > this.ttlMs;
  }

  private needsRefresh(data: ResolutionCacheData): boolean {
    return data.cache_time === 0 || this.isStale(data);
  }

  private async loadOnce(): Promise<ResolutionCacheData> {
    if (!this.data) {
      const stored = await this.readStored();
      if (!stored) {
        await this.refresh();
        return this.current();
      }
      if (stored.domain !== this.domain) {
        log.info(`Cache file was built for ${stored.domain}, rebuilding for ${this.domain}`);
        await this.refresh();
        return this.current();
      }
      this.data = stored;
      if (!this.needsRefresh(stored)) return stored;
    }

    await this.refresh();
    return this.current();
  }

  private current(): ResolutionCacheData {
    if (!this.data) this.data = emptyCacheData(this.domain);
    return this.data;
  }

  private async readStored(): Promise<ResolutionCacheData | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch {
      log.debug(`No cache file at ${this.filePath}`);
      return null;
    }

    try {
      const parsed = cacheDataSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      log.warn(`Ignoring malformed cache file ${this.filePath}`);
    } catch (err) {
      log.warn(`Ignoring unreadable cache file ${this.filePath}: ${describeError(err)}`);
    }
    return null;
  }

  private async persist(data: ResolutionCacheData): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    // Unique per write: overlapping refreshes must not rename each other's temp file.
    const tmpPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
    await writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    await rename(tmpPath, this.filePath);
  }
}
