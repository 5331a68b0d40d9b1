import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import path from 'path';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  CACHE_TTL_MS,
  ResolutionCache,
  cacheFileName,
  domainHash,
  emptyCacheData,
  type EnumerationSource,
} from '../../../server/redmine/cache.js';
import { RedmineApiError } from '../../../server/redmine/errors.js';
import { setLogLevel } from '../../../server/log.js';
import type { ResolutionCacheData } from '../../../shared/types.js';
import {
  ACTIVITIES,
  DOMAIN,
  PRIORITIES,
  STATUSES,
  TRACKERS,
  USERS,
  makeTempDir,
  removeTempDir,
} from '../../helpers/fake-redmine.js';

const HOUR_MS = 60 * 60 * 1000;
const START_MS = Date.UTC(2026, 0, 10, 12, 0, 0);

function workingSource() {
  return {
    getPriorities: vi.fn(async () => PRIORITIES),
    getIssueStatuses: vi.fn(async () => STATUSES),
    getTrackers: vi.fn(async () => TRACKERS),
    getTimeEntryActivities: vi.fn(async () => ACTIVITIES),
    listUsers: vi.fn(async (_options: { limit: number }) => USERS),
  } satisfies EnumerationSource;
}

function brokenSource() {
  const source = workingSource();
  source.getPriorities.mockRejectedValue(new RedmineApiError('Unable to connect to the Redmine server.'));
  return source;
}

function storedData(overrides: Partial<ResolutionCacheData>): ResolutionCacheData {
  return { ...emptyCacheData(DOMAIN), cache_time: START_MS / 1000, ...overrides };
}

describe('cache file naming', () => {
  it('derives a stable file name from the domain', () => {
    expect(domainHash(DOMAIN)).toBe(1885166550);
    expect(cacheFileName(DOMAIN)).toBe('cache_https_redmine.test_1885166550.json');
    expect(cacheFileName('http://localhost:3000/redmine')).toBe('cache_http_localhost_3000_redmine_2429768308.json');
  });
});

describe('ResolutionCache', () => {
  let dir: string;
  let nowMs: number;

  beforeAll(() => setLogLevel('error'));

  beforeEach(async () => {
    dir = await makeTempDir();
    nowMs = START_MS;
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function createCache(source: EnumerationSource, domain = DOMAIN): ResolutionCache {
    return new ResolutionCache({ domain, cacheDir: dir, source, now: () => nowMs });
  }

  async function writeCacheFile(cache: ResolutionCache, data: unknown): Promise<void> {
    await mkdir(path.dirname(cache.filePath), { recursive: true });
    await writeFile(cache.filePath, JSON.stringify(data), 'utf-8');
  }

  // ─── Refresh ────────────────────────────────────────────────────────────

  it('resolves every enumerated name to the ID the server reported', async () => {
    const cache = createCache(workingSource());

    for (const p of PRIORITIES) expect(await cache.lookup('priorities', p.name)).toBe(p.id);
    for (const s of STATUSES) expect(await cache.lookup('statuses', s.name)).toBe(s.id);
    for (const t of TRACKERS) expect(await cache.lookup('trackers', t.name)).toBe(t.id);
    for (const a of ACTIVITIES) expect(await cache.lookup('time_entry_activities', a.name)).toBe(a.id);
  });

  it('indexes users by full name and by login, skipping blank names', async () => {
    const cache = createCache(workingSource());
    const data = await cache.load();

    expect(data.users_by_name).toEqual({ 'Jane Doe': 5, 'Rich Roe': 6 });
    expect(data.users_by_login).toEqual({ jdoe: 5, rroe: 6, bot: 7 });
    expect(await cache.resolveUser('Jane Doe')).toBe(5);
    expect(await cache.resolveUser('bot')).toBe(7);
    expect(await cache.resolveUser('nobody')).toBeUndefined();
  });

  it('asks for one page of 100 users', async () => {
    const source = workingSource();
    await createCache(source).load();
    expect(source.listUsers).toHaveBeenCalledWith({ limit: 100 });
  });

  it('stamps the entry with the refresh time in epoch seconds', async () => {
    const data = await createCache(workingSource()).load();
    expect(data.domain).toBe(DOMAIN);
    expect(data.cache_time).toBe(START_MS / 1000);
  });

  it('writes the refreshed entry to disk', async () => {
    const cache = createCache(workingSource());
    const data = await cache.load();
    const onDisk: unknown = JSON.parse(await readFile(cache.filePath, 'utf-8'));
    expect(onDisk).toEqual(data);
  });

  it('resolves the statuses a tracker reports', async () => {
    const source = workingSource();
    source.getIssueStatuses.mockResolvedValue([{ id: 1, name: 'New', is_closed: false }, { id: 5, name: 'Closed', is_closed: true }]);
    const cache = createCache(source);

    expect(await cache.lookup('statuses', 'Closed')).toBe(5);
    expect(await cache.lookup('statuses', 'Unknown')).toBeUndefined();
  });

  // ─── Lookups ────────────────────────────────────────────────────────────

  it('does not refresh on a miss', async () => {
    const source = workingSource();
    const cache = createCache(source);
    await cache.load();
    expect(source.getPriorities).toHaveBeenCalledTimes(1);

    expect(await cache.lookup('priorities', 'Blocker')).toBeUndefined();
    expect(await cache.lookup('statuses', 'constructor')).toBeUndefined();
    expect(source.getPriorities).toHaveBeenCalledTimes(1);
  });

  it('shares one refresh between concurrent first lookups', async () => {
    const source = workingSource();
    const cache = createCache(source);

    const ids = await Promise.all([
      cache.lookup('statuses', 'Closed'),
      cache.lookup('trackers', 'Bug'),
      cache.lookup('priorities', 'High'),
    ]);

    expect(ids).toEqual([5, 1, 3]);
    expect(source.getPriorities).toHaveBeenCalledTimes(1);
  });

  it('completes overlapping refreshes and leaves one readable file', async () => {
    const cache = createCache(workingSource());

    const results = await Promise.all([cache.refresh(), cache.refresh()]);

    expect(results.map(r => r.ok)).toEqual([true, true]);
    const stored = JSON.parse(await readFile(cache.filePath, 'utf-8'));
    expect(stored.domain).toBe(DOMAIN);
    expect(stored.trackers).toEqual({ Bug: 1, Feature: 2 });
    expect((await readdir(dir)).filter(name => name.endsWith('.tmp'))).toEqual([]);
  });

  it('returns copies from entries()', async () => {
    const cache = createCache(workingSource());
    const trackers = await cache.entries('trackers');
    trackers.Bug = 99;
    expect(await cache.lookup('trackers', 'Bug')).toBe(1);
  });

  // ─── Disk ───────────────────────────────────────────────────────────────

  it('serves a fresh file without refreshing', async () => {
    const source = workingSource();
    const cache = createCache(source);
    await writeCacheFile(cache, storedData({ statuses: { Legacy: 42 }, cache_time: (START_MS - HOUR_MS) / 1000 }));

    expect(await cache.lookup('statuses', 'Legacy')).toBe(42);
    expect(source.getPriorities).not.toHaveBeenCalled();
    expect(cache.status().state).toBe('fresh');
  });

  it('rebuilds a file written for another domain before serving anything', async () => {
    const source = workingSource();
    const cache = createCache(source);
    await writeCacheFile(cache, storedData({ domain: 'https://other.test', statuses: { Legacy: 42 } }));

    expect(await cache.lookup('statuses', 'Legacy')).toBeUndefined();
    expect(await cache.lookup('statuses', 'Closed')).toBe(5);
    expect(source.getPriorities).toHaveBeenCalledTimes(1);
    expect(cache.snapshot()?.domain).toBe(DOMAIN);
  });

  it('never serves another domain\'s data when the rebuild fails', async () => {
    const cache = createCache(brokenSource());
    await writeCacheFile(cache, storedData({ domain: 'https://other.test', statuses: { Legacy: 42 } }));

    expect(await cache.lookup('statuses', 'Legacy')).toBeUndefined();
    expect(cache.snapshot()).toEqual(emptyCacheData(DOMAIN));
    expect(cache.status().state).toBe('empty');
  });

  it('refreshes a file older than the TTL', async () => {
    const source = workingSource();
    const cache = createCache(source);
    await writeCacheFile(cache, storedData({
      statuses: { Legacy: 42 },
      cache_time: (START_MS - CACHE_TTL_MS - HOUR_MS) / 1000,
    }));

    expect(await cache.lookup('statuses', 'Legacy')).toBeUndefined();
    expect(await cache.lookup('statuses', 'Closed')).toBe(5);
    expect(source.getPriorities).toHaveBeenCalledTimes(1);
  });

  it('keeps serving stale values when the refresh fails', async () => {
    const source = brokenSource();
    const cache = createCache(source);
    const staleTime = (START_MS - CACHE_TTL_MS - HOUR_MS) / 1000;
    await writeCacheFile(cache, storedData({ statuses: { Legacy: 42 }, cache_time: staleTime }));

    expect(await cache.lookup('statuses', 'Legacy')).toBe(42);
    expect(source.getPriorities).toHaveBeenCalledTimes(1);
    expect(cache.snapshot()?.cache_time).toBe(staleTime);
    expect(cache.status().state).toBe('stale');
  });

  it('installs an empty cache when the first refresh fails', async () => {
    const cache = createCache(brokenSource());

    expect(await cache.lookup('statuses', 'Closed')).toBeUndefined();
    expect(cache.snapshot()).toEqual(emptyCacheData(DOMAIN));
    expect(cache.snapshot()?.cache_time).toBe(0);
    await expect(stat(cache.filePath)).rejects.toThrow();
  });

  it('retries an empty cache on the next access', async () => {
    const source = brokenSource();
    const cache = createCache(source);
    expect(await cache.lookup('statuses', 'Closed')).toBeUndefined();

    source.getPriorities.mockResolvedValue(PRIORITIES);
    expect(await cache.lookup('statuses', 'Closed')).toBe(5);
    expect(source.getPriorities).toHaveBeenCalledTimes(2);
  });

  it('refreshes an in-memory entry once it ages past the TTL', async () => {
    const source = workingSource();
    const cache = createCache(source);
    await cache.load();

    nowMs += CACHE_TTL_MS + HOUR_MS;
    await cache.lookup('statuses', 'Closed');

    expect(source.getPriorities).toHaveBeenCalledTimes(2);
    expect(cache.snapshot()?.cache_time).toBe(nowMs / 1000);
  });

  it('rebuilds when the file is malformed', async () => {
    const source = workingSource();
    const cache = createCache(source);
    await mkdir(dir, { recursive: true });
    await writeFile(cache.filePath, '{ not json', 'utf-8');

    expect(await cache.lookup('trackers', 'Feature')).toBe(2);
    expect(source.getPriorities).toHaveBeenCalledTimes(1);
  });

  it('rebuilds when the file has the wrong shape', async () => {
    const source = workingSource();
    const cache = createCache(source);
    await writeCacheFile(cache, { domain: DOMAIN, cache_time: 'yesterday' });

    expect(await cache.lookup('trackers', 'Feature')).toBe(2);
    expect(source.getPriorities).toHaveBeenCalledTimes(1);
  });

  it('round-trips through disk into a new instance', async () => {
    const first = createCache(workingSource());
    const written = await first.load();

    const second = brokenSource();
    const reloaded = await createCache(second).load();

    expect(reloaded).toEqual(written);
    expect(second.getPriorities).not.toHaveBeenCalled();
  });

  // ─── Refresh Semantics ──────────────────────────────────────────────────

  it('abandons a partial refresh and keeps the previous entry', async () => {
    const source = workingSource();
    const cache = createCache(source);
    const before = await cache.load();
    const fileBefore = await readFile(cache.filePath, 'utf-8');

    source.getIssueStatuses.mockResolvedValue([{ id: 77, name: 'Triaged', is_closed: false }]);
    source.listUsers.mockRejectedValue(new RedmineApiError('Permission denied for this resource (HTTP 403)', 403));
    nowMs += HOUR_MS;

    const result = await cache.refresh();

    expect(result).toEqual({ ok: false, reason: 'Permission denied for this resource (HTTP 403)', data: before });
    expect(cache.snapshot()).toBe(before);
    expect(await cache.lookup('statuses', 'Triaged')).toBeUndefined();
    expect(await readFile(cache.filePath, 'utf-8')).toBe(fileBefore);
  });

  it('reports a successful refresh', async () => {
    const cache = createCache(workingSource());
    const result = await cache.refresh();
    expect(result.ok).toBe(true);
    expect(result.data.trackers).toEqual({ Bug: 1, Feature: 2 });
  });

  // ─── Status & Reset ─────────────────────────────────────────────────────

  it('describes its state and counts', async () => {
    const cache = createCache(workingSource());
    expect(cache.status()).toEqual({
      state: 'unloaded',
      domain: DOMAIN,
      filePath: path.join(dir, cacheFileName(DOMAIN)),
      cachedAt: null,
      counts: {
        priorities: 0,
        statuses: 0,
        trackers: 0,
        time_entry_activities: 0,
        users_by_name: 0,
        users_by_login: 0,
      },
    });

    await cache.load();
    const status = cache.status();
    expect(status.state).toBe('fresh');
    expect(status.cachedAt).toEqual(new Date(START_MS));
    expect(status.counts).toEqual({
      priorities: 3,
      statuses: 4,
      trackers: 2,
      time_entry_activities: 2,
      users_by_name: 2,
      users_by_login: 3,
    });
  });

  it('re-reads disk after reset()', async () => {
    const source = workingSource();
    const cache = createCache(source);
    await cache.load();
    await writeCacheFile(cache, storedData({ trackers: { Support: 3 } }));

    cache.reset();

    expect(await cache.lookup('trackers', 'Support')).toBe(3);
    expect(source.getPriorities).toHaveBeenCalledTimes(1);
  });

  it('deletes the file on clear()', async () => {
    const cache = createCache(workingSource());
    await cache.load();
    await cache.clear();

    await expect(stat(cache.filePath)).rejects.toThrow();
    expect(cache.status().state).toBe('unloaded');
  });
});
