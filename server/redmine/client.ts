import { z } from 'zod';
import { createLogger } from '../log.js';
import type { JsonObject, NameIndex, RedmineConfig, RefreshResult, ResolutionCategory } from '../../shared/types.js';
import { ResolutionCache, type EnumerationSource } from './cache.js';
import { RedmineApiError, RedmineNotFoundError, RedmineValidationError } from './errors.js';
import { RequestExecutor, type FetchLike } from './request.js';
import {
  attachmentSchema,
  decodeEntity,
  decodeList,
  enumerationItemSchema,
  issueDetailSchema,
  issueSchema,
  projectSchema,
  userSchema,
  type Attachment,
  type EnumerationItem,
  type Issue,
  type IssueDetail,
  type Journal,
  type Project,
  type User,
} from './schemas.js';
import {
  issueCreateSchema,
  issueQuerySchema,
  issueUpdateSchema,
  projectCreateSchema,
  projectUpdateSchema,
  timeEntryCreateSchema,
  validatePayload,
  type IssueCreate,
  type IssueQuery,
  type IssueUpdate,
  type ProjectCreate,
  type ProjectUpdate,
  type TimeEntryCreate,
} from './validation.js';

const log = createLogger('redmine');

const createdSchema = z.object({ id: z.number() });

export type ProjectRef = number | string;

/** 'users' resolves by full name first, then by login. */
export type ResolvableCategory = ResolutionCategory | 'users';

export interface RedmineClientOptions {
  fetch?: FetchLike;
  /** Epoch milliseconds; drives cache ages and default dates */
  now?: () => number;
}

export interface UserListOptions {
  limit?: number;
  offset?: number;
  /** 1 active, 2 registered, 3 locked */
  status?: number;
}

export interface DownloadedAttachment {
  content: Buffer;
  contentType?: string;
  attachment: Attachment;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function includeParam(include?: string[]): string | undefined {
  return include && include.length > 0 ? include.join(',') : undefined;
}

/** A successful response without the expected top-level key means the entity is not there. */
function requireKey(response: JsonObject, key: string, missing: string): unknown {
  const value = response[key];
  if (value === undefined || value === null) throw new RedmineNotFoundError(missing);
  return value;
}

function validated<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  try {
    return validatePayload(schema, data);
  } catch (err) {
    if (err instanceof RedmineValidationError) throw new RedmineApiError(`Invalid ${what}: ${err.message}`);
    throw err;
  }
}

/** Drops absent fields; null means "clear this field", which Redmine spells as "". */
function toUpdateBody(patch: Record<string, unknown>): JsonObject {
  const body: JsonObject = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    body[key] = value === null ? '' : value;
  }
  return body;
}

/** YYYY-MM-DD in the local time zone. */
export function localDate(epochMs: number): string {
  const d = new Date(epochMs);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

function compact(payload: Record<string, unknown>): JsonObject {
  return Object.fromEntries(Object.entries(payload).filter(([, v]) => v !== undefined));
}

// ─── Client ─────────────────────────────────────────────────────────────────

export class RedmineClient implements EnumerationSource {
  readonly config: RedmineConfig;
  readonly executor: RequestExecutor;
  readonly cache: ResolutionCache;
  private now: () => number;

  constructor(config: RedmineConfig, options: RedmineClientOptions = {}) {
    this.config = config;
    this.now = options.now ?? Date.now;
    this.executor = new RequestExecutor({
      baseUrl: config.domain,
      apiKey: config.apiKey,
      timeoutSeconds: config.timeoutSeconds,
      fetch: options.fetch,
    });
    this.cache = new ResolutionCache({
      domain: config.domain,
      cacheDir: config.cacheDir,
      source: this,
      now: this.now,
    });
  }

  // ─── Issues ─────────────────────────────────────────────────────────────

  async getIssue(issueId: number, include?: string[]): Promise<IssueDetail> {
    const response = await this.executor.execute('GET', `/issues/${issueId}.json`, {
      query: { include: includeParam(include) },
    });
    return decodeEntity(issueDetailSchema, requireKey(response, 'issue', `Issue ${issueId} does not exist`), 'issue');
  }

  async listIssues(query: IssueQuery = {}): Promise<Issue[]> {
    const { include, ...params } = validated(issueQuerySchema, query, 'issue query');
    const response = await this.executor.execute('GET', '/issues.json', {
      query: { ...params, include: includeParam(include) },
    });
    return decodeList(issueSchema, response.issues, 'issue list');
  }

  async createIssue(input: IssueCreate): Promise<number> {
    const payload = compact(validated(issueCreateSchema, input, 'issue data'));
    const response = await this.executor.execute('POST', '/issues.json', { body: { issue: payload } });
    const issue = requireKey(response, 'issue', 'Creating the issue failed: the response contained no issue');
    return decodeEntity(createdSchema, issue, 'issue').id;
  }

  async updateIssue(issueId: number, patch: IssueUpdate): Promise<void> {
    const body = toUpdateBody(validated(issueUpdateSchema, patch, 'issue update'));
    if (Object.keys(body).length === 0) throw new RedmineApiError('No fields provided to update');
    await this.executor.execute('PUT', `/issues/${issueId}.json`, { body: { issue: body } });
  }

  async deleteIssue(issueId: number): Promise<void> {
    await this.executor.execute('DELETE', `/issues/${issueId}.json`);
  }

  async addWatcher(issueId: number, userId: number): Promise<void> {
    await this.executor.execute('POST', `/issues/${issueId}/watchers.json`, { body: { user_id: userId } });
  }

  async removeWatcher(issueId: number, userId: number): Promise<void> {
    await this.executor.execute('DELETE', `/issues/${issueId}/watchers/${userId}.json`);
  }

  async getIssueJournals(issueId: number): Promise<Journal[]> {
    const issue = await this.getIssue(issueId, ['journals']);
    return issue.journals;
  }

  // ─── Projects ───────────────────────────────────────────────────────────

  async getProject(projectId: ProjectRef, include?: string[]): Promise<Project> {
    const response = await this.executor.execute('GET', `/projects/${projectId}.json`, {
      query: { include: includeParam(include) },
    });
    return decodeEntity(projectSchema, requireKey(response, 'project', `Project ${projectId} does not exist`), 'project');
  }

  async listProjects(options: { limit?: number; offset?: number } = {}): Promise<Project[]> {
    const response = await this.executor.execute('GET', '/projects.json', {
      query: { limit: clamp(options.limit ?? 100, 1, 100), offset: Math.max(options.offset ?? 0, 0) },
    });
    return decodeList(projectSchema, response.projects, 'project list');
  }

  async createProject(input: ProjectCreate): Promise<number> {
    const payload = compact(validated(projectCreateSchema, input, 'project data'));
    const response = await this.executor.execute('POST', '/projects.json', { body: { project: payload } });
    const project = requireKey(response, 'project', 'Creating the project failed: the response contained no project');
    return decodeEntity(createdSchema, project, 'project').id;
  }

  async updateProject(projectId: ProjectRef, patch: ProjectUpdate): Promise<void> {
    const body = toUpdateBody(validated(projectUpdateSchema, patch, 'project update'));
    if (Object.keys(body).length === 0) throw new RedmineApiError('No fields provided to update');
    await this.executor.execute('PUT', `/projects/${projectId}.json`, { body: { project: body } });
  }

  async deleteProject(projectId: ProjectRef): Promise<void> {
    await this.executor.execute('DELETE', `/projects/${projectId}.json`);
  }

  async archiveProject(projectId: ProjectRef): Promise<void> {
    await this.executor.execute('PUT', `/projects/${projectId}/archive.json`);
  }

  async unarchiveProject(projectId: ProjectRef): Promise<void> {
    await this.executor.execute('PUT', `/projects/${projectId}/unarchive.json`);
  }

  // ─── Enumerations ───────────────────────────────────────────────────────

  async getIssueStatuses(): Promise<EnumerationItem[]> {
    const response = await this.executor.execute('GET', '/issue_statuses.json');
    return decodeList(enumerationItemSchema, response.issue_statuses, 'issue status list');
  }

  async getPriorities(): Promise<EnumerationItem[]> {
    const response = await this.executor.execute('GET', '/enumerations/issue_priorities.json');
    return decodeList(enumerationItemSchema, response.issue_priorities, 'priority list');
  }

  async getTrackers(): Promise<EnumerationItem[]> {
    const response = await this.executor.execute('GET', '/trackers.json');
    return decodeList(enumerationItemSchema, response.trackers, 'tracker list');
  }

  async getTimeEntryActivities(): Promise<EnumerationItem[]> {
    const response = await this.executor.execute('GET', '/enumerations/time_entry_activities.json');
    return decodeList(enumerationItemSchema, response.time_entry_activities, 'time entry activity list');
  }

  async getDocumentCategories(): Promise<EnumerationItem[]> {
    const response = await this.executor.execute('GET', '/enumerations/document_categories.json');
    return decodeList(enumerationItemSchema, response.document_categories, 'document category list');
  }

  // ─── Users ──────────────────────────────────────────────────────────────

  async listUsers(options: UserListOptions = {}): Promise<User[]> {
    const response = await this.executor.execute('GET', '/users.json', {
      query: {
        limit: clamp(options.limit ?? 20, 1, 100),
        offset: Math.max(options.offset ?? 0, 0),
        status: options.status,
      },
    });
    return decodeList(userSchema, response.users, 'user list');
  }

  /** Matches login, first name, last name and mail on the server side. */
  async searchUsers(query: string, limit = 10): Promise<User[]> {
    const name = query.trim();
    if (!name) return [];
    const response = await this.executor.execute('GET', '/users.json', {
      query: { name, limit: clamp(limit, 1, 50) },
    });
    return decodeList(userSchema, response.users, 'user list');
  }

  async getUser(userId: number, include?: string[]): Promise<User> {
    const response = await this.executor.execute('GET', `/users/${userId}.json`, {
      query: { include: includeParam(include) },
    });
    return decodeEntity(userSchema, requireKey(response, 'user', `User ${userId} does not exist`), 'user');
  }

  async getCurrentUser(): Promise<User> {
    const response = await this.executor.execute('GET', '/my/account.json');
    return decodeEntity(userSchema, requireKey(response, 'user', 'Unable to load the current user'), 'user');
  }

  // ─── Time Entries ───────────────────────────────────────────────────────

  /** Resolves to the new entry's ID and the date it was booked on. */
  async createTimeEntry(input: TimeEntryCreate): Promise<{ id: number; spent_on: string }> {
    const entry = validated(timeEntryCreateSchema, input, 'time entry');
    const spentOn = entry.spent_on ?? localDate(this.now());
    const payload = compact({
      ...entry,
      comments: entry.comments ? entry.comments : undefined,
      spent_on: spentOn,
    });
    const response = await this.executor.execute('POST', '/time_entries.json', { body: { time_entry: payload } });
    const created = requireKey(response, 'time_entry', 'Creating the time entry failed: the response contained no time entry');
    return { id: decodeEntity(createdSchema, created, 'time entry').id, spent_on: spentOn };
  }

  // ─── Attachments ────────────────────────────────────────────────────────

  async getAttachment(attachmentId: number): Promise<Attachment> {
    const response = await this.executor.execute('GET', `/attachments/${attachmentId}.json`);
    return decodeEntity(attachmentSchema, requireKey(response, 'attachment', `Attachment ${attachmentId} does not exist`), 'attachment');
  }

  async downloadAttachment(attachmentId: number): Promise<DownloadedAttachment> {
    const attachment = await this.getAttachment(attachmentId);
    if (!attachment.content_url) throw new RedmineApiError(`Attachment ${attachmentId} has no download URL`);
    const { content, contentType } = await this.executor.download(attachment.content_url);
    return { content, contentType, attachment };
  }

  // ─── Connection ─────────────────────────────────────────────────────────

  async testConnection(): Promise<boolean> {
    try {
      const response = await this.executor.execute('GET', '/my/account.json');
      return 'user' in response;
    } catch (err) {
      if (err instanceof RedmineApiError) {
        log.debug(`Connection test failed: ${err.message}`);
        return false;
      }
      throw err;
    }
  }

  // ─── Name Resolution ────────────────────────────────────────────────────

  /** The one resolution step every name-accepting operation goes through. */
  async resolveId(category: ResolvableCategory, name: string): Promise<number | undefined> {
    if (category === 'users') return this.cache.resolveUser(name);
    return this.cache.lookup(category, name);
  }

  findPriorityId(name: string): Promise<number | undefined> {
    return this.resolveId('priorities', name);
  }

  findStatusId(name: string): Promise<number | undefined> {
    return this.resolveId('statuses', name);
  }

  findTrackerId(name: string): Promise<number | undefined> {
    return this.resolveId('trackers', name);
  }

  findTimeEntryActivityId(name: string): Promise<number | undefined> {
    return this.resolveId('time_entry_activities', name);
  }

  findUserIdByName(name: string): Promise<number | undefined> {
    return this.resolveId('users_by_name', name);
  }

  findUserIdByLogin(login: string): Promise<number | undefined> {
    return this.resolveId('users_by_login', login);
  }

  findUserId(identifier: string): Promise<number | undefined> {
    return this.resolveId('users', identifier);
  }

  availableOptions(category: ResolutionCategory): Promise<NameIndex> {
    return this.cache.entries(category);
  }

  async availableUsers(): Promise<{ byName: NameIndex; byLogin: NameIndex }> {
    return {
      byName: await this.cache.entries('users_by_name'),
      byLogin: await this.cache.entries('users_by_login'),
    };
  }

  refreshCache(): Promise<RefreshResult> {
    return this.cache.refresh();
  }
}

export function createRedmineClient(config: RedmineConfig, options: RedmineClientOptions = {}): RedmineClient {
  return new RedmineClient(config, options);
}
