/**
 * Error taxonomy for everything that talks to Redmine.
 *
 * Raw transport failures are classified once, at the request boundary, and translated into a
 * single human-readable message. Higher layers only ever see RedmineApiError.
 */

// ─── Failure Model ──────────────────────────────────────────────────────────

export type ErrorContext = 'request' | 'issue' | 'project' | 'connection' | 'response';

export type TransportFailure =
  | { kind: 'timeout' }
  | { kind: 'connection'; detail?: string }
  | { kind: 'http'; status: number; body?: unknown }
  | { kind: 'decode'; detail?: string }
  | { kind: 'unknown'; detail?: string };

// ─── Error Types ────────────────────────────────────────────────────────────

export class RedmineApiError extends Error {
  readonly statusCode?: number;
  readonly responseData?: unknown;

  constructor(message: string, statusCode?: number, responseData?: unknown) {
    super(message);
    this.name = 'RedmineApiError';
    this.statusCode = statusCode;
    this.responseData = responseData;
  }
}

/** The request succeeded but the expected top-level key was missing. */
export class RedmineNotFoundError extends RedmineApiError {
  constructor(message: string) {
    super(message);
    this.name = 'RedmineNotFoundError';
  }
}

export class RedmineValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '));
    this.name = 'RedmineValidationError';
    this.issues = issues;
  }
}

// ─── Translation ────────────────────────────────────────────────────────────

const SUBJECTS: Record<ErrorContext, string> = {
  request: 'resource',
  issue: 'issue',
  project: 'project',
  connection: 'resource',
  response: 'resource',
};

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function statusHeadline(status: number, subject: string): string {
  switch (status) {
    case 400: return 'Bad request';
    case 401: return 'Authentication failed, check REDMINE_API_KEY';
    case 403: return `Permission denied for this ${subject}`;
    case 404: return `${capitalize(subject)} not found`;
    case 409: return `Conflict while updating this ${subject}`;
    case 422: return `Validation failed for this ${subject}`;
    default:
      return status >= 500 ? 'Redmine server error' : 'Request failed';
  }
}

/** Redmine reports failures as {"errors": ["...", ...]}; anything else is ignored. */
export function extractErrorList(body: unknown): string[] {
  if (typeof body !== 'object' || body === null || !('errors' in body)) return [];
  const errors = body.errors;
  if (!Array.isArray(errors)) return [];
  return errors.filter((e): e is string => typeof e === 'string' && e.trim() !== '');
}

export function translateFailure(failure: TransportFailure, context: ErrorContext): string {
  switch (failure.kind) {
    case 'timeout':
      return 'Request timed out: the Redmine server did not respond in time. Try again later or raise REDMINE_MCP_TIMEOUT.';
    case 'connection':
      return 'Unable to connect to the Redmine server. Check REDMINE_DOMAIN and your network connection.';
    case 'decode':
      return 'Redmine returned a response that could not be decoded as JSON.';
    case 'http': {
      const headline = `${statusHeadline(failure.status, SUBJECTS[context])} (HTTP ${failure.status})`;
      const details = extractErrorList(failure.body);
      return details.length > 0 ? `${headline}: ${details.join('; ')}` : headline;
    }
    case 'unknown':
      return failure.detail ? `Unexpected error while talking to Redmine: ${failure.detail}` : 'Unexpected error while talking to Redmine';
    default:
      return 'Unexpected error while talking to Redmine';
  }
}

export function inferContext(path: string): ErrorContext {
  if (path.includes('/issues')) return 'issue';
  if (path.includes('/projects')) return 'project';
  return 'request';
}

/** Flattens any thrown value into a message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
