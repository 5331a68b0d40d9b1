/**
 * Validation for outgoing payloads and list queries. Runs before a request is sent so that
 * obviously bad input never reaches Redmine.
 */

import { z } from 'zod';
import { RedmineValidationError } from './errors.js';

// ─── Field Rules ────────────────────────────────────────────────────────────

const entityId = z.number().int().positive();
const projectRef = z.union([entityId, z.string().trim().min(1)]);
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a date in YYYY-MM-DD format');
const doneRatio = z.number().int().min(0, 'must be between 0 and 100').max(100, 'must be between 0 and 100');
const hours = z.number().min(0, 'must not be negative');

const customFieldValue = z.object({
  id: entityId,
  value: z.union([z.string(), z.array(z.string())]),
});

export const PROJECT_IDENTIFIER = /^[a-z][a-z0-9_-]*$/;

// ─── Issues ─────────────────────────────────────────────────────────────────

export const issueCreateSchema = z.object({
  project_id: projectRef,
  subject: z.string().trim().min(1, 'must not be empty').max(255),
  description: z.string().optional(),
  tracker_id: entityId.optional(),
  status_id: entityId.optional(),
  priority_id: entityId.optional(),
  assigned_to_id: entityId.optional(),
  parent_issue_id: entityId.optional(),
  start_date: isoDate.optional(),
  due_date: isoDate.optional(),
  estimated_hours: hours.optional(),
  done_ratio: doneRatio.optional(),
  custom_fields: z.array(customFieldValue).optional(),
}).strict();

/**
 * Every updatable attribute is optional. An absent key leaves the field alone; `null` on
 * assigned_to_id / parent_issue_id clears it.
 */
export const issueUpdateSchema = z.object({
  subject: z.string().trim().min(1, 'must not be empty').max(255).optional(),
  description: z.string().optional(),
  status_id: entityId.optional(),
  priority_id: entityId.optional(),
  tracker_id: entityId.optional(),
  assigned_to_id: entityId.nullable().optional(),
  parent_issue_id: entityId.nullable().optional(),
  done_ratio: doneRatio.optional(),
  start_date: isoDate.optional(),
  due_date: isoDate.optional(),
  estimated_hours: hours.optional(),
  notes: z.string().optional(),
  private_notes: z.boolean().optional(),
}).strict();

export const issueQuerySchema = z.object({
  project_id: projectRef.optional(),
  /** numeric ID, or Redmine's "o" (open), "c" (closed), "*" (all) */
  status_id: z.union([entityId, z.enum(['o', 'c', '*'])]).optional(),
  assigned_to_id: z.union([entityId, z.literal('me')]).optional(),
  tracker_id: entityId.optional(),
  priority_id: entityId.optional(),
  author_id: entityId.optional(),
  created_on: z.string().optional(),
  updated_on: z.string().optional(),
  limit: z.number().int().min(1).max(100).default(25),
  offset: z.number().int().min(0).default(0),
  sort: z.string().regex(/^[a-z_]+(:desc|:asc)?(,[a-z_]+(:desc|:asc)?)*$/, 'must look like "field" or "field:desc"').optional(),
  include: z.array(z.string()).optional(),
}).strict();

// ─── Projects ───────────────────────────────────────────────────────────────

export const projectCreateSchema = z.object({
  name: z.string().trim().min(1, 'must not be empty').max(255),
  identifier: z.string().max(100).regex(PROJECT_IDENTIFIER, 'must start with a lowercase letter and contain only a-z, 0-9, - and _'),
  description: z.string().optional(),
  homepage: z.string().optional(),
  is_public: z.boolean().optional(),
  parent_id: entityId.optional(),
  inherit_members: z.boolean().optional(),
  tracker_ids: z.array(entityId).optional(),
  enabled_module_names: z.array(z.string()).optional(),
}).strict();

export const projectUpdateSchema = projectCreateSchema.omit({ identifier: true }).partial().strict();

// ─── Time Entries ───────────────────────────────────────────────────────────

export const timeEntryCreateSchema = z.object({
  issue_id: entityId,
  hours: z.number().positive('must be greater than 0'),
  activity_id: entityId,
  comments: z.string().max(1024).optional(),
  spent_on: isoDate.optional(),
  user_id: entityId.optional(),
}).strict();

export type IssueCreate = z.input<typeof issueCreateSchema>;
export type IssueUpdate = z.input<typeof issueUpdateSchema>;
export type IssueQuery = z.input<typeof issueQuerySchema>;
export type ProjectCreate = z.input<typeof projectCreateSchema>;
export type ProjectUpdate = z.input<typeof projectUpdateSchema>;
export type TimeEntryCreate = z.input<typeof timeEntryCreateSchema>;

// ─── Entry Point ────────────────────────────────────────────────────────────

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });
}

export function validatePayload<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) throw new RedmineValidationError(formatIssues(result.error));
  return result.data;
}
