/**
 * Shapes of the JSON Redmine returns. Decoded payloads are narrowed through these schemas so
 * the rest of the code works with typed entities; unknown fields are dropped.
 */

import { z } from 'zod';
import { RedmineApiError } from './errors.js';

// ─── Building Blocks ────────────────────────────────────────────────────────

const text = z.string().nullish().transform(v => v ?? '');

export const namedRefSchema = z.object({
  id: z.number(),
  name: z.string().default(''),
});

export const enumerationItemSchema = z.object({
  id: z.number(),
  name: z.string(),
  is_default: z.boolean().optional(),
  is_closed: z.boolean().optional(),
  active: z.boolean().optional(),
});

// ─── Issues ─────────────────────────────────────────────────────────────────

export const journalDetailSchema = z.object({
  property: z.string().default(''),
  name: z.string().default(''),
  old_value: z.string().nullish(),
  new_value: z.string().nullish(),
});

export const journalSchema = z.object({
  id: z.number(),
  user: namedRefSchema.optional(),
  notes: text,
  private_notes: z.boolean().default(false),
  created_on: z.string().default(''),
  details: z.array(journalDetailSchema).default([]),
});

export const attachmentSchema = z.object({
  id: z.number(),
  filename: z.string(),
  filesize: z.number().default(0),
  content_type: text,
  description: text,
  content_url: z.string().optional(),
  author: namedRefSchema.optional(),
  created_on: z.string().optional(),
});

export const issueRelationSchema = z.object({
  id: z.number(),
  issue_id: z.number(),
  issue_to_id: z.number(),
  relation_type: z.string(),
  delay: z.number().nullish(),
});

export const childIssueSchema = z.object({
  id: z.number(),
  subject: z.string().optional(),
  tracker: namedRefSchema.optional(),
});

export const issueSchema = z.object({
  id: z.number(),
  subject: z.string(),
  description: text,
  project: namedRefSchema,
  tracker: namedRefSchema,
  status: namedRefSchema,
  priority: namedRefSchema,
  author: namedRefSchema,
  assigned_to: namedRefSchema.nullish(),
  parent: z.object({ id: z.number(), subject: z.string().optional() }).nullish(),
  start_date: z.string().nullish(),
  due_date: z.string().nullish(),
  done_ratio: z.number().default(0),
  estimated_hours: z.number().nullish(),
  created_on: z.string().nullish(),
  updated_on: z.string().nullish(),
  closed_on: z.string().nullish(),
});

export const issueDetailSchema = issueSchema.extend({
  journals: z.array(journalSchema).default([]),
  attachments: z.array(attachmentSchema).default([]),
  children: z.array(childIssueSchema).default([]),
  watchers: z.array(namedRefSchema).default([]),
  relations: z.array(issueRelationSchema).default([]),
});

// ─── Projects & Users ───────────────────────────────────────────────────────

export const projectSchema = z.object({
  id: z.number(),
  name: z.string(),
  identifier: z.string(),
  description: text,
  status: z.number().default(1),
  is_public: z.boolean().optional(),
  parent: namedRefSchema.optional(),
  created_on: z.string().nullish(),
  updated_on: z.string().nullish(),
});

export const customFieldSchema = z.object({
  id: z.number(),
  name: z.string(),
  value: z.union([z.string(), z.array(z.string())]).nullish(),
});

export const userSchema = z.object({
  id: z.number(),
  login: z.string().default(''),
  firstname: z.string().default(''),
  lastname: z.string().default(''),
  mail: z.string().default(''),
  status: z.number().default(1),
  created_on: z.string().nullish(),
  last_login_on: z.string().nullish(),
  groups: z.array(namedRefSchema).default([]),
  custom_fields: z.array(customFieldSchema).default([]),
});

export type NamedRef = z.infer<typeof namedRefSchema>;
export type EnumerationItem = z.infer<typeof enumerationItemSchema>;
export type JournalDetail = z.infer<typeof journalDetailSchema>;
export type Journal = z.infer<typeof journalSchema>;
export type Attachment = z.infer<typeof attachmentSchema>;
export type Issue = z.infer<typeof issueSchema>;
export type IssueDetail = z.infer<typeof issueDetailSchema>;
export type Project = z.infer<typeof projectSchema>;
export type User = z.infer<typeof userSchema>;

// ─── Decoding ───────────────────────────────────────────────────────────────

export function decodeEntity<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const first = result.error.issues[0];
  const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
  throw new RedmineApiError(`Redmine returned an unexpected ${what} payload (${where}${first?.message ?? 'invalid shape'})`);
}

/** Lists default to [] when the key is absent; a present but malformed list is an error. */
export function decodeList<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): Array<z.output<T>> {
  if (value === undefined) return [];
  return decodeEntity(z.array(schema), value, what);
}
