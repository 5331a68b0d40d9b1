import { z } from 'zod';
import { RedmineApiError } from '../redmine/errors.js';
import type { IssueUpdate } from '../redmine/validation.js';
import { bullets, formatIssue, fullName, issueList, refName, table } from './format.js';
import { resolveNamed } from './resolve.js';
import { ToolInputError, defineTool, type ToolModule } from './types.js';

// ─── Shared Parameters ──────────────────────────────────────────────────────

const issueId = z.number().int().positive().describe('Issue ID');
const projectRef = z.union([z.number().int().positive(), z.string().min(1)]).describe('Project ID or identifier');
const statusFilter = z.enum(['open', 'closed', 'all']).default('open').describe('Which issues to include: open, closed or all');
const listLimit = z.number().int().min(1).max(100).default(20).describe('Maximum number of issues (1-100)');
const optionalText = z.string().optional();

export type StatusFilter = 'open' | 'closed' | 'all';

export function statusParam(filter: StatusFilter): 'o' | 'c' | undefined {
  if (filter === 'open') return 'o';
  if (filter === 'closed') return 'c';
  return undefined;
}

function withNotes(lines: string[], notes: string | undefined): string {
  const text = notes?.trim();
  if (text) lines.push(`Notes: ${text}`);
  return lines.join('\n');
}

// ─── Tools ──────────────────────────────────────────────────────────────────

export const issueTools: ToolModule = {
  domain: 'issues',
  tools: [
    defineTool({
      name: 'get_issue',
      label: 'Fetching issue',
      description: 'Get one issue with its description, and optionally its history, attachments, subtasks, relations and watchers',
      inputSchema: {
        issue_id: issueId,
        include_details: z.boolean().default(true).describe('Include journals, attachments, subtasks, relations and watchers'),
      },
      readOnly: true,
      execute: async ({ issue_id, include_details }, { client }) => {
        const include = include_details ? ['journals', 'attachments', 'children', 'relations', 'watchers'] : undefined;
        return formatIssue(await client.getIssue(issue_id, include));
      },
    }),
    defineTool({
      name: 'list_project_issues',
      label: 'Listing project issues',
      description: 'List the issues of a project, most recently updated first',
      inputSchema: {
        project_id: projectRef,
        status_filter: statusFilter,
        limit: listLimit,
      },
      readOnly: true,
      execute: async ({ project_id, status_filter, limit }, { client }) => {
        const issues = await client.listIssues({
          project_id,
          status_id: statusParam(status_filter),
          limit,
          sort: 'updated_on:desc',
        });
        const project = issues[0]?.project.name ?? `project ${project_id}`;
        if (issues.length === 0) return `No ${status_filter === 'all' ? '' : `${status_filter} `}issues found in ${project}.`;
        return issueList(`Issues in ${project} [${status_filter}]`, issues);
      },
    }),
    defineTool({
      name: 'search_issues',
      label: 'Searching issues',
      description: 'Find issues whose subject or description contains a keyword (case-insensitive), optionally within one project',
      inputSchema: {
        query: z.string().describe('Keyword to look for'),
        project_id: projectRef.optional(),
        limit: z.number().int().min(1).max(50).default(10).describe('Maximum number of matches (1-50)'),
      },
      readOnly: true,
      execute: async ({ query, project_id, limit }, { client }) => {
        const keyword = query.trim();
        if (!keyword) throw new ToolInputError('Provide a keyword to search for.');

        // Redmine's issue API has no text search; scan recent issues locally.
        const candidates = await client.listIssues({
          project_id,
          limit: Math.min(limit * 3, 100),
          sort: 'updated_on:desc',
        });
        const needle = keyword.toLowerCase();
        const matches = candidates
          .filter(issue => issue.subject.toLowerCase().includes(needle) || issue.description.toLowerCase().includes(needle))
          .slice(0, limit);

        const scope = project_id === undefined ? 'any accessible project' : `project ${project_id}`;
        if (matches.length === 0) return `No issues in ${scope} mention "${keyword}".`;
        const rows = table(
          [['ID', 7], ['Status', 12], ['Project', 20], ['Subject', 60]],
          matches.map(issue => [`#${issue.id}`, issue.status.name, issue.project.name, issue.subject]),
        );
        return `Issues in ${scope} matching "${keyword}" (${matches.length}):\n\n${rows}`;
      },
    }),
    defineTool({
      name: 'get_my_issues',
      label: 'Listing my issues',
      description: 'List the issues assigned to the owner of the API key',
      inputSchema: {
        status_filter: statusFilter,
        limit: listLimit,
      },
      readOnly: true,
      execute: async ({ status_filter, limit }, { client }) => {
        const me = await client.getCurrentUser();
        const issues = await client.listIssues({
          assigned_to_id: me.id,
          status_id: statusParam(status_filter),
          limit,
          sort: 'updated_on:desc',
        });
        return issueList(`Issues assigned to ${fullName(me)} [${status_filter}]`, issues);
      },
    }),
    defineTool({
      name: 'create_new_issue',
      label: 'Creating issue',
      description: 'Create an issue. Tracker, priority and assignee accept either an ID or a name',
      inputSchema: {
        project_id: projectRef,
        subject: z.string().describe('Issue subject'),
        description: optionalText.describe('Issue description'),
        tracker_id: z.number().int().positive().optional(),
        tracker_name: optionalText.describe('Tracker name, e.g. "Bug"'),
        priority_id: z.number().int().positive().optional(),
        priority_name: optionalText.describe('Priority name, e.g. "High"'),
        assigned_to_id: z.number().int().positive().optional(),
        assigned_to_name: optionalText.describe('Assignee full name'),
        assigned_to_login: optionalText.describe('Assignee login'),
      },
      execute: async (args, { client }) => {
        const subject = args.subject.trim();
        if (!subject) throw new ToolInputError('The issue subject must not be empty.');

        const trackerId = await resolveNamed(client, 'trackers', args.tracker_id, args.tracker_name);
        const priorityId = await resolveNamed(client, 'priorities', args.priority_id, args.priority_name);
        const assigneeId = args.assigned_to_name?.trim()
          ? await resolveNamed(client, 'users_by_name', undefined, args.assigned_to_name)
          : await resolveNamed(client, 'users_by_login', args.assigned_to_id, args.assigned_to_login);

        const id = await client.createIssue({
          project_id: args.project_id,
          subject,
          description: args.description || undefined,
          tracker_id: trackerId,
          priority_id: priorityId,
          assigned_to_id: assigneeId,
        });
        const issue = await client.getIssue(id);

        const lines = [
          `Created issue #${id}: ${issue.subject}`,
          '',
          `Project: ${issue.project.name}`,
          `Tracker: ${issue.tracker.name}`,
          `Status: ${issue.status.name}`,
          `Priority: ${issue.priority.name}`,
          `Assigned to: ${refName(issue.assigned_to)}`,
        ];
        if (issue.description) lines.push('', 'Description:', issue.description);
        return lines.join('\n');
      },
    }),
    defineTool({
      name: 'update_issue_status',
      label: 'Updating issue status',
      description: 'Change the status of an issue by status ID or name, optionally with a note',
      inputSchema: {
        issue_id: issueId,
        status_id: z.number().int().positive().optional(),
        status_name: optionalText.describe('Status name, e.g. "In Progress"'),
        notes: optionalText.describe('Note to add with the change'),
      },
      execute: async ({ issue_id, status_id, status_name, notes }, { client }) => {
        const statusId = await resolveNamed(client, 'statuses', status_id, status_name);
        if (statusId === undefined) throw new ToolInputError('Provide status_id or status_name.');

        const note = notes?.trim();
        await client.updateIssue(issue_id, { status_id: statusId, notes: note || undefined });
        const issue = await client.getIssue(issue_id);
        return withNotes([`Updated issue #${issue_id}: ${issue.subject}`, `Status: ${issue.status.name}`], note);
      },
    }),
    defineTool({
      name: 'update_issue_content',
      label: 'Updating issue',
      description: 'Change the subject, description, priority, tracker, progress, parent, dates or estimate of an issue',
      inputSchema: {
        issue_id: issueId,
        subject: optionalText,
        description: optionalText,
        priority_id: z.number().int().positive().optional(),
        priority_name: optionalText,
        tracker_id: z.number().int().positive().optional(),
        tracker_name: optionalText,
        done_ratio: z.number().int().optional().describe('Progress in percent (0-100)'),
        parent_issue_id: z.number().int().positive().optional(),
        remove_parent: z.boolean().default(false).describe('Detach the issue from its parent'),
        start_date: optionalText.describe('YYYY-MM-DD'),
        due_date: optionalText.describe('YYYY-MM-DD'),
        estimated_hours: z.number().optional(),
      },
      execute: async (args, { client }) => {
        const patch: IssueUpdate = {};
        const changes: string[] = [];

        if (args.subject !== undefined) {
          patch.subject = args.subject.trim();
          changes.push(`Subject: ${patch.subject}`);
        }
        if (args.description !== undefined) {
          patch.description = args.description;
          changes.push('Description updated');
        }
        const priorityId = await resolveNamed(client, 'priorities', args.priority_id, args.priority_name);
        if (priorityId !== undefined) {
          patch.priority_id = priorityId;
          changes.push(`Priority ID: ${priorityId}`);
        }
        const trackerId = await resolveNamed(client, 'trackers', args.tracker_id, args.tracker_name);
        if (trackerId !== undefined) {
          patch.tracker_id = trackerId;
          changes.push(`Tracker ID: ${trackerId}`);
        }
        if (args.done_ratio !== undefined) {
          patch.done_ratio = args.done_ratio;
          changes.push(`Done: ${args.done_ratio}%`);
        }
        if (args.remove_parent) {
          patch.parent_issue_id = null;
          changes.push('Parent removed');
        } else if (args.parent_issue_id !== undefined) {
          patch.parent_issue_id = args.parent_issue_id;
          changes.push(`Parent: #${args.parent_issue_id}`);
        }
        if (args.start_date !== undefined) {
          patch.start_date = args.start_date;
          changes.push(`Start date: ${args.start_date}`);
        }
        if (args.due_date !== undefined) {
          patch.due_date = args.due_date;
          changes.push(`Due date: ${args.due_date}`);
        }
        if (args.estimated_hours !== undefined) {
          patch.estimated_hours = args.estimated_hours;
          changes.push(`Estimated hours: ${args.estimated_hours}`);
        }

        await client.updateIssue(args.issue_id, patch);
        const issue = await client.getIssue(args.issue_id);
        return [
          `Updated issue #${args.issue_id}: ${issue.subject}`,
          '',
          'Changed:',
          bullets(changes),
          '',
          'Now:',
          bullets([
            `Tracker: ${issue.tracker.name}`,
            `Status: ${issue.status.name}`,
            `Priority: ${issue.priority.name}`,
            `Done: ${issue.done_ratio}%`,
          ]),
        ].join('\n');
      },
    }),
    defineTool({
      name: 'add_issue_note',
      label: 'Adding note',
      description: 'Add a note to an issue, optionally logging spent time against an activity',
      inputSchema: {
        issue_id: issueId,
        notes: z.string().describe('Note text'),
        private: z.boolean().default(false).describe('Make the note private'),
        spent_hours: z.number().optional().describe('Hours to log with the note'),
        activity_id: z.number().int().positive().optional(),
        activity_name: optionalText.describe('Time entry activity name, e.g. "Development"'),
        spent_on: optionalText.describe('Date of the logged time, YYYY-MM-DD (default today)'),
      },
      execute: async (args, { client }) => {
        const notes = args.notes.trim();
        if (!notes) throw new ToolInputError('The note must not be empty.');

        let timeEntry: { id: number; spentOn: string; activityId: number } | undefined;
        if (args.spent_hours !== undefined) {
          const activityId = await resolveNamed(client, 'time_entry_activities', args.activity_id, args.activity_name);
          if (activityId === undefined) throw new ToolInputError('Logging time needs activity_id or activity_name.');
          const created = await client.createTimeEntry({
            issue_id: args.issue_id,
            hours: args.spent_hours,
            activity_id: activityId,
            comments: notes,
            spent_on: args.spent_on,
          });
          timeEntry = { id: created.id, spentOn: created.spent_on, activityId };
        }

        await client.updateIssue(args.issue_id, { notes, private_notes: args.private || undefined });
        const issue = await client.getIssue(args.issue_id);

        const lines = [
          `Added a ${args.private ? 'private' : 'public'} note to issue #${args.issue_id}: ${issue.subject}`,
          '',
          notes,
        ];
        if (timeEntry) {
          lines.push(
            '',
            `Logged time entry #${timeEntry.id}:`,
            bullets([
              `Hours: ${args.spent_hours}`,
              `Activity: ${args.activity_name?.trim() || `ID ${timeEntry.activityId}`}`,
              `Date: ${timeEntry.spentOn}`,
            ]),
          );
        }
        return lines.join('\n');
      },
    }),
    defineTool({
      name: 'assign_issue',
      label: 'Assigning issue',
      description: 'Assign an issue by user ID, full name or login; with none of them the issue is unassigned',
      inputSchema: {
        issue_id: issueId,
        user_id: z.number().int().positive().optional(),
        user_name: optionalText.describe('Full name, or login as a fallback'),
        user_login: optionalText,
        notes: optionalText,
      },
      execute: async ({ issue_id, user_id, user_name, user_login, notes }, { client }) => {
        const userId = user_name?.trim()
          ? await resolveNamed(client, 'users', undefined, user_name)
          : await resolveNamed(client, 'users_by_login', user_id, user_login);

        const note = notes?.trim();
        await client.updateIssue(issue_id, { assigned_to_id: userId ?? null, notes: note || undefined });
        const issue = await client.getIssue(issue_id);
        return withNotes(
          [
            `Updated issue #${issue_id}: ${issue.subject}`,
            userId === undefined ? 'Action: unassigned' : `Action: assigned to user ${userId}`,
            `Assigned to: ${refName(issue.assigned_to)}`,
          ],
          note,
        );
      },
    }),
    defineTool({
      name: 'close_issue',
      label: 'Closing issue',
      description: 'Close an issue using the first closing status defined on the server',
      inputSchema: {
        issue_id: issueId,
        notes: optionalText,
        done_ratio: z.number().int().min(0).max(100).default(100),
      },
      execute: async ({ issue_id, notes, done_ratio }, { client }) => {
        const statuses = await client.getIssueStatuses();
        const closed = statuses.find(status => status.is_closed);
        if (!closed) throw new RedmineApiError('No closing issue status is defined on this server');

        const note = notes?.trim();
        await client.updateIssue(issue_id, { status_id: closed.id, done_ratio, notes: note || undefined });
        const issue = await client.getIssue(issue_id);
        return withNotes(
          [`Closed issue #${issue_id}: ${issue.subject}`, `Status: ${issue.status.name}`, `Done: ${issue.done_ratio}%`],
          note,
        );
      },
    }),
  ],
};
