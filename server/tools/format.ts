import type { Issue, IssueDetail, Journal, JournalDetail, NamedRef, User } from '../redmine/schemas.js';

// ─── Text Helpers ───────────────────────────────────────────────────────────

export function truncate(text: string, width: number): string {
  if (text.length <= width) return text;
  return `${text.slice(0, Math.max(width - 3, 0))}...`;
}

export function bullets(lines: string[]): string {
  return lines.map(line => `- ${line}`).join('\n');
}

/** Fixed-width columns; cells longer than their column are truncated. */
export function table(columns: Array<[header: string, width: number]>, rows: string[][]): string {
  const render = (cells: string[]) =>
    columns.map(([, width], i) => truncate(cells[i] ?? '', width).padEnd(width)).join(' ').trimEnd();
  const header = render(columns.map(([name]) => name));
  const rule = columns.map(([, width]) => '-'.repeat(width)).join(' ');
  return [header, rule, ...rows.map(render)].join('\n');
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function refName(ref: NamedRef | null | undefined, fallback = 'Unassigned'): string {
  return ref?.name || fallback;
}

export function fullName(user: Pick<User, 'firstname' | 'lastname' | 'login'>): string {
  return `${user.firstname} ${user.lastname}`.trim() || user.login;
}

// ─── Issues ─────────────────────────────────────────────────────────────────

export function issueTable(issues: Issue[]): string {
  return table(
    [['ID', 7], ['Status', 12], ['Priority', 10], ['Assignee', 18], ['Subject', 60]],
    issues.map(issue => [
      `#${issue.id}`,
      issue.status.name,
      issue.priority.name,
      refName(issue.assigned_to),
      issue.subject,
    ]),
  );
}

export function issueList(title: string, issues: Issue[]): string {
  if (issues.length === 0) return `${title}: no issues found.`;
  return `${title} (${issues.length}):\n\n${issueTable(issues)}`;
}

function describeChange(detail: JournalDetail): string {
  const field = detail.name || detail.property;
  const from = detail.old_value ?? '';
  const to = detail.new_value ?? '';
  if (!from) return `${field} set to "${to}"`;
  if (!to) return `${field} cleared (was "${from}")`;
  return `${field} changed from "${from}" to "${to}"`;
}

export function formatJournal(journal: Journal): string {
  const who = refName(journal.user, 'Unknown user');
  const lines = [`Journal #${journal.id} by ${who} on ${journal.created_on || 'unknown date'}${journal.private_notes ? ' (private)' : ''}`];
  for (const detail of journal.details) lines.push(`  * ${describeChange(detail)}`);
  if (journal.notes) lines.push(...journal.notes.split('\n').map(line => `  ${line}`));
  return lines.join('\n');
}

export function formatIssue(issue: IssueDetail): string {
  const lines = [
    `Issue #${issue.id}: ${issue.subject}`,
    '',
    `Project: ${issue.project.name}`,
    `Tracker: ${issue.tracker.name}`,
    `Status: ${issue.status.name}`,
    `Priority: ${issue.priority.name}`,
    `Author: ${refName(issue.author, 'Unknown')}`,
    `Assigned to: ${refName(issue.assigned_to)}`,
    `Done: ${issue.done_ratio}%`,
  ];
  if (issue.parent) lines.push(`Parent: #${issue.parent.id}${issue.parent.subject ? ` ${issue.parent.subject}` : ''}`);
  if (issue.start_date) lines.push(`Start date: ${issue.start_date}`);
  if (issue.due_date) lines.push(`Due date: ${issue.due_date}`);
  if (issue.estimated_hours != null) lines.push(`Estimated hours: ${issue.estimated_hours}`);
  if (issue.created_on) lines.push(`Created: ${issue.created_on}`);
  if (issue.updated_on) lines.push(`Updated: ${issue.updated_on}`);
  if (issue.closed_on) lines.push(`Closed: ${issue.closed_on}`);

  lines.push('', 'Description:', issue.description || '(none)');

  if (issue.children.length > 0) {
    lines.push('', `Subtasks (${issue.children.length}):`);
    lines.push(bullets(issue.children.map(child => `#${child.id} ${child.subject ?? ''}`.trimEnd())));
  }
  if (issue.relations.length > 0) {
    lines.push('', `Relations (${issue.relations.length}):`);
    lines.push(bullets(issue.relations.map(r => `${r.relation_type} #${r.issue_id === issue.id ? r.issue_to_id : r.issue_id}`)));
  }
  if (issue.watchers.length > 0) {
    lines.push('', `Watchers: ${issue.watchers.map(w => w.name).join(', ')}`);
  }
  if (issue.attachments.length > 0) {
    lines.push('', `Attachments (${issue.attachments.length}):`);
    lines.push(bullets(issue.attachments.map(a => `#${a.id} ${a.filename} (${formatSize(a.filesize)}, ${a.content_type || 'unknown type'})`)));
  }
  if (issue.journals.length > 0) {
    lines.push('', `History (${issue.journals.length}):`);
    for (const journal of issue.journals) lines.push(formatJournal(journal));
  }
  return lines.join('\n');
}
