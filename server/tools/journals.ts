import { z } from 'zod';
import { RedmineNotFoundError } from '../redmine/errors.js';
import type { Journal } from '../redmine/schemas.js';
import { formatJournal, refName } from './format.js';
import { defineTool, type ToolModule } from './types.js';

function journalDetail(issueId: number, journal: Journal): string {
  const lines = [
    `Journal #${journal.id} on issue #${issueId}`,
    `Author: ${refName(journal.user, 'Unknown user')}${journal.user ? ` (ID: ${journal.user.id})` : ''}`,
    `Created: ${journal.created_on || 'unknown'}`,
  ];
  if (journal.private_notes) lines.push('Private note');
  lines.push('', 'Notes:', journal.notes || '(no text)');
  if (journal.details.length > 0) {
    lines.push('', `Changes (${journal.details.length}):`);
    for (const detail of journal.details) {
      lines.push(`- ${detail.name || detail.property} (${detail.property})`);
      lines.push(`  old: ${detail.old_value ?? '(empty)'}`);
      lines.push(`  new: ${detail.new_value ?? '(empty)'}`);
    }
  }
  return lines.join('\n');
}

export const journalTools: ToolModule = {
  domain: 'journals',
  tools: [
    defineTool({
      name: 'list_issue_journals',
      label: 'Listing issue notes',
      description: 'List the notes of an issue; property changes are left out unless asked for',
      inputSchema: {
        issue_id: z.number().int().positive(),
        include_property_changes: z.boolean().default(false),
      },
      readOnly: true,
      execute: async ({ issue_id, include_property_changes }, { client }) => {
        const journals = await client.getIssueJournals(issue_id);
        if (journals.length === 0) return `Issue #${issue_id} has no journal entries.`;

        const shown = include_property_changes ? journals : journals.filter(j => j.notes.trim());
        if (shown.length === 0) {
          return `Issue #${issue_id} has no notes (${journals.length} entries with property changes only).`;
        }
        const rendered = shown.map(j => formatJournal(include_property_changes ? j : { ...j, details: [] }));
        return `Notes on issue #${issue_id} (${shown.length}):\n\n${rendered.join('\n\n')}`;
      },
    }),
    defineTool({
      name: 'get_journal',
      label: 'Fetching note',
      description: 'Get one journal entry of an issue with its full text and property changes',
      inputSchema: {
        issue_id: z.number().int().positive(),
        journal_id: z.number().int().positive(),
      },
      readOnly: true,
      execute: async ({ issue_id, journal_id }, { client }) => {
        const journals = await client.getIssueJournals(issue_id);
        const journal = journals.find(j => j.id === journal_id);
        if (!journal) throw new RedmineNotFoundError(`Issue #${issue_id} has no journal #${journal_id}`);
        return journalDetail(issue_id, journal);
      },
    }),
  ],
};
