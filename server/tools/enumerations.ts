import type { EnumerationItem } from '../redmine/schemas.js';
import { bullets } from './format.js';
import { defineTool, type ToolModule } from './types.js';

function flags(item: EnumerationItem): string {
  const marks: string[] = [];
  if (item.is_closed) marks.push('closed');
  if (item.is_default) marks.push('default');
  if (item.active === false) marks.push('inactive');
  return marks.length > 0 ? ` [${marks.join(', ')}]` : '';
}

export function formatEnumeration(title: string, items: EnumerationItem[]): string {
  if (items.length === 0) return `${title}: none defined.`;
  return `${title} (${items.length}):\n${bullets(items.map(item => `${item.name} (ID: ${item.id})${flags(item)}`))}`;
}

export const enumerationTools: ToolModule = {
  domain: 'enumerations',
  tools: [
    defineTool({
      name: 'get_issue_statuses',
      label: 'Listing issue statuses',
      description: 'List every issue status with its ID and whether it closes the issue',
      inputSchema: {},
      readOnly: true,
      execute: async (_args, { client }) => formatEnumeration('Issue statuses', await client.getIssueStatuses()),
    }),
    defineTool({
      name: 'get_trackers',
      label: 'Listing trackers',
      description: 'List every tracker (Bug, Feature, ...) with its ID',
      inputSchema: {},
      readOnly: true,
      execute: async (_args, { client }) => formatEnumeration('Trackers', await client.getTrackers()),
    }),
    defineTool({
      name: 'get_priorities',
      label: 'Listing priorities',
      description: 'List every issue priority with its ID',
      inputSchema: {},
      readOnly: true,
      execute: async (_args, { client }) => formatEnumeration('Priorities', await client.getPriorities()),
    }),
    defineTool({
      name: 'get_time_entry_activities',
      label: 'Listing time entry activities',
      description: 'List the activities time can be logged against',
      inputSchema: {},
      readOnly: true,
      execute: async (_args, { client }) => formatEnumeration('Time entry activities', await client.getTimeEntryActivities()),
    }),
    defineTool({
      name: 'get_document_categories',
      label: 'Listing document categories',
      description: 'List the document categories defined on the server',
      inputSchema: {},
      readOnly: true,
      execute: async (_args, { client }) => formatEnumeration('Document categories', await client.getDocumentCategories()),
    }),
  ],
};
