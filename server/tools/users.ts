import { z } from 'zod';
import type { User } from '../redmine/schemas.js';
import { bullets, fullName, table } from './format.js';
import { defineTool, type ToolModule } from './types.js';

const USER_STATUS: Record<number, string> = { 1: 'active', 2: 'registered', 3: 'locked' };

const STATUS_CODES = { active: 1, locked: 3, all: undefined } as const;

function statusText(user: User): string {
  return USER_STATUS[user.status] ?? String(user.status);
}

export function userTable(users: User[], withMail = false): string {
  const columns: Array<[string, number]> = [['ID', 6], ['Login', 16], ['Name', 24], ['Status', 10]];
  if (withMail) columns.splice(3, 0, ['Email', 28]);
  return table(
    columns,
    users.map(user => {
      const row = [String(user.id), user.login, fullName(user), statusText(user)];
      if (withMail) row.splice(3, 0, user.mail);
      return row;
    }),
  );
}

export function formatUser(user: User): string {
  const lines = [
    `User #${user.id}: ${fullName(user)}`,
    '',
    bullets([
      `Login: ${user.login || 'n/a'}`,
      `Email: ${user.mail || 'n/a'}`,
      `Status: ${statusText(user)}`,
      `Created: ${user.created_on ?? 'n/a'}`,
      ...(user.last_login_on ? [`Last login: ${user.last_login_on}`] : []),
    ]),
  ];
  if (user.groups.length > 0) lines.push('', 'Groups:', bullets(user.groups.map(g => g.name)));
  const fields = user.custom_fields.filter(f => f.value !== null && f.value !== undefined && f.value.length > 0);
  if (fields.length > 0) {
    lines.push('', 'Custom fields:', bullets(fields.map(f => `${f.name}: ${Array.isArray(f.value) ? f.value.join(', ') : f.value}`)));
  }
  return lines.join('\n');
}

export const userTools: ToolModule = {
  domain: 'users',
  tools: [
    defineTool({
      name: 'search_users',
      label: 'Searching users',
      description: 'Find users by login, first name, last name or email',
      inputSchema: {
        query: z.string().describe('Name or login fragment'),
        limit: z.number().int().min(1).max(50).default(10),
      },
      readOnly: true,
      execute: async ({ query, limit }, { client }) => {
        const users = await client.searchUsers(query, limit);
        if (users.length === 0) return `No users match "${query.trim()}".`;
        return `Users matching "${query.trim()}" (${users.length}):\n\n${userTable(users)}`;
      },
    }),
    defineTool({
      name: 'list_users',
      label: 'Listing users',
      description: 'List users, active ones by default (needs administrator rights on most servers)',
      inputSchema: {
        limit: z.number().int().min(1).max(100).default(20),
        status_filter: z.enum(['active', 'locked', 'all']).default('active'),
      },
      readOnly: true,
      execute: async ({ limit, status_filter }, { client }) => {
        const users = await client.listUsers({ limit, status: STATUS_CODES[status_filter] });
        if (users.length === 0) return 'No users found.';
        return `Users (${users.length}):\n\n${userTable(users, true)}`;
      },
    }),
    defineTool({
      name: 'get_user',
      label: 'Fetching user',
      description: 'Get one user with groups and custom fields',
      inputSchema: {
        user_id: z.number().int().positive(),
      },
      readOnly: true,
      execute: async ({ user_id }, { client }) => formatUser(await client.getUser(user_id, ['groups'])),
    }),
  ],
};
