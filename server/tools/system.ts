import { RedmineApiError } from '../redmine/errors.js';
import type { CacheStatus } from '../../shared/types.js';
import { bullets } from './format.js';
import { defineTool, type ToolModule } from './types.js';

export function formatCacheStatus(status: CacheStatus): string {
  const { counts } = status;
  return [
    `Domain: ${status.domain}`,
    `State: ${status.state}`,
    `Cached at: ${status.cachedAt ? status.cachedAt.toISOString() : 'never'}`,
    `File: ${status.filePath}`,
    'Entries:',
    bullets([
      `Priorities: ${counts.priorities}`,
      `Statuses: ${counts.statuses}`,
      `Trackers: ${counts.trackers}`,
      `Time entry activities: ${counts.time_entry_activities}`,
      `Users (by name): ${counts.users_by_name}`,
      `Users (by login): ${counts.users_by_login}`,
    ]),
  ].join('\n');
}

export const systemTools: ToolModule = {
  domain: 'system',
  tools: [
    defineTool({
      name: 'server_info',
      label: 'Reading server info',
      description: 'Show the Redmine endpoint, transport, timeout and resolution cache state of this server',
      inputSchema: {},
      readOnly: true,
      execute: async (_args, { client, config }) => {
        const settings = bullets([
          `Redmine domain: ${config.domain}`,
          `Transport: ${config.transport}`,
          `Request timeout: ${config.timeoutSeconds}s`,
          `Log level: ${config.logLevel}`,
        ]);
        return `Redmine MCP server\n\n${settings}\n\nResolution cache:\n${formatCacheStatus(client.cache.status())}`;
      },
    }),
    defineTool({
      name: 'health_check',
      label: 'Checking connection',
      description: 'Verify that the Redmine server is reachable and the API key is accepted',
      inputSchema: {},
      readOnly: true,
      execute: async (_args, { client, config }) => {
        const ok = await client.testConnection();
        return ok
          ? `Connected to ${config.domain}.`
          : `Cannot reach ${config.domain} with the configured API key.`;
      },
    }),
    defineTool({
      name: 'refresh_cache',
      label: 'Refreshing cache',
      description: 'Rebuild the name-to-ID cache (statuses, priorities, trackers, activities, users) from Redmine',
      inputSchema: {},
      execute: async (_args, { client }) => {
        const result = await client.refreshCache();
        if (!result.ok) throw new RedmineApiError(result.reason);
        return `Cache refreshed.\n\n${formatCacheStatus(client.cache.status())}`;
      },
    }),
  ],
};
