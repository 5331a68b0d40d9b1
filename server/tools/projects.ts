import { z } from 'zod';
import type { Project } from '../redmine/schemas.js';
import { table } from './format.js';
import { defineTool, type ToolModule } from './types.js';

const PROJECT_STATUS: Record<number, string> = { 1: 'active', 5: 'closed', 9: 'archived' };

export function projectTable(projects: Project[]): string {
  return table(
    [['ID', 6], ['Identifier', 24], ['Status', 9], ['Name', 50]],
    projects.map(p => [String(p.id), p.identifier, PROJECT_STATUS[p.status] ?? String(p.status), p.name]),
  );
}

export const projectTools: ToolModule = {
  domain: 'projects',
  tools: [
    defineTool({
      name: 'get_projects',
      label: 'Listing projects',
      description: 'List the projects visible to the API key, with their numeric ID and identifier',
      inputSchema: {
        limit: z.number().int().min(1).max(100).default(100).describe('Maximum number of projects (1-100)'),
        offset: z.number().int().min(0).default(0).describe('Number of projects to skip'),
      },
      readOnly: true,
      execute: async ({ limit, offset }, { client }) => {
        const projects = await client.listProjects({ limit, offset });
        if (projects.length === 0) return 'No projects found.';
        return `Projects (${projects.length}):\n\n${projectTable(projects)}`;
      },
    }),
  ],
};
