import type { RedmineClient, ResolvableCategory } from '../redmine/client.js';
import { bullets } from './format.js';
import { ToolInputError } from './types.js';

const LABELS: Record<ResolvableCategory, { label: string; plural: string }> = {
  priorities: { label: 'priority', plural: 'priorities' },
  statuses: { label: 'status', plural: 'statuses' },
  trackers: { label: 'tracker', plural: 'trackers' },
  time_entry_activities: { label: 'activity', plural: 'activities' },
  users_by_name: { label: 'user', plural: 'users' },
  users_by_login: { label: 'user login', plural: 'logins' },
  users: { label: 'user', plural: 'users' },
};

export class UnknownNameError extends ToolInputError {
  constructor(message: string) {
    super(message);
    this.name = 'UnknownNameError';
  }
}

async function knownNames(client: RedmineClient, category: ResolvableCategory): Promise<string[]> {
  const index = await client.availableOptions(category === 'users' ? 'users_by_name' : category);
  return Object.keys(index).sort((a, b) => a.localeCompare(b));
}

export async function unknownNameMessage(client: RedmineClient, category: ResolvableCategory, name: string): Promise<string> {
  const { label, plural } = LABELS[category];
  const names = await knownNames(client, category);
  if (names.length === 0) {
    return `Unknown ${label} "${name}". No ${plural} are cached; run refresh_cache or pass the numeric ID.`;
  }
  return `Unknown ${label} "${name}". Available ${plural}:\n${bullets(names)}`;
}

/** A non-blank name takes precedence over the ID; otherwise the ID is returned as given. */
export async function resolveNamed(
  client: RedmineClient,
  category: ResolvableCategory,
  id: number | undefined,
  name: string | undefined,
): Promise<number | undefined> {
  const trimmed = name?.trim();
  if (!trimmed) return id;
  const resolved = await client.resolveId(category, trimmed);
  if (resolved === undefined) throw new UnknownNameError(await unknownNameMessage(client, category, trimmed));
  return resolved;
}
