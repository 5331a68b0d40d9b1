import { ConfigError } from '../server/config.js';
import type { RedmineConfig } from '../shared/types.js';

export type Flags = Record<string, string>;

export interface ParsedArgs {
  positionals: string[];
  flags: Flags;
}

/** `--key value`, `--key=value`, or a bare `--key` meaning "true". */
export function parseArgs(args: string[]): ParsedArgs {
  const flags: Flags = {};
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    if (eq > 2) {
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags[arg.slice(2)] = next;
      i++;
    } else {
      flags[arg.slice(2)] = 'true';
    }
  }
  return { positionals, flags };
}

/** Command-line flags win over the environment. */
export function applyServeFlags(config: RedmineConfig, flags: Flags): RedmineConfig {
  const next = { ...config };

  if (flags.transport !== undefined) {
    if (flags.transport !== 'stdio' && flags.transport !== 'http') {
      throw new ConfigError(`--transport must be "stdio" or "http", got "${flags.transport}"`);
    }
    next.transport = flags.transport;
  }
  if (flags.host !== undefined) next.host = flags.host;
  if (flags.port !== undefined) {
    const port = Number(flags.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`--port must be an integer between 1 and 65535, got "${flags.port}"`);
    }
    next.port = port;
  }
  return next;
}
