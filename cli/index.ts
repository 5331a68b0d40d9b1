#!/usr/bin/env node

/**
 * redmine-mcp CLI: Redmine tools for MCP clients.
 *
 * Usage:
 *   redmine-mcp [serve] [--transport stdio|http] [--host H] [--port N]
 *   redmine-mcp check                       Test the connection and API key
 *   redmine-mcp cache show|refresh|clear    Inspect or rebuild the name-to-ID cache
 *   redmine-mcp tools                       List the registered tools
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigError, describeConfig, loadConfig } from '../server/config.js';
import { startHttpServer, startStdioServer } from '../server/index.js';
import { createLogger, setLogLevel } from '../server/log.js';
import { createRedmineClient } from '../server/redmine/client.js';
import { describeError } from '../server/redmine/errors.js';
import { getToolModules, type ToolContext } from '../server/tools/index.js';
import { formatCacheStatus } from '../server/tools/system.js';
import { applyServeFlags, parseArgs, type Flags } from './flags.js';

const log = createLogger('cli');

const HELP = `
  redmine-mcp: Redmine tools for MCP clients

  Commands:
    serve [--transport stdio|http]     Start the MCP server (default command)
          [--host H] [--port N]
    check                              Test the connection and API key
    cache show|refresh|clear           Inspect or rebuild the name-to-ID cache
    tools                              List the registered tools

  Configuration comes from the environment or a .env file:
    REDMINE_DOMAIN, REDMINE_API_KEY (required)
    REDMINE_MCP_TIMEOUT, REDMINE_MCP_TRANSPORT, REDMINE_MCP_HOST, REDMINE_MCP_PORT,
    REDMINE_MCP_LOG_LEVEL, REDMINE_MCP_CACHE_DIR
`;

function createContext(flags: Flags = {}): ToolContext {
  const config = applyServeFlags(loadConfig(), flags);
  setLogLevel(config.logLevel);
  log.debug(describeConfig(config));
  return { config, client: createRedmineClient(config) };
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function serveCommand(flags: Flags) {
  const ctx = createContext(flags);
  if (ctx.config.transport === 'http') {
    const server = startHttpServer(ctx, { host: ctx.config.host, port: ctx.config.port });
    const shutdown = () => {
      log.info('Shutting down');
      server.close();
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    return;
  }
  await startStdioServer(ctx);
}

async function checkCommand() {
  const { client, config } = createContext();
  if (await client.testConnection()) {
    console.log(`  ✓ Connected to ${config.domain}`);
    return;
  }
  console.error(`  ✗ Cannot reach ${config.domain} with the configured API key`);
  process.exitCode = 1;
}

async function cacheCommand(action: string | undefined) {
  const { client } = createContext();
  switch (action) {
    case undefined:
    case 'show':
      await client.cache.load();
      console.log(formatCacheStatus(client.cache.status()));
      break;
    case 'refresh': {
      const result = await client.refreshCache();
      if (!result.ok) {
        console.error(`  ✗ Refresh failed: ${result.reason}`);
        process.exitCode = 1;
      } else {
        console.log('  ✓ Cache refreshed\n');
      }
      console.log(formatCacheStatus(client.cache.status()));
      break;
    }
    case 'clear':
      await client.cache.clear();
      console.log(`  ✓ Removed ${client.cache.filePath}`);
      break;
    default:
      console.error(`Unknown cache action: ${action} (expected show, refresh or clear)`);
      process.exitCode = 1;
  }
}

function toolsCommand() {
  for (const mod of getToolModules()) {
    console.log(`\n  ${mod.domain}`);
    for (const tool of mod.tools) {
      console.log(`    ${tool.name.padEnd(28)} ${tool.description}`);
    }
  }
  console.log();
}

// ─── Main ───────────────────────────────────────────────────────────────────

const [, , ...argv] = process.argv;
const { positionals, flags } = parseArgs(argv);
const [command = 'serve', action] = positionals;

async function main() {
  if (flags.help !== undefined || command === 'help') {
    console.log(HELP);
    return;
  }

  loadDotenv();

  switch (command) {
    case 'serve':
      await serveCommand(flags);
      break;
    case 'check':
      await checkCommand();
      break;
    case 'cache':
      await cacheCommand(action);
      break;
    case 'tools':
      toolsCommand();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      process.exitCode = 1;
  }
}

main().catch(err => {
  if (err instanceof ConfigError) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    console.error(describeError(err));
  }
  process.exit(1);
});
