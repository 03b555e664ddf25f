#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { readFileSync } from 'fs';
import updateNotifier from 'update-notifier';
import { runCLI } from './cli.js';
import { logger } from './logger.js';
import { createServer } from './server.js';
import { PACKAGE_JSON_PATH } from './version.js';

// Check for updates (cached 24hr, non-blocking)
try {
  const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'name' in pkg && 'version' in pkg
    && typeof pkg.name === 'string' && typeof pkg.version === 'string') {
    const notifier = updateNotifier({ pkg: { name: pkg.name, version: pkg.version }, updateCheckInterval: 1000 * 60 * 60 * 24 });
    notifier.notify({ isGlobal: true });
  }
} catch (error) {
  logger.debug('Update check skipped', { reason: error instanceof Error ? error.message : String(error) });
}

async function startMCPServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('crewsmith MCP server running');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const result = await runCLI(args);

  switch (result) {
    case 'handled':
      process.exit();
      break;
    case 'server':
      await startMCPServer();
      break;
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
