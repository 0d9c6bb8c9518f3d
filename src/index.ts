#!/usr/bin/env node

/**
 * Parley - MCP Server Entry Point
 *
 * Runs two-agent conversation experiments, scores convergence turn by turn
 * and imports finished experiments into an analytical store.
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './mcp/index.js';
import { logger } from './utils/index.js';

// Re-export types for external use
export * from './types/index.js';

const SERVER_NAME = 'parley';
const SERVER_VERSION = '0.1.0';

async function main(): Promise<void> {
  // Create MCP server with all tools registered
  const server = await createServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Connect via stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Server failed to start');
  process.exitCode = 1;
});
