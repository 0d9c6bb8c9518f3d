/**
 * MCP Server Implementation
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import {
  checkProviderAvailability,
  detectApiKeys,
  loadConfigDefaults,
  type ApiKeyConfig,
  type ConfigDefaults,
} from '../config/index.js';
import { ExperimentRunner } from '../core/index.js';
import { AnalyticsStore, Importer } from '../storage/index.js';
import { createLogger } from '../utils/logger.js';
import { TOOLS, createErrorResponse } from './tools.js';
import { HandlerRegistry, type HandlerContext } from './handler-registry.js';
import { registerAllHandlers } from './handlers/index.js';
import { wrapError } from './handlers/utils.js';

const logger = createLogger('MCPServer');

export interface ServerOptions {
  name?: string;
  version?: string;
  /** Defaults to the environment (see loadConfigDefaults) */
  configDefaults?: ConfigDefaults;
  /** API keys (defaults to environment variables) */
  apiKeys?: ApiKeyConfig;
  analytics?: AnalyticsStore;
  importer?: Importer;
  experimentRunner?: ExperimentRunner;
}

/**
 * Create and configure the MCP server
 */
export async function createServer(options: ServerOptions = {}): Promise<Server> {
  const serverName = options.name || 'parley';
  const serverVersion = options.version || '0.1.0';

  const configDefaults = options.configDefaults ?? loadConfigDefaults();
  const { runtime } = configDefaults;
  const apiKeys = options.apiKeys ?? detectApiKeys();

  for (const availability of checkProviderAvailability(apiKeys)) {
    if (!availability.available) {
      logger.warn({ provider: availability.provider, reason: availability.reason }, 'Provider unavailable');
    }
  }

  await mkdir(runtime.outputDir, { recursive: true });
  await mkdir(dirname(runtime.dbPath), { recursive: true });

  const analytics = options.analytics ?? new AnalyticsStore({ filename: runtime.dbPath });
  const importer = options.importer ?? new Importer({ store: analytics });
  const experimentRunner =
    options.experimentRunner ??
    new ExperimentRunner({
      outputDir: runtime.outputDir,
      apiKeys,
      importer: runtime.autoImport ? importer : undefined,
    });

  // Create server instance
  const server = new Server(
    {
      name: serverName,
      version: serverVersion,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  const handlerRegistry = new HandlerRegistry();
  registerAllHandlers(handlerRegistry);

  const handlerContext: HandlerContext = {
    experimentRunner,
    importer,
    analytics,
    outputDir: runtime.outputDir,
    configDefaults,
  };

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const startTime = Date.now();

    logger.info({ tool: name }, 'Tool call started');

    try {
      const result = await handlerRegistry.execute(name, args, handlerContext);

      const duration = Date.now() - startTime;
      logger.info({ tool: name, duration, success: !result.isError }, 'Tool call completed');

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      logger.error({ err: error, tool: name, duration }, 'Tool call failed');
      return createErrorResponse(wrapError(error));
    }
  });

  logger.info({ outputDir: runtime.outputDir, dbPath: runtime.dbPath, tools: TOOLS.length }, 'Server ready');
  return server;
}
