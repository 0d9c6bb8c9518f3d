/**
 * Handler Registry for MCP Tools
 *
 * Maps tool names to handler functions so server.ts needs no switch over
 * tool names.
 */

import type { ConfigDefaults } from '../config/loader.js';
import type { ExperimentRunner } from '../core/experiment-runner.js';
import type { AnalyticsStore } from '../storage/analytics.js';
import type { Importer } from '../storage/importer.js';
import { createErrorResponse, type ToolResponse } from './tools.js';

/**
 * Context available to all handlers
 */
export interface HandlerContext {
  experimentRunner: ExperimentRunner;
  importer: Importer;
  analytics: AnalyticsStore;
  outputDir: string;
  configDefaults: ConfigDefaults;
}

/**
 * Handler function type
 */
export type ToolHandler = (args: unknown, ctx: HandlerContext) => Promise<ToolResponse>;

/**
 * Registry for tool handlers
 */
export class HandlerRegistry {
  private handlers = new Map<string, ToolHandler>();

  register(toolName: string, handler: ToolHandler): void {
    this.handlers.set(toolName, handler);
  }

  has(toolName: string): boolean {
    return this.handlers.has(toolName);
  }

  getRegisteredTools(): string[] {
    return Array.from(this.handlers.keys());
  }

  /**
   * Execute a handler for a tool
   */
  async execute(toolName: string, args: unknown, ctx: HandlerContext): Promise<ToolResponse> {
    const handler = this.handlers.get(toolName);
    if (!handler) {
      return createErrorResponse(`Unknown tool: ${toolName}`);
    }
    return handler(args, ctx);
  }
}
