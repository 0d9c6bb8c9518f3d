/**
 * MCP module exports
 */

export { createServer } from './server.js';
export type { ServerOptions } from './server.js';

export { HandlerRegistry } from './handler-registry.js';
export type { HandlerContext, ToolHandler } from './handler-registry.js';

export { TOOLS, createSuccessResponse, createErrorResponse } from './tools.js';
export type { ToolResponse } from './tools.js';
