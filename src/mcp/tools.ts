/**
 * MCP Tool Definitions
 *
 * Tool schemas are generated from Zod schemas using Zod 4's native z.toJSONSchema().
 * Runtime validation is handled by Zod schemas in types/schemas.ts.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ParleyError } from '../errors/index.js';
import {
  GetExperimentStatusInputSchema,
  ImportExperimentInputSchema,
  ListExperimentsInputSchema,
  QueryTurnsInputSchema,
  RunExperimentInputSchema,
  StopExperimentInputSchema,
} from '../types/schemas.js';

// Type for MCP Tool inputSchema
type McpInputSchema = Tool['inputSchema'];

/**
 * Convert Zod schema to MCP-compatible JSON Schema
 */
function toMcpJsonSchema(schema: z.ZodType): McpInputSchema {
  // MCP does not expect the $schema dialect marker
  const { $schema: _dialect, ...jsonSchema } = z.toJSONSchema(schema, { io: 'input', unrepresentable: 'any' });
  return { ...jsonSchema, type: 'object' };
}

const RUN_EXPERIMENT_TOOL: Tool = {
  name: 'run_experiment',
  description: `Start an experiment: one or more conversations between two agents, scored for convergence after every turn.

Each conversation ends when the convergence score reaches the threshold (action "stop"), when maxTurns is reached, or on an unrecoverable provider error.
Pass the configuration inline as config, or as a YAML file path in configPath.
With wait=false (default) the tool returns the experiment ID immediately; poll get_experiment_status for progress.`,
  inputSchema: toMcpJsonSchema(RunExperimentInputSchema),
};

const GET_EXPERIMENT_STATUS_TOOL: Tool = {
  name: 'get_experiment_status',
  description:
    'Get the status of an experiment: manifest counters, per-conversation status, end reason, turns completed and latest convergence score.',
  inputSchema: toMcpJsonSchema(GetExperimentStatusInputSchema),
};

const LIST_EXPERIMENTS_TOOL: Tool = {
  name: 'list_experiments',
  description: 'List experiments in the output directory, newest first, optionally filtered by status.',
  inputSchema: toMcpJsonSchema(ListExperimentsInputSchema),
};

const STOP_EXPERIMENT_TOOL: Tool = {
  name: 'stop_experiment',
  description:
    'Interrupt a running experiment. Conversations finish their in-flight agent call and end as interrupted; conversations not yet started stay created.',
  inputSchema: toMcpJsonSchema(StopExperimentInputSchema),
};

const IMPORT_EXPERIMENT_TOOL: Tool = {
  name: 'import_experiment',
  description:
    'Import finished experiments into the analytical store. Already imported experiments are skipped unless force is set.',
  inputSchema: toMcpJsonSchema(ImportExperimentInputSchema),
};

const QUERY_TURNS_TOOL: Tool = {
  name: 'query_turns',
  description:
    'Query imported turns with their component and combined convergence scores. With includeMetrics, each turn also carries word, vocabulary, entropy and repetition metrics of both messages.',
  inputSchema: toMcpJsonSchema(QueryTurnsInputSchema),
};

/**
 * All available tools
 */
export const TOOLS: Tool[] = [
  RUN_EXPERIMENT_TOOL,
  GET_EXPERIMENT_STATUS_TOOL,
  LIST_EXPERIMENTS_TOOL,
  STOP_EXPERIMENT_TOOL,
  IMPORT_EXPERIMENT_TOOL,
  QUERY_TURNS_TOOL,
];

/**
 * Tool response type (matches MCP CallToolResult)
 */
export interface ToolResponse {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
  _meta?: Record<string, unknown>;
}

/**
 * Create a success tool response
 */
export function createSuccessResponse(data: unknown): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

/**
 * Create an error tool response
 */
export function createErrorResponse(error: string | Error): ToolResponse {
  const message = error instanceof Error ? error.message : error;
  const body = error instanceof ParleyError ? { error: message, code: error.code } : { error: message };
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(body, null, 2),
      },
    ],
    isError: true,
  };
}
