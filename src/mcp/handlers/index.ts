/**
 * MCP Handler Modules - Barrel Export
 */

import type { HandlerRegistry } from '../handler-registry.js';
import { registerExperimentHandlers } from './experiments.js';
import { registerImportHandlers } from './imports.js';
import { registerQueryHandlers } from './query.js';

/**
 * Register all handlers with the registry
 */
export function registerAllHandlers(registry: HandlerRegistry): void {
  registerExperimentHandlers(registry);
  registerImportHandlers(registry);
  registerQueryHandlers(registry);
}

export {
  handleGetExperimentStatus,
  handleListExperiments,
  handleRunExperiment,
  handleStopExperiment,
  registerExperimentHandlers,
} from './experiments.js';
export { handleImportExperiment, registerImportHandlers } from './imports.js';
export { handleQueryTurns, registerQueryHandlers } from './query.js';
export { wrapError } from './utils.js';
