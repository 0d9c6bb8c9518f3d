/**
 * Import handlers
 * Handles: import_experiment
 */

import { experimentDirectory } from '../../storage/paths.js';
import { ImportExperimentInputSchema } from '../../types/schemas.js';
import type { HandlerContext, HandlerRegistry } from '../handler-registry.js';
import { createErrorResponse, createSuccessResponse, type ToolResponse } from '../tools.js';
import { wrapError } from './utils.js';

/**
 * Handler: import_experiment
 *
 * One experiment when an ID is given, otherwise every experiment in the
 * output directory.
 */
export async function handleImportExperiment(args: unknown, ctx: HandlerContext): Promise<ToolResponse> {
  try {
    const input = ImportExperimentInputSchema.parse(args ?? {});

    if (input.experimentId) {
      const outcome = await ctx.importer.importExperiment(experimentDirectory(ctx.outputDir, input.experimentId), {
        force: input.force,
      });
      return createSuccessResponse({ results: [outcome] });
    }

    const results = await ctx.importer.importAll(ctx.outputDir, { force: input.force });
    return createSuccessResponse({
      results,
      imported: results.filter((r) => r.status === 'imported').length,
      skipped: results.filter((r) => r.status === 'skipped').length,
      notReady: results.filter((r) => r.status === 'not_ready').length,
      failed: results.filter((r) => r.status === 'failed').length,
    });
  } catch (error) {
    return createErrorResponse(wrapError(error));
  }
}

// --- Handler Registration ---

export function registerImportHandlers(registry: HandlerRegistry): void {
  registry.register('import_experiment', handleImportExperiment);
}
