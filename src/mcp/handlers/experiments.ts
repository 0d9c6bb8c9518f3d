/**
 * Experiment handlers
 * Handles: run_experiment, get_experiment_status, list_experiments, stop_experiment
 */

import { join } from 'node:path';
import { loadExperimentConfig, parseExperimentConfig } from '../../config/loader.js';
import { replayConversation } from '../../core/replay.js';
import { readEventLog } from '../../storage/event-store.js';
import { ImportMarkers } from '../../storage/markers.js';
import { experimentDirectory } from '../../storage/paths.js';
import type { ExperimentManifest, ManifestConversationEntry } from '../../types/index.js';
import {
  GetExperimentStatusInputSchema,
  ListExperimentsInputSchema,
  RunExperimentInputSchema,
  StopExperimentInputSchema,
} from '../../types/schemas.js';
import { createLogger } from '../../utils/logger.js';
import type { HandlerContext, HandlerRegistry } from '../handler-registry.js';
import { createErrorResponse, createSuccessResponse, type ToolResponse } from '../tools.js';
import { wrapError } from './utils.js';

const logger = createLogger('ExperimentHandlers');

/**
 * Handler: run_experiment
 */
export async function handleRunExperiment(args: unknown, ctx: HandlerContext): Promise<ToolResponse> {
  try {
    const input = RunExperimentInputSchema.parse(args);
    const config = input.configPath
      ? await loadExperimentConfig(input.configPath, ctx.configDefaults)
      : parseExperimentConfig(input.config, ctx.configDefaults);

    const launched = await ctx.experimentRunner.launch(config);

    if (!input.wait) {
      void launched.completion.then(
        (summary) => {
          logger.info({ experimentId: summary.experimentId, status: summary.status }, 'Background experiment finished');
        },
        (error: unknown) => {
          logger.error({ err: error, experimentId: launched.experimentId }, 'Background experiment failed');
        }
      );
      return createSuccessResponse({
        experimentId: launched.experimentId,
        status: 'running',
        conversations: config.repetitions,
        directory: launched.directory,
      });
    }

    const summary = await launched.completion;
    return createSuccessResponse({
      experimentId: summary.experimentId,
      status: summary.status,
      directory: summary.directory,
      conversations: summary.conversations.map((c) => ({
        conversationId: c.conversationId,
        status: c.status,
        endReason: c.endReason ?? null,
        turns: c.turns.length,
        finalScore: c.finalScore,
        ...(c.error !== undefined ? { error: c.error } : {}),
      })),
      ...(summary.importOutcome ? { import: summary.importOutcome } : {}),
      ...(summary.importError ? { importError: summary.importError } : {}),
    });
  } catch (error) {
    return createErrorResponse(wrapError(error));
  }
}

interface ConversationStatusView {
  conversationId: string;
  status: ManifestConversationEntry['status'];
  endReason: ManifestConversationEntry['endReason'];
  turnsCompleted: number;
  finalScore: number | null;
  error: string | null;
  lastScore?: number | null;
  totalTokens?: number;
  costUsd?: number;
  partialMessages?: number;
}

async function describeConversation(
  directory: string,
  entry: ManifestConversationEntry
): Promise<ConversationStatusView> {
  const base: ConversationStatusView = {
    conversationId: entry.id,
    status: entry.status,
    endReason: entry.endReason,
    turnsCompleted: entry.turnsCompleted,
    finalScore: entry.finalScore,
    error: entry.error,
  };
  if (entry.status === 'created') {
    return base;
  }

  try {
    const { events } = await readEventLog(join(directory, entry.eventLog));
    const snapshot = replayConversation(events);
    return {
      ...base,
      lastScore: snapshot.lastScore,
      totalTokens: snapshot.usage.totalTokens,
      costUsd: snapshot.costUsd,
      partialMessages: snapshot.partialMessages.length,
    };
  } catch (error) {
    // The manifest entry is still worth returning
    logger.warn({ err: error, conversationId: entry.id }, 'Could not replay conversation log');
    return base;
  }
}

/**
 * Handler: get_experiment_status
 */
export async function handleGetExperimentStatus(args: unknown, ctx: HandlerContext): Promise<ToolResponse> {
  try {
    const input = GetExperimentStatusInputSchema.parse(args);
    const manifest: ExperimentManifest = await ctx.experimentRunner.getStatus(input.experimentId);
    const directory = experimentDirectory(ctx.outputDir, input.experimentId);
    const importState = await new ImportMarkers(directory).state();

    const conversations = await Promise.all(
      Object.values(manifest.conversations).map((entry) => describeConversation(directory, entry))
    );

    return createSuccessResponse({
      experimentId: manifest.experimentId,
      name: manifest.name,
      status: manifest.status,
      active: ctx.experimentRunner.isActive(manifest.experimentId),
      createdAt: manifest.createdAt,
      startedAt: manifest.startedAt,
      completedAt: manifest.completedAt,
      counters: manifest.counters,
      convergence: {
        profile: manifest.config.convergence.profile,
        threshold: manifest.config.convergence.threshold,
        action: manifest.config.convergence.action,
      },
      importState,
      conversations,
      error: manifest.error,
    });
  } catch (error) {
    return createErrorResponse(wrapError(error));
  }
}

/**
 * Handler: list_experiments
 */
export async function handleListExperiments(args: unknown, ctx: HandlerContext): Promise<ToolResponse> {
  try {
    const input = ListExperimentsInputSchema.parse(args ?? {});
    const experiments = await ctx.experimentRunner.listExperiments({ status: input.status, limit: input.limit });
    return createSuccessResponse({ experiments, count: experiments.length });
  } catch (error) {
    return createErrorResponse(wrapError(error));
  }
}

/**
 * Handler: stop_experiment
 */
export async function handleStopExperiment(args: unknown, ctx: HandlerContext): Promise<ToolResponse> {
  try {
    const input = StopExperimentInputSchema.parse(args);
    if (!ctx.experimentRunner.stop(input.experimentId)) {
      return createErrorResponse(`Experiment ${input.experimentId} is not running`);
    }
    return createSuccessResponse({ experimentId: input.experimentId, stopping: true });
  } catch (error) {
    return createErrorResponse(wrapError(error));
  }
}

// --- Handler Registration ---

export function registerExperimentHandlers(registry: HandlerRegistry): void {
  registry.register('run_experiment', handleRunExperiment);
  registry.register('get_experiment_status', handleGetExperimentStatus);
  registry.register('list_experiments', handleListExperiments);
  registry.register('stop_experiment', handleStopExperiment);
}
