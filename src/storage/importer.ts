/**
 * Importer
 *
 * Projects finished experiment directories into the analytical store.
 * Event logs and the manifest are only read. Imports through one Importer
 * are serialized, so a shared store sees one transaction at a time.
 */

import type { Dirent } from 'node:fs';
import { access, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { replayConversation, type ConversationSnapshot, type ReplayedMessage } from '../core/replay.js';
import { messageMetrics } from '../core/text-analysis.js';
import { ImportError, ParleyError, PersistenceError } from '../errors/index.js';
import type { ConversationEvent, ExperimentManifest, ManifestConversationEntry } from '../types/index.js';
import type { StoredMessageMetricsRow } from '../types/schemas.js';
import { createLogger } from '../utils/logger.js';
import { SerialQueue } from '../utils/serial-queue.js';
import type {
  AnalyticsStore,
  ExperimentProjection,
  ProjectionCounts,
  StoredEventRow,
  StoredMessageRow,
} from './analytics.js';
import { nodeFileOps, type FileOps } from './atomic-file.js';
import {
  allConversationsTerminal,
  deriveFinalStatus,
  isTerminalExperimentStatus,
  readManifest,
} from './manifest.js';
import { ImportMarkers } from './markers.js';
import { readEventLog } from './event-store.js';
import { manifestPath } from './paths.js';

const logger = createLogger('Importer');

export interface ImporterOptions {
  store: AnalyticsStore;
  fileOps?: FileOps;
  now?: () => Date;
}

export interface ImportOptions {
  /** Re-import an experiment that is already imported */
  force?: boolean;
}

export type ImportOutcome =
  | { experimentId: string; status: 'imported'; resumed: boolean; counts: ProjectionCounts }
  | { experimentId: string; status: 'skipped' }
  | { experimentId: string; status: 'not_ready' }
  | { experimentId: string; status: 'failed'; error: string };

/**
 * An experiment is ready once no conversation can still produce events:
 * every conversation is terminal, or the experiment itself has ended
 * (unstarted conversations of an interrupted experiment stay `created`).
 */
export function isReadyForImport(manifest: ExperimentManifest): boolean {
  if (allConversationsTerminal(manifest)) {
    return true;
  }
  return (
    isTerminalExperimentStatus(manifest.status) && manifest.counters.running === 0 && manifest.counters.paused === 0
  );
}

function toMessageRow(experimentId: string, conversationId: string, message: ReplayedMessage, complete: boolean): StoredMessageRow {
  return {
    conversation_id: conversationId,
    experiment_id: experimentId,
    turn_index: message.turnIndex,
    speaker: message.speaker,
    text: message.text,
    prompt_tokens: message.usage.promptTokens,
    completion_tokens: message.usage.completionTokens,
    cost_usd: message.costUsd,
    latency_ms: message.latencyMs,
    complete: complete ? 1 : 0,
    timestamp: message.timestamp,
  };
}

function toMetricsRow(message: StoredMessageRow): StoredMessageMetricsRow {
  const metrics = messageMetrics(message.text);
  return {
    conversation_id: message.conversation_id,
    experiment_id: message.experiment_id,
    turn_index: message.turn_index,
    speaker: message.speaker,
    word_count: metrics.wordCount,
    char_count: metrics.charCount,
    sentence_count: metrics.sentenceCount,
    vocabulary_size: metrics.vocabularySize,
    type_token_ratio: metrics.typeTokenRatio,
    entropy: metrics.entropy,
    self_repetition: metrics.selfRepetition,
    question_count: metrics.questionCount,
    average_word_length: metrics.averageWordLength,
  };
}

function toEventRows(experimentId: string, conversationId: string, events: readonly ConversationEvent[]): StoredEventRow[] {
  return events.map((event, seq) => ({
    conversation_id: conversationId,
    experiment_id: experimentId,
    seq,
    type: event.type,
    timestamp: event.timestamp,
    payload: JSON.stringify(event.payload),
  }));
}

interface ReplayedConversation {
  entry: ManifestConversationEntry;
  events: ConversationEvent[];
  snapshot: ConversationSnapshot;
}

/**
 * Build the rows of an experiment from its manifest and replayed logs
 */
export function buildProjection(manifest: ExperimentManifest, conversations: readonly ReplayedConversation[]): ExperimentProjection {
  const experimentId = manifest.experimentId;
  const projection: ExperimentProjection = {
    experiment: {
      id: experimentId,
      name: manifest.name,
      status: isTerminalExperimentStatus(manifest.status) ? manifest.status : deriveFinalStatus(manifest.counters),
      created_at: manifest.createdAt,
      started_at: manifest.startedAt,
      completed_at: manifest.completedAt,
      agent_a_provider: manifest.agentA.provider,
      agent_a_model: manifest.agentA.model,
      agent_b_provider: manifest.agentB.provider,
      agent_b_model: manifest.agentB.model,
      max_turns: manifest.config.maxTurns,
      profile: manifest.config.convergence.profile,
      threshold: manifest.config.convergence.threshold,
      action: manifest.config.convergence.action,
      conversation_count: manifest.counters.total,
    },
    conversations: [],
    turns: [],
    messages: [],
    metrics: [],
    events: [],
  };

  for (const { entry, events, snapshot } of conversations) {
    const conversationId = entry.id;

    projection.conversations.push({
      id: conversationId,
      experiment_id: experimentId,
      status: snapshot.endReason ? snapshot.status : entry.status,
      end_reason: snapshot.endReason ?? entry.endReason,
      end_reason_raw: snapshot.endReasonRaw ?? entry.endReason,
      turns_completed: snapshot.turns.length,
      final_score: snapshot.lastScore,
      partial_messages: snapshot.partialMessages.length,
      prompt_tokens: snapshot.usage.promptTokens,
      completion_tokens: snapshot.usage.completionTokens,
      cost_usd: snapshot.costUsd,
      started_at: snapshot.startedAt ?? entry.startedAt,
      ended_at: snapshot.endedAt ?? entry.endedAt,
      error: snapshot.error ?? entry.error,
    });

    for (const turn of snapshot.turns) {
      projection.turns.push({
        conversation_id: conversationId,
        experiment_id: experimentId,
        turn_index: turn.index,
        score: turn.score,
        trend: turn.trend,
        cumulative_overlap: turn.cumulativeOverlap,
        content: turn.components.content,
        structure: turn.components.structure,
        sentences: turn.components.sentences,
        length: turn.components.length,
        punctuation: turn.components.punctuation,
        completed_at: turn.completedAt,
      });
      projection.messages.push(
        toMessageRow(experimentId, conversationId, turn.agentA, true),
        toMessageRow(experimentId, conversationId, turn.agentB, true)
      );
    }
    for (const message of snapshot.partialMessages) {
      projection.messages.push(toMessageRow(experimentId, conversationId, message, false));
    }
    projection.events.push(...toEventRows(experimentId, conversationId, events));
  }

  projection.metrics = projection.messages.map(toMetricsRow);
  return projection;
}

export class Importer {
  private readonly store: AnalyticsStore;
  private readonly fileOps: FileOps;
  private readonly now: () => Date;
  private readonly queue = new SerialQueue();

  constructor(options: ImporterOptions) {
    this.store = options.store;
    this.fileOps = options.fileOps ?? nodeFileOps;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Import one experiment directory
   *
   * @throws ImportError with code MANIFEST_MISSING, NOT_READY or INVALID_EVENT_LOG
   */
  importExperiment(experimentDir: string, options: ImportOptions = {}): Promise<ImportOutcome> {
    return this.queue.run(() => this.runImport(experimentDir, options.force ?? false));
  }

  /**
   * Import every experiment directory under `outputDir`. Failures are
   * reported per experiment.
   */
  async importAll(outputDir: string, options: ImportOptions = {}): Promise<ImportOutcome[]> {
    const outcomes: ImportOutcome[] = [];
    for (const experimentId of await listExperimentDirectories(outputDir)) {
      const dir = join(outputDir, experimentId);
      try {
        outcomes.push(await this.importExperiment(dir, options));
      } catch (error) {
        if (error instanceof ImportError && error.code === 'NOT_READY') {
          outcomes.push({ experimentId, status: 'not_ready' });
          continue;
        }
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ err: error, experimentId }, 'Experiment import failed');
        outcomes.push({ experimentId, status: 'failed', error: message });
      }
    }
    return outcomes;
  }

  private async runImport(experimentDir: string, force: boolean): Promise<ImportOutcome> {
    const manifest = await loadManifest(experimentDir);
    const { experimentId } = manifest;
    const markers = new ImportMarkers(experimentDir, this.fileOps);
    const markerState = await markers.state();

    if (markerState === 'imported' && !force) {
      logger.debug({ experimentId }, 'Already imported, skipping');
      return { experimentId, status: 'skipped' };
    }
    if (!isReadyForImport(manifest)) {
      throw new ImportError(`Experiment ${experimentId} still has conversations in progress`, { code: 'NOT_READY' });
    }

    const resumed = markerState === 'importing';
    if (resumed) {
      logger.warn({ experimentId }, 'Found unfinished import, importing again');
    }

    await markers.begin(this.now().toISOString());

    const conversations: ReplayedConversation[] = [];
    for (const entry of Object.values(manifest.conversations).sort((a, b) => a.id.localeCompare(b.id))) {
      conversations.push(await replayEntry(experimentDir, entry));
    }

    const projection = buildProjection(manifest, conversations);
    await this.store.replaceExperiment(projection);
    await this.store.persist();
    await markers.commit();

    const counts = await this.store.countRows(experimentId);
    logger.info({ experimentId, resumed, ...counts }, 'Experiment imported');
    return { experimentId, status: 'imported', resumed, counts };
  }
}

async function loadManifest(experimentDir: string): Promise<ExperimentManifest> {
  try {
    return await readManifest(experimentDir);
  } catch (error) {
    if (error instanceof PersistenceError) {
      const code = error.code === 'MANIFEST_MISSING' ? 'MANIFEST_MISSING' : 'INVALID_MANIFEST';
      throw new ImportError(error.message, { code, cause: error });
    }
    throw error;
  }
}

async function replayEntry(experimentDir: string, entry: ManifestConversationEntry): Promise<ReplayedConversation> {
  // Never started, so no log was opened
  if (entry.status === 'created') {
    return { entry, events: [], snapshot: replayConversation([]) };
  }

  try {
    const { events, tornTail } = await readEventLog(join(experimentDir, entry.eventLog));
    if (tornTail) {
      logger.warn({ conversationId: entry.id }, 'Importing event log with torn final record');
    }
    return { entry, events, snapshot: replayConversation(events) };
  } catch (error) {
    if (error instanceof ParleyError) {
      throw new ImportError(`Cannot import conversation ${entry.id}: ${error.message}`, {
        code: 'INVALID_EVENT_LOG',
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Names of the directories under `outputDir` that hold a manifest
 */
export async function listExperimentDirectories(outputDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(outputDir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw new PersistenceError(`Failed to list ${outputDir}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const names: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory() && (await fileExists(manifestPath(join(outputDir, entry.name))))) {
      names.push(entry.name);
    }
  }
  return names.sort();
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
