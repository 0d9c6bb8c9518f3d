/**
 * Experiment orchestration
 *
 * An experiment is `repetitions` conversations between the same two agent
 * specs. Each gets its own event log; the manifest tracks them all. The
 * conversations share a worker pool of `maxParallel`.
 */

import { randomUUID } from 'crypto';
import { mkdir } from 'node:fs/promises';
import { assertAgentsAvailable, createAgent, type ConversationAgent } from '../agents/index.js';
import type { ApiKeyConfig } from '../config/providers.js';
import { ConfigurationError, PersistenceError } from '../errors/index.js';
import type { FileOps } from '../storage/atomic-file.js';
import { EventStore } from '../storage/event-store.js';
import type { Importer, ImportOutcome } from '../storage/importer.js';
import { listExperimentDirectories } from '../storage/importer.js';
import { deriveFinalStatus, ManifestStore, readManifest } from '../storage/manifest.js';
import { eventLogFilename, experimentDirectory } from '../storage/paths.js';
import {
  MANIFEST_VERSION,
  type AgentSlot,
  type AgentSpec,
  type Conversation,
  type ConvergenceSettings,
  type ExperimentConfig,
  type ExperimentManifest,
  type ExperimentStatus,
  type ManifestConversationEntry,
} from '../types/index.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { createLogger } from '../utils/logger.js';
import type { RetryOptions } from '../utils/retry.js';
import type { ConvergenceScorer } from './convergence-engine.js';
import { ConversationRunner, type ConversationResult } from './conversation-runner.js';

const logger = createLogger('ExperimentRunner');

export type AgentFactory = (spec: AgentSpec, slot: AgentSlot, conversationIndex: number) => ConversationAgent;

export type EngineFactory = (settings: ConvergenceSettings, conversationIndex: number) => ConvergenceScorer;

export interface ExperimentRunnerOptions {
  outputDir: string;
  apiKeys?: ApiKeyConfig;
  /** Replaces createAgent; API keys are not checked when set */
  agentFactory?: AgentFactory;
  engineFactory?: EngineFactory;
  /** Runs after every conversation is terminal */
  importer?: Importer;
  retry?: Partial<RetryOptions>;
  idGenerator?: () => string;
  now?: () => Date;
  fileOps?: FileOps;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface ExperimentSummary {
  experimentId: string;
  directory: string;
  status: ExperimentStatus;
  conversations: ConversationResult[];
  importOutcome?: ImportOutcome;
  importError?: string;
}

export interface LaunchedExperiment {
  experimentId: string;
  directory: string;
  /** Settles once the experiment reaches a final status */
  completion: Promise<ExperimentSummary>;
}

export interface ExperimentListing {
  experimentId: string;
  name: string;
  status: ExperimentStatus;
  createdAt: string;
  counters: ExperimentManifest['counters'];
  active: boolean;
}

export interface ListExperimentsOptions {
  status?: ExperimentStatus;
  limit?: number;
}

interface PlannedConversation {
  conversation: Conversation;
  agentA: ConversationAgent;
  agentB: ConversationAgent;
  engine?: ConvergenceScorer;
}

function entryPatch(
  snapshot: Readonly<Conversation>,
  finalScore: number | null
): Partial<Omit<ManifestConversationEntry, 'id' | 'eventLog'>> {
  return {
    status: snapshot.status,
    turnsCompleted: snapshot.turnCount,
    endReason: snapshot.endReason ?? null,
    finalScore,
    error: snapshot.error ?? null,
    startedAt: snapshot.startedAt?.toISOString() ?? null,
    endedAt: snapshot.endedAt?.toISOString() ?? null,
  };
}

export class ExperimentRunner {
  private readonly outputDir: string;
  private readonly apiKeys: ApiKeyConfig;
  private readonly agentFactory?: AgentFactory;
  private readonly engineFactory?: EngineFactory;
  private readonly importer?: Importer;
  private readonly retry?: Partial<RetryOptions>;
  private readonly idGenerator: () => string;
  private readonly now: () => Date;
  private readonly fileOps?: FileOps;
  private readonly active = new Map<string, AbortController>();

  constructor(options: ExperimentRunnerOptions) {
    this.outputDir = options.outputDir;
    this.apiKeys = options.apiKeys ?? {};
    this.agentFactory = options.agentFactory;
    this.engineFactory = options.engineFactory;
    this.importer = options.importer;
    this.retry = options.retry;
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.now = options.now ?? (() => new Date());
    this.fileOps = options.fileOps;
  }

  /**
   * Run an experiment to completion
   */
  async run(config: ExperimentConfig, options: RunOptions = {}): Promise<ExperimentSummary> {
    const launched = await this.launch(config, options);
    return launched.completion;
  }

  /**
   * Create the experiment on disk and start its conversations.
   * Resolves once the manifest is `running`.
   *
   * @throws ConfigurationError before anything is written when agents cannot be built
   */
  async launch(config: ExperimentConfig, options: RunOptions = {}): Promise<LaunchedExperiment> {
    if (!this.agentFactory) {
      assertAgentsAvailable([config.agentA, config.agentB], this.apiKeys);
    }

    const experimentId = this.idGenerator();
    const directory = experimentDirectory(this.outputDir, experimentId);
    const planned = this.plan(experimentId, config);

    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Cannot create experiment directory ${directory}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const manifest = new ManifestStore(directory, { fileOps: this.fileOps });
    await manifest.create(this.initialManifest(experimentId, config, planned));
    await manifest.setStatus('running', { startedAt: this.now().toISOString() });

    const controller = new AbortController();
    const { signal } = options;
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', () => controller.abort(), { once: true });
    }
    this.active.set(experimentId, controller);

    logger.info(
      { experimentId, name: config.name, conversations: planned.length, maxParallel: config.maxParallel },
      'Experiment started'
    );

    const completion = this.execute(experimentId, directory, config, planned, manifest, controller.signal).finally(
      () => {
        this.active.delete(experimentId);
      }
    );

    return { experimentId, directory, completion };
  }

  /**
   * Interrupt a running experiment started by this runner
   *
   * @returns false when the experiment is not running here
   */
  stop(experimentId: string): boolean {
    const controller = this.active.get(experimentId);
    if (!controller) {
      return false;
    }
    logger.info({ experimentId }, 'Stopping experiment');
    controller.abort();
    return true;
  }

  isActive(experimentId: string): boolean {
    return this.active.has(experimentId);
  }

  /**
   * Manifest of an experiment in the output directory
   *
   * @throws PersistenceError (MANIFEST_MISSING) for unknown experiments and
   * ConfigurationError (INVALID_EXPERIMENT_ID) for IDs outside the output directory
   */
  async getStatus(experimentId: string): Promise<ExperimentManifest> {
    return readManifest(experimentDirectory(this.outputDir, experimentId));
  }

  /**
   * Experiments in the output directory, newest first
   */
  async listExperiments(options: ListExperimentsOptions = {}): Promise<ExperimentListing[]> {
    const listings: ExperimentListing[] = [];

    for (const name of await listExperimentDirectories(this.outputDir)) {
      let manifest: ExperimentManifest;
      try {
        manifest = await readManifest(experimentDirectory(this.outputDir, name));
      } catch (error) {
        logger.warn({ err: error, directory: name }, 'Skipping experiment with unreadable manifest');
        continue;
      }
      if (options.status && manifest.status !== options.status) {
        continue;
      }
      listings.push({
        experimentId: manifest.experimentId,
        name: manifest.name,
        status: manifest.status,
        createdAt: manifest.createdAt,
        counters: manifest.counters,
        active: this.active.has(manifest.experimentId),
      });
    }

    listings.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return options.limit === undefined ? listings : listings.slice(0, options.limit);
  }

  // ============================================
  // Internals
  // ============================================

  private plan(experimentId: string, config: ExperimentConfig): PlannedConversation[] {
    const createdAt = this.now();
    const planned: PlannedConversation[] = [];

    for (let index = 0; index < config.repetitions; index++) {
      const conversation: Conversation = {
        id: this.idGenerator(),
        experimentId,
        agentA: config.agentA,
        agentB: config.agentB,
        initialPrompt: config.initialPrompt,
        maxTurns: config.maxTurns,
        status: 'created',
        turnCount: 0,
        convergence: config.convergence,
        createdAt,
      };
      planned.push({
        conversation,
        agentA: this.buildAgent(config.agentA, 'agent_a', index),
        agentB: this.buildAgent(config.agentB, 'agent_b', index),
        engine: this.engineFactory?.(config.convergence, index),
      });
    }

    const ids = new Set(planned.map((p) => p.conversation.id));
    if (ids.size !== planned.length || ids.has(experimentId)) {
      throw new ConfigurationError('Generated conversation ids are not unique', { code: 'INVALID_CONFIG' });
    }
    return planned;
  }

  private buildAgent(spec: AgentSpec, slot: AgentSlot, index: number): ConversationAgent {
    return this.agentFactory ? this.agentFactory(spec, slot, index) : createAgent(spec, slot, this.apiKeys);
  }

  private initialManifest(
    experimentId: string,
    config: ExperimentConfig,
    planned: readonly PlannedConversation[]
  ): ExperimentManifest {
    const conversations: Record<string, ManifestConversationEntry> = {};
    for (const { conversation } of planned) {
      conversations[conversation.id] = {
        id: conversation.id,
        eventLog: eventLogFilename(conversation.id),
        status: 'created',
        turnsCompleted: 0,
        endReason: null,
        finalScore: null,
        error: null,
        startedAt: null,
        endedAt: null,
      };
    }

    return {
      version: MANIFEST_VERSION,
      experimentId,
      name: config.name,
      status: 'created',
      createdAt: this.now().toISOString(),
      startedAt: null,
      completedAt: null,
      agentA: config.agentA,
      agentB: config.agentB,
      config: {
        maxTurns: config.maxTurns,
        temperatureA: config.agentA.temperature ?? null,
        temperatureB: config.agentB.temperature ?? null,
        initialPrompt: config.initialPrompt,
        convergence: config.convergence,
        maxParallel: config.maxParallel,
        repetitions: config.repetitions,
        callTimeoutMs: config.callTimeoutMs,
        maxRetries: config.maxRetries,
      },
      counters: { total: 0, created: 0, running: 0, paused: 0, completed: 0, failed: 0, interrupted: 0 },
      conversations,
      error: null,
    };
  }

  private async execute(
    experimentId: string,
    directory: string,
    config: ExperimentConfig,
    planned: readonly PlannedConversation[],
    manifest: ManifestStore,
    signal: AbortSignal
  ): Promise<ExperimentSummary> {
    const eventStore = new EventStore(directory);

    const settled = await mapWithConcurrency(planned, config.maxParallel, (item) =>
      this.runConversation(item, config, eventStore, manifest, signal)
    );

    const conversations: ConversationResult[] = [];
    const failures: string[] = [];
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        if (result.value) {
          conversations.push(result.value);
        }
      } else {
        const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
        logger.error({ experimentId, err: result.reason }, 'Conversation worker failed');
        failures.push(message);
      }
    }

    const summary: ExperimentSummary = { experimentId, directory, status: 'running', conversations };

    if (failures.length > 0) {
      summary.status = 'failed';
      await manifest.setStatus('failed', { completedAt: this.now().toISOString(), error: failures.join('; ') });
      return summary;
    }

    if (signal.aborted) {
      summary.status = 'interrupted';
      await manifest.setStatus('interrupted', { completedAt: this.now().toISOString() });
      logger.info({ experimentId }, 'Experiment interrupted');
      return summary;
    }

    await manifest.setStatus('post_processing');

    if (this.importer) {
      try {
        summary.importOutcome = await this.importer.importExperiment(directory);
      } catch (error) {
        // The experiment is intact; `.importing` stays behind so a later import redoes it
        summary.importError = error instanceof Error ? error.message : String(error);
        logger.error({ experimentId, err: error }, 'Import after experiment failed');
      }
    }

    const current = manifest.snapshot();
    const finalStatus = current ? deriveFinalStatus(current.counters) : 'failed';
    await manifest.setStatus(finalStatus, { completedAt: this.now().toISOString() });
    summary.status = finalStatus;

    logger.info({ experimentId, status: finalStatus, conversations: conversations.length }, 'Experiment finished');
    return summary;
  }

  /**
   * Run one conversation. Returns null when the experiment was stopped
   * before this conversation started.
   */
  private async runConversation(
    item: PlannedConversation,
    config: ExperimentConfig,
    eventStore: EventStore,
    manifest: ManifestStore,
    signal: AbortSignal
  ): Promise<ConversationResult | null> {
    if (signal.aborted) {
      return null;
    }

    const { conversation } = item;
    const log = eventStore.openLog(conversation.id);
    const runner: ConversationRunner = new ConversationRunner({
      conversation,
      agentA: item.agentA,
      agentB: item.agentB,
      engine: item.engine,
      log,
      callTimeoutMs: config.callTimeoutMs,
      retry: { ...this.retry, maxRetries: config.maxRetries },
      now: this.now,
      onUpdate: async (snapshot) => {
        await manifest.updateConversation(conversation.id, entryPatch(snapshot, runner.result().finalScore));
      },
    });

    const interrupts: Promise<void>[] = [];
    const onAbort = (): void => {
      interrupts.push(runner.interrupt());
    };

    let result: ConversationResult;
    try {
      const running = runner.run();
      // run() has left `created` synchronously, so interrupt() is legal from here on
      signal.addEventListener('abort', onAbort, { once: true });
      result = await running;
      await Promise.all(interrupts);
    } finally {
      signal.removeEventListener('abort', onAbort);
      await log.close();
    }

    // Listener failures are only logged by the runner; make sure the outcome lands
    await manifest.updateConversation(conversation.id, entryPatch(runner.snapshot(), result.finalScore));
    return result;
  }
}
