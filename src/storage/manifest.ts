/**
 * Experiment manifest
 *
 * manifest.json is rewritten whole on every update through writeFileAtomic,
 * and all updates of one experiment go through a single SerialQueue. A failed
 * update leaves both the file and the in-memory copy at their previous value.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { PersistenceError } from '../errors/index.js';
import { ExperimentManifestSchema } from '../types/schemas.js';
import type {
  ExperimentManifest,
  ExperimentStatus,
  ManifestConversationEntry,
  ManifestCounters,
  TerminalExperimentStatus,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { SerialQueue } from '../utils/serial-queue.js';
import { nodeFileOps, writeFileAtomic, type FileOps } from './atomic-file.js';
import { manifestPath } from './paths.js';

const logger = createLogger('ManifestStore');

export interface ManifestStoreOptions {
  fileOps?: FileOps;
  queue?: SerialQueue;
}

export function countConversations(conversations: Readonly<Record<string, ManifestConversationEntry>>): ManifestCounters {
  const counters: ManifestCounters = {
    total: 0,
    created: 0,
    running: 0,
    paused: 0,
    completed: 0,
    failed: 0,
    interrupted: 0,
  };
  for (const entry of Object.values(conversations)) {
    counters.total++;
    counters[entry.status]++;
  }
  return counters;
}

export function allConversationsTerminal(manifest: ExperimentManifest): boolean {
  const { counters } = manifest;
  return counters.completed + counters.failed + counters.interrupted === counters.total;
}

export function isTerminalExperimentStatus(status: ExperimentStatus): status is TerminalExperimentStatus {
  switch (status) {
    case 'completed':
    case 'completed_with_failures':
    case 'failed':
    case 'interrupted':
      return true;
    case 'created':
    case 'running':
    case 'post_processing':
      return false;
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown experiment status: ${String(unreachable)}`);
    }
  }
}

/**
 * Experiment outcome once every conversation has finished
 */
export function deriveFinalStatus(counters: ManifestCounters): TerminalExperimentStatus {
  if (counters.interrupted > 0) {
    return 'interrupted';
  }
  if (counters.total > 0 && counters.failed === counters.total) {
    return 'failed';
  }
  return counters.failed > 0 ? 'completed_with_failures' : 'completed';
}

/**
 * Read and validate manifest.json from an experiment directory
 *
 * @throws PersistenceError with code MANIFEST_MISSING or INVALID_MANIFEST
 */
export async function readManifest(experimentDir: string): Promise<ExperimentManifest> {
  const path = manifestPath(experimentDir);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new PersistenceError(`Manifest not found at ${path}`, {
      code: 'MANIFEST_MISSING',
      cause: error instanceof Error ? error : undefined,
    });
  }

  try {
    return ExperimentManifestSchema.parse(JSON.parse(text));
  } catch (error) {
    const detail = error instanceof z.ZodError ? z.prettifyError(error) : String(error);
    throw new PersistenceError(`Invalid manifest at ${path}: ${detail}`, {
      code: 'INVALID_MANIFEST',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export class ManifestStore {
  private readonly fileOps: FileOps;
  private readonly queue: SerialQueue;
  private current: ExperimentManifest | null = null;

  constructor(
    readonly experimentDir: string,
    options: ManifestStoreOptions = {}
  ) {
    this.fileOps = options.fileOps ?? nodeFileOps;
    this.queue = options.queue ?? new SerialQueue();
  }

  get path(): string {
    return manifestPath(this.experimentDir);
  }

  /**
   * Write the initial manifest
   */
  create(manifest: ExperimentManifest): Promise<ExperimentManifest> {
    return this.queue.run(async () => {
      const next = { ...structuredClone(manifest), counters: countConversations(manifest.conversations) };
      await this.persist(next);
      return structuredClone(next);
    });
  }

  /**
   * Load the manifest from disk into this store
   */
  load(): Promise<ExperimentManifest> {
    return this.queue.run(async () => {
      this.current = await readManifest(this.experimentDir);
      return structuredClone(this.current);
    });
  }

  /**
   * Latest manifest written or loaded by this store
   */
  snapshot(): ExperimentManifest | null {
    return this.current ? structuredClone(this.current) : null;
  }

  /**
   * Apply `mutate` to a copy of the current manifest and swap it in.
   * Counters are recomputed from the conversation map.
   */
  update(mutate: (draft: ExperimentManifest) => void): Promise<ExperimentManifest> {
    return this.queue.run(async () => {
      const base = this.current ?? (await readManifest(this.experimentDir));
      const draft = structuredClone(base);
      mutate(draft);
      draft.counters = countConversations(draft.conversations);
      await this.persist(draft);
      return structuredClone(draft);
    });
  }

  updateConversation(
    conversationId: string,
    patch: Partial<Omit<ManifestConversationEntry, 'id' | 'eventLog'>>
  ): Promise<ExperimentManifest> {
    return this.update((draft) => {
      const entry = draft.conversations[conversationId];
      if (!entry) {
        throw new PersistenceError(`Conversation ${conversationId} is not in the manifest`, {
          code: 'UNKNOWN_CONVERSATION',
        });
      }
      draft.conversations[conversationId] = { ...entry, ...patch };
    });
  }

  setStatus(
    status: ExperimentStatus,
    extra: Partial<Pick<ExperimentManifest, 'startedAt' | 'completedAt' | 'error'>> = {}
  ): Promise<ExperimentManifest> {
    return this.update((draft) => {
      draft.status = status;
      Object.assign(draft, extra);
    });
  }

  private async persist(next: ExperimentManifest): Promise<void> {
    await writeFileAtomic(this.path, `${JSON.stringify(next, null, 2)}\n`, this.fileOps);
    this.current = next;
    logger.debug(
      { experimentId: next.experimentId, status: next.status, counters: next.counters },
      'Manifest written'
    );
  }
}
