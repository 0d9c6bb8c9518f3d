/**
 * Durable file primitives
 */

import { open, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PersistenceError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('AtomicFile');

/**
 * File operations used by durable writers. Injectable so tests can simulate
 * failures between writing the side file and swapping it in.
 */
export interface FileOps {
  /** Write `data` to `path`, replacing it, and fsync before resolving */
  writeDurable(path: string, data: string | Uint8Array): Promise<void>;
  /** Atomically replace `to` with `from` */
  rename(from: string, to: string): Promise<void>;
  /** Remove a file; missing files are ignored */
  remove(path: string): Promise<void>;
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const handle = await open(dir, 'r');
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch (error) {
    // Directory fsync is unsupported on some platforms
    logger.debug({ err: error, dir }, 'Directory sync skipped');
  }
}

export const nodeFileOps: FileOps = {
  async writeDurable(path, data) {
    const handle = await open(path, 'w');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
  },

  async rename(from, to) {
    await rename(from, to);
    await syncDirectory(dirname(to));
  },

  async remove(path) {
    await rm(path, { force: true });
  },
};

let sideFileCounter = 0;

/**
 * Replace `path` with `data` so that readers only ever see the old or the
 * new complete content: write a side file, fsync it, rename it over `path`.
 *
 * @throws PersistenceError when any step fails; `path` is left untouched
 */
export async function writeFileAtomic(
  path: string,
  data: string | Uint8Array,
  fileOps: FileOps = nodeFileOps
): Promise<void> {
  const sidePath = `${path}.${process.pid}.${++sideFileCounter}.tmp`;

  try {
    await fileOps.writeDurable(sidePath, data);
    await fileOps.rename(sidePath, path);
  } catch (error) {
    await fileOps.remove(sidePath).catch((cleanupError: unknown) => {
      logger.warn({ err: cleanupError, sidePath }, 'Failed to remove side file');
    });
    throw new PersistenceError(`Atomic write of ${path} failed`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}
