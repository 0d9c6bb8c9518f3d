/**
 * Import markers
 *
 * `.importing` is written durably before an import starts and renamed over
 * `.imported` once the projection is persisted. A leftover `.importing`
 * means the last import did not finish.
 */

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { nodeFileOps, type FileOps } from './atomic-file.js';
import { IMPORTED_MARKER, IMPORTING_MARKER } from './paths.js';

export type ImportMarkerState = 'none' | 'importing' | 'imported';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class ImportMarkers {
  constructor(
    readonly experimentDir: string,
    private readonly fileOps: FileOps = nodeFileOps
  ) {}

  get importingPath(): string {
    return join(this.experimentDir, IMPORTING_MARKER);
  }

  get importedPath(): string {
    return join(this.experimentDir, IMPORTED_MARKER);
  }

  /**
   * `.importing` wins over `.imported`: an unfinished import must be redone
   */
  async state(): Promise<ImportMarkerState> {
    if (await exists(this.importingPath)) {
      return 'importing';
    }
    return (await exists(this.importedPath)) ? 'imported' : 'none';
  }

  async begin(startedAt: string): Promise<void> {
    await this.fileOps.writeDurable(this.importingPath, `${startedAt}\n`);
  }

  async commit(): Promise<void> {
    await this.fileOps.rename(this.importingPath, this.importedPath);
  }
}
