/**
 * Experiment directory layout
 *
 * <outputDir>/<experimentId>/
 *   manifest.json
 *   <conversationId>.jsonl
 *   .importing | .imported
 */

import { join, relative, resolve } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import { EXPERIMENT_ID_PATTERN } from '../types/schemas.js';

export const MANIFEST_FILENAME = 'manifest.json';
export const IMPORTING_MARKER = '.importing';
export const IMPORTED_MARKER = '.imported';
export const EVENT_LOG_EXTENSION = '.jsonl';

/**
 * Directory of an experiment directly under `outputDir`
 *
 * @throws ConfigurationError (INVALID_EXPERIMENT_ID) for an ID that is not a
 * single safe segment or resolves outside `outputDir`
 */
export function experimentDirectory(outputDir: string, experimentId: string): string {
  const rel = relative(resolve(outputDir), resolve(outputDir, experimentId));
  if (!EXPERIMENT_ID_PATTERN.test(experimentId) || rel !== experimentId) {
    throw new ConfigurationError(`Invalid experiment ID: ${JSON.stringify(experimentId)}`, {
      code: 'INVALID_EXPERIMENT_ID',
    });
  }
  return join(outputDir, experimentId);
}

export function manifestPath(experimentDir: string): string {
  return join(experimentDir, MANIFEST_FILENAME);
}

export function eventLogFilename(conversationId: string): string {
  return `${conversationId}${EVENT_LOG_EXTENSION}`;
}

export function eventLogPath(experimentDir: string, conversationId: string): string {
  return join(experimentDir, eventLogFilename(conversationId));
}
