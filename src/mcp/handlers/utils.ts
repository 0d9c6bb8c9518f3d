/**
 * Shared helpers for MCP handlers
 */

import { z } from 'zod';
import { ConfigurationError } from '../../errors/index.js';

/**
 * Wrap unknown error as Error object. Zod failures become a
 * ConfigurationError carrying the formatted issues.
 */
export function wrapError(error: unknown): Error {
  if (error instanceof z.ZodError) {
    return new ConfigurationError(`Invalid input: ${z.prettifyError(error)}`, { code: 'INVALID_INPUT', cause: error });
  }
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === 'string') {
    return new Error(error);
  }
  return new Error(String(error));
}
