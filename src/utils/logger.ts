/**
 * Structured logging system using Pino
 */

import pino from 'pino';
import { createRequire } from 'module';

// Create require for ESM compatibility
const require = createRequire(import.meta.url);

/**
 * Determine if pretty printing should be used
 * Disabled in test environment and production
 */
function shouldUsePrettyPrint(): boolean {
  const env = process.env.NODE_ENV || '';
  return env !== 'production' && env !== 'test' && !process.env.CI;
}

/**
 * Check if pino-pretty is available
 * It may not be installed in npx/production environments
 */
function isPinoPrettyAvailable(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
const base = { service: 'parley' };

/**
 * Main logger instance
 *
 * Writes to stderr: stdout carries the MCP stdio protocol.
 */
export const logger =
  shouldUsePrettyPrint() && isPinoPrettyAvailable()
    ? pino({
        level,
        base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      })
    : pino({ level, base }, pino.destination(2));

/**
 * Create a child logger with specific context
 *
 * @param context - Context identifier (e.g., 'BaseAgent', 'ConversationRunner')
 * @returns Child logger with context field
 *
 * @example
 * const log = createLogger('ConversationRunner');
 * log.info({ conversationId: 'conv-1' }, 'Turn started');
 */
export function createLogger(context: string): pino.Logger {
  return logger.child({ context });
}
