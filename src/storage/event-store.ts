/**
 * Append-only conversation event logs
 *
 * One JSONL file per conversation. Each append is written and fsynced before
 * its promise resolves, and appends to one log are serialized, so a record
 * the runner has seen committed survives a crash.
 */

import { open, readFile, type FileHandle } from 'node:fs/promises';
import { PersistenceError } from '../errors/index.js';
import { ConversationEventSchema } from '../types/schemas.js';
import type { ConversationEvent } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { SerialQueue } from '../utils/serial-queue.js';
import { eventLogPath } from './paths.js';

const logger = createLogger('EventStore');

/**
 * Destination for a conversation's events
 */
export interface EventSink {
  append(event: ConversationEvent): Promise<void>;
}

export interface EventLogContents {
  events: ConversationEvent[];
  /** A partial final record was found and skipped */
  tornTail: boolean;
}

/**
 * Durable event log for one conversation
 */
export class ConversationLog implements EventSink {
  private readonly queue = new SerialQueue();
  private handle: FileHandle | null = null;
  private closed = false;

  constructor(readonly path: string) {}

  append(event: ConversationEvent): Promise<void> {
    return this.queue.run(() => this.write(`${JSON.stringify(event)}\n`));
  }

  /**
   * Close the file once pending appends have settled
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.queue.drain();
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }

  private async write(line: string): Promise<void> {
    if (this.closed) {
      throw new PersistenceError(`Event log ${this.path} is closed`);
    }
    try {
      this.handle ??= await open(this.path, 'a');
      await this.handle.write(line);
      await this.handle.sync();
    } catch (error) {
      throw new PersistenceError(`Failed to append to event log ${this.path}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

/**
 * Parse the contents of an event log.
 *
 * A final line that does not parse is treated as a write torn by a crash:
 * it is skipped and reported. Any earlier bad line is corruption.
 *
 * @throws PersistenceError with code CORRUPT_EVENT_LOG
 */
export function parseEventLog(content: string, source: string = '<memory>'): EventLogContents {
  const lines = content.split('\n');
  const events: ConversationEvent[] = [];
  let tornTail = false;

  let lastRecord = lines.length - 1;
  while (lastRecord >= 0 && (lines[lastRecord]?.trim() ?? '').length === 0) {
    lastRecord--;
  }

  for (let i = 0; i <= lastRecord; i++) {
    const line = lines[i]?.trim() ?? '';
    if (line.length === 0) {
      continue;
    }

    const event = parseLine(line);

    if (event) {
      events.push(event);
    } else if (i === lastRecord) {
      tornTail = true;
      logger.warn({ source, line: i + 1 }, 'Skipping torn final record in event log');
    } else {
      throw new PersistenceError(`Corrupt record at line ${i + 1} of ${source}`, { code: 'CORRUPT_EVENT_LOG' });
    }
  }

  return { events, tornTail };
}

function parseLine(line: string): ConversationEvent | undefined {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return undefined;
  }
  const result = ConversationEventSchema.safeParse(json);
  return result.success ? result.data : undefined;
}

/**
 * Read an event log from disk
 */
export async function readEventLog(path: string): Promise<EventLogContents> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new PersistenceError(`Failed to read event log ${path}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseEventLog(content, path);
}

/**
 * Event logs of one experiment directory
 */
export class EventStore {
  constructor(readonly experimentDir: string) {}

  openLog(conversationId: string): ConversationLog {
    return new ConversationLog(eventLogPath(this.experimentDir, conversationId));
  }

  readEvents(conversationId: string): Promise<EventLogContents> {
    return readEventLog(eventLogPath(this.experimentDir, conversationId));
  }
}
