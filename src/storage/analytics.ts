/**
 * Analytical store for imported experiments
 * Uses sql.js (pure JavaScript/WebAssembly) so it runs anywhere Node does
 */

import { readFile } from 'node:fs/promises';
import initSqlJs from 'sql.js';
import type { SqlJsStatic, Database as SqlJsDatabase, SqlValue } from 'sql.js';
import { z, ZodError } from 'zod';
import { PersistenceError } from '../errors/index.js';
import {
  StoredConversationRowSchema,
  StoredExperimentRowSchema,
  StoredMessageMetricsRowSchema,
  StoredTurnRowSchema,
  type StoredConversationRow,
  type StoredExperimentRow,
  type StoredMessageMetricsRow,
  type StoredTurnRow,
} from '../types/schemas.js';
import type { AgentSlot } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { nodeFileOps, writeFileAtomic, type FileOps } from './atomic-file.js';

const logger = createLogger('AnalyticsStore');

export interface AnalyticsStoreOptions {
  /** Database file; in-memory only when omitted */
  filename?: string;
  fileOps?: FileOps;
}

export interface StoredMessageRow {
  conversation_id: string;
  experiment_id: string;
  turn_index: number;
  speaker: AgentSlot;
  text: string;
  prompt_tokens: number;
  completion_tokens: number;
  cost_usd: number;
  latency_ms: number;
  /** 0 for a reply whose turn never completed */
  complete: 0 | 1;
  timestamp: string;
}

export interface StoredEventRow {
  conversation_id: string;
  experiment_id: string;
  seq: number;
  type: string;
  timestamp: string;
  payload: string;
}

/**
 * Everything the store holds for one experiment
 */
export interface ExperimentProjection {
  experiment: StoredExperimentRow;
  conversations: StoredConversationRow[];
  turns: StoredTurnRow[];
  messages: StoredMessageRow[];
  /** One row per message */
  metrics: StoredMessageMetricsRow[];
  events: StoredEventRow[];
}

export interface TurnFilter {
  experimentId?: string;
  conversationId?: string;
  minScore?: number;
  limit?: number;
}

export interface MessageMetricsFilter {
  experimentId?: string;
  conversationId?: string;
}

export interface ProjectionCounts {
  conversations: number;
  turns: number;
  messages: number;
  metrics: number;
  events: number;
}

const PROJECTION_TABLES = ['events', 'message_metrics', 'messages', 'turns', 'conversations'] as const;

const CountRowSchema = z.object({ count: z.number().int() });

// Global SQL.js instance (initialized once)
let sqlJsInstance: SqlJsStatic | null = null;

async function getSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsInstance) {
    sqlJsInstance = await initSqlJs();
  }
  return sqlJsInstance;
}

async function readExisting(filename: string): Promise<Uint8Array | undefined> {
  try {
    return await readFile(filename);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw new PersistenceError(`Failed to read analytics database ${filename}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export class AnalyticsStore {
  private db: SqlJsDatabase | null = null;
  private initPromise: Promise<void> | null;
  private readonly fileOps: FileOps;

  constructor(private readonly options: AnalyticsStoreOptions = {}) {
    this.fileOps = options.fileOps ?? nodeFileOps;
    this.initPromise = this.initialize();
    // Surfaced by the first call that awaits ensureInitialized()
    this.initPromise.catch((error: unknown) => {
      logger.error({ err: error, filename: options.filename }, 'Analytics store failed to open');
    });
  }

  private async initialize(): Promise<void> {
    const SQL = await getSqlJs();
    const existing = this.options.filename ? await readExisting(this.options.filename) : undefined;
    this.db = new SQL.Database(existing);
    this.initializeSchema();
    logger.debug({ filename: this.options.filename ?? ':memory:', loaded: existing !== undefined }, 'Opened');
  }

  private async ensureInitialized(): Promise<void> {
    if (this.initPromise) {
      await this.initPromise;
      this.initPromise = null;
    }
  }

  private getDb(): SqlJsDatabase {
    if (!this.db) {
      throw new PersistenceError('Analytics database is not open', { code: 'DB_NOT_INITIALIZED' });
    }
    return this.db;
  }

  private initializeSchema(): void {
    const db = this.getDb();

    db.run(`
      CREATE TABLE IF NOT EXISTS experiments (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        agent_a_provider TEXT NOT NULL,
        agent_a_model TEXT NOT NULL,
        agent_b_provider TEXT NOT NULL,
        agent_b_model TEXT NOT NULL,
        max_turns INTEGER NOT NULL,
        profile TEXT NOT NULL,
        threshold REAL NOT NULL,
        action TEXT NOT NULL,
        conversation_count INTEGER NOT NULL
      )
    `);

    db.run(`
      CREATE TABLE IF NOT EXISTS conversations (
        id TEXT PRIMARY KEY,
        experiment_id TEXT NOT NULL,
        status TEXT NOT NULL,
        end_reason TEXT,
        end_reason_raw TEXT,
        turns_completed INTEGER NOT NULL,
        final_score REAL,
        partial_messages INTEGER NOT NULL,
        prompt_tokens INTEGER NOT NULL,
        completion_tokens INTEGER NOT NULL,
        cost_usd REAL NOT NULL,
        started_at TEXT,
        ended_at TEXT,
        error TEXT
      )
    `);
    db.run(`CREATE INDEX IF NOT EXISTS idx_conversations_experiment ON conversations(experiment_id)`);

    db.run(`
      CREATE TABLE IF NOT EXISTS turns (
        conversation_id TEXT NOT NULL,
        experiment_id TEXT NOT NULL,
        turn_index INTEGER NOT NULL,
        score REAL NOT NULL,
        trend REAL NOT NULL,
        cumulative_overlap REAL NOT NULL,
        content REAL NOT NULL,
        structure REAL NOT NULL,
        sentences REAL NOT NULL,
        length REAL NOT NULL,
        punctuation REAL NOT NULL,
        completed_at TEXT NOT NULL,
        PRIMARY KEY (conversation_id, turn_index)
      )
    `);
    db.run(`CREATE INDEX IF NOT EXISTS idx_turns_experiment ON turns(experiment_id)`);
    db.run(`CREATE INDEX IF NOT EXISTS idx_turns_score ON turns(score)`);

    db.run(`
      CREATE TABLE IF NOT EXISTS messages (
        conversation_id TEXT NOT NULL,
        experiment_id TEXT NOT NULL,
        turn_index INTEGER NOT NULL,
        speaker TEXT NOT NULL,
        text TEXT NOT NULL,
        prompt_tokens INTEGER NOT NULL,
        completion_tokens INTEGER NOT NULL,
        cost_usd REAL NOT NULL,
        latency_ms INTEGER NOT NULL,
        complete INTEGER NOT NULL,
        timestamp TEXT NOT NULL,
        PRIMARY KEY (conversation_id, turn_index, speaker)
      )
    `);
    db.run(`CREATE INDEX IF NOT EXISTS idx_messages_experiment ON messages(experiment_id)`);

    db.run(`
      CREATE TABLE IF NOT EXISTS message_metrics (
        conversation_id TEXT NOT NULL,
        experiment_id TEXT NOT NULL,
        turn_index INTEGER NOT NULL,
        speaker TEXT NOT NULL,
        word_count INTEGER NOT NULL,
        char_count INTEGER NOT NULL,
        sentence_count INTEGER NOT NULL,
        vocabulary_size INTEGER NOT NULL,
        type_token_ratio REAL NOT NULL,
        entropy REAL NOT NULL,
        self_repetition REAL NOT NULL,
        question_count INTEGER NOT NULL,
        average_word_length REAL NOT NULL,
        PRIMARY KEY (conversation_id, turn_index, speaker)
      )
    `);
    db.run(`CREATE INDEX IF NOT EXISTS idx_message_metrics_experiment ON message_metrics(experiment_id)`);

    db.run(`
      CREATE TABLE IF NOT EXISTS events (
        conversation_id TEXT NOT NULL,
        experiment_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        type TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        payload TEXT NOT NULL,
        PRIMARY KEY (conversation_id, seq)
      )
    `);
    db.run(`CREATE INDEX IF NOT EXISTS idx_events_experiment ON events(experiment_id)`);
  }

  /**
   * Replace everything stored for an experiment in one transaction.
   * On failure the previous projection is left in place.
   */
  async replaceExperiment(projection: ExperimentProjection): Promise<void> {
    await this.ensureInitialized();
    const db = this.getDb();
    const experimentId = projection.experiment.id;

    db.run('BEGIN TRANSACTION');
    try {
      this.deleteExperimentRows(db, experimentId);
      this.insertExperiment(db, projection.experiment);
      for (const row of projection.conversations) {
        this.insertConversation(db, row);
      }
      for (const row of projection.turns) {
        this.insertTurn(db, row);
      }
      for (const row of projection.messages) {
        this.insertMessage(db, row);
      }
      for (const row of projection.metrics) {
        this.insertMessageMetrics(db, row);
      }
      for (const row of projection.events) {
        this.insertEvent(db, row);
      }
      db.run('COMMIT');
    } catch (error) {
      db.run('ROLLBACK');
      throw new PersistenceError(`Failed to store projection of experiment ${experimentId}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    logger.debug(
      {
        experimentId,
        conversations: projection.conversations.length,
        turns: projection.turns.length,
        metrics: projection.metrics.length,
        events: projection.events.length,
      },
      'Experiment projection stored'
    );
  }

  async getExperiment(experimentId: string): Promise<StoredExperimentRow | null> {
    await this.ensureInitialized();
    const rows = this.select('SELECT * FROM experiments WHERE id = ?', [experimentId], StoredExperimentRowSchema);
    return rows[0] ?? null;
  }

  async listConversations(experimentId: string): Promise<StoredConversationRow[]> {
    await this.ensureInitialized();
    return this.select(
      'SELECT * FROM conversations WHERE experiment_id = ? ORDER BY id ASC',
      [experimentId],
      StoredConversationRowSchema
    );
  }

  /**
   * Turns matching all given filters, ordered by conversation then turn
   */
  async queryTurns(filter: TurnFilter = {}): Promise<StoredTurnRow[]> {
    await this.ensureInitialized();

    const conditions: string[] = [];
    const values: SqlValue[] = [];

    if (filter.experimentId !== undefined) {
      conditions.push('experiment_id = ?');
      values.push(filter.experimentId);
    }
    if (filter.conversationId !== undefined) {
      conditions.push('conversation_id = ?');
      values.push(filter.conversationId);
    }
    if (filter.minScore !== undefined) {
      conditions.push('score >= ?');
      values.push(filter.minScore);
    }

    let sql = 'SELECT * FROM turns';
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(' AND ')}`;
    }
    sql += ' ORDER BY conversation_id ASC, turn_index ASC';
    if (filter.limit !== undefined) {
      sql += ' LIMIT ?';
      values.push(filter.limit);
    }

    return this.select(sql, values, StoredTurnRowSchema);
  }

  /**
   * Message metrics matching all given filters, ordered by conversation,
   * turn and speaker
   */
  async queryMessageMetrics(filter: MessageMetricsFilter = {}): Promise<StoredMessageMetricsRow[]> {
    await this.ensureInitialized();

    const conditions: string[] = [];
    const values: SqlValue[] = [];
    if (filter.experimentId !== undefined) {
      conditions.push('experiment_id = ?');
      values.push(filter.experimentId);
    }
    if (filter.conversationId !== undefined) {
      conditions.push('conversation_id = ?');
      values.push(filter.conversationId);
    }

    let sql = 'SELECT * FROM message_metrics';
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(' AND ')}`;
    }
    sql += ' ORDER BY conversation_id ASC, turn_index ASC, speaker ASC';

    return this.select(sql, values, StoredMessageMetricsRowSchema);
  }

  async countRows(experimentId: string): Promise<ProjectionCounts> {
    await this.ensureInitialized();
    const count = (table: (typeof PROJECTION_TABLES)[number]): number => {
      const [row] = this.select(
        `SELECT COUNT(*) AS count FROM ${table} WHERE experiment_id = ?`,
        [experimentId],
        CountRowSchema
      );
      return row?.count ?? 0;
    };
    return {
      conversations: count('conversations'),
      turns: count('turns'),
      messages: count('messages'),
      metrics: count('message_metrics'),
      events: count('events'),
    };
  }

  /**
   * Write the database to its file, if it has one
   */
  async persist(): Promise<void> {
    await this.ensureInitialized();
    const { filename } = this.options;
    if (!filename) {
      return;
    }
    await writeFileAtomic(filename, this.getDb().export(), this.fileOps);
    logger.debug({ filename }, 'Analytics database persisted');
  }

  /**
   * Close the database connection
   */
  async close(): Promise<void> {
    await this.ensureInitialized();
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private select<T>(sql: string, params: SqlValue[], schema: z.ZodType<T>): T[] {
    const stmt = this.getDb().prepare(sql);
    const results: T[] = [];
    try {
      stmt.bind(params);
      while (stmt.step()) {
        results.push(schema.parse(stmt.getAsObject()));
      }
    } catch (error) {
      if (error instanceof ZodError) {
        throw new PersistenceError(`Invalid row in analytics database: ${error.message}`, {
          code: 'INVALID_ROW',
          cause: error,
        });
      }
      throw error;
    } finally {
      stmt.free();
    }
    return results;
  }

  private deleteExperimentRows(db: SqlJsDatabase, experimentId: string): void {
    for (const table of PROJECTION_TABLES) {
      db.run(`DELETE FROM ${table} WHERE experiment_id = ?`, [experimentId]);
    }
    db.run('DELETE FROM experiments WHERE id = ?', [experimentId]);
  }

  private insertExperiment(db: SqlJsDatabase, row: StoredExperimentRow): void {
    db.run(
      `INSERT INTO experiments (id, name, status, created_at, started_at, completed_at, agent_a_provider, agent_a_model,
         agent_b_provider, agent_b_model, max_turns, profile, threshold, action, conversation_count)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        row.id,
        row.name,
        row.status,
        row.created_at,
        row.started_at,
        row.completed_at,
        row.agent_a_provider,
        row.agent_a_model,
        row.agent_b_provider,
        row.agent_b_model,
        row.max_turns,
        row.profile,
        row.threshold,
        row.action,
        row.conversation_count,
      ]
    );
  }

  private insertConversation(db: SqlJsDatabase, row: StoredConversationRow): void {
    db.run(
      `INSERT INTO conversations (id, experiment_id, status, end_reason, end_reason_raw, turns_completed, final_score,
         partial_messages, prompt_tokens, completion_tokens, cost_usd, started_at, ended_at, error)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        row.id,
        row.experiment_id,
        row.status,
        row.end_reason,
        row.end_reason_raw,
        row.turns_completed,
        row.final_score,
        row.partial_messages,
        row.prompt_tokens,
        row.completion_tokens,
        row.cost_usd,
        row.started_at,
        row.ended_at,
        row.error,
      ]
    );
  }

  private insertTurn(db: SqlJsDatabase, row: StoredTurnRow): void {
    db.run(
      `INSERT INTO turns (conversation_id, experiment_id, turn_index, score, trend, cumulative_overlap, content,
         structure, sentences, length, punctuation, completed_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        row.conversation_id,
        row.experiment_id,
        row.turn_index,
        row.score,
        row.trend,
        row.cumulative_overlap,
        row.content,
        row.structure,
        row.sentences,
        row.length,
        row.punctuation,
        row.completed_at,
      ]
    );
  }

  private insertMessage(db: SqlJsDatabase, row: StoredMessageRow): void {
    db.run(
      `INSERT INTO messages (conversation_id, experiment_id, turn_index, speaker, text, prompt_tokens,
         completion_tokens, cost_usd, latency_ms, complete, timestamp)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        row.conversation_id,
        row.experiment_id,
        row.turn_index,
        row.speaker,
        row.text,
        row.prompt_tokens,
        row.completion_tokens,
        row.cost_usd,
        row.latency_ms,
        row.complete,
        row.timestamp,
      ]
    );
  }

  private insertMessageMetrics(db: SqlJsDatabase, row: StoredMessageMetricsRow): void {
    db.run(
      `INSERT INTO message_metrics (conversation_id, experiment_id, turn_index, speaker, word_count, char_count,
         sentence_count, vocabulary_size, type_token_ratio, entropy, self_repetition, question_count, average_word_length)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        row.conversation_id,
        row.experiment_id,
        row.turn_index,
        row.speaker,
        row.word_count,
        row.char_count,
        row.sentence_count,
        row.vocabulary_size,
        row.type_token_ratio,
        row.entropy,
        row.self_repetition,
        row.question_count,
        row.average_word_length,
      ]
    );
  }

  private insertEvent(db: SqlJsDatabase, row: StoredEventRow): void {
    db.run(
      `INSERT INTO events (conversation_id, experiment_id, seq, type, timestamp, payload)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [row.conversation_id, row.experiment_id, row.seq, row.type, row.timestamp, row.payload]
    );
  }
}
