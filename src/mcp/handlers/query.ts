/**
 * Analytical query handlers
 * Handles: query_turns
 */

import type { AgentSlot } from '../../types/index.js';
import { QueryTurnsInputSchema, type StoredMessageMetricsRow } from '../../types/schemas.js';
import type { HandlerContext, HandlerRegistry } from '../handler-registry.js';
import { createErrorResponse, createSuccessResponse, type ToolResponse } from '../tools.js';
import { wrapError } from './utils.js';

function metricsKey(conversationId: string, turnIndex: number, speaker: AgentSlot): string {
  return `${conversationId}:${turnIndex}:${speaker}`;
}

function toMetricsView(row: StoredMessageMetricsRow | undefined) {
  if (!row) {
    return null;
  }
  return {
    wordCount: row.word_count,
    charCount: row.char_count,
    sentenceCount: row.sentence_count,
    vocabularySize: row.vocabulary_size,
    typeTokenRatio: row.type_token_ratio,
    entropy: row.entropy,
    selfRepetition: row.self_repetition,
    questionCount: row.question_count,
    averageWordLength: row.average_word_length,
  };
}

/**
 * Handler: query_turns
 */
export async function handleQueryTurns(args: unknown, ctx: HandlerContext): Promise<ToolResponse> {
  try {
    const { includeMetrics, ...filter } = QueryTurnsInputSchema.parse(args ?? {});
    const rows = await ctx.analytics.queryTurns(filter);

    const metrics = new Map<string, StoredMessageMetricsRow>();
    if (includeMetrics && rows.length > 0) {
      const metricRows = await ctx.analytics.queryMessageMetrics({
        experimentId: filter.experimentId,
        conversationId: filter.conversationId,
      });
      for (const row of metricRows) {
        metrics.set(metricsKey(row.conversation_id, row.turn_index, row.speaker), row);
      }
    }

    return createSuccessResponse({
      turns: rows.map((row) => ({
        experimentId: row.experiment_id,
        conversationId: row.conversation_id,
        turnIndex: row.turn_index,
        score: row.score,
        trend: row.trend,
        cumulativeOverlap: row.cumulative_overlap,
        components: {
          content: row.content,
          structure: row.structure,
          sentences: row.sentences,
          length: row.length,
          punctuation: row.punctuation,
        },
        ...(includeMetrics
          ? {
              metrics: {
                agentA: toMetricsView(metrics.get(metricsKey(row.conversation_id, row.turn_index, 'agent_a'))),
                agentB: toMetricsView(metrics.get(metricsKey(row.conversation_id, row.turn_index, 'agent_b'))),
              },
            }
          : {}),
      })),
      count: rows.length,
    });
  } catch (error) {
    return createErrorResponse(wrapError(error));
  }
}

// --- Handler Registration ---

export function registerQueryHandlers(registry: HandlerRegistry): void {
  registry.register('query_turns', handleQueryTurns);
}
