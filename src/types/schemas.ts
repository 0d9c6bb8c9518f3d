/**
 * Zod schemas for runtime validation
 */

import { z } from 'zod';
import type { EndReason, LegacyEndReason } from './index.js';

// ============================================
// Shared Enums
// ============================================

export const AIProviderSchema = z.enum(['anthropic', 'openai', 'google', 'local', 'scripted']);

export const AgentSlotSchema = z.enum(['agent_a', 'agent_b']);

export const ConversationStatusSchema = z.enum(['created', 'running', 'paused', 'completed', 'failed', 'interrupted']);

export const TerminalConversationStatusSchema = z.enum(['completed', 'failed', 'interrupted']);

export const EndReasonSchema = z.enum([
  'convergence_threshold',
  'max_turns_reached',
  'timeout',
  'rate_limit',
  'api_error',
  'exception',
  'interrupted',
]);

export const ExperimentStatusSchema = z.enum([
  'created',
  'running',
  'post_processing',
  'completed',
  'completed_with_failures',
  'failed',
  'interrupted',
]);

export const ConvergenceProfileSchema = z.enum(['balanced', 'structural', 'semantic', 'strict', 'custom']);

export const ConvergenceActionSchema = z.enum(['stop', 'warn', 'notify', 'continue']);

const unit = z.number().min(0).max(1);

export const ConvergenceWeightsSchema = z.object({
  content: unit,
  structure: unit,
  sentences: unit,
  length: unit,
  punctuation: unit,
});

// ============================================
// End Reason Resolution
// ============================================

const LEGACY_END_REASONS: Readonly<Record<LegacyEndReason, EndReason>> = Object.freeze({
  high_convergence: 'convergence_threshold',
  max_turns: 'max_turns_reached',
  error: 'exception',
  pause: 'interrupted',
});

function isLegacyEndReason(value: string): value is LegacyEndReason {
  return Object.hasOwn(LEGACY_END_REASONS, value);
}

/**
 * Map an end reason read from storage to its canonical value.
 * Returns undefined for values that are neither canonical nor a known older spelling.
 */
export function resolveEndReason(raw: string): EndReason | undefined {
  const canonical = EndReasonSchema.safeParse(raw);
  if (canonical.success) {
    return canonical.data;
  }
  return isLegacyEndReason(raw) ? LEGACY_END_REASONS[raw] : undefined;
}

/**
 * Accepts canonical and older end reason spellings, yields the canonical one
 */
export const StoredEndReasonSchema = z.string().transform((raw, ctx): EndReason => {
  const resolved = resolveEndReason(raw);
  if (resolved === undefined) {
    ctx.addIssue({ code: 'custom', message: `Unknown end reason '${raw}'` });
    return z.NEVER;
  }
  return resolved;
});

// ============================================
// Agent Schemas
// ============================================

export const ModelPricingSchema = z.object({
  inputPerMillion: z.number().nonnegative(),
  outputPerMillion: z.number().nonnegative(),
});

export const AgentSpecSchema = z.object({
  provider: AIProviderSchema,
  model: z.string().min(1, 'Model is required'),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  systemPrompt: z.string().optional(),
  pricing: ModelPricingSchema.optional(),
  script: z.array(z.string()).optional(),
});

const TokenUsageSchema = z.object({
  promptTokens: z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
});

// ============================================
// Event Schemas
// ============================================

const EventAgentInfoSchema = z.object({
  provider: AIProviderSchema,
  model: z.string(),
  temperature: z.number().optional(),
});

function eventSchema<T extends string, P extends z.ZodType>(type: T, payload: P) {
  return z.object({
    type: z.literal(type),
    timestamp: z.string().min(1),
    conversationId: z.string().min(1),
    payload,
  });
}

const turnIndex = z.number().int().nonnegative();

const ThresholdCrossingSchema = z.object({ turnIndex, score: z.number(), threshold: z.number() });

const ConversationEndPayloadSchema = z
  .object({
    status: TerminalConversationStatusSchema,
    endReason: z.string(),
    totalTurns: z.number().int().nonnegative(),
    finalScore: z.number().nullable(),
    durationMs: z.number().nonnegative(),
    partialTurn: z.boolean().default(false),
    error: z.string().optional(),
  })
  .transform((payload, ctx) => {
    const endReason = resolveEndReason(payload.endReason);
    if (endReason === undefined) {
      ctx.addIssue({ code: 'custom', message: `Unknown end reason '${payload.endReason}'`, path: ['endReason'] });
      return z.NEVER;
    }
    const { endReason: raw, ...rest } = payload;
    return raw === endReason ? { ...rest, endReason } : { ...rest, endReason, endReasonRaw: raw };
  });

/**
 * One line of a conversation event log
 */
export const ConversationEventSchema = z.discriminatedUnion('type', [
  eventSchema(
    'conversation-start',
    z.object({
      experimentId: z.string(),
      agentA: EventAgentInfoSchema,
      agentB: EventAgentInfoSchema,
      initialPrompt: z.string(),
      maxTurns: z.number().int().positive(),
      convergence: z.object({
        profile: ConvergenceProfileSchema,
        weights: ConvergenceWeightsSchema,
        threshold: z.number(),
        action: ConvergenceActionSchema,
      }),
    })
  ),
  eventSchema('turn-start', z.object({ turnIndex })),
  eventSchema(
    'message-complete',
    z.object({
      turnIndex,
      speaker: AgentSlotSchema,
      text: z.string(),
      usage: TokenUsageSchema,
      costUsd: z.number().nonnegative(),
      latencyMs: z.number().nonnegative(),
    })
  ),
  eventSchema(
    'turn-complete',
    z.object({
      turnIndex,
      components: ConvergenceWeightsSchema,
      score: unit,
      trend: z.number(),
      cumulativeOverlap: unit,
    })
  ),
  eventSchema('convergence-warning', ThresholdCrossingSchema),
  eventSchema('convergence-notification', ThresholdCrossingSchema),
  eventSchema('conversation-paused', z.object({ turnIndex })),
  eventSchema('conversation-resumed', z.object({ turnIndex })),
  eventSchema(
    'provider-error',
    z.object({
      turnIndex,
      speaker: AgentSlotSchema,
      code: z.string(),
      message: z.string(),
      retryable: z.boolean(),
    })
  ),
  eventSchema('conversation-end', ConversationEndPayloadSchema),
]);

// ============================================
// Manifest Schemas
// ============================================

const ConvergenceSettingsSchema = z.object({
  profile: ConvergenceProfileSchema,
  weights: ConvergenceWeightsSchema,
  threshold: unit,
  action: ConvergenceActionSchema,
  windowSize: z.number().int().positive(),
});

const ManifestConversationEntrySchema = z.object({
  id: z.string().min(1),
  eventLog: z.string().min(1),
  status: ConversationStatusSchema,
  turnsCompleted: z.number().int().nonnegative(),
  endReason: StoredEndReasonSchema.nullable(),
  finalScore: z.number().nullable(),
  error: z.string().nullable(),
  startedAt: z.string().nullable(),
  endedAt: z.string().nullable(),
});

const ManifestCountersSchema = z.object({
  total: z.number().int().nonnegative(),
  created: z.number().int().nonnegative(),
  running: z.number().int().nonnegative(),
  paused: z.number().int().nonnegative(),
  completed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  interrupted: z.number().int().nonnegative(),
});

export const ExperimentManifestSchema = z.object({
  version: z.literal(1),
  experimentId: z.string().min(1),
  name: z.string(),
  status: ExperimentStatusSchema,
  createdAt: z.string(),
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  agentA: AgentSpecSchema,
  agentB: AgentSpecSchema,
  config: z.object({
    maxTurns: z.number().int().positive(),
    temperatureA: z.number().nullable(),
    temperatureB: z.number().nullable(),
    initialPrompt: z.string(),
    convergence: ConvergenceSettingsSchema,
    maxParallel: z.number().int().positive(),
    repetitions: z.number().int().positive(),
    callTimeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
  }),
  counters: ManifestCountersSchema,
  conversations: z.record(z.string(), ManifestConversationEntrySchema),
  error: z.string().nullable(),
});

// ============================================
// Experiment Configuration Schemas
// ============================================

/**
 * Experiment configuration as written by a user (YAML file or tool input).
 * Omitted fields take their defaults from the environment.
 */
export const ExperimentConfigInputSchema = z.object({
  name: z.string().min(1, 'Experiment name is required'),
  agentA: AgentSpecSchema,
  agentB: AgentSpecSchema,
  initialPrompt: z.string().min(1, 'Initial prompt is required'),
  maxTurns: z.number().int().positive().optional(),
  repetitions: z.number().int().positive().optional().default(1),
  maxParallel: z.number().int().positive().optional(),
  callTimeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  convergence: z
    .object({
      profile: z.string().optional(),
      customWeights: z.record(z.string(), z.number()).optional(),
      threshold: unit.optional(),
      action: ConvergenceActionSchema.optional(),
      windowSize: z.number().int().positive().optional(),
    })
    .optional(),
});

export type ExperimentConfigInput = z.input<typeof ExperimentConfigInputSchema>;

// ============================================
// MCP Input Schemas
// ============================================

/** Experiment IDs are a single directory name under the output directory */
export const EXPERIMENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export const ExperimentIdSchema = z
  .string()
  .min(1, 'Experiment ID is required')
  .regex(EXPERIMENT_ID_PATTERN, 'Experiment ID may only contain letters, digits, "-" and "_"');

export const RunExperimentInputSchema = z
  .object({
    config: ExperimentConfigInputSchema.optional().describe('Experiment configuration'),
    configPath: z.string().min(1).optional().describe('Path to a YAML experiment configuration file'),
    wait: z
      .boolean()
      .optional()
      .default(false)
      .describe('Wait for every conversation to finish before returning'),
  })
  .refine((input) => (input.config === undefined) !== (input.configPath === undefined), {
    message: 'Exactly one of config or configPath is required',
  });

export const GetExperimentStatusInputSchema = z.object({
  experimentId: ExperimentIdSchema,
});

export const ListExperimentsInputSchema = z.object({
  status: ExperimentStatusSchema.optional().describe('Filter by experiment status'),
  limit: z.number().int().positive().optional().default(50).describe('Maximum number of results to return'),
});

export const StopExperimentInputSchema = z.object({
  experimentId: ExperimentIdSchema,
});

export const ImportExperimentInputSchema = z.object({
  experimentId: ExperimentIdSchema.optional().describe('Experiment to import; every finished experiment when omitted'),
  force: z.boolean().optional().default(false).describe('Re-import experiments that were already imported'),
});

export const QueryTurnsInputSchema = z.object({
  experimentId: ExperimentIdSchema.optional(),
  conversationId: z.string().min(1).optional(),
  minScore: unit.optional().describe('Only turns whose combined score is at least this value'),
  limit: z.number().int().positive().max(1000).optional().default(100),
  includeMetrics: z
    .boolean()
    .optional()
    .default(false)
    .describe('Attach the linguistic metrics of both messages to each turn'),
});

// ============================================
// Analytical Store Row Schemas
// ============================================

export const StoredExperimentRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: ExperimentStatusSchema,
  created_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  agent_a_provider: AIProviderSchema,
  agent_a_model: z.string(),
  agent_b_provider: AIProviderSchema,
  agent_b_model: z.string(),
  max_turns: z.number().int(),
  profile: ConvergenceProfileSchema,
  threshold: z.number(),
  action: ConvergenceActionSchema,
  conversation_count: z.number().int(),
});

export const StoredConversationRowSchema = z.object({
  id: z.string(),
  experiment_id: z.string(),
  status: ConversationStatusSchema,
  end_reason: EndReasonSchema.nullable(),
  end_reason_raw: z.string().nullable(),
  turns_completed: z.number().int(),
  final_score: z.number().nullable(),
  partial_messages: z.number().int(),
  prompt_tokens: z.number().int(),
  completion_tokens: z.number().int(),
  cost_usd: z.number(),
  started_at: z.string().nullable(),
  ended_at: z.string().nullable(),
  error: z.string().nullable(),
});

export const StoredTurnRowSchema = z.object({
  conversation_id: z.string(),
  experiment_id: z.string(),
  turn_index: z.number().int(),
  score: z.number(),
  trend: z.number(),
  cumulative_overlap: z.number(),
  content: z.number(),
  structure: z.number(),
  sentences: z.number(),
  length: z.number(),
  punctuation: z.number(),
  completed_at: z.string(),
});

export const StoredMessageMetricsRowSchema = z.object({
  conversation_id: z.string(),
  experiment_id: z.string(),
  turn_index: z.number().int(),
  speaker: AgentSlotSchema,
  word_count: z.number().int(),
  char_count: z.number().int(),
  sentence_count: z.number().int(),
  vocabulary_size: z.number().int(),
  type_token_ratio: z.number(),
  entropy: z.number(),
  self_repetition: z.number(),
  question_count: z.number().int(),
  average_word_length: z.number(),
});

export type StoredExperimentRow = z.infer<typeof StoredExperimentRowSchema>;
export type StoredConversationRow = z.infer<typeof StoredConversationRowSchema>;
export type StoredTurnRow = z.infer<typeof StoredTurnRowSchema>;
export type StoredMessageMetricsRow = z.infer<typeof StoredMessageMetricsRowSchema>;
