/**
 * Core module exports
 */

export {
  ConvergenceEngine,
  EMPTY_CUMULATIVE,
  accumulateOverlap,
  clampUnit,
  combineComponents,
  computeComponents,
} from './convergence-engine.js';
export type { ConvergenceInput, ConvergenceResult, ConvergenceScorer, TurnTexts } from './convergence-engine.js';

export { ConversationRunner } from './conversation-runner.js';
export type { ConversationResult, ConversationRunnerOptions } from './conversation-runner.js';

export { ExperimentRunner } from './experiment-runner.js';
export type {
  AgentFactory,
  EngineFactory,
  ExperimentListing,
  ExperimentRunnerOptions,
  ExperimentSummary,
  LaunchedExperiment,
  ListExperimentsOptions,
  RunOptions,
} from './experiment-runner.js';

export { replayConversation } from './replay.js';
export type { ConversationSnapshot, ReplayedMessage, ReplayedTurn } from './replay.js';

export { assertTransition, canTransition, isTerminalStatus } from './state-machine.js';
export { endReasonForError, evaluateStopPolicy } from './stop-policy.js';
export type { StopDecision, StopPolicyInput } from './stop-policy.js';

export * from './text-analysis.js';
