/**
 * Convergence Engine
 *
 * Scores how alike the two agents' recent outputs are. The engine is
 * stateless: the runner passes in the previous score and the running
 * cumulative-overlap aggregate, and receives the updated aggregate back.
 */

import type {
  ComponentScores,
  ConvergenceComponent,
  ConvergenceWeights,
  CumulativeOverlap,
} from '../types/index.js';
import { CONVERGENCE_COMPONENTS } from '../config/convergence.js';
import {
  averageLength,
  averageSentences,
  featureSimilarity,
  jaccard,
  profileSimilarity,
  PUNCTUATION_KEYS,
  punctuationDensities,
  STRUCTURE_FEATURE_KEYS,
  structureFeatures,
  vocabulary,
} from './text-analysis.js';

/**
 * The two messages of one turn
 */
export interface TurnTexts {
  agentA: string;
  agentB: string;
}

export interface ConvergenceInput {
  /** Recent turns, oldest first; the last entry is the turn being scored */
  window: readonly TurnTexts[];
  /** Score of the previous turn, null on the first turn */
  previousScore: number | null;
  cumulative: CumulativeOverlap;
}

export interface ConvergenceResult {
  components: ComponentScores;
  score: number;
  trend: number;
  cumulative: CumulativeOverlap;
}

/**
 * Anything that can score a turn. The runner depends on this rather than on
 * ConvergenceEngine so tests can supply fixed score sequences.
 */
export interface ConvergenceScorer {
  score(input: ConvergenceInput): ConvergenceResult;
}

export const EMPTY_CUMULATIVE: CumulativeOverlap = Object.freeze({ turns: 0, total: 0, mean: 0 });

export function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Fold one more content score into the running aggregate
 */
export function accumulateOverlap(cumulative: CumulativeOverlap, content: number): CumulativeOverlap {
  const turns = cumulative.turns + 1;
  const total = cumulative.total + content;
  return { turns, total, mean: total / turns };
}

/**
 * Weighted sum of component scores, clamped to [0,1]
 */
export function combineComponents(components: ComponentScores, weights: ConvergenceWeights): number {
  let score = 0;
  for (const component of CONVERGENCE_COMPONENTS) {
    score += components[component] * weights[component];
  }
  return clampUnit(score);
}

/**
 * Component similarities between two sets of messages
 */
export function computeComponents(textsA: readonly string[], textsB: readonly string[]): ComponentScores {
  const scores: Record<ConvergenceComponent, number> = {
    content: jaccard(vocabulary(textsA), vocabulary(textsB)),
    structure: profileSimilarity(structureFeatures(textsA), structureFeatures(textsB), STRUCTURE_FEATURE_KEYS),
    sentences: featureSimilarity(averageSentences(textsA), averageSentences(textsB)),
    length: featureSimilarity(averageLength(textsA), averageLength(textsB)),
    punctuation: profileSimilarity(punctuationDensities(textsA), punctuationDensities(textsB), PUNCTUATION_KEYS),
  };

  for (const component of CONVERGENCE_COMPONENTS) {
    scores[component] = clampUnit(scores[component]);
  }
  return scores;
}

export class ConvergenceEngine implements ConvergenceScorer {
  /**
   * @param weights - resolved and validated weight table (see resolveConvergenceWeights)
   * @param windowSize - number of most recent turns compared
   */
  constructor(
    private readonly weights: ConvergenceWeights,
    private readonly windowSize: number = 1
  ) {}

  score(input: ConvergenceInput): ConvergenceResult {
    const window = input.window.slice(-Math.max(1, this.windowSize));
    const components = computeComponents(
      window.map((turn) => turn.agentA),
      window.map((turn) => turn.agentB)
    );
    const score = combineComponents(components, this.weights);

    return {
      components,
      score,
      trend: input.previousScore === null ? 0 : score - input.previousScore,
      cumulative: accumulateOverlap(input.cumulative, components.content),
    };
  }
}
