/**
 * Scripted Agent - replays a fixed list of replies
 *
 * Used for dry runs and tests. Each step is either a reply text or an error
 * to throw; the script cycles once exhausted.
 */

import { ConfigurationError } from '../errors/index.js';
import type { AgentConfig } from '../types/index.js';
import { BaseAgent } from './base.js';
import type { ProviderCompletion } from './types.js';

export type ScriptStep = string | Error;

export interface ScriptedAgentOptions {
  /** Steps to replay; defaults to the config's `script` */
  steps?: readonly ScriptStep[];
  /** Delay before each reply */
  responseDelayMs?: number;
}

export class ScriptedAgent extends BaseAgent {
  private readonly steps: readonly ScriptStep[];
  private readonly responseDelayMs: number;
  private position = 0;

  constructor(config: AgentConfig, options?: ScriptedAgentOptions) {
    super(config);
    this.steps = options?.steps ?? config.script ?? [];
    this.responseDelayMs = options?.responseDelayMs ?? 0;
    if (this.steps.length === 0) {
      throw new ConfigurationError('Scripted agents require at least one script step', { code: 'INVALID_CONFIG' });
    }
  }

  /** Number of replies requested so far */
  get callCount(): number {
    return this.position;
  }

  protected override async callProviderApi(): Promise<ProviderCompletion> {
    const step = this.steps[this.position % this.steps.length] ?? '';
    this.position++;

    if (this.responseDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.responseDelayMs));
    }

    if (step instanceof Error) {
      throw step;
    }

    return { text: step, promptTokens: 0, completionTokens: step.split(/\s+/).filter(Boolean).length };
  }
}
