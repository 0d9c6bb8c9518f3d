/**
 * Agent construction from experiment configuration
 */

import { API_KEY_ENV_VARS, type ApiKeyConfig } from '../config/providers.js';
import { ConfigurationError } from '../errors/index.js';
import type { AgentSlot, AgentSpec } from '../types/index.js';
import { AnthropicAgent } from './anthropic.js';
import type { BaseAgent } from './base.js';
import { GeminiAgent } from './gemini.js';
import { LocalAgent } from './local.js';
import { OpenAIAgent } from './openai.js';
import { ScriptedAgent } from './scripted.js';

function requireKey(apiKeys: ApiKeyConfig, provider: keyof ApiKeyConfig): string {
  const key = apiKeys[provider];
  if (!key) {
    throw new ConfigurationError(`${API_KEY_ENV_VARS[provider]} is required for provider '${provider}'`, {
      code: 'MISSING_API_KEY',
      provider,
    });
  }
  return key;
}

/**
 * Build the agent for one slot of a conversation
 *
 * @throws ConfigurationError when a hosted provider has no API key
 */
export function createAgent(spec: AgentSpec, slot: AgentSlot, apiKeys: ApiKeyConfig): BaseAgent {
  const config = { ...spec, slot };

  switch (spec.provider) {
    case 'anthropic':
      return new AnthropicAgent(config, { apiKey: requireKey(apiKeys, 'anthropic') });
    case 'openai':
      return new OpenAIAgent(config, { apiKey: requireKey(apiKeys, 'openai') });
    case 'google':
      return new GeminiAgent(config, { apiKey: requireKey(apiKeys, 'google') });
    case 'local':
      return new LocalAgent(config);
    case 'scripted':
      return new ScriptedAgent(config);
    default: {
      const unreachable: never = spec.provider;
      throw new ConfigurationError(`Unknown provider: ${String(unreachable)}`, { code: 'INVALID_CONFIG' });
    }
  }
}

/**
 * Check that both agents of an experiment can be built, before anything is written
 */
export function assertAgentsAvailable(specs: readonly AgentSpec[], apiKeys: ApiKeyConfig): void {
  for (const spec of specs) {
    if (spec.provider === 'anthropic' || spec.provider === 'openai' || spec.provider === 'google') {
      requireKey(apiKeys, spec.provider);
    }
  }
}
