/**
 * Provider Configuration
 *
 * API key detection and provider availability for the hosted agent adapters.
 *
 * Environment variables:
 * - ANTHROPIC_API_KEY: Anthropic API key
 * - OPENAI_API_KEY: OpenAI API key
 * - GOOGLE_API_KEY: Google Gemini API key
 */

import type { AIProvider } from '../types/index.js';
import { getEnvOptional } from '../utils/env.js';

export type HostedProvider = Extract<AIProvider, 'anthropic' | 'openai' | 'google'>;

/**
 * API key configuration for each hosted provider
 */
export type ApiKeyConfig = Partial<Record<HostedProvider, string>>;

export interface ProviderAvailability {
  provider: AIProvider;
  available: boolean;
  reason?: string;
}

export const API_KEY_ENV_VARS: Readonly<Record<HostedProvider, string>> = Object.freeze({
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
});

export function isHostedProvider(provider: AIProvider): provider is HostedProvider {
  return provider === 'anthropic' || provider === 'openai' || provider === 'google';
}

/**
 * Check which API keys are available from environment
 */
export function detectApiKeys(): ApiKeyConfig {
  return {
    anthropic: getEnvOptional(API_KEY_ENV_VARS.anthropic),
    openai: getEnvOptional(API_KEY_ENV_VARS.openai),
    google: getEnvOptional(API_KEY_ENV_VARS.google),
  };
}

/**
 * Check provider availability based on API keys.
 * Offline providers are always available.
 */
export function checkProviderAvailability(apiKeys: ApiKeyConfig): ProviderAvailability[] {
  const providers: AIProvider[] = ['anthropic', 'openai', 'google', 'local', 'scripted'];

  return providers.map((provider) => {
    if (!isHostedProvider(provider)) {
      return { provider, available: true };
    }
    const key = apiKeys[provider];
    return {
      provider,
      available: !!key,
      reason: key ? undefined : `${API_KEY_ENV_VARS[provider]} not set`,
    };
  });
}
