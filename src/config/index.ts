/**
 * Configuration Module
 *
 * Centralized configuration exports for Parley.
 * All environment variable-based settings should be accessed through this module.
 */

// Provider configuration (API keys)
export {
  type ApiKeyConfig,
  type HostedProvider,
  type ProviderAvailability,
  API_KEY_ENV_VARS,
  detectApiKeys,
  checkProviderAvailability,
  isHostedProvider,
} from './providers.js';

// Runtime defaults
export { type RuntimeConfig, RUNTIME_DEFAULTS, loadRuntimeConfig } from './runtime.js';

// Convergence profiles
export {
  CONVERGENCE_COMPONENTS,
  CONVERGENCE_DEFAULTS,
  CONVERGENCE_PROFILES,
  PROFILE_NAMES,
  WEIGHT_SUM_TOLERANCE,
  isConvergenceAction,
  isProfileName,
  loadConvergenceDefaults,
  resolveConvergenceWeights,
  validateWeights,
} from './convergence.js';

// Experiment configuration files
export { type ConfigDefaults, loadConfigDefaults, loadExperimentConfig, parseExperimentConfig } from './loader.js';
