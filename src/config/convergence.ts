/**
 * Convergence Configuration
 *
 * Built-in weight profiles for the convergence engine and the environment
 * defaults for threshold and action.
 *
 * Environment variables:
 * - PARLEY_CONVERGENCE_PROFILE: Default profile name (default: balanced)
 * - PARLEY_CONVERGENCE_THRESHOLD: Score that triggers the action, 0-1 (default: 0.85)
 * - PARLEY_CONVERGENCE_ACTION: stop | warn | notify | continue (default: stop)
 */

import { InvalidProfileError, ConfigurationError, WeightsDoNotSumToOneError } from '../errors/index.js';
import type {
  BuiltinProfileName,
  ConvergenceAction,
  ConvergenceComponent,
  ConvergenceProfileName,
  ConvergenceSettings,
  ConvergenceWeights,
} from '../types/index.js';
import { getEnvFloat, getEnvWithDefault } from '../utils/env.js';

export const CONVERGENCE_COMPONENTS: readonly ConvergenceComponent[] = Object.freeze([
  'content',
  'structure',
  'sentences',
  'length',
  'punctuation',
]);

export const CONVERGENCE_ACTIONS: readonly ConvergenceAction[] = Object.freeze(['stop', 'warn', 'notify', 'continue']);

export const PROFILE_NAMES: readonly ConvergenceProfileName[] = Object.freeze([
  'balanced',
  'structural',
  'semantic',
  'strict',
  'custom',
]);

/** Allowed distance of a weight total from 1.0 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

function freezeWeights(weights: ConvergenceWeights): ConvergenceWeights {
  return Object.freeze({ ...weights });
}

export const CONVERGENCE_PROFILES: Readonly<Record<BuiltinProfileName, ConvergenceWeights>> = Object.freeze({
  balanced: freezeWeights({ content: 0.4, structure: 0.15, sentences: 0.2, length: 0.15, punctuation: 0.1 }),
  structural: freezeWeights({ content: 0.25, structure: 0.35, sentences: 0.2, length: 0.1, punctuation: 0.1 }),
  semantic: freezeWeights({ content: 0.6, structure: 0.1, sentences: 0.15, length: 0.1, punctuation: 0.05 }),
  strict: freezeWeights({ content: 0.5, structure: 0.25, sentences: 0.15, length: 0.05, punctuation: 0.05 }),
});

export function isProfileName(value: string): value is ConvergenceProfileName {
  return (PROFILE_NAMES as readonly string[]).includes(value);
}

export function isConvergenceAction(value: string): value is ConvergenceAction {
  return (CONVERGENCE_ACTIONS as readonly string[]).includes(value);
}

function isBuiltinProfile(profile: ConvergenceProfileName): profile is BuiltinProfileName {
  return profile !== 'custom';
}

/**
 * Check caller-supplied weights: exactly the five components, each in [0,1],
 * summing to 1.0 within WEIGHT_SUM_TOLERANCE.
 */
export function validateWeights(weights: Readonly<Record<string, number>>): ConvergenceWeights {
  const keys = Object.keys(weights);
  const unknown = keys.filter((key) => !(CONVERGENCE_COMPONENTS as readonly string[]).includes(key));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown convergence components: ${unknown.join(', ')}`, {
      code: 'INVALID_CONFIG',
    });
  }

  const resolved: Record<ConvergenceComponent, number> = {
    content: 0,
    structure: 0,
    sentences: 0,
    length: 0,
    punctuation: 0,
  };

  for (const component of CONVERGENCE_COMPONENTS) {
    const value = weights[component];
    if (value === undefined) {
      throw new ConfigurationError(`Missing convergence weight for '${component}'`, { code: 'INVALID_CONFIG' });
    }
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError(`Convergence weight for '${component}' must be in [0, 1], got ${value}`, {
        code: 'INVALID_CONFIG',
      });
    }
    resolved[component] = value;
  }

  const total = CONVERGENCE_COMPONENTS.reduce((sum, component) => sum + resolved[component], 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new WeightsDoNotSumToOneError(total);
  }

  return freezeWeights(resolved);
}

/**
 * Resolve the weight table for a profile.
 *
 * Built-in profiles return their shared frozen table; `custom` validates and
 * freezes `customWeights`.
 *
 * @throws InvalidProfileError for an unknown profile name
 * @throws ConfigurationError when customWeights come with a built-in profile
 * @throws WeightsDoNotSumToOneError when custom weights do not total 1.0
 */
export function resolveConvergenceWeights(
  profile: string,
  customWeights?: Readonly<Record<string, number>>
): ConvergenceWeights {
  if (!isProfileName(profile)) {
    throw new InvalidProfileError(profile, PROFILE_NAMES);
  }

  if (isBuiltinProfile(profile)) {
    if (customWeights) {
      throw new ConfigurationError(`customWeights require profile 'custom', got '${profile}'`, {
        code: 'INVALID_CONFIG',
      });
    }
    return CONVERGENCE_PROFILES[profile];
  }

  if (!customWeights) {
    throw new ConfigurationError("Profile 'custom' requires customWeights", { code: 'INVALID_CONFIG' });
  }
  return validateWeights(customWeights);
}

export const CONVERGENCE_DEFAULTS = {
  PROFILE: 'balanced',
  THRESHOLD: 0.85,
  ACTION: 'stop',
  WINDOW_SIZE: 1,
} as const satisfies {
  PROFILE: BuiltinProfileName;
  THRESHOLD: number;
  ACTION: ConvergenceAction;
  WINDOW_SIZE: number;
};

/**
 * Default convergence settings from the environment.
 *
 * Invalid values fall back to the built-in defaults rather than failing
 * startup.
 */
export function loadConvergenceDefaults(): ConvergenceSettings {
  const rawProfile = getEnvWithDefault('PARLEY_CONVERGENCE_PROFILE', CONVERGENCE_DEFAULTS.PROFILE);
  const profile: BuiltinProfileName =
    isProfileName(rawProfile) && isBuiltinProfile(rawProfile) ? rawProfile : CONVERGENCE_DEFAULTS.PROFILE;

  const threshold = getEnvFloat('PARLEY_CONVERGENCE_THRESHOLD', CONVERGENCE_DEFAULTS.THRESHOLD);
  const rawAction = getEnvWithDefault('PARLEY_CONVERGENCE_ACTION', CONVERGENCE_DEFAULTS.ACTION);

  return {
    profile,
    weights: CONVERGENCE_PROFILES[profile],
    threshold: threshold >= 0 && threshold <= 1 ? threshold : CONVERGENCE_DEFAULTS.THRESHOLD,
    action: isConvergenceAction(rawAction) ? rawAction : CONVERGENCE_DEFAULTS.ACTION,
    windowSize: CONVERGENCE_DEFAULTS.WINDOW_SIZE,
  };
}
