/**
 * Experiment configuration loading
 *
 * Experiment configs come from YAML files or tool input. Both pass through
 * `parseExperimentConfig`, which validates with zod, fills defaults from the
 * environment and resolves convergence weights. Every failure is a
 * ConfigurationError, raised before anything is written to disk.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { ConfigurationError, InvalidProfileError } from '../errors/index.js';
import { ExperimentConfigInputSchema } from '../types/schemas.js';
import type { ConvergenceSettings, ExperimentConfig } from '../types/index.js';
import { isProfileName, loadConvergenceDefaults, PROFILE_NAMES, resolveConvergenceWeights } from './convergence.js';
import { loadRuntimeConfig, type RuntimeConfig } from './runtime.js';

export interface ConfigDefaults {
  runtime: RuntimeConfig;
  convergence: ConvergenceSettings;
}

export function loadConfigDefaults(): ConfigDefaults {
  return { runtime: loadRuntimeConfig(), convergence: loadConvergenceDefaults() };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate raw experiment configuration and fill in defaults
 *
 * @throws ConfigurationError (or a subclass) when the input is invalid
 */
export function parseExperimentConfig(input: unknown, defaults: ConfigDefaults = loadConfigDefaults()): ExperimentConfig {
  const parsed = ExperimentConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid experiment configuration: ${formatIssues(parsed.error)}`, {
      code: 'INVALID_CONFIG',
    });
  }

  const raw = parsed.data;
  const convergenceInput = raw.convergence ?? {};
  const profile = convergenceInput.profile ?? defaults.convergence.profile;
  if (!isProfileName(profile)) {
    throw new InvalidProfileError(profile, PROFILE_NAMES);
  }

  const convergence: ConvergenceSettings = {
    profile,
    weights: resolveConvergenceWeights(profile, convergenceInput.customWeights),
    threshold: convergenceInput.threshold ?? defaults.convergence.threshold,
    action: convergenceInput.action ?? defaults.convergence.action,
    windowSize: convergenceInput.windowSize ?? defaults.convergence.windowSize,
  };

  for (const [slot, spec] of [
    ['agentA', raw.agentA],
    ['agentB', raw.agentB],
  ] as const) {
    if (spec.provider === 'scripted' && (!spec.script || spec.script.length === 0)) {
      throw new ConfigurationError(`${slot}: scripted agents need a non-empty script`, { code: 'INVALID_CONFIG' });
    }
  }

  return {
    name: raw.name,
    agentA: raw.agentA,
    agentB: raw.agentB,
    initialPrompt: raw.initialPrompt,
    maxTurns: raw.maxTurns ?? defaults.runtime.defaultMaxTurns,
    repetitions: raw.repetitions,
    maxParallel: raw.maxParallel ?? defaults.runtime.maxParallel,
    convergence,
    callTimeoutMs: raw.callTimeoutMs ?? defaults.runtime.callTimeoutMs,
    maxRetries: raw.maxRetries ?? defaults.runtime.maxRetries,
  };
}

/**
 * Read and validate an experiment configuration file (YAML or JSON)
 */
export async function loadExperimentConfig(
  filePath: string,
  defaults: ConfigDefaults = loadConfigDefaults()
): Promise<ExperimentConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read experiment configuration '${filePath}'`, {
      code: 'INVALID_CONFIG',
      cause: error instanceof Error ? error : undefined,
    });
  }

  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`Experiment configuration '${filePath}' is not valid YAML`, {
      code: 'INVALID_CONFIG',
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parseExperimentConfig(document, defaults);
}
