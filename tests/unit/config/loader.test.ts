import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CONVERGENCE_PROFILES } from '../../../src/config/convergence.js';
import { loadExperimentConfig, parseExperimentConfig, type ConfigDefaults } from '../../../src/config/loader.js';
import { ConfigurationError, InvalidProfileError, WeightsDoNotSumToOneError } from '../../../src/errors/index.js';

const defaults: ConfigDefaults = {
  runtime: {
    outputDir: '/tmp/parley-test',
    dbPath: '/tmp/parley-test/parley.sqlite',
    maxParallel: 2,
    callTimeoutMs: 30000,
    maxRetries: 1,
    defaultMaxTurns: 12,
    autoImport: false,
  },
  convergence: {
    profile: 'balanced',
    weights: CONVERGENCE_PROFILES.balanced,
    threshold: 0.85,
    action: 'stop',
    windowSize: 1,
  },
};

const baseInput = {
  name: 'echo-test',
  agentA: { provider: 'local', model: 'echo' },
  agentB: { provider: 'local', model: 'echo' },
  initialPrompt: 'Describe a lighthouse.',
};

describe('Experiment Configuration Loader', () => {
  describe('parseExperimentConfig', () => {
    it('should fill omitted fields from defaults', () => {
      const config = parseExperimentConfig(baseInput, defaults);

      expect(config).toEqual({
        name: 'echo-test',
        agentA: { provider: 'local', model: 'echo' },
        agentB: { provider: 'local', model: 'echo' },
        initialPrompt: 'Describe a lighthouse.',
        maxTurns: 12,
        repetitions: 1,
        maxParallel: 2,
        convergence: defaults.convergence,
        callTimeoutMs: 30000,
        maxRetries: 1,
      });
    });

    it('should resolve a named profile with overrides', () => {
      const config = parseExperimentConfig(
        { ...baseInput, maxTurns: 5, convergence: { profile: 'structural', threshold: 0.6, action: 'warn' } },
        defaults
      );

      expect(config.maxTurns).toBe(5);
      expect(config.convergence).toEqual({
        profile: 'structural',
        weights: CONVERGENCE_PROFILES.structural,
        threshold: 0.6,
        action: 'warn',
        windowSize: 1,
      });
    });

    it('should reject an unknown profile', () => {
      expect(() => parseExperimentConfig({ ...baseInput, convergence: { profile: 'gentle' } }, defaults)).toThrow(
        InvalidProfileError
      );
    });

    it('should reject custom weights that do not sum to 1', () => {
      expect(() =>
        parseExperimentConfig(
          {
            ...baseInput,
            convergence: {
              profile: 'custom',
              customWeights: { content: 0.3, structure: 0.3, sentences: 0.3, length: 0.3, punctuation: 0.3 },
            },
          },
          defaults
        )
      ).toThrow(WeightsDoNotSumToOneError);
    });

    it('should reject custom weights when the profile defaults to a built-in one', () => {
      const attempt = () =>
        parseExperimentConfig(
          {
            ...baseInput,
            convergence: {
              customWeights: { content: 0.2, structure: 0.2, sentences: 0.2, length: 0.2, punctuation: 0.2 },
            },
          },
          defaults
        );

      expect(attempt).toThrow(ConfigurationError);
      expect(attempt).toThrow("customWeights require profile 'custom'");
    });

    it('should report schema issues with their path', () => {
      expect(() => parseExperimentConfig({ ...baseInput, maxTurns: 0 }, defaults)).toThrow(
        /^Invalid experiment configuration: maxTurns: /
      );
    });

    it('should require a script for scripted agents', () => {
      expect(() =>
        parseExperimentConfig({ ...baseInput, agentB: { provider: 'scripted', model: 'fixture' } }, defaults)
      ).toThrow('agentB: scripted agents need a non-empty script');
    });

    it('should reject a threshold outside [0, 1]', () => {
      expect(() => parseExperimentConfig({ ...baseInput, convergence: { threshold: 1.2 } }, defaults)).toThrow(
        ConfigurationError
      );
    });
  });

  describe('loadExperimentConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'parley-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read a YAML file', async () => {
      const file = join(dir, 'experiment.yaml');
      await writeFile(
        file,
        [
          'name: yaml-run',
          'agentA:',
          '  provider: scripted',
          '  model: fixture',
          '  script:',
          '    - hello there',
          'agentB:',
          '  provider: local',
          '  model: echo',
          'initialPrompt: Say hello.',
          'repetitions: 3',
          'convergence:',
          '  profile: semantic',
          '',
        ].join('\n')
      );

      const config = await loadExperimentConfig(file, defaults);

      expect(config.name).toBe('yaml-run');
      expect(config.agentA.script).toEqual(['hello there']);
      expect(config.repetitions).toBe(3);
      expect(config.convergence.weights).toBe(CONVERGENCE_PROFILES.semantic);
    });

    it('should fail for a missing file', async () => {
      await expect(loadExperimentConfig(join(dir, 'missing.yaml'), defaults)).rejects.toMatchObject({
        code: 'INVALID_CONFIG',
      });
    });

    it('should fail for malformed YAML', async () => {
      const file = join(dir, 'broken.yaml');
      await writeFile(file, 'name: [unclosed\n');

      await expect(loadExperimentConfig(file, defaults)).rejects.toThrow(
        `Experiment configuration '${file}' is not valid YAML`
      );
    });
  });
});
