import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { ConfigurationError } from '../../../src/errors/index.js';
import { eventLogPath, experimentDirectory, manifestPath } from '../../../src/storage/paths.js';

describe('experiment paths', () => {
  it('should place an experiment directly under the output directory', () => {
    const dir = experimentDirectory(join('out', 'runs'), 'exp_1-a');

    expect(dir).toBe(join('out', 'runs', 'exp_1-a'));
    expect(manifestPath(dir)).toBe(join('out', 'runs', 'exp_1-a', 'manifest.json'));
    expect(eventLogPath(dir, 'c1')).toBe(join('out', 'runs', 'exp_1-a', 'c1.jsonl'));
  });

  it.each(['../elsewhere', '..', '.', 'a/b', 'a\\b', '/etc', '', 'exp 1'])(
    'should reject experiment ID %j',
    (experimentId) => {
      expect(() => experimentDirectory('out', experimentId)).toThrow(ConfigurationError);
      expect(() => experimentDirectory('out', experimentId)).toThrow('Invalid experiment ID');
    }
  );
});
