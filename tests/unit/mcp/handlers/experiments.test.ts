/**
 * Tests for MCP experiment handlers
 * Handles: run_experiment, get_experiment_status, list_experiments, stop_experiment
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  handleGetExperimentStatus,
  handleListExperiments,
  handleRunExperiment,
  handleStopExperiment,
} from '../../../../src/mcp/handlers/experiments.js';
import type { HandlerContext } from '../../../../src/mcp/handler-registry.js';
import type { ToolResponse } from '../../../../src/mcp/tools.js';
import { createCountingAgent, createGate, createHandlerContext, createReply, StubAgent } from '../../../utils/index.js';

function body(response: ToolResponse): unknown {
  return JSON.parse(response.content[0]?.text ?? 'null');
}

const config = {
  name: 'rivers',
  agentA: { provider: 'local', model: 'stub' },
  agentB: { provider: 'local', model: 'stub' },
  initialPrompt: 'Talk about rivers.',
  maxTurns: 2,
};

describe('Experiment Handlers', () => {
  let outputDir: string;
  let ctx: HandlerContext;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'parley-handlers-'));
    ctx = createHandlerContext(outputDir);
  });

  afterEach(async () => {
    await ctx.analytics.close();
    await rm(outputDir, { recursive: true, force: true });
  });

  describe('handleRunExperiment', () => {
    it('should return the summary when waiting', async () => {
      const response = await handleRunExperiment({ config, wait: true }, ctx);

      expect(response.isError).toBeUndefined();
      expect(body(response)).toEqual({
        experimentId: 'id-1',
        status: 'completed',
        directory: join(outputDir, 'id-1'),
        conversations: [
          { conversationId: 'id-2', status: 'completed', endReason: 'max_turns_reached', turns: 2, finalScore: 0.1 },
        ],
      });
    });

    it('should return immediately by default', async () => {
      const response = await handleRunExperiment({ config }, ctx);

      expect(body(response)).toEqual({
        experimentId: 'id-1',
        status: 'running',
        conversations: 1,
        directory: join(outputDir, 'id-1'),
      });
      await vi.waitFor(() => expect(ctx.experimentRunner.isActive('id-1')).toBe(false));
      expect((await ctx.experimentRunner.getStatus('id-1')).status).toBe('completed');
    });

    it('should load the configuration from a YAML file', async () => {
      const configPath = join(outputDir, 'rivers.yaml');
      await writeFile(
        configPath,
        [
          'name: from-file',
          'agentA: { provider: local, model: stub }',
          'agentB: { provider: local, model: stub }',
          'initialPrompt: Talk about rivers.',
          'maxTurns: 1',
          '',
        ].join('\n')
      );

      const response = await handleRunExperiment({ configPath, wait: true }, ctx);

      expect(body(response)).toMatchObject({ experimentId: 'id-1', status: 'completed', conversations: [{ turns: 1 }] });
      expect((await ctx.experimentRunner.getStatus('id-1')).name).toBe('from-file');
    });

    it('should reject input with both config and configPath', async () => {
      const response = await handleRunExperiment({ config, configPath: 'x.yaml' }, ctx);

      expect(body(response)).toMatchObject({ code: 'INVALID_INPUT' });
    });

    it('should reject malformed input', async () => {
      const response = await handleRunExperiment({ wait: true }, ctx);

      expect(response.isError).toBe(true);
      expect(body(response)).toMatchObject({ code: 'INVALID_INPUT' });
    });

    it('should reject an unknown convergence profile', async () => {
      const response = await handleRunExperiment({ config: { ...config, convergence: { profile: 'loose' } } }, ctx);

      expect(body(response)).toEqual({
        error: "Invalid convergence profile 'loose'. Must be one of: balanced, structural, semantic, strict, custom",
        code: 'INVALID_PROFILE',
      });
    });
  });

  describe('handleGetExperimentStatus', () => {
    it('should describe a finished experiment', async () => {
      await handleRunExperiment({ config, wait: true }, ctx);

      const response = await handleGetExperimentStatus({ experimentId: 'id-1' }, ctx);

      expect(body(response)).toMatchObject({
        experimentId: 'id-1',
        name: 'rivers',
        status: 'completed',
        active: false,
        counters: { total: 1, completed: 1 },
        convergence: { profile: 'balanced', threshold: 0.85, action: 'stop' },
        importState: 'none',
        conversations: [
          {
            conversationId: 'id-2',
            status: 'completed',
            endReason: 'max_turns_reached',
            turnsCompleted: 2,
            finalScore: 0.1,
            error: null,
            lastScore: 0.1,
            totalTokens: 60,
            partialMessages: 0,
          },
        ],
        error: null,
      });
    });

    it('should report unknown experiments', async () => {
      const response = await handleGetExperimentStatus({ experimentId: 'missing' }, ctx);

      expect(response.isError).toBe(true);
      expect(body(response)).toMatchObject({ code: 'MANIFEST_MISSING' });
    });

    it.each(['../elsewhere', 'a/b', '..'])('should reject the experiment ID %j', async (experimentId) => {
      const response = await handleGetExperimentStatus({ experimentId }, ctx);

      expect(response.isError).toBe(true);
      expect(body(response)).toMatchObject({ code: 'INVALID_INPUT' });
    });
  });

  describe('handleListExperiments', () => {
    it('should list experiments', async () => {
      await handleRunExperiment({ config, wait: true }, ctx);

      expect(body(await handleListExperiments({}, ctx))).toMatchObject({
        experiments: [{ experimentId: 'id-1', name: 'rivers', status: 'completed', active: false }],
        count: 1,
      });
      expect(body(await handleListExperiments({ status: 'failed' }, ctx))).toEqual({ experiments: [], count: 0 });
    });

    it('should accept missing arguments', async () => {
      expect(body(await handleListExperiments(undefined, ctx))).toEqual({ experiments: [], count: 0 });
    });

    it('should reject an unknown status filter', async () => {
      expect(body(await handleListExperiments({ status: 'done' }, ctx))).toMatchObject({ code: 'INVALID_INPUT' });
    });
  });

  describe('handleStopExperiment', () => {
    it('should report experiments that are not running', async () => {
      const response = await handleStopExperiment({ experimentId: 'nope' }, ctx);

      expect(response.isError).toBe(true);
      expect(body(response)).toEqual({ error: 'Experiment nope is not running' });
    });

    it('should interrupt a running experiment', async () => {
      const gate = createGate();
      const gated = new StubAgent('agent_a', async (call) => {
        await gate.promise;
        return createReply(`A ${call}`);
      });
      await ctx.analytics.close();
      ctx = createHandlerContext(outputDir, [0.1], {
        agentFactory: (_spec, slot) => (slot === 'agent_a' ? gated : createCountingAgent(slot, 'B')),
      });

      await handleRunExperiment({ config }, ctx);
      await vi.waitFor(() => expect(gated.calls).toBe(1));

      expect(body(await handleStopExperiment({ experimentId: 'id-1' }, ctx))).toEqual({
        experimentId: 'id-1',
        stopping: true,
      });
      gate.release();
      await vi.waitFor(() => expect(ctx.experimentRunner.isActive('id-1')).toBe(false));
      expect((await ctx.experimentRunner.getStatus('id-1')).status).toBe('interrupted');
    });
  });
});
