import { describe, it, expect } from 'vitest';
import { estimateNewTokens, runWorkerBenchmark } from '../../../src/worker/benchmark-worker.js';
import { BenchError } from '../../../src/api/errors.js';
import { FakeBackend, FakeSession, scriptedClock } from '../../helpers/fake-backend.js';

const params = {
  model: 'test-org/tiny',
  prompt: 'p q',
  runs: 2,
  maxTokens: 16,
  temperature: 0.2,
};

describe('estimateNewTokens', () => {
  it('subtracts the prompt length from the generated length', async () => {
    const session = new FakeSession('m', {});
    await expect(estimateNewTokens(session, 'p q', 'a b c d e')).resolves.toEqual({ newTokens: 3, ok: true });
  });

  it('floors the estimate at 0', async () => {
    const session = new FakeSession('m', {});
    await expect(estimateNewTokens(session, 'a b c', 'x')).resolves.toEqual({ newTokens: 0, ok: true });
  });

  it('degrades to 0 when the tokenizer throws', async () => {
    const session = new FakeSession('m', { failEncode: () => true });
    await expect(estimateNewTokens(session, 'p', 'x y')).resolves.toEqual({ newTokens: 0, ok: false });
  });
});

describe('runWorkerBenchmark', () => {
  it('loads once and times every run', async () => {
    const backend = new FakeBackend({ output: 'w x y z' });
    // load: 0 -> 1500, run 1: 2000 -> 2500, run 2: 3000 -> 3250
    const now = scriptedClock([0, 1500, 2000, 2500, 3000, 3250]);

    const result = await runWorkerBenchmark(backend, params, { now });

    expect(backend.sessions).toHaveLength(1);
    expect(backend.sessions[0]?.generateCalls).toEqual([
      { prompt: 'p q', options: { maxTokens: 16, temperature: 0.2 } },
      { prompt: 'p q', options: { maxTokens: 16, temperature: 0.2 } },
    ]);
    expect(result).toEqual({
      loadSeconds: 1.5,
      estimationFailures: 0,
      rows: [
        { run: 1, latencySeconds: 0.5, estimatedNewTokens: 2, estimatedTokensPerSecond: 4 },
        { run: 2, latencySeconds: 0.25, estimatedNewTokens: 2, estimatedTokensPerSecond: 8 },
      ],
    });
  });

  it('counts tokenizer failures and keeps the run', async () => {
    const backend = new FakeBackend({ output: 'w x y z', failEncode: (text) => text === 'w x y z' });
    const now = scriptedClock([0, 0, 0, 1000, 1000, 2000]);

    const result = await runWorkerBenchmark(backend, params, { now });

    expect(result.estimationFailures).toBe(2);
    expect(result.rows.map((row) => row.estimatedNewTokens)).toEqual([0, 0]);
    expect(result.rows.map((row) => row.estimatedTokensPerSecond)).toEqual([0, 0]);
  });

  it('reports 0 tokens/s when a run takes no measurable time', async () => {
    const backend = new FakeBackend({ output: 'a b c d' });

    const result = await runWorkerBenchmark(backend, { ...params, runs: 1 }, { now: () => 42 });

    expect(result.rows).toEqual([
      { run: 1, latencySeconds: 0, estimatedNewTokens: 2, estimatedTokensPerSecond: 0 },
    ]);
  });

  it('propagates load and generation failures', async () => {
    await expect(
      runWorkerBenchmark(new FakeBackend({ loadError: new BenchError('ModelLoadError', 'no model') }), params)
    ).rejects.toMatchObject({ code: 'ModelLoadError' });

    await expect(
      runWorkerBenchmark(new FakeBackend({ generateError: new Error('metal device lost') }), params)
    ).rejects.toThrow('metal device lost');
  });
});
