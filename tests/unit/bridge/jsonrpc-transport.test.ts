import { PassThrough } from 'node:stream';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { JsonRpcTransport, JsonRpcError } from '../../../src/bridge/jsonrpc-transport.js';
import { GenerateResponseSchema } from '../../../src/bridge/serializers.js';
import { BenchError } from '../../../src/api/errors.js';

interface Harness {
  transport: JsonRpcTransport;
  stdin: PassThrough;
  stdout: PassThrough;
  requests: Array<{ id: number; method: string; params?: unknown }>;
}

const RequestLine = z.object({ id: z.number(), method: z.string(), params: z.unknown().optional() });

const createTransport = (defaultTimeout = 1_000): Harness => {
  const stdin = new PassThrough();
  const stdout = new PassThrough();
  const requests: Harness['requests'] = [];

  stdin.setEncoding('utf-8');
  stdin.on('data', (chunk: string) => {
    for (const line of chunk.split('\n').filter(Boolean)) {
      requests.push(RequestLine.parse(JSON.parse(line)));
    }
  });

  const transport = new JsonRpcTransport({ stdin, stdout, defaultTimeout });
  return { transport, stdin, stdout, requests };
};

const respond = (stdout: PassThrough, message: unknown): void => {
  stdout.write(`${JSON.stringify(message)}\n`);
};

const nextTick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('JsonRpcTransport', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('correlates responses with requests and validates the result', async () => {
    const { transport, stdout, requests } = createTransport();

    const pending = transport.request(
      'generate',
      { model_id: 'm', prompt: 'hi', max_tokens: 4, temperature: 0 },
      GenerateResponseSchema
    );
    await nextTick();

    expect(requests).toEqual([
      { id: 1, method: 'generate', params: { model_id: 'm', prompt: 'hi', max_tokens: 4, temperature: 0 } },
    ]);

    respond(stdout, { jsonrpc: '2.0', id: 1, result: { text: 'hello there' } });
    await expect(pending).resolves.toEqual({ text: 'hello there' });
    expect(transport.pendingCount()).toBe(0);
    transport.close();
  });

  it('reassembles responses split across chunks and skips non-JSON lines', async () => {
    const { transport, stdout } = createTransport();

    const pending = transport.request('generate', {}, GenerateResponseSchema);
    await nextTick();

    stdout.write('Fetching 4 files\n{"jsonrpc":"2.0","id":1,');
    stdout.write('"result":{"text":"ok"}}\n');

    await expect(pending).resolves.toEqual({ text: 'ok' });
    transport.close();
  });

  it('rejects with JsonRpcError on an error response', async () => {
    const { transport, stdout } = createTransport();

    const pending = transport.request('load_model', { model_id: 'missing' }, GenerateResponseSchema);
    await nextTick();
    respond(stdout, { jsonrpc: '2.0', id: 1, error: { code: -32001, message: 'failed to load missing' } });

    await expect(pending).rejects.toBeInstanceOf(JsonRpcError);
    await expect(pending).rejects.toMatchObject({ code: -32001, message: 'failed to load missing' });
    transport.close();
  });

  it('rejects with ProtocolError when the result does not match the schema', async () => {
    const { transport, stdout } = createTransport();

    const pending = transport.request('generate', {}, GenerateResponseSchema);
    await nextTick();
    respond(stdout, { jsonrpc: '2.0', id: 1, result: { tokens: [1, 2] } });

    await expect(pending).rejects.toMatchObject({ code: 'ProtocolError', message: 'Invalid result for generate' });
    transport.close();
  });

  it('times out requests that get no answer', async () => {
    vi.useFakeTimers();
    const { transport } = createTransport(50);

    const pending = transport.request('generate', {}, GenerateResponseSchema);
    const assertion = expect(pending).rejects.toMatchObject({ code: 'Timeout' });
    await vi.advanceTimersByTimeAsync(60);

    await assertion;
    expect(transport.pendingCount()).toBe(0);
    transport.close();
  });

  it('rejects pending and later requests once closed', async () => {
    const { transport } = createTransport();

    const pending = transport.request('generate', {}, GenerateResponseSchema);
    transport.close();

    await expect(pending).rejects.toMatchObject({ code: 'TransportError', message: 'Transport closed' });
    await expect(transport.request('generate', {}, GenerateResponseSchema)).rejects.toBeInstanceOf(BenchError);
    expect(transport.isReady()).toBe(false);
  });

  it('closes and fails pending requests when the runtime stdout ends', async () => {
    const { transport, stdout } = createTransport();

    const pending = transport.request('load_model', { model_id: 'm' }, GenerateResponseSchema);
    const assertion = expect(pending).rejects.toMatchObject({ code: 'TransportError', message: 'Transport closed' });
    stdout.end();

    await assertion;
    expect(transport.isReady()).toBe(false);
  });

  it('ignores lines that are not responses', async () => {
    const { transport, stdout } = createTransport();

    const pending = transport.request('generate', {}, GenerateResponseSchema);
    await nextTick();
    respond(stdout, { jsonrpc: '2.0', method: 'progress', params: { percent: 50 } });
    respond(stdout, { jsonrpc: '2.0', id: 1, result: { text: 'done' } });

    await expect(pending).resolves.toEqual({ text: 'done' });
    transport.close();
  });
});
