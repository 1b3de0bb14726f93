/**
 * In-process stand-in for python/runtime.py: answers line-delimited
 * JSON-RPC on its stdio from a table of handlers.
 */

import { EventEmitter } from 'node:events';
import type { ChildProcess } from 'node:child_process';
import { PassThrough } from 'node:stream';
import { PythonRunner, type SpawnFunction } from '../../src/bridge/python-runner.js';

export type Handler = (params: unknown) => unknown;

export class RuntimeMethodError {
  constructor(
    public readonly code: number,
    public readonly message: string
  ) {}
}

export class FakeRuntimeProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  pid: number | undefined = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly signals: string[] = [];
  readonly methods: string[] = [];

  constructor(handlers: Record<string, Handler>) {
    super();
    this.stdin.setEncoding('utf-8');
    this.stdin.on('data', (chunk: string) => {
      for (const line of chunk.split('\n').filter(Boolean)) {
        const request: { id: number; method: string; params?: unknown } = JSON.parse(line);
        this.methods.push(request.method);
        const handler = handlers[request.method];
        if (handler) {
          this.stdout.write(`${JSON.stringify(this.answer(request.id, handler, request.params))}\n`);
        }
        if (request.method === 'shutdown') {
          setImmediate(() => this.finish(0, null));
        }
      }
    });
  }

  private answer(id: number, handler: Handler, params: unknown): unknown {
    try {
      return { jsonrpc: '2.0', id, result: handler(params) };
    } catch (error) {
      if (error instanceof RuntimeMethodError) {
        return { jsonrpc: '2.0', id, error: { code: error.code, message: error.message } };
      }
      throw error;
    }
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    this.finish(null, signal);
    return true;
  }

  finish(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exitCode !== null || this.signalCode !== null) {
      return;
    }
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
  }
}

export const runtimeInfo = {
  version: '0.1.0',
  protocol: '1.0',
  capabilities: ['load_model', 'generate', 'tokenize'],
};

export function createFakeRunner(child: FakeRuntimeProcess): { runner: PythonRunner; calls: string[][] } {
  const calls: string[][] = [];
  const spawnProcess: SpawnFunction = (command, args) => {
    calls.push([command, ...args]);
    return child as unknown as ChildProcess;
  };
  const runner = new PythonRunner({
    pythonPath: 'python3',
    runtimePath: '/opt/runtime.py',
    startupTimeout: 1_000,
    shutdownTimeout: 200,
    spawnProcess,
  });
  return { runner, calls };
}
