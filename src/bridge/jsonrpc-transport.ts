/**
 * JSON-RPC 2.0 Transport Layer
 *
 * Handles communication with the Python runtime via stdio:
 * - Line-delimited JSON framing
 * - Request/response correlation via IDs
 * - Timeout and error handling
 *
 * The runtime is single-threaded and answers in order, so there is no
 * batching or retry layer here: a failed request fails the benchmark.
 */

import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import { lazyLog } from '../utils/logger-helpers.js';
import {
  type JsonRpcMessage,
  type JsonRpcRequest,
  JsonRpcMessageSchema,
  JsonRpcError,
  encodeLine,
} from './serializers.js';
import { BenchError } from '../api/errors.js';

export { JsonRpcError } from './serializers.js';

export interface RequestOptions {
  /** Per-request timeout (ms); overrides the transport default */
  timeout?: number;
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  method: string;
}

export interface JsonRpcTransportOptions {
  stdin: Writable;
  stdout: Readable;
  stderr?: Readable;
  logger?: Logger;
  defaultTimeout: number; // milliseconds
  maxLineBufferSize?: number; // bytes (default: 16MB)
}

const DEFAULT_MAX_LINE_BUFFER_SIZE = 16 * 1024 * 1024;

/**
 * JSON-RPC 2.0 Transport over stdio
 */
export class JsonRpcTransport {
  private readonly stdin: Writable;
  private readonly stdout: Readable;
  private readonly stderr?: Readable;
  private readonly logger?: Logger;
  private readonly defaultTimeout: number;
  private readonly maxLineBufferSize: number;

  private pending = new Map<string | number, PendingRequest>();
  private nextId = 1;
  private closed = false;

  // Buffer for incomplete JSON lines
  private lineBuffer = '';

  // Event handlers (store references for cleanup)
  private readonly stdoutDataHandler = (chunk: string): void => this.handleStdoutData(chunk);
  private readonly stdoutEndHandler = (): void => {
    this.logger?.debug('Runtime stdout ended');
    this.close();
  };
  private readonly streamErrorHandler = (err: Error): void => {
    this.logger?.error({ err }, 'Runtime stdio error');
    this.close();
  };
  private readonly stderrDataHandler = (chunk: string): void => {
    this.logger?.debug({ stderr: chunk.trim() }, 'Python stderr');
  };

  constructor(options: JsonRpcTransportOptions) {
    this.stdin = options.stdin;
    this.stdout = options.stdout;
    this.stderr = options.stderr;
    this.logger = options.logger;
    this.defaultTimeout = options.defaultTimeout;
    this.maxLineBufferSize = options.maxLineBufferSize ?? DEFAULT_MAX_LINE_BUFFER_SIZE;

    this.stdout.setEncoding('utf-8');
    this.stdout.on('data', this.stdoutDataHandler);
    this.stdout.on('end', this.stdoutEndHandler);
    this.stdout.on('error', this.streamErrorHandler);
    this.stdin.on('error', this.streamErrorHandler);

    if (this.stderr) {
      this.stderr.setEncoding('utf-8');
      this.stderr.on('data', this.stderrDataHandler);
    }
  }

  /**
   * Send a request and validate its result against `schema`.
   */
  public async request<T>(
    method: string,
    params: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const raw = await this.send(method, params, options);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new BenchError('ProtocolError', `Invalid result for ${method}`, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }

  private send(method: string, params: unknown, options: RequestOptions): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new BenchError('TransportError', 'Transport is closed'));
    }

    const id = this.nextId++;
    const timeout = options.timeout ?? this.defaultTimeout;
    const startTime = Date.now();
    const request: JsonRpcRequest = { jsonrpc: '2.0', method, params, id };

    return new Promise<unknown>((resolve, reject) => {
      const settle = (): void => {
        this.pending.delete(id);
        clearTimeout(timeoutHandle);
      };

      const timeoutHandle = setTimeout(() => {
        settle();
        reject(
          new BenchError('Timeout', `Request timed out after ${timeout}ms: ${method} (id: ${id})`, {
            method,
            timeout,
            duration: Date.now() - startTime,
          })
        );
      }, timeout);

      this.pending.set(id, {
        resolve: (value) => {
          settle();
          resolve(value);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
        method,
      });

      this.stdin.write(encodeLine(request), 'utf-8', (err) => {
        if (err) {
          settle();
          reject(err);
        }
      });

      lazyLog(this.logger, 'debug', () => ({ request, id }), 'Sent JSON-RPC request');
    });
  }

  /**
   * Close the transport and reject all pending requests
   */
  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;

    this.stdout.off('data', this.stdoutDataHandler);
    this.stdout.off('end', this.stdoutEndHandler);
    this.stdout.off('error', this.streamErrorHandler);
    this.stdin.off('error', this.streamErrorHandler);
    this.stderr?.off('data', this.stderrDataHandler);

    const error = new BenchError('TransportError', 'Transport closed');
    for (const pending of [...this.pending.values()]) {
      pending.reject(error);
    }
    this.pending.clear();
  }

  /**
   * Check if transport is ready
   */
  public isReady(): boolean {
    return !this.closed && this.stdin.writable;
  }

  public pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Handle incoming stdout data
   */
  private handleStdoutData(chunk: string): void {
    this.lineBuffer += chunk;

    const bufferSize = Buffer.byteLength(this.lineBuffer, 'utf-8');
    if (bufferSize > this.maxLineBufferSize) {
      const error = new BenchError(
        'TransportError',
        `JSON-RPC stdout line buffer exceeded limit (${bufferSize} > ${this.maxLineBufferSize})`
      );
      this.logger?.error({ err: error, limit: this.maxLineBufferSize }, 'Stdout buffer overflow');
      this.lineBuffer = '';
      this.close();
      return;
    }

    const lines = this.lineBuffer.split('\n');
    this.lineBuffer = lines.pop() ?? '';

    for (const line of lines) {
      if (!line.trim()) {
        continue;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err) {
        // mlx_lm and its dependencies occasionally print to stdout
        this.logger?.warn({ err, line }, 'Ignoring non-JSON line on runtime stdout');
        continue;
      }

      const parseResult = JsonRpcMessageSchema.safeParse(raw);
      if (!parseResult.success) {
        this.logger?.warn({ raw, error: parseResult.error.format() }, 'Invalid JSON-RPC message');
        continue;
      }
      this.handleMessage(parseResult.data);
    }
  }

  private handleMessage(message: JsonRpcMessage): void {
    if (message.id === null) {
      this.logger?.warn({ message }, 'Response without valid ID');
      return;
    }

    const pending = this.pending.get(message.id);
    if (!pending) {
      this.logger?.warn({ id: message.id }, 'Received response for unknown request');
      return;
    }

    if ('error' in message) {
      const { code, message: msg, data } = message.error;
      this.logger?.debug({ code, method: pending.method }, 'JSON-RPC error response');
      pending.reject(new JsonRpcError(code, msg, data));
      return;
    }

    lazyLog(this.logger, 'debug', () => ({ id: message.id, method: pending.method }), 'JSON-RPC success response');
    pending.resolve(message.result);
  }
}
