/**
 * mlx-lm inference backend
 *
 * Implements {@link InferenceBackend} on top of the Python runtime: one
 * runtime process per backend, models loaded through `load_model`, text
 * generated through `generate`.
 */

import type { Logger } from 'pino';
import type { GenerateOptions, InferenceBackend, ModelSession } from '../types/engine.js';
import { PythonRunner, type PythonRunnerOptions } from './python-runner.js';
import type { JsonRpcTransport } from './jsonrpc-transport.js';
import {
  GenerateResponseSchema,
  LoadModelResponseSchema,
  TokenizeResponseSchema,
  type GenerateParams,
  type LoadModelParams,
  type TokenizeParams,
} from './serializers.js';
import { BenchError, toBenchError } from '../api/errors.js';

export interface MlxLmBackendOptions {
  logger?: Logger;
  /** Options for the runtime process; ignored when `runner` is given */
  runtime?: Omit<PythonRunnerOptions, 'logger'>;
  runner?: PythonRunner;
}

class MlxModelSession implements ModelSession {
  constructor(
    public readonly modelId: string,
    private readonly transport: JsonRpcTransport
  ) {}

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    try {
      const result = await this.transport.request(
        'generate',
        {
          model_id: this.modelId,
          prompt,
          max_tokens: options.maxTokens,
          temperature: options.temperature,
        } satisfies GenerateParams,
        GenerateResponseSchema
      );
      return result.text;
    } catch (error) {
      throw toBenchError(error, 'GenerationError');
    }
  }

  async encode(text: string): Promise<number[]> {
    try {
      const result = await this.transport.request(
        'tokenize',
        { model_id: this.modelId, text } satisfies TokenizeParams,
        TokenizeResponseSchema
      );
      return result.tokens;
    } catch (error) {
      throw toBenchError(error, 'TokenizerError');
    }
  }
}

export class MlxLmBackend implements InferenceBackend {
  private readonly runner: PythonRunner;
  private readonly logger?: Logger;
  private closed = false;

  constructor(options: MlxLmBackendOptions = {}) {
    this.logger = options.logger;
    this.runner = options.runner ?? new PythonRunner({ ...options.runtime, logger: options.logger });
  }

  async load(modelId: string): Promise<ModelSession> {
    if (this.closed) {
      throw new BenchError('Cancelled', 'Backend is closed');
    }
    if (this.runner.getStatus() !== 'ready') {
      await this.runner.start();
    }

    const transport = this.runner.getTransport();
    if (!transport) {
      throw new BenchError('BackendUnavailable', 'Python runtime is not ready');
    }

    this.logger?.info({ model: modelId }, 'Loading model');
    try {
      const result = await transport.request(
        'load_model',
        { model_id: modelId } satisfies LoadModelParams,
        LoadModelResponseSchema
      );
      if (result.state !== 'ready') {
        throw new BenchError('ModelLoadError', `Model ${modelId} did not reach ready state`, {
          state: result.state,
        });
      }
    } catch (error) {
      throw toBenchError(error, 'ModelLoadError');
    }

    return new MlxModelSession(modelId, transport);
  }

  /**
   * Stop the runtime. Requests still in flight fail; later loads are refused.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.runner.stop();
  }
}
