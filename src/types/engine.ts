/**
 * Inference backend contract
 *
 * The benchmark treats the model runtime as an opaque capability:
 * load a model by identifier, generate text, tokenize text.
 */

export interface GenerateOptions {
  maxTokens: number;
  temperature: number;
}

/**
 * A model loaded by an {@link InferenceBackend}.
 */
export interface ModelSession {
  readonly modelId: string;

  generate(prompt: string, options: GenerateOptions): Promise<string>;

  encode(text: string): Promise<number[]>;
}

export interface InferenceBackend {
  /**
   * Load a model. Called once per worker.
   */
  load(modelId: string): Promise<ModelSession>;

  /**
   * Release the runtime. Safe to call more than once.
   */
  close(): Promise<void>;
}
