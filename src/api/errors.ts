/**
 * Benchmark error utilities.
 *
 * Provides a consistent error type for every CLI and library surface and
 * helpers to convert lower-level transport errors into BenchError
 * instances that callers can reason about.
 */

import type { ZodError } from 'zod';
import { JsonRpcError, JsonRpcErrorCode } from '../bridge/serializers.js';

/**
 * Error codes surfaced to operators and library callers.
 */
export type BenchErrorCode =
  | 'UsageError'
  | 'ConfigError'
  | 'BackendUnavailable'
  | 'ModelLoadError'
  | 'GenerationError'
  | 'TokenizerError'
  | 'WorkerFailure'
  | 'ProtocolError'
  | 'DataFormatError'
  | 'RenderUnavailable'
  | 'TransportError'
  | 'Timeout'
  | 'Cancelled'
  | 'RuntimeError';

export interface BenchErrorShape {
  code: BenchErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class BenchError extends Error implements BenchErrorShape {
  public readonly code: BenchErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: BenchErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BenchError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for structured logs).
   */
  public toObject(): BenchErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

const JSON_RPC_CODE_MAP: ReadonlyMap<number, BenchErrorCode> = new Map<number, BenchErrorCode>([
  [JsonRpcErrorCode.ParseError, 'TransportError'],
  [JsonRpcErrorCode.InvalidRequest, 'TransportError'],
  [JsonRpcErrorCode.MethodNotFound, 'BackendUnavailable'],
  [JsonRpcErrorCode.InvalidParams, 'UsageError'],
  [JsonRpcErrorCode.InternalError, 'RuntimeError'],
  [JsonRpcErrorCode.ModelLoadError, 'ModelLoadError'],
  [JsonRpcErrorCode.GenerationError, 'GenerationError'],
  [JsonRpcErrorCode.TokenizerError, 'TokenizerError'],
  [JsonRpcErrorCode.BackendUnavailable, 'BackendUnavailable'],
  [JsonRpcErrorCode.ModelNotLoaded, 'ModelLoadError'],
  [JsonRpcErrorCode.RuntimeError, 'RuntimeError'],
]);

/**
 * Map unknown errors into BenchError instances.
 *
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toBenchError(
  error: unknown,
  fallbackCode: BenchErrorCode = 'RuntimeError'
): BenchError {
  if (error instanceof BenchError) {
    return error;
  }

  if (error instanceof JsonRpcError) {
    const mappedCode = JSON_RPC_CODE_MAP.get(error.code) ?? fallbackCode;
    const details = isRecord(error.data) ? error.data : undefined;
    return new BenchError(mappedCode, error.message, details);
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new BenchError('Cancelled', error.message || 'Operation aborted by caller');
    }

    if (/timed? ?out/i.test(error.message)) {
      return new BenchError('Timeout', error.message);
    }

    return new BenchError(fallbackCode, error.message);
  }

  return new BenchError(fallbackCode, 'Unknown error');
}

/**
 * Convert a Zod validation error to a BenchError.
 *
 * Only the first issue makes it into the message; all of them are kept
 * in `details.issues`.
 *
 * @example
 * ```typescript
 * const result = BenchmarkConfigSchema.safeParse({ ...config, runs: 0 });
 * if (!result.success) {
 *   throw zodErrorToBenchError(result.error, 'UsageError');
 * }
 * // Throws: "Validation error on field 'runs': --runs must be >= 1"
 * ```
 */
export function zodErrorToBenchError(
  error: ZodError,
  code: BenchErrorCode = 'UsageError'
): BenchError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new BenchError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

/**
 * Process exit code for an error reaching a CLI entry point.
 */
export function exitCodeFor(error: unknown): number {
  if (!(error instanceof BenchError)) {
    return 1;
  }
  switch (error.code) {
    case 'UsageError':
      return 2;
    case 'Cancelled':
      return 130;
    default:
      return 1;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
