/**
 * JSON-RPC 2.0 Serialization Schemas
 *
 * Validates all IPC messages exchanged with python/runtime.py using Zod.
 * See https://www.jsonrpc.org/specification
 */

import { z } from 'zod';

/**
 * JSON-RPC 2.0 Request
 */
export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
  id: z.union([z.string(), z.number()]).optional(),
});

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

/**
 * JSON-RPC 2.0 Response (Success)
 */
export const JsonRpcSuccessSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    result: z.unknown(),
    id: z.union([z.string(), z.number(), z.null()]),
  })
  .refine((data) => 'result' in data, {
    message: 'JSON-RPC success response must have result field',
  });

export type JsonRpcSuccess = z.infer<typeof JsonRpcSuccessSchema>;

/**
 * JSON-RPC 2.0 Error Object
 */
export const JsonRpcErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export type JsonRpcErrorObject = z.infer<typeof JsonRpcErrorObjectSchema>;

/**
 * JSON-RPC 2.0 Response (Error)
 */
export const JsonRpcErrorResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  error: JsonRpcErrorObjectSchema,
  id: z.union([z.string(), z.number(), z.null()]),
});

export type JsonRpcErrorResponse = z.infer<typeof JsonRpcErrorResponseSchema>;

/**
 * Anything the runtime may write to stdout. The runtime sends no
 * notifications; every line answers a request.
 */
export const JsonRpcMessageSchema = z.union([JsonRpcErrorResponseSchema, JsonRpcSuccessSchema]);

export type JsonRpcMessage = z.infer<typeof JsonRpcMessageSchema>;

/**
 * JSON-RPC 2.0 Error Codes
 *
 * Standard JSON-RPC codes: -32700 to -32600
 * Runtime application codes: -32001 to -32099 (must match python/runtime.py)
 */
export enum JsonRpcErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  ModelLoadError = -32001,
  GenerationError = -32002,
  TokenizerError = -32003,
  BackendUnavailable = -32004,
  ModelNotLoaded = -32005,
  RuntimeError = -32099,
}

// runtime/info
export const RuntimeInfoResponseSchema = z.object({
  version: z.string(),
  protocol: z.string(),
  mlx_lm_version: z.string().optional(),
  capabilities: z.array(z.string()),
});

export type RuntimeInfoResponse = z.infer<typeof RuntimeInfoResponseSchema>;

// load_model
export const LoadModelParamsSchema = z.object({
  model_id: z.string(),
});

export type LoadModelParams = z.infer<typeof LoadModelParamsSchema>;

export const LoadModelResponseSchema = z.object({
  model_id: z.string(),
  state: z.enum(['ready', 'error']),
});

export type LoadModelResponse = z.infer<typeof LoadModelResponseSchema>;

// generate (single shot, non-streaming)
export const GenerateParamsSchema = z.object({
  model_id: z.string(),
  prompt: z.string(),
  max_tokens: z.number().int().positive(),
  temperature: z.number().min(0),
});

export type GenerateParams = z.infer<typeof GenerateParamsSchema>;

export const GenerateResponseSchema = z.object({
  text: z.string(),
});

export type GenerateResponse = z.infer<typeof GenerateResponseSchema>;

// tokenize
export const TokenizeParamsSchema = z.object({
  model_id: z.string(),
  text: z.string(),
});

export type TokenizeParams = z.infer<typeof TokenizeParamsSchema>;

export const TokenizeResponseSchema = z.object({
  tokens: z.array(z.number().int()),
});

export type TokenizeResponse = z.infer<typeof TokenizeResponseSchema>;

// shutdown
export const ShutdownResponseSchema = z.object({
  success: z.boolean(),
});

export type ShutdownResponse = z.infer<typeof ShutdownResponseSchema>;

/**
 * Encode a message as one line of the stdio framing.
 */
export function encodeLine(message: JsonRpcRequest): string {
  return JSON.stringify(message) + '\n';
}

/**
 * Error response raised by the runtime for one request
 */
export class JsonRpcError extends Error {
  constructor(
    public code: number,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'JsonRpcError';
  }
}
