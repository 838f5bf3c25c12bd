import { z } from 'zod';
import { FrameParseError } from './errors.js';
import type { JsonRpcRequest, JsonRpcResponse, RequestId } from '../types.js';

const FrameSchema = z.object({
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().optional().catch(undefined),
  params: z.record(z.unknown()).optional().catch(undefined)
});

/**
 * Decodes one input line. Returns `undefined` for blank lines and throws
 * `FrameParseError` when the line is not a single JSON-RPC object.
 */
export function parseFrame(line: string): JsonRpcRequest | undefined {
  const text = line.trim();
  if (!text) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new FrameParseError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new FrameParseError('Invalid request: expected a single JSON object per line');
  }

  const parsed = FrameSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FrameParseError('Invalid request: id must be a string, number or null');
  }

  const request: JsonRpcRequest = { method: parsed.data.method ?? '' };
  if (parsed.data.id !== undefined) request.id = parsed.data.id;
  if (parsed.data.params) request.params = parsed.data.params;
  return request;
}

export function success(id: RequestId | undefined, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result };
}

export function failure(id: RequestId | undefined, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

/** One response per line; an absent id is left out rather than sent as null. */
export function serializeResponse(response: JsonRpcResponse): string {
  return JSON.stringify(response);
}
