import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export const METHOD_NOT_FOUND: number = ErrorCode.MethodNotFound;
export const INTERNAL_ERROR: number = ErrorCode.InternalError;

/** An error that is answered to the RPC client as `{ code, message }`. */
export class BridgeError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
  }
}

export class FrameParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameParseError';
  }
}

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function internalError(err: unknown): BridgeError {
  return new BridgeError(INTERNAL_ERROR, `Internal error: ${describeError(err)}`);
}
