import type { EngineErrorKind, ErrorInfo } from '../shared/types.js';

export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.kind = kind;
  }

  toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message };
  }
}

export function errorInfo(kind: EngineErrorKind, message: string): ErrorInfo {
  return { kind, message };
}

export function isEngineError(error: unknown, kind?: EngineErrorKind): error is EngineError {
  return error instanceof EngineError && (kind === undefined || error.kind === kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
