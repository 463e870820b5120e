import type { ZodIssue } from 'zod';

export class MalformedOutputError extends Error {
  constructor(
    message: string,
    public readonly rawText: string,
    public readonly issues: ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'MalformedOutputError';
  }
}

export class ToolDeniedError extends Error {
  constructor(public readonly toolName: string, public readonly reason: string) {
    super(`Tool "${toolName}" denied: ${reason}`);
    this.name = 'ToolDeniedError';
  }
}

export class FetchError extends Error {
  constructor(public readonly url: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause === undefined ? 'unknown error' : String(cause);
    super(`Failed to fetch ${url}: ${detail}`, { cause });
    this.name = 'FetchError';
  }
}

export class StageTimeoutError extends Error {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'StageTimeoutError';
  }
}

export class ValidationError extends Error {
  readonly statusCode = 400;

  constructor(message: string, public readonly details: string[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class StoreUnavailableError extends Error {
  readonly statusCode = 503;

  constructor(operation: 'load' | 'save', public readonly failures: string[]) {
    super(`State store unavailable for ${operation}: ${failures.join('; ') || 'no backends configured'}`);
    this.name = 'StoreUnavailableError';
  }
}

export class AuthError extends Error {
  constructor(
    message: string,
    public readonly statusCode: 401 | 503 = 401,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

export class RateLimitError extends Error {
  readonly statusCode = 429;

  constructor(public readonly retryAfterSeconds: number) {
    super('Rate limit exceeded. Please retry later.');
    this.name = 'RateLimitError';
  }
}

export function describeError(error: unknown): string {
  const text = error instanceof Error ? error.message : String(error);
  const compact = text.split(/\s+/).join(' ');
  return compact.length > 240 ? `${compact.slice(0, 237).trimEnd()}...` : compact;
}
