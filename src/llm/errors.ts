/**
 * Error handling for LLM collaborator calls
 */

import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import type { AttemptRecord, AttemptStage } from '../core/types.js';

/**
 * Specific error codes for collaborator failures
 */
export type GenerationErrorCode =
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'UNREACHABLE'
  | 'AUTH'
  | 'RATE_LIMITED'
  | 'BAD_RESPONSE'
  | 'UNKNOWN';

/**
 * A generator or fixer call that did not return text
 *
 * Fatal for the request: nothing was produced, so there is nothing to fix.
 */
export class GenerationError extends Error {
  readonly code: GenerationErrorCode;

  /**
   * Which call failed
   */
  readonly stage: AttemptStage;

  /**
   * HTTP status code (if applicable)
   */
  readonly statusCode?: number;

  readonly details?: Record<string, unknown>;

  /**
   * Attempts completed before the failure (set by the orchestrator)
   */
  attempts: readonly AttemptRecord[] = [];

  constructor(
    message: string,
    code: GenerationErrorCode,
    stage: AttemptStage,
    statusCode?: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GenerationError';
    this.code = code;
    this.stage = stage;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    const call = this.stage === 'fix' ? 'fixer' : 'generator';
    switch (this.code) {
      case 'TIMEOUT':
        return `The ${call} call timed out. The model may be overloaded or the timeout too short.`;
      case 'CANCELLED':
        return `The ${call} call was cancelled.`;
      case 'UNREACHABLE':
        return `Cannot reach the LLM endpoint. Check that the server is running and LLM_BASE_URL is correct.`;
      case 'AUTH':
        return `The LLM endpoint rejected the API key. Check LLM_API_KEY.`;
      case 'RATE_LIMITED':
        return `The LLM endpoint is rate limiting requests. Try again later.`;
      case 'BAD_RESPONSE':
        return `The LLM endpoint returned a response without text.`;
      case 'UNKNOWN':
      default:
        return this.message || `The ${call} call failed.`;
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stage: this.stage,
      statusCode: this.statusCode,
      details: this.details,
      attempts: this.attempts.length,
    };
  }
}

/**
 * Raised by a collaborator whose response carries no completion at all
 */
export class EmptyCompletionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyCompletionError';
  }
}

/**
 * Create a GenerationError from an unknown error
 * Detects SDK error classes first, then falls back to message patterns
 */
export function createGenerationError(error: unknown, stage: AttemptStage): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }

  if (error instanceof EmptyCompletionError) {
    return new GenerationError(error.message, 'BAD_RESPONSE', stage);
  }

  // Order matters: the timeout error is a subclass of the connection error
  if (error instanceof APIConnectionTimeoutError) {
    return new GenerationError('LLM request timed out', 'TIMEOUT', stage);
  }

  if (error instanceof APIUserAbortError) {
    return new GenerationError('LLM request was aborted', 'CANCELLED', stage);
  }

  if (error instanceof APIConnectionError) {
    return new GenerationError('Cannot connect to LLM endpoint', 'UNREACHABLE', stage, undefined, {
      originalMessage: error.message,
    });
  }

  if (error instanceof APIError) {
    return fromStatus(error.status, error.message, stage);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (error.name === 'AbortError' || message.includes('aborted')) {
      return new GenerationError('LLM request was aborted', 'CANCELLED', stage);
    }

    if (message.includes('timeout') || message.includes('timed out')) {
      return new GenerationError('LLM request timed out', 'TIMEOUT', stage);
    }

    if (
      message.includes('econnrefused') ||
      message.includes('enotfound') ||
      message.includes('network') ||
      message.includes('fetch failed')
    ) {
      return new GenerationError('Cannot connect to LLM endpoint', 'UNREACHABLE', stage, undefined, {
        originalMessage: error.message,
      });
    }

    if (message.includes('unauthorized') || message.includes('invalid api key')) {
      return new GenerationError('LLM endpoint rejected the credentials', 'AUTH', stage, 401);
    }

    if (message.includes('rate limit') || message.includes('too many requests')) {
      return new GenerationError('LLM endpoint rate limited the request', 'RATE_LIMITED', stage, 429);
    }

    return new GenerationError(error.message, 'UNKNOWN', stage, undefined, {
      originalError: error.name,
    });
  }

  // HTTP error-like object with status code
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
    return fromStatus(error.status, message, stage);
  }

  if (typeof error === 'string') {
    return new GenerationError(error, 'UNKNOWN', stage);
  }

  return new GenerationError('An unknown error occurred while calling the LLM', 'UNKNOWN', stage, undefined, {
    originalError: String(error),
  });
}

function fromStatus(status: number | undefined, message: string, stage: AttemptStage): GenerationError {
  switch (status) {
    case 401:
    case 403:
      return new GenerationError('LLM endpoint rejected the credentials', 'AUTH', stage, status);
    case 408:
      return new GenerationError('LLM request timed out', 'TIMEOUT', stage, status);
    case 429:
      return new GenerationError('LLM endpoint rate limited the request', 'RATE_LIMITED', stage, status);
    default:
      return new GenerationError(
        message || `HTTP error ${status ?? 'unknown'}`,
        'UNKNOWN',
        stage,
        status
      );
  }
}

/**
 * Type guard to check if an error is a GenerationError
 */
export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}
