/**
 * Error Classifier
 *
 * Maps transport and backend failures onto the canonical error taxonomy.
 * `retryable` is fixed per code so callers can build retry policy on it.
 */

import type { ErrorCode, GenerationError } from '../types';
import {
  BackendConnectionError,
  BackendHttpError,
  BackendReportedError,
  BackendTimeoutError,
  DiagramJobFailedError,
  DiagramPollTimeoutError,
  EmptyContentError,
} from './backend-errors';

export const RETRYABLE: Record<ErrorCode, boolean> = {
  GRID_TOO_SMALL: true,
  MISSING_DATA: true,
  AI_SERVICE_ERROR: true,
  INVALID_REQUEST: false,
  RATE_LIMITED: true,
  CREDITS_EXHAUSTED: false,
  TIMEOUT: true,
  CONNECTION_ERROR: true,
  INTERNAL_ERROR: false,
};

const CODE_ALIASES: Record<string, ErrorCode> = {
  GENERATION_FAILED: 'AI_SERVICE_ERROR',
  POLL_TIMEOUT: 'AI_SERVICE_ERROR',
  INSUFFICIENT_CREDITS: 'CREDITS_EXHAUSTED',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMITED',
};

/** Reasons a backend may declare on a 4xx that survive classification */
const DECLARABLE_ON_4XX: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'GRID_TOO_SMALL',
  'MISSING_DATA',
  'CREDITS_EXHAUSTED',
]);

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(RETRYABLE, value);
}

export function createGenerationError(code: ErrorCode, message: string, suggestion?: string): GenerationError {
  const error: GenerationError = { code, message, retryable: RETRYABLE[code] };
  if (suggestion) {
    error.suggestion = suggestion;
  }
  return error;
}

/**
 * Canonical code for a code string declared by a backend, or undefined
 * when the string is not one the orchestrator recognizes.
 */
export function normalizeDeclaredCode(code: string | undefined): ErrorCode | undefined {
  if (!code) {
    return undefined;
  }
  const upper = code.toUpperCase();
  if (isErrorCode(upper)) {
    return upper;
  }
  return CODE_ALIASES[upper];
}

// ============================================================================
// Declared reasons in backend bodies
// ============================================================================

export interface DeclaredReason {
  code?: string;
  message?: string;
  suggestion?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Pull a declared reason out of the shapes backends use:
 * `{error: {code, message}}`, `{error: "..."}`, `{detail: {...}}`, `{detail: "..."}`, `{message}`.
 */
export function extractDeclaredReason(body: unknown): DeclaredReason {
  if (!isRecord(body)) {
    return typeof body === 'string' && body.length > 0 ? { message: body.slice(0, 500) } : {};
  }

  for (const key of ['error', 'detail']) {
    const nested = body[key];
    if (isRecord(nested)) {
      return {
        code: stringField(nested, 'code'),
        message: stringField(nested, 'message'),
        suggestion: stringField(nested, 'suggestion'),
      };
    }
    if (typeof nested === 'string' && nested.length > 0) {
      return { code: stringField(body, 'code'), message: nested };
    }
  }

  return { code: stringField(body, 'code'), message: stringField(body, 'message') };
}

// ============================================================================
// Classification
// ============================================================================

export function classifyHttpStatus(status: number, body: unknown, service = 'backend'): GenerationError {
  const reason = extractDeclaredReason(body);
  const message = reason.message ?? `${service} service returned HTTP ${status}`;

  if (status === 429) {
    return createGenerationError(
      'RATE_LIMITED',
      message,
      reason.suggestion ?? 'Wait a moment before generating again.'
    );
  }
  if (status === 402) {
    return createGenerationError('CREDITS_EXHAUSTED', message, reason.suggestion);
  }
  if (status >= 400 && status < 500) {
    const declared = normalizeDeclaredCode(reason.code);
    const code = declared && DECLARABLE_ON_4XX.has(declared) ? declared : 'INVALID_REQUEST';
    return createGenerationError(code, message, reason.suggestion);
  }
  if (status >= 500) {
    return createGenerationError('AI_SERVICE_ERROR', message, reason.suggestion);
  }
  return createGenerationError('INTERNAL_ERROR', `Unexpected HTTP status ${status} from ${service} service`);
}

export function classifyReportedError(declaredCode: string | undefined, message: string, suggestion?: string): GenerationError {
  const code = normalizeDeclaredCode(declaredCode) ?? 'AI_SERVICE_ERROR';
  return createGenerationError(code, message, suggestion);
}

/**
 * Classify anything thrown during dispatch. Unknown errors are INTERNAL_ERROR.
 */
export function classifyError(error: unknown): GenerationError {
  if (error instanceof BackendHttpError) {
    return classifyHttpStatus(error.status, error.body, error.service);
  }
  if (error instanceof BackendReportedError) {
    return classifyReportedError(error.declaredCode, error.message, error.suggestion);
  }
  if (error instanceof BackendTimeoutError) {
    return createGenerationError('TIMEOUT', error.message, 'Try again; the service may be under load.');
  }
  if (error instanceof BackendConnectionError) {
    return createGenerationError('CONNECTION_ERROR', error.message, 'Try again later.');
  }
  if (error instanceof DiagramPollTimeoutError) {
    return createGenerationError('AI_SERVICE_ERROR', error.message, 'Try again with a simpler diagram.');
  }
  if (error instanceof DiagramJobFailedError || error instanceof EmptyContentError) {
    return createGenerationError('AI_SERVICE_ERROR', error.message);
  }
  if (error instanceof Error) {
    return createGenerationError('INTERNAL_ERROR', error.message);
  }
  return createGenerationError('INTERNAL_ERROR', String(error));
}
