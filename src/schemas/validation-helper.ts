/**
 * Helper functions for Zod validation in API handlers
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { safeLog } from '../utils/log-sanitizer';
import { createGenerationError } from '../services/error-classifier';
import type { GenerationFailure } from '../types';

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * INVALID_REQUEST envelope for a body that failed structural validation.
 */
export function invalidRequestEnvelope(elementId: string, message: string, details?: string[]): GenerationFailure & { details?: string[] } {
  const envelope: GenerationFailure & { details?: string[] } = {
    success: false,
    element_id: elementId,
    error: createGenerationError('INVALID_REQUEST', message, 'Check the request fields and try again.'),
  };
  if (details && details.length > 0) {
    envelope.details = details;
  }
  return envelope;
}

function elementIdOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'element_id' in body && typeof body.element_id === 'string') {
    return body.element_id;
  }
  return '';
}

/**
 * Parse a JSON body and validate it against a Zod schema.
 * Returns parsed data on success, or a 400 INVALID_REQUEST Response on failure.
 */
export async function validateRequestBody<T>(
  request: Request,
  schema: ZodType<T, ZodTypeDef, unknown>,
  endpoint: string
): Promise<{ success: true; data: T } | { success: false; response: Response }> {
  let body: unknown;

  try {
    body = await request.json();
  } catch (error) {
    safeLog.warn('[Validation] Invalid JSON body', { endpoint, error: String(error) });
    return {
      success: false,
      response: jsonResponse(invalidRequestEnvelope('', 'Invalid JSON in request body'), 400),
    };
  }

  const result = schema.safeParse(body);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    safeLog.warn('[Validation] Request validation failed', { endpoint, errors });

    return {
      success: false,
      response: jsonResponse(
        invalidRequestEnvelope(elementIdOf(body), `Validation failed: ${errors.join('; ')}`, errors),
        400
      ),
    };
  }

  return { success: true, data: result.data };
}

/**
 * Format Zod validation errors into "path: message" strings
 */
export function formatZodErrors(error: ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}

/**
 * Validate a path parameter extracted from the URL.
 * Returns the parsed value, or a 400 INVALID_REQUEST Response.
 */
export function validatePathParameter<T>(
  value: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  name: string,
  endpoint: string
): { success: true; data: T } | { success: false; response: Response } {
  const result = schema.safeParse(value);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    safeLog.warn('[Validation] Invalid path parameter', { endpoint, name, errors });
    return {
      success: false,
      response: jsonResponse(invalidRequestEnvelope('', `Invalid ${name} format`, errors), 400),
    };
  }

  return { success: true, data: result.data };
}
