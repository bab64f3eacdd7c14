/**
 * fetch with a local deadline and optional caller cancellation.
 *
 * The deadline and the caller's signal abort the same request, but surface
 * differently: a caller abort raises GenerationCancelledError, the deadline
 * raises RequestTimeoutError, anything else is rethrown untouched.
 */

import { GenerationCancelledError } from '../services/backend-errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (input, init) => fetch(input, init);

export class RequestTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export interface FetchedBody {
  status: number;
  ok: boolean;
  text: string;
}

/**
 * Perform the request and read the body before the deadline.
 */
export async function fetchWithTimeout(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<FetchedBody> {
  if (signal?.aborted) {
    throw new GenerationCancelledError();
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    const text = await response.text();
    return { status: response.status, ok: response.ok, text };
  } catch (error) {
    if (signal?.aborted) {
      throw new GenerationCancelledError();
    }
    if (timedOut) {
      throw new RequestTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onCallerAbort);
  }
}

/** JSON.parse that yields undefined for empty or non-JSON text */
export function parseJsonBody(text: string): unknown {
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
