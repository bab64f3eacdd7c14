/**
 * Diagram Job Poller
 *
 * The diagram backend is asynchronous: submit returns a jobId, then the
 * status endpoint is polled until the job reaches a terminal state.
 *
 * State Flow:
 * submitted → pending → processing → succeeded
 *                    ↘            ↘ failed
 *                     ↘ timed_out (cumulative wait exceeds the ceiling)
 *
 * Interval starts at the base, doubles on transient status-endpoint errors
 * up to the cap, and resets after any successful poll.
 */

import { z } from 'zod';
import { optional } from '../schemas/elements';
import { safeLog } from '../utils/log-sanitizer';
import {
  BackendConnectionError,
  BackendHttpError,
  BackendTimeoutError,
  DiagramJobFailedError,
  DiagramPollTimeoutError,
  GenerationCancelledError,
} from './backend-errors';

// =============================================================================
// Types
// =============================================================================

export type DiagramJobState = 'submitted' | 'pending' | 'processing' | 'succeeded' | 'failed' | 'timed_out';

const VALID_TRANSITIONS: Record<DiagramJobState, DiagramJobState[]> = {
  submitted: ['pending', 'processing', 'succeeded', 'failed', 'timed_out'],
  pending: ['processing', 'succeeded', 'failed', 'timed_out'],
  processing: ['succeeded', 'failed', 'timed_out'],
  succeeded: [],
  failed: [],
  timed_out: [],
};

export const DiagramStatusSchema = z
  .object({
    status: z.string(),
    progress: optional(z.number()),
    mermaidCode: optional(z.string()),
    svgContent: optional(z.string()),
    error: optional(z.string()),
  })
  .passthrough();

export type DiagramStatus = z.infer<typeof DiagramStatusSchema>;

export interface DiagramJobResult {
  jobId: string;
  mermaidCode?: string;
  svgContent?: string;
  /** Every state the job passed through, in order */
  states: DiagramJobState[];
}

export interface Clock {
  now(): number;
  /** Resolves after `ms`; rejects with GenerationCancelledError if the signal aborts first */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new GenerationCancelledError());
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new GenerationCancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

export type StatusFetcher = (jobId: string, timeoutMs: number, signal?: AbortSignal) => Promise<DiagramStatus>;

export interface DiagramPollerOptions {
  fetchStatus: StatusFetcher;
  clock?: Clock;
  /** Cumulative wait ceiling */
  timeoutMs: number;
  intervalMs: number;
  maxIntervalMs: number;
  /** Upper bound for one status request */
  statusTimeoutMs: number;
}

/** A single status request never gets less than this, even near the ceiling */
const MIN_STATUS_TIMEOUT_MS = 1_000;

// =============================================================================
// Job state machine
// =============================================================================

export class DiagramJob {
  private state: DiagramJobState = 'submitted';
  private readonly visited: DiagramJobState[] = ['submitted'];

  constructor(public readonly jobId: string) {}

  get current(): DiagramJobState {
    return this.state;
  }

  get history(): DiagramJobState[] {
    return [...this.visited];
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.state].length === 0;
  }

  canTransition(to: DiagramJobState): boolean {
    return VALID_TRANSITIONS[this.state].includes(to);
  }

  transition(to: DiagramJobState): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid diagram job transition: ${this.state} -> ${to}`);
    }
    this.state = to;
    this.visited.push(to);
  }

  /**
   * Apply a status reported by the backend. Reports that would move the job
   * backwards (pending after processing) leave it where it is.
   */
  observe(reported: string): void {
    const next = mapReportedStatus(reported);
    if (next && next !== this.state && this.canTransition(next)) {
      this.transition(next);
    }
  }
}

export function mapReportedStatus(reported: string): DiagramJobState | null {
  switch (reported.toLowerCase()) {
    case 'pending':
    case 'queued':
      return 'pending';
    case 'processing':
    case 'running':
      return 'processing';
    case 'completed':
    case 'succeeded':
      return 'succeeded';
    case 'failed':
    case 'error':
      return 'failed';
    default:
      return null;
  }
}

function isTransientStatusError(error: unknown): boolean {
  if (error instanceof BackendConnectionError || error instanceof BackendTimeoutError) {
    return true;
  }
  return error instanceof BackendHttpError && (error.status >= 500 || error.status === 429);
}

// =============================================================================
// Poller
// =============================================================================

export class DiagramJobPoller {
  private readonly clock: Clock;

  constructor(private readonly options: DiagramPollerOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async poll(jobId: string, signal?: AbortSignal): Promise<DiagramJobResult> {
    const { timeoutMs, intervalMs, maxIntervalMs, statusTimeoutMs } = this.options;
    const job = new DiagramJob(jobId);
    const startedAt = this.clock.now();
    let interval = intervalMs;

    for (;;) {
      const elapsed = this.clock.now() - startedAt;
      if (elapsed >= timeoutMs) {
        job.transition('timed_out');
        safeLog.warn('[Diagram] Job polling ceiling reached', { jobId, elapsedMs: elapsed });
        throw new DiagramPollTimeoutError(jobId, elapsed);
      }

      await this.clock.sleep(Math.min(interval, timeoutMs - elapsed), signal);

      const remaining = timeoutMs - (this.clock.now() - startedAt);
      const requestTimeout = Math.min(statusTimeoutMs, Math.max(remaining, MIN_STATUS_TIMEOUT_MS));

      let status: DiagramStatus;
      try {
        status = await this.options.fetchStatus(jobId, requestTimeout, signal);
      } catch (error) {
        if (isTransientStatusError(error)) {
          interval = Math.min(interval * 2, maxIntervalMs);
          safeLog.warn('[Diagram] Transient status error, backing off', {
            jobId,
            nextIntervalMs: interval,
            error: error instanceof Error ? error.message : String(error),
          });
          continue;
        }
        if (error instanceof BackendHttpError) {
          job.transition('failed');
          const reason = error.status === 404 ? `job ${jobId} not found` : `status endpoint returned HTTP ${error.status}`;
          throw new DiagramJobFailedError(jobId, reason);
        }
        throw error;
      }

      interval = intervalMs;
      job.observe(status.status);
      safeLog.debug('[Diagram] Poll', { jobId, status: status.status, progress: status.progress, state: job.current });

      if (job.current === 'succeeded') {
        return {
          jobId,
          mermaidCode: status.mermaidCode,
          svgContent: status.svgContent,
          states: job.history,
        };
      }
      if (job.current === 'failed') {
        throw new DiagramJobFailedError(jobId, status.error ?? 'unknown error');
      }
    }
  }
}
