/**
 * Backend Dispatcher
 *
 * Executes adapted requests against the generation backends. Chart, text,
 * table, image and infographic are one POST each; diagram submits a job
 * and hands it to the DiagramJobPoller.
 *
 * Throws the typed errors in ./backend-errors; the pipeline classifies them.
 */

import { z } from 'zod';
import type { OrchestratorConfig } from '../config';
import { optional } from '../schemas/elements';
import { safeLog } from '../utils/log-sanitizer';
import {
  defaultFetch,
  fetchWithTimeout,
  parseJsonBody,
  RequestTimeoutError,
  type FetchedBody,
  type FetchLike,
} from '../utils/fetch-with-timeout';
import type { BackendRequest } from './adapters/types';
import {
  BackendConnectionError,
  BackendHttpError,
  BackendReportedError,
  BackendTimeoutError,
  GenerationCancelledError,
  type BackendService,
} from './backend-errors';
import { extractDeclaredReason } from './error-classifier';
import {
  DiagramJobPoller,
  DiagramStatusSchema,
  type Clock,
  type DiagramStatus,
} from './diagram-job-poller';

// ============================================================================
// Types
// ============================================================================

export const CLIENT_SERVICE_ID = 'visual-elements-orchestrator';

export type GenerationService = Exclude<BackendService, 'layout'>;

export interface BackendResult {
  /** The backend's `data` object (or the whole body when it has none) */
  data: Record<string, unknown>;
  /** Set when the result came from a polled diagram job */
  jobId?: string;
}

export interface DispatcherOptions {
  fetch?: FetchLike;
  clock?: Clock;
}

export interface JsonRequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  apiVersion?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

const EnvelopeSchema = z
  .object({
    success: optional(z.boolean()),
    data: optional(z.record(z.unknown())),
  })
  .passthrough();

// ============================================================================
// Dispatcher
// ============================================================================

export class BackendDispatcher {
  private readonly fetchImpl: FetchLike;
  private readonly poller: DiagramJobPoller;

  constructor(
    private readonly config: OrchestratorConfig,
    options: DispatcherOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.poller = new DiagramJobPoller({
      fetchStatus: (jobId, timeoutMs, signal) => this.fetchDiagramStatus(jobId, { timeoutMs, signal }),
      clock: options.clock,
      timeoutMs: config.diagramPoll.timeoutMs,
      intervalMs: config.diagramPoll.intervalMs,
      maxIntervalMs: config.diagramPoll.maxIntervalMs,
      statusTimeoutMs: config.serviceTimeoutMs,
    });
  }

  baseUrl(service: GenerationService): string {
    switch (service) {
      case 'chart':
        return this.config.services.chart;
      case 'diagram':
        return this.config.services.diagram;
      case 'text_table':
        return this.config.services.textTable;
      case 'image':
        return this.config.services.image;
      case 'infographic':
        return this.config.services.infographic;
    }
  }

  timeoutFor(service: GenerationService): number {
    return service === 'image' ? this.config.imageTimeoutMs : this.config.serviceTimeoutMs;
  }

  /**
   * Send an adapted request and return the backend's content payload.
   */
  async dispatch(request: BackendRequest, signal?: AbortSignal): Promise<BackendResult> {
    const service = toGenerationService(request.service);
    const started = Date.now();

    const body = await this.requestJson(service, request.endpoint, {
      method: 'POST',
      body: request.body,
      apiVersion: request.apiVersion,
      signal,
    });
    const data = unwrapEnvelope(service, body);

    safeLog.debug('[Dispatcher] Backend responded', {
      service,
      endpoint: request.endpoint,
      durationMs: Date.now() - started,
    });

    if (service !== 'diagram') {
      return { data };
    }

    const jobId = stringField(data, 'jobId') ?? stringField(data, 'job_id');
    if (!jobId) {
      // Synchronous result, nothing to poll
      return { data };
    }

    safeLog.info('[Dispatcher] Diagram job submitted', { jobId });
    const result = await this.poller.poll(jobId, signal);
    return {
      jobId,
      data: {
        mermaidCode: result.mermaidCode,
        svgContent: result.svgContent,
      },
    };
  }

  /**
   * One status request for a diagram job. 404 surfaces as BackendHttpError.
   */
  async fetchDiagramStatus(
    jobId: string,
    options: { timeoutMs?: number; signal?: AbortSignal } = {}
  ): Promise<DiagramStatus> {
    const body = await this.requestJson('diagram', `/api/ai/diagram/status/${encodeURIComponent(jobId)}`, {
      method: 'GET',
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
    const candidate = isRecord(body) && isRecord(body.data) ? body.data : body;
    const parsed = DiagramStatusSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new BackendReportedError('diagram', 'INVALID_RESPONSE', `Malformed status for diagram job ${jobId}`);
    }
    return parsed.data;
  }

  /**
   * Perform one JSON request against a generation service.
   * Returns the parsed body of a 2xx response.
   */
  async requestJson(service: GenerationService, path: string, options: JsonRequestOptions = {}): Promise<unknown> {
    const method = options.method ?? 'GET';
    const timeoutMs = options.timeoutMs ?? this.timeoutFor(service);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'X-Client-Service': CLIENT_SERVICE_ID,
    };
    if (options.apiVersion) {
      headers['X-API-Version'] = options.apiVersion;
    }
    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    let fetched: FetchedBody;
    try {
      fetched = await fetchWithTimeout(this.fetchImpl, `${this.baseUrl(service)}${path}`, init, timeoutMs, options.signal);
    } catch (error) {
      if (error instanceof GenerationCancelledError) {
        throw error;
      }
      if (error instanceof RequestTimeoutError) {
        safeLog.warn('[Dispatcher] Backend timeout', { service, path, timeoutMs });
        throw new BackendTimeoutError(service, timeoutMs);
      }
      safeLog.warn('[Dispatcher] Backend unreachable', { service, path, error });
      throw new BackendConnectionError(service, error);
    }

    const parsed = parseJsonBody(fetched.text);
    if (!fetched.ok) {
      safeLog.warn('[Dispatcher] Backend HTTP error', { service, path, status: fetched.status });
      throw new BackendHttpError(service, fetched.status, parsed ?? fetched.text);
    }
    if (parsed === undefined) {
      throw new BackendReportedError(service, 'INVALID_RESPONSE', `${service} service returned a non-JSON body`);
    }
    return parsed;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toGenerationService(service: BackendService): GenerationService {
  if (service === 'layout') {
    throw new Error('Layout Service requests go through the LayoutClient');
  }
  return service;
}

/**
 * Backends answer `{success, data}`; a `success: false` body is a declared failure.
 */
export function unwrapEnvelope(service: BackendService, body: unknown): Record<string, unknown> {
  // A declared failure keeps its code whatever shape the rest of the body has
  if (isRecord(body) && body.success === false) {
    const reason = extractDeclaredReason(body);
    throw new BackendReportedError(
      service,
      reason.code,
      reason.message ?? `${service} generation failed`,
      reason.suggestion
    );
  }

  const parsed = EnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new BackendReportedError(service, 'INVALID_RESPONSE', `${service} service returned an unexpected body`);
  }

  if (parsed.data.data) {
    return parsed.data.data;
  }
  const { success: _success, data: _data, ...rest } = parsed.data;
  return rest;
}
