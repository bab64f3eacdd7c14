/**
 * Generation Pipeline
 *
 * validate → convert grid → adapt → dispatch → assemble → inject
 *
 * Every outcome is an envelope: validation and backend failures become
 * `success: false` with a classified error, injection failures only clear
 * `injected`. Cancellation is the one thing that propagates, as
 * GenerationCancelledError, so the caller can drop the response.
 */

import type { OrchestratorConfig } from '../config';
import type {
  BatchElementResult,
  BatchGenerateResponse,
  GenerationError,
  GenerationResponse,
  GenerationSuccess,
  TableAnalysisResponse,
  TableAnalysisSuccess,
} from '../types';
import type { ZodError } from 'zod';
import {
  ELEMENT_SCHEMAS,
  type BatchElement,
  type BatchGenerateRequest,
  type GenerationRequest,
  type TableAnalyzeRequest,
} from '../schemas/elements';
import { formatZodErrors } from '../schemas/validation-helper';
import { safeLog } from '../utils/log-sanitizer';
import { adaptRequest, adaptTableAnalyzeRequest } from './adapters';
import { BackendDispatcher } from './backend-dispatcher';
import { DiagramJobFailedError, DiagramPollTimeoutError, GenerationCancelledError } from './backend-errors';
import { classifyError, createGenerationError } from './error-classifier';
import { convertGridSpan } from './grid-converter';
import { LayoutClient, injectionParams } from './layout-client';
import { validateGenerationRequest } from './request-validator';
import { assembleFailure, assembleSuccess, snakeCaseKeys } from './response-assembler';

export interface GenerateOptions {
  signal?: AbortSignal;
  /** Correlates log lines of one HTTP request */
  requestId?: string;
}

export interface PipelineDependencies {
  dispatcher: BackendDispatcher;
  layout: LayoutClient;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jobIdOf(error: unknown): string | undefined {
  if (error instanceof DiagramJobFailedError || error instanceof DiagramPollTimeoutError) {
    return error.jobId;
  }
  return undefined;
}

export class GenerationPipeline {
  constructor(
    private readonly config: OrchestratorConfig,
    private readonly deps: PipelineDependencies
  ) {}

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationResponse> {
    const { signal, requestId } = options;
    const elementId = request.payload.element_id;
    const logContext = { requestId, kind: request.kind, elementId };

    const validation = validateGenerationRequest(request);
    if (!validation.valid) {
      safeLog.info('[Pipeline] Request rejected', { ...logContext, code: validation.error.code });
      return assembleFailure(elementId, validation.error);
    }

    const constraints = convertGridSpan(validation.span, {
      pxPerCol: this.config.diagramPxPerCol,
      pxPerRow: this.config.diagramPxPerRow,
    });
    const backendRequest = adaptRequest(request, constraints);

    let response: GenerationSuccess;
    try {
      const result = await this.deps.dispatcher.dispatch(backendRequest, signal);
      response = assembleSuccess(request, result);
    } catch (error) {
      if (error instanceof GenerationCancelledError) {
        safeLog.info('[Pipeline] Generation cancelled', logContext);
        throw error;
      }
      const classified = classifyError(error);
      safeLog.warn('[Pipeline] Generation failed', {
        ...logContext,
        code: classified.code,
        error: classified.message,
      });
      return assembleFailure(elementId, classified, jobIdOf(error));
    }

    if (signal?.aborted) {
      throw new GenerationCancelledError();
    }

    const injection = await this.deps.layout.inject(injectionParams(request, response), signal);
    if (signal?.aborted) {
      safeLog.info('[Pipeline] Generation cancelled during injection', logContext);
      throw new GenerationCancelledError();
    }
    if (injection.success) {
      response.injected = true;
    } else {
      response.injection_error = injection.error;
    }

    safeLog.info('[Pipeline] Element generated', { ...logContext, injected: response.injected });
    return response;
  }

  /**
   * Table analysis. Nothing is placed on the slide.
   */
  async analyzeTable(request: TableAnalyzeRequest, options: GenerateOptions = {}): Promise<TableAnalysisResponse> {
    const { signal, requestId } = options;
    const elementId = request.element_id;

    try {
      const result = await this.deps.dispatcher.dispatch(adaptTableAnalyzeRequest(request), signal);
      const data = snakeCaseKeys(result.data);
      const response: TableAnalysisSuccess = { success: true, element_id: elementId };
      if (isRecord(data)) {
        if (typeof data.summary === 'string') {
          response.summary = data.summary;
        }
        if (isRecord(data.statistics)) {
          response.statistics = data.statistics;
        }
        if (Array.isArray(data.trends)) {
          response.trends = data.trends;
        }
        if (Array.isArray(data.recommendations)) {
          response.recommendations = data.recommendations;
        }
      }
      safeLog.info('[Pipeline] Table analyzed', { requestId, elementId, analysisType: request.analysis_type });
      return response;
    } catch (error) {
      if (error instanceof GenerationCancelledError) {
        throw error;
      }
      const classified = classifyError(error);
      safeLog.warn('[Pipeline] Table analysis failed', { requestId, elementId, code: classified.code });
      return assembleFailure(elementId, classified);
    }
  }

  /**
   * Run every element of a batch; results keep the request order.
   */
  async runBatch(batch: BatchGenerateRequest, options: GenerateOptions = {}): Promise<BatchGenerateResponse> {
    const started = Date.now();
    let results: BatchElementResult[];

    if (batch.parallel) {
      results = await Promise.all(batch.elements.map((element) => this.runBatchElement(element, options)));
    } else {
      results = [];
      for (const element of batch.elements) {
        results.push(await this.runBatchElement(element, options));
      }
    }

    const succeeded = results.filter((result) => result.success).length;
    const failed = results.length - succeeded;

    safeLog.info('[Pipeline] Batch complete', {
      requestId: options.requestId,
      total: results.length,
      succeeded,
      failed,
      parallel: batch.parallel,
      durationMs: Date.now() - started,
    });

    return {
      success: failed === 0,
      total: results.length,
      succeeded,
      failed,
      results,
    };
  }

  private async runBatchElement(element: BatchElement, options: GenerateOptions): Promise<BatchElementResult> {
    const built = toGenerationRequest(element);
    if (!built.ok) {
      return {
        element_id: element.element_id,
        element_type: element.element_type,
        success: false,
        error: built.error,
      };
    }

    const response = await this.generate(built.request, options);
    const result: BatchElementResult = {
      element_id: element.element_id,
      element_type: element.element_type,
      success: response.success,
      result: response,
    };
    if (!response.success) {
      result.error = response.error;
    }
    return result;
  }
}

// ============================================================================
// Batch element → typed request
// ============================================================================

export type BuiltRequest = { ok: true; request: GenerationRequest } | { ok: false; error: GenerationError };

/**
 * A batch element's config is the type's request body minus the shared
 * fields; merge them back and parse with the type's schema.
 */
export function toGenerationRequest(element: BatchElement): BuiltRequest {
  const body = {
    ...element.config,
    element_id: element.element_id,
    context: element.context,
    position: element.position,
  };

  switch (element.element_type) {
    case 'chart': {
      const parsed = ELEMENT_SCHEMAS.chart.safeParse(body);
      return parsed.success ? { ok: true, request: { kind: 'chart', payload: parsed.data } } : invalid(parsed.error);
    }
    case 'diagram': {
      const parsed = ELEMENT_SCHEMAS.diagram.safeParse(body);
      return parsed.success ? { ok: true, request: { kind: 'diagram', payload: parsed.data } } : invalid(parsed.error);
    }
    case 'text': {
      const parsed = ELEMENT_SCHEMAS.text.safeParse(body);
      return parsed.success ? { ok: true, request: { kind: 'text', payload: parsed.data } } : invalid(parsed.error);
    }
    case 'table': {
      const parsed = ELEMENT_SCHEMAS.table.safeParse(body);
      return parsed.success ? { ok: true, request: { kind: 'table', payload: parsed.data } } : invalid(parsed.error);
    }
    case 'image': {
      const parsed = ELEMENT_SCHEMAS.image.safeParse(body);
      return parsed.success ? { ok: true, request: { kind: 'image', payload: parsed.data } } : invalid(parsed.error);
    }
    case 'infographic': {
      const parsed = ELEMENT_SCHEMAS.infographic.safeParse(body);
      return parsed.success
        ? { ok: true, request: { kind: 'infographic', payload: parsed.data } }
        : invalid(parsed.error);
    }
  }
}

function invalid(error: ZodError): BuiltRequest {
  const details = formatZodErrors(error);
  return {
    ok: false,
    error: createGenerationError('INVALID_REQUEST', `Validation failed: ${details.join('; ')}`),
  };
}
