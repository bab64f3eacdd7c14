/**
 * Response Assembler
 *
 * Turns a backend result into the uniform generation envelope: exactly one
 * content field on success, none on failure. Backends answer in camelCase
 * (sometimes snake_case); everything leaving the orchestrator is snake_case.
 */

import type { GeneratedContent, GenerationError, GenerationFailure, GenerationSuccess } from '../types';
import type { GenerationRequest } from '../schemas/elements';
import type { BackendResult } from './backend-dispatcher';
import { EmptyContentError, type BackendService } from './backend-errors';

// ============================================================================
// Field access
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(data: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function firstNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
  }
  return undefined;
}

function firstRecord(data: Record<string, unknown>, ...keys: string[]): Record<string, unknown> | undefined {
  for (const key of keys) {
    const value = data[key];
    if (isRecord(value)) {
      return value;
    }
  }
  return undefined;
}

export function toSnakeCase(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

/** Recursively rename object keys; arrays are walked, other values kept */
export function snakeCaseKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(snakeCaseKeys);
  }
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [toSnakeCase(key), snakeCaseKeys(inner)]));
  }
  return value;
}

function snakeCaseRecord(value: Record<string, unknown> | undefined): Record<string, unknown> {
  const converted = snakeCaseKeys(value ?? {});
  return isRecord(converted) ? converted : {};
}

function defined(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

// ============================================================================
// Content
// ============================================================================

function serviceOf(request: GenerationRequest): BackendService {
  switch (request.kind) {
    case 'text':
    case 'text_transform':
    case 'text_autofit':
    case 'table':
    case 'table_transform':
      return 'text_table';
    default:
      return request.kind;
  }
}

export function toImageUrl(base64: string): string {
  return base64.startsWith('data:') ? base64 : `data:image/png;base64,${base64}`;
}

/**
 * The one artifact of a backend result. A 2xx without it is an EmptyContentError.
 */
export function extractContent(request: GenerationRequest, data: Record<string, unknown>): GeneratedContent {
  const content = findContent(request, data);
  if (!content) {
    throw new EmptyContentError(serviceOf(request));
  }
  return content;
}

function findContent(request: GenerationRequest, data: Record<string, unknown>): GeneratedContent | undefined {
  switch (request.kind) {
    case 'chart': {
      const config = firstRecord(data, 'chartConfig', 'chart_config');
      return config ? { kind: 'chart_config', value: config } : undefined;
    }
    case 'diagram': {
      const svg = firstString(data, 'svgContent', 'svg_content');
      return svg ? { kind: 'svg_content', value: svg } : undefined;
    }
    case 'text':
    case 'text_transform':
    case 'text_autofit':
    case 'table':
    case 'table_transform': {
      const html = firstString(data, 'htmlContent', 'html_content');
      return html ? { kind: 'html_content', value: html } : undefined;
    }
    case 'image': {
      const url = firstString(data, 'imageUrl', 'image_url');
      if (url) {
        return { kind: 'image_url', value: url };
      }
      const base64 = firstString(data, 'imageBase64', 'image_base64');
      return base64 ? { kind: 'image_url', value: toImageUrl(base64) } : undefined;
    }
    case 'infographic': {
      const svg = firstString(data, 'svgContent', 'svg_content');
      if (svg) {
        return { kind: 'svg_content', value: svg };
      }
      const html = firstString(data, 'htmlContent', 'html_content');
      return html ? { kind: 'html_content', value: html } : undefined;
    }
  }
}

// ============================================================================
// Metadata
// ============================================================================

function buildMetadata(request: GenerationRequest, data: Record<string, unknown>): Record<string, unknown> {
  const reported = snakeCaseRecord(firstRecord(data, 'metadata'));
  const generationId = firstString(data, 'generationId', 'generation_id');

  switch (request.kind) {
    case 'chart':
      return defined({
        ...reported,
        chart_type: typeof reported.chart_type === 'string' ? reported.chart_type : request.payload.chart_type,
        data_point_count:
          typeof reported.data_point_count === 'number' ? reported.data_point_count : (request.payload.data?.length ?? 0),
        dataset_count: typeof reported.dataset_count === 'number' ? reported.dataset_count : 1,
        generation_id: generationId,
      });
    case 'diagram':
      return defined({
        ...reported,
        diagram_type: request.payload.diagram_type,
        mermaid_code: firstString(data, 'mermaidCode', 'mermaid_code'),
      });
    case 'image':
      return defined({
        ...reported,
        credits_remaining: firstNumber(data, 'creditsRemaining', 'credits_remaining'),
        generation_id: generationId,
      });
    case 'infographic':
      return defined({ ...reported, infographic_type: request.payload.infographic_type, generation_id: generationId });
    case 'text_transform':
      return defined({
        ...reported,
        transformation_applied:
          firstString(data, 'transformationApplied', 'transformation_applied') ?? request.payload.transformation,
        word_count: firstNumber(data, 'wordCount', 'word_count'),
      });
    case 'text_autofit':
      return defined({
        ...reported,
        original_length: firstNumber(data, 'originalLength', 'original_length'),
        fitted_length: firstNumber(data, 'fittedLength', 'fitted_length'),
        reduction_percentage: firstNumber(data, 'reductionPercentage', 'reduction_percentage'),
      });
    default:
      return defined({ ...reported, generation_id: generationId });
  }
}

// ============================================================================
// Envelopes
// ============================================================================

/**
 * Success envelope, before injection. The pipeline sets `injected`.
 */
export function assembleSuccess(request: GenerationRequest, result: BackendResult): GenerationSuccess {
  const { data } = result;
  const content = extractContent(request, data);

  const response: GenerationSuccess = {
    success: true,
    element_id: request.payload.element_id,
    injected: false,
  };

  switch (content.kind) {
    case 'chart_config':
      response.chart_config = content.value;
      break;
    case 'svg_content':
      response.svg_content = content.value;
      break;
    case 'html_content':
      response.html_content = content.value;
      break;
    case 'image_url':
      response.image_url = content.value;
      break;
  }

  if (result.jobId) {
    response.job_id = result.jobId;
  }

  const metadata = buildMetadata(request, data);
  if (Object.keys(metadata).length > 0) {
    response.metadata = metadata;
  }

  if (request.kind === 'chart') {
    const insights = firstRecord(data, 'insights');
    if (insights) {
      response.insights = snakeCaseRecord(insights);
    }
  }

  if (request.kind === 'image') {
    const creditsUsed = firstNumber(data, 'creditsUsed', 'credits_used');
    if (creditsUsed !== undefined) {
      response.credits_used = creditsUsed;
    }
  }

  return response;
}

export function assembleFailure(elementId: string, error: GenerationError, jobId?: string): GenerationFailure {
  const response: GenerationFailure = { success: false, element_id: elementId, error };
  if (jobId) {
    response.job_id = jobId;
  }
  return response;
}
