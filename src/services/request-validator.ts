/**
 * Request Validator
 *
 * Business-rule checks that run after the zod schema accepted the body and
 * before anything leaves the process. Order:
 *   1. required context fields are non-empty
 *   2. grid strings parse with end > start
 *   3. span meets the type's minimum (Layout units)
 *   4. something to generate from: a prompt or raw data
 */

import type { GenerationError } from '../types';
import type { ElementContext, GenerationRequest } from '../schemas/elements';
import { createGenerationError } from './error-classifier';
import { parseGridPosition, type GridSpan } from './grid-converter';

// ============================================================================
// Minimum sizes
// ============================================================================

export interface MinimumSize {
  columns: number;
  rows: number;
}

const DEFAULT_MINIMUM: MinimumSize = { columns: 3, rows: 3 };

const CHART_MINIMUMS: Record<string, MinimumSize> = {
  bar: { columns: 3, rows: 3 },
  pie: { columns: 3, rows: 3 },
  line: { columns: 3, rows: 2 },
};

const DIAGRAM_MINIMUMS: Record<string, MinimumSize> = {
  flowchart: { columns: 3, rows: 2 },
  sequence: { columns: 4, rows: 3 },
};

const INFOGRAPHIC_MINIMUMS: Record<string, MinimumSize> = {
  timeline: { columns: 8, rows: 3 },
  process: { columns: 6, rows: 3 },
};

export function getMinimumSize(request: GenerationRequest): MinimumSize {
  switch (request.kind) {
    case 'chart':
      return CHART_MINIMUMS[request.payload.chart_type] ?? DEFAULT_MINIMUM;
    case 'diagram':
      return DIAGRAM_MINIMUMS[request.payload.diagram_type] ?? DEFAULT_MINIMUM;
    case 'infographic':
      return INFOGRAPHIC_MINIMUMS[request.payload.infographic_type] ?? DEFAULT_MINIMUM;
    default:
      return DEFAULT_MINIMUM;
  }
}

function subtypeLabel(request: GenerationRequest): string {
  switch (request.kind) {
    case 'chart':
      return `${request.payload.chart_type} chart`;
    case 'diagram':
      return `${request.payload.diagram_type} diagram`;
    case 'infographic':
      return `${request.payload.infographic_type} infographic`;
    case 'text_transform':
    case 'text_autofit':
      return 'text';
    case 'table_transform':
      return 'table';
    default:
      return request.kind;
  }
}

/**
 * GRID_TOO_SMALL error for a span below the minimum, or null when it fits
 */
export function checkMinimumSize(request: GenerationRequest, span: GridSpan): GenerationError | null {
  const minimum = getMinimumSize(request);
  if (span.columns >= minimum.columns && span.rows >= minimum.rows) {
    return null;
  }
  const label = subtypeLabel(request);
  return createGenerationError(
    'GRID_TOO_SMALL',
    `Grid size ${span.columns}x${span.rows} is too small for ${label}. Minimum size is ${minimum.columns}x${minimum.rows}.`,
    `Resize the ${label} element to at least ${minimum.columns}x${minimum.rows} grid units.`
  );
}

// ============================================================================
// Data presence
// ============================================================================

function hasText(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

function missingData(message: string, suggestion: string): GenerationError {
  return createGenerationError('MISSING_DATA', message, suggestion);
}

export function checkDataPresence(request: GenerationRequest): GenerationError | null {
  switch (request.kind) {
    case 'chart': {
      const { prompt, data, generate_data: generateData } = request.payload;
      const hasData = data !== undefined && data.length > 0;
      if (!hasData && !generateData) {
        return missingData(
          'Either provide data or set generate_data=true',
          'Add data points or enable synthetic data generation.'
        );
      }
      if (!hasData && !hasText(prompt)) {
        return missingData('A prompt is required when no data is provided', 'Describe the data to chart.');
      }
      return null;
    }
    case 'infographic': {
      const { prompt, items, generate_data: generateData } = request.payload;
      const hasItems = items !== undefined && items.length > 0;
      if (!hasItems && !generateData) {
        return missingData(
          'Either provide items or set generate_data=true',
          'Add infographic items or enable content generation.'
        );
      }
      if (!hasItems && !hasText(prompt)) {
        return missingData('A prompt is required when no items are provided', 'Describe the infographic content.');
      }
      return null;
    }
    case 'table': {
      const { prompt, data } = request.payload;
      if (!hasText(prompt) && (data === undefined || data.length === 0)) {
        return missingData('Either a prompt or table data is required', 'Describe the table or paste its rows.');
      }
      return null;
    }
    case 'diagram': {
      const { prompt, mermaid_code: mermaidCode } = request.payload;
      if (!hasText(prompt) && !hasText(mermaidCode)) {
        return missingData('Either a prompt or mermaid_code is required', 'Describe the diagram to draw.');
      }
      return null;
    }
    case 'text':
    case 'image':
      if (!hasText(request.payload.prompt)) {
        return missingData(`A prompt is required for ${request.kind} generation`, `Describe the ${request.kind} to generate.`);
      }
      return null;
    case 'text_transform':
    case 'text_autofit':
    case 'table_transform':
      if (!hasText(request.payload.source_content)) {
        return missingData('source_content must not be blank', 'Provide the content to transform.');
      }
      return null;
  }
}

// ============================================================================
// Entry point
// ============================================================================

export type ValidationOutcome =
  | { valid: true; span: GridSpan }
  | { valid: false; error: GenerationError };

export function checkContext(context: ElementContext): GenerationError | null {
  const missing = (['presentation_id', 'presentation_title', 'slide_id'] as const).filter(
    (field) => context[field].trim().length === 0
  );
  if (missing.length === 0) {
    return null;
  }
  return createGenerationError('INVALID_REQUEST', `Missing required context fields: ${missing.join(', ')}`);
}

export function validateGenerationRequest(request: GenerationRequest): ValidationOutcome {
  const contextError = checkContext(request.payload.context);
  if (contextError) {
    return { valid: false, error: contextError };
  }

  const grid = parseGridPosition(request.payload.position);
  if (!grid.ok) {
    return { valid: false, error: createGenerationError('INVALID_REQUEST', grid.message) };
  }

  const sizeError = checkMinimumSize(request, grid.span);
  if (sizeError) {
    return { valid: false, error: sizeError };
  }

  const dataError = checkDataPresence(request);
  if (dataError) {
    return { valid: false, error: dataError };
  }

  return { valid: true, span: grid.span };
}
