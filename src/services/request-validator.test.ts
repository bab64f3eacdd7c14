import { describe, it, expect } from 'vitest';
import {
  checkContext,
  checkDataPresence,
  getMinimumSize,
  validateGenerationRequest,
} from './request-validator';
import {
  ChartRequestSchema,
  DiagramRequestSchema,
  InfographicRequestSchema,
  TextRequestSchema,
  TableRequestSchema,
  TextTransformRequestSchema,
  type GenerationRequest,
} from '../schemas/elements';

// ============================================================================
// Fixtures
// ============================================================================

const CONTEXT = {
  presentation_id: 'pres-1',
  presentation_title: 'Quarterly Review',
  slide_id: 'slide-3',
  slide_index: 2,
};

function chart(overrides: Record<string, unknown> = {}): GenerationRequest {
  return {
    kind: 'chart',
    payload: ChartRequestSchema.parse({
      element_id: 'chart-1',
      context: CONTEXT,
      position: { grid_row: '4/12', grid_column: '2/14' },
      prompt: 'Revenue by quarter',
      chart_type: 'bar',
      data: [{ label: 'Q1', value: 10 }],
      ...overrides,
    }),
  };
}

describe('getMinimumSize', () => {
  it('should use type-specific minimums', () => {
    expect(getMinimumSize(chart({ chart_type: 'line' }))).toEqual({ columns: 3, rows: 2 });
    expect(
      getMinimumSize({
        kind: 'infographic',
        payload: InfographicRequestSchema.parse({
          element_id: 'i1',
          context: CONTEXT,
          position: { grid_row: '1/4', grid_column: '1/9' },
          prompt: 'Milestones',
          infographic_type: 'timeline',
        }),
      })
    ).toEqual({ columns: 8, rows: 3 });
  });

  it('should default to 3x3', () => {
    expect(getMinimumSize(chart({ chart_type: 'radar' }))).toEqual({ columns: 3, rows: 3 });
  });
});

describe('checkContext', () => {
  it('should list every blank required field', () => {
    const parsed = ChartRequestSchema.parse({
      element_id: 'chart-1',
      context: { ...CONTEXT, presentation_id: '', slide_id: '  ' },
      position: { grid_row: '4/12', grid_column: '2/14' },
      chart_type: 'bar',
    });
    expect(checkContext(parsed.context)).toEqual({
      code: 'INVALID_REQUEST',
      message: 'Missing required context fields: presentation_id, slide_id',
      retryable: false,
    });
  });
});

describe('validateGenerationRequest', () => {
  it('should accept a well-formed chart and return its span', () => {
    expect(validateGenerationRequest(chart())).toEqual({ valid: true, span: { columns: 12, rows: 8 } });
  });

  it('should reject a malformed grid string as INVALID_REQUEST', () => {
    const outcome = validateGenerationRequest(chart({ position: { grid_row: '12/4', grid_column: '2/14' } }));
    expect(outcome.valid).toBe(false);
    if (!outcome.valid) {
      expect(outcome.error.code).toBe('INVALID_REQUEST');
      expect(outcome.error.retryable).toBe(false);
    }
  });

  it('should reject a span below the minimum with GRID_TOO_SMALL', () => {
    const outcome = validateGenerationRequest(chart({ position: { grid_row: '4/6', grid_column: '2/14' } }));
    expect(outcome).toEqual({
      valid: false,
      error: {
        code: 'GRID_TOO_SMALL',
        message: 'Grid size 12x2 is too small for bar chart. Minimum size is 3x3.',
        retryable: true,
        suggestion: 'Resize the bar chart element to at least 3x3 grid units.',
      },
    });
  });

  it('should allow a two-row line chart', () => {
    const outcome = validateGenerationRequest(
      chart({ chart_type: 'line', position: { grid_row: '4/6', grid_column: '2/14' } })
    );
    expect(outcome.valid).toBe(true);
  });

  it('should check the grid before data presence', () => {
    const outcome = validateGenerationRequest(
      chart({ data: undefined, position: { grid_row: '4/5', grid_column: '2/3' } })
    );
    expect(outcome.valid).toBe(false);
    if (!outcome.valid) {
      expect(outcome.error.code).toBe('GRID_TOO_SMALL');
    }
  });

  it('should reject a sequence diagram narrower than four columns', () => {
    const outcome = validateGenerationRequest({
      kind: 'diagram',
      payload: DiagramRequestSchema.parse({
        element_id: 'd1',
        context: CONTEXT,
        position: { grid_row: '2/8', grid_column: '1/4' },
        prompt: 'Login flow',
        diagram_type: 'sequence',
      }),
    });
    expect(outcome.valid).toBe(false);
    if (!outcome.valid) {
      expect(outcome.error.suggestion).toBe('Resize the sequence diagram element to at least 4x3 grid units.');
    }
  });
});

describe('checkDataPresence', () => {
  it('should require data when generate_data is false', () => {
    expect(checkDataPresence(chart({ data: undefined }))?.code).toBe('MISSING_DATA');
    expect(checkDataPresence(chart({ data: [] }))?.code).toBe('MISSING_DATA');
  });

  it('should accept generated chart data with a prompt', () => {
    expect(checkDataPresence(chart({ data: undefined, generate_data: true }))).toBeNull();
  });

  it('should accept explicit chart data without a prompt', () => {
    expect(checkDataPresence(chart({ prompt: undefined }))).toBeNull();
  });

  it('should require a prompt for generated chart data', () => {
    expect(checkDataPresence(chart({ prompt: '  ', data: undefined, generate_data: true }))?.code).toBe('MISSING_DATA');
  });

  it('should let infographics generate content by default', () => {
    const request: GenerationRequest = {
      kind: 'infographic',
      payload: InfographicRequestSchema.parse({
        element_id: 'i1',
        context: CONTEXT,
        position: { grid_row: '1/8', grid_column: '1/13' },
        prompt: 'Sales funnel',
        infographic_type: 'funnel',
      }),
    };
    expect(checkDataPresence(request)).toBeNull();
  });

  it('should require items when infographic generation is off', () => {
    const request: GenerationRequest = {
      kind: 'infographic',
      payload: InfographicRequestSchema.parse({
        element_id: 'i1',
        context: CONTEXT,
        position: { grid_row: '1/8', grid_column: '1/13' },
        prompt: 'Sales funnel',
        infographic_type: 'funnel',
        generate_data: false,
      }),
    };
    expect(checkDataPresence(request)?.message).toBe('Either provide items or set generate_data=true');
  });

  it('should accept a table with rows but no prompt', () => {
    const request: GenerationRequest = {
      kind: 'table',
      payload: TableRequestSchema.parse({
        element_id: 't1',
        context: CONTEXT,
        position: { grid_row: '1/8', grid_column: '1/13' },
        data: [['Region', 'Sales'], ['North', '10']],
      }),
    };
    expect(checkDataPresence(request)).toBeNull();
  });

  it('should require a prompt for text', () => {
    const request: GenerationRequest = {
      kind: 'text',
      payload: TextRequestSchema.parse({
        element_id: 'x1',
        context: CONTEXT,
        position: { grid_row: '1/8', grid_column: '1/13' },
      }),
    };
    expect(checkDataPresence(request)?.code).toBe('MISSING_DATA');
  });

  it('should reject blank source content for transforms', () => {
    const request: GenerationRequest = {
      kind: 'text_transform',
      payload: TextTransformRequestSchema.parse({
        element_id: 'x1',
        context: CONTEXT,
        position: { grid_row: '1/8', grid_column: '1/13' },
        source_content: '   ',
        transformation: 'condense',
      }),
    };
    expect(checkDataPresence(request)?.code).toBe('MISSING_DATA');
  });
});
