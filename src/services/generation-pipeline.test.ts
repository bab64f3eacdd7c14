/**
 * End-to-end pipeline tests against in-process backends
 */

import { describe, it, expect, vi } from 'vitest';
import { GenerationPipeline, toGenerationRequest } from './generation-pipeline';
import { BackendDispatcher } from './backend-dispatcher';
import { LayoutClient } from './layout-client';
import { GenerationCancelledError } from './backend-errors';
import { loadConfig } from '../config';
import {
  ChartRequestSchema,
  DiagramRequestSchema,
  TableAnalyzeRequestSchema,
  type GenerationRequest,
} from '../schemas/elements';

// ============================================================================
// Fixtures
// ============================================================================

const CONFIG = loadConfig({
  CHART_SERVICE_URL: 'http://chart.test',
  DIAGRAM_SERVICE_URL: 'http://diagram.test',
  TEXT_TABLE_SERVICE_URL: 'http://text.test',
  LAYOUT_SERVICE_URL: 'http://layout.test',
  DIAGRAM_POLL_TIMEOUT: '6',
});

const context = {
  presentation_id: 'pres-1',
  presentation_title: 'Quarterly Review',
  slide_id: 'slide-2',
  slide_index: 1,
  slide_count: 8,
};

type Handler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** Layout Service holding one presentation with two slides */
function layoutHandler(slides: Array<Record<string, unknown>> = [{ id: 'slide-1' }, { id: 'slide-2' }]): Handler {
  return (url, init) => {
    if (url.pathname === '/api/presentations/pres-1' && (init?.method ?? 'GET') === 'GET') {
      return json({ id: 'pres-1', slides });
    }
    const put = url.pathname.match(/^\/api\/presentations\/pres-1\/slides\/(\d+)$/);
    if (put && init?.method === 'PUT') {
      const index = Number(put[1]);
      const updates: unknown = JSON.parse(String(init.body));
      if (typeof updates === 'object' && updates !== null) {
        slides[index] = { ...slides[index], ...updates };
      }
      return json(slides[index]);
    }
    return json({ detail: 'Not found' }, 404);
  };
}

function createHarness(handlers: Record<string, Handler>) {
  const fetchMock = vi.fn(async (input: string, init?: RequestInit) => {
    const url = new URL(input);
    const handler = handlers[url.host];
    if (!handler) {
      throw new TypeError(`fetch failed: ${url.host}`);
    }
    return handler(url, init);
  });
  let now = 0;
  const clock = {
    now: () => now,
    sleep: async (ms: number) => {
      now += ms;
    },
  };
  const pipeline = new GenerationPipeline(CONFIG, {
    dispatcher: new BackendDispatcher(CONFIG, { fetch: fetchMock, clock }),
    layout: new LayoutClient(CONFIG, { fetch: fetchMock }),
  });
  const hostsCalled = () => fetchMock.mock.calls.map(([input]) => new URL(input).host);
  return { pipeline, fetchMock, hostsCalled };
}

function chartRequest(overrides: Record<string, unknown> = {}): GenerationRequest {
  return {
    kind: 'chart',
    payload: ChartRequestSchema.parse({
      element_id: 'chart-1',
      context,
      position: { grid_row: '4/12', grid_column: '2/14' },
      chart_type: 'bar',
      prompt: 'Quarterly revenue',
      data: [
        { label: 'Q1', value: 120 },
        { label: 'Q2', value: 135 },
        { label: 'Q3', value: 150 },
        { label: 'Q4', value: 170 },
      ],
      ...overrides,
    }),
  };
}

const chartBackend: Handler = () =>
  json({
    success: true,
    data: {
      chartConfig: { type: 'bar', data: { labels: ['Q1', 'Q2', 'Q3', 'Q4'] } },
      metadata: { chartType: 'bar', dataPointCount: 4, datasetCount: 1 },
    },
  });

// ============================================================================
// Single element
// ============================================================================

describe('GenerationPipeline.generate', () => {
  it('should generate and inject a bar chart', async () => {
    const slides: Array<Record<string, unknown>> = [{ id: 'slide-1' }, { id: 'slide-2' }];
    const { pipeline, fetchMock } = createHarness({
      'chart.test': chartBackend,
      'layout.test': layoutHandler(slides),
    });

    const response = await pipeline.generate(chartRequest(), { requestId: 'req-1' });

    expect(response.success).toBe(true);
    if (response.success) {
      expect(response.chart_config?.type).toBe('bar');
      expect(response.metadata?.data_point_count).toBe(4);
      expect(response.injected).toBe(true);
      expect(response.injection_error).toBeUndefined();
    }

    const [, chartInit] = fetchMock.mock.calls[0];
    expect(JSON.parse(String(chartInit?.body))).toMatchObject({
      chartType: 'bar',
      constraints: { gridWidth: 6, gridHeight: 5 },
    });
    expect(slides[1].charts).toEqual([
      {
        id: 'chart-1',
        chart_config: { type: 'bar', data: { labels: ['Q1', 'Q2', 'Q3', 'Q4'] } },
        chart_type: 'bar',
        position: { grid_row: '4/12', grid_column: '2/14' },
      },
    ]);
  });

  it('should keep a success when injection fails', async () => {
    const { pipeline } = createHarness({
      'chart.test': chartBackend,
      'layout.test': () => json({ detail: 'Not found' }, 404),
    });

    const response = await pipeline.generate(chartRequest());

    expect(response.success).toBe(true);
    if (response.success) {
      expect(response.injected).toBe(false);
      expect(response.injection_error).toBe('Presentation pres-1 not found');
    }
  });

  it('should reject a grid below the minimum without calling any backend', async () => {
    const { pipeline, fetchMock } = createHarness({ 'chart.test': chartBackend, 'layout.test': layoutHandler() });

    const response = await pipeline.generate(chartRequest({ position: { grid_row: '1/2', grid_column: '1/3' } }));

    expect(response).toEqual({
      success: false,
      element_id: 'chart-1',
      error: {
        code: 'GRID_TOO_SMALL',
        message: 'Grid size 2x1 is too small for bar chart. Minimum size is 3x3.',
        retryable: true,
        suggestion: 'Resize the bar chart element to at least 3x3 grid units.',
      },
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should classify a rate-limited backend and skip injection', async () => {
    const { pipeline, hostsCalled } = createHarness({
      'chart.test': () => json({ detail: 'Too many requests' }, 429),
      'layout.test': layoutHandler(),
    });

    const response = await pipeline.generate(chartRequest());

    expect(response.success).toBe(false);
    if (!response.success) {
      expect(response.error.code).toBe('RATE_LIMITED');
      expect(response.error.retryable).toBe(true);
    }
    expect(hostsCalled()).toEqual(['chart.test']);
  });

  it('should keep a declared credits failure non-retryable when data is null', async () => {
    const { pipeline, hostsCalled } = createHarness({
      'chart.test': () =>
        json({ success: false, data: null, error: { code: 'INSUFFICIENT_CREDITS', message: 'No credits left' } }),
      'layout.test': layoutHandler(),
    });

    const response = await pipeline.generate(chartRequest());

    expect(response.success).toBe(false);
    if (!response.success) {
      expect(response.error.code).toBe('CREDITS_EXHAUSTED');
      expect(response.error.retryable).toBe(false);
    }
    expect(hostsCalled()).toEqual(['chart.test']);
  });

  it('should report an unreachable backend as a connection error', async () => {
    const { pipeline } = createHarness({ 'layout.test': layoutHandler() });

    const response = await pipeline.generate(chartRequest());

    expect(response.success).toBe(false);
    if (!response.success) {
      expect(response.error.code).toBe('CONNECTION_ERROR');
    }
  });

  it('should time out a diagram job that never completes', async () => {
    const { pipeline, hostsCalled } = createHarness({
      'diagram.test': (url) =>
        url.pathname === '/api/ai/diagram/generate' ? json({ success: true, jobId: 'job-42' }) : json({ status: 'processing' }),
      'layout.test': layoutHandler(),
    });
    const request: GenerationRequest = {
      kind: 'diagram',
      payload: DiagramRequestSchema.parse({
        element_id: 'diag-1',
        context,
        position: { grid_row: '2/10', grid_column: '1/13' },
        diagram_type: 'flowchart',
        prompt: 'Order fulfilment',
      }),
    };

    const response = await pipeline.generate(request);

    expect(response).toEqual({
      success: false,
      element_id: 'diag-1',
      job_id: 'job-42',
      error: {
        code: 'AI_SERVICE_ERROR',
        message: 'Diagram job job-42 did not complete within 6s',
        retryable: true,
        suggestion: 'Try again with a simpler diagram.',
      },
    });
    expect(hostsCalled()).not.toContain('layout.test');
  });

  it('should propagate cancellation and start no work', async () => {
    const controller = new AbortController();
    controller.abort();
    const { pipeline, fetchMock } = createHarness({ 'chart.test': chartBackend, 'layout.test': layoutHandler() });

    await expect(pipeline.generate(chartRequest(), { signal: controller.signal })).rejects.toBeInstanceOf(
      GenerationCancelledError
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should propagate a cancellation that arrives during injection', async () => {
    const controller = new AbortController();
    const layout = layoutHandler();
    const { pipeline } = createHarness({
      'chart.test': chartBackend,
      'layout.test': (url, init) => {
        controller.abort();
        return layout(url, init);
      },
    });

    await expect(pipeline.generate(chartRequest(), { signal: controller.signal })).rejects.toBeInstanceOf(
      GenerationCancelledError
    );
  });
});

// ============================================================================
// Batch
// ============================================================================

describe('GenerationPipeline.runBatch', () => {
  const chartElement = {
    element_type: 'chart' as const,
    element_id: 'chart-1',
    context: { ...context, slide_count: 8 },
    position: { grid_row: '4/12', grid_column: '2/14' },
    config: {
      chart_type: 'bar',
      data: [
        { label: 'Q1', value: 1 },
        { label: 'Q2', value: 2 },
      ],
    },
  };

  it('should report per-element results and totals in request order', async () => {
    const { pipeline } = createHarness({ 'chart.test': chartBackend, 'layout.test': layoutHandler() });

    const response = await pipeline.runBatch({
      parallel: true,
      elements: [
        chartElement,
        { ...chartElement, element_id: 'broken', config: { chart_type: 'histogram' } },
        { ...chartElement, element_id: 'tiny', position: { grid_row: '1/2', grid_column: '1/2' } },
      ],
    });

    expect(response.total).toBe(3);
    expect(response.succeeded).toBe(1);
    expect(response.failed).toBe(2);
    expect(response.success).toBe(false);
    expect(response.results.map((result) => [result.element_id, result.success, result.error?.code])).toEqual([
      ['chart-1', true, undefined],
      ['broken', false, 'INVALID_REQUEST'],
      ['tiny', false, 'GRID_TOO_SMALL'],
    ]);
  });

  it('should run sequentially when parallel is false', async () => {
    const { pipeline, hostsCalled } = createHarness({ 'chart.test': chartBackend, 'layout.test': layoutHandler() });

    const response = await pipeline.runBatch({
      parallel: false,
      elements: [chartElement, { ...chartElement, element_id: 'chart-2' }],
    });

    expect(response.success).toBe(true);
    expect(hostsCalled()).toEqual([
      'chart.test',
      'layout.test',
      'layout.test',
      'chart.test',
      'layout.test',
      'layout.test',
    ]);
  });
});

describe('toGenerationRequest', () => {
  it('should merge shared fields into the typed request', () => {
    const built = toGenerationRequest({
      element_type: 'text',
      element_id: 'text-1',
      context,
      position: { grid_row: '1/4', grid_column: '1/9' },
      config: { prompt: 'Welcome', element_id: 'ignored' },
    });

    expect(built.ok).toBe(true);
    if (built.ok) {
      expect(built.request.kind).toBe('text');
      expect(built.request.payload.element_id).toBe('text-1');
    }
  });

  it('should describe schema failures as INVALID_REQUEST', () => {
    const built = toGenerationRequest({
      element_type: 'image',
      element_id: 'img-1',
      context,
      position: { grid_row: '1/4', grid_column: '1/9' },
      config: { prompt: 'Lake', quality: 'extreme' },
    });

    expect(built.ok).toBe(false);
    if (!built.ok) {
      expect(built.error.code).toBe('INVALID_REQUEST');
      expect(built.error.message).toMatch(/^Validation failed: quality: /);
    }
  });
});

describe('GenerationPipeline.analyzeTable', () => {
  const analyzeRequest = TableAnalyzeRequestSchema.parse({
    element_id: 'table-1',
    context,
    source_content: '<table><tr><td>1</td></tr></table>',
    analysis_type: 'trends',
  });

  it('should return the analysis without touching the slide', async () => {
    const { pipeline, fetchMock, hostsCalled } = createHarness({
      'text.test': () =>
        json({
          success: true,
          data: {
            summary: 'Revenue grows every quarter',
            statistics: { rowCount: 4 },
            trends: ['upward'],
            recommendations: ['Highlight Q4'],
          },
        }),
      'layout.test': layoutHandler(),
    });

    const response = await pipeline.analyzeTable(analyzeRequest);

    expect(response).toEqual({
      success: true,
      element_id: 'table-1',
      summary: 'Revenue grows every quarter',
      statistics: { row_count: 4 },
      trends: ['upward'],
      recommendations: ['Highlight Q4'],
    });
    expect(hostsCalled()).toEqual(['text.test']);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://text.test/api/ai/table/analyze');
    expect(JSON.parse(String(init?.body))).toMatchObject({ elementId: 'table-1', analysisType: 'trends' });
  });

  it('should classify a failing analysis', async () => {
    const { pipeline } = createHarness({ 'text.test': () => json({ detail: 'boom' }, 500) });

    const response = await pipeline.analyzeTable(analyzeRequest);

    expect(response).toEqual({
      success: false,
      element_id: 'table-1',
      error: { code: 'AI_SERVICE_ERROR', message: 'boom', retryable: true },
    });
  });
});
