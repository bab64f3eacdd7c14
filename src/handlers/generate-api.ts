/**
 * Generation API
 *
 * Every route under /api/generate. Status codes:
 * - 400: INVALID_REQUEST raised here (bad JSON, schema, path parameter, context or grid)
 * - 200: any other envelope, success or classified failure
 * - 404 / 405: unknown path / method
 * - 499: the client went away mid-generation
 * - 500: unexpected crash, still with an INTERNAL_ERROR envelope
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  BatchGenerateRequestSchema,
  ChartRequestSchema,
  DiagramRequestSchema,
  ImageRequestSchema,
  InfographicRequestSchema,
  TableAnalyzeRequestSchema,
  TableRequestSchema,
  TableTransformRequestSchema,
  TextAutofitRequestSchema,
  TextRequestSchema,
  TextTransformRequestSchema,
  type GenerationRequest,
} from '../schemas/elements';
import { GridDimensionPathSchema, JobIdPathSchema, PresentationIdPathSchema } from '../schemas/path-params';
import { jsonResponse, validatePathParameter, validateRequestBody } from '../schemas/validation-helper';
import type { OrchestratorConfig } from '../config';
import type { GenerationPipeline } from '../services/generation-pipeline';
import type { MetadataCatalog } from '../services/metadata-catalog';
import { tablePresets } from '../services/metadata-catalog';
import { GenerationCancelledError } from '../services/backend-errors';
import { createGenerationError } from '../services/error-classifier';
import { convertGridSpan } from '../services/grid-converter';
import { validateGenerationRequest } from '../services/request-validator';
import { assembleFailure } from '../services/response-assembler';
import { safeLog } from '../utils/log-sanitizer';

export interface GenerateApiDeps {
  config: OrchestratorConfig;
  pipeline: GenerationPipeline;
  catalog: MetadataCatalog;
}

interface RouteContext {
  request: Request;
  params: string[];
  deps: GenerateApiDeps;
  requestId: string;
  signal: AbortSignal;
}

interface Route {
  method: 'GET' | 'POST';
  pattern: RegExp;
  handle: (ctx: RouteContext) => Promise<Response>;
}

/** nginx's "client closed request" */
const CLIENT_CLOSED_REQUEST = 499;

// ============================================================================
// Generation
// ============================================================================

async function runGeneration(ctx: RouteContext, generation: GenerationRequest): Promise<Response> {
  // GRID_TOO_SMALL and MISSING_DATA still answer 200 from the pipeline
  const validation = validateGenerationRequest(generation);
  if (!validation.valid && validation.error.code === 'INVALID_REQUEST') {
    return jsonResponse(assembleFailure(generation.payload.element_id, validation.error), 400);
  }

  const response = await ctx.deps.pipeline.generate(generation, { signal: ctx.signal, requestId: ctx.requestId });
  return jsonResponse(response);
}

function generateRoute<T>(
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  toGeneration: (payload: T) => GenerationRequest
): Route {
  return {
    method: 'POST',
    pattern: new RegExp(`^/api/generate/${path}$`),
    handle: async (ctx) => {
      const parsed = await validateRequestBody(ctx.request, schema, `POST /api/generate/${path}`);
      if (!parsed.success) {
        return parsed.response;
      }
      return runGeneration(ctx, toGeneration(parsed.data));
    },
  };
}

async function handleChartValidate(ctx: RouteContext): Promise<Response> {
  const parsed = await validateRequestBody(ctx.request, ChartRequestSchema, 'POST /api/generate/chart/validate');
  if (!parsed.success) {
    return parsed.response;
  }
  const chart = parsed.data;

  const validation = validateGenerationRequest({ kind: 'chart', payload: chart });
  if (!validation.valid) {
    const status = validation.error.code === 'INVALID_REQUEST' ? 400 : 200;
    return jsonResponse({ valid: false, error: validation.error }, status);
  }

  const { span, standard } = convertGridSpan(validation.span, {
    pxPerCol: ctx.deps.config.diagramPxPerCol,
    pxPerRow: ctx.deps.config.diagramPxPerRow,
  });

  return jsonResponse({
    valid: true,
    grid_dimensions: {
      columns: span.columns,
      rows: span.rows,
      grid_width: standard.gridWidth,
      grid_height: standard.gridHeight,
    },
    chart_type: chart.chart_type,
    palette: chart.palette,
    has_data: (chart.data?.length ?? 0) > 0,
    generate_data: chart.generate_data,
  });
}

async function handleBatch(ctx: RouteContext): Promise<Response> {
  const parsed = await validateRequestBody(ctx.request, BatchGenerateRequestSchema, 'POST /api/generate/batch');
  if (!parsed.success) {
    return parsed.response;
  }
  const response = await ctx.deps.pipeline.runBatch(parsed.data, { signal: ctx.signal, requestId: ctx.requestId });
  return jsonResponse(response);
}

async function handleTableAnalyze(ctx: RouteContext): Promise<Response> {
  const parsed = await validateRequestBody(ctx.request, TableAnalyzeRequestSchema, 'POST /api/generate/table/analyze');
  if (!parsed.success) {
    return parsed.response;
  }
  const response = await ctx.deps.pipeline.analyzeTable(parsed.data, { signal: ctx.signal, requestId: ctx.requestId });
  return jsonResponse(response);
}

// ============================================================================
// Metadata
// ============================================================================

function metadataRoute(path: string, lookup: (catalog: MetadataCatalog, signal: AbortSignal) => Promise<unknown>): Route {
  return {
    method: 'GET',
    pattern: new RegExp(`^/api/generate/${path}$`),
    handle: async (ctx) => jsonResponse(await lookup(ctx.deps.catalog, ctx.signal)),
  };
}

async function handleDiagramStatus(ctx: RouteContext): Promise<Response> {
  const jobId = validatePathParameter(ctx.params[0], JobIdPathSchema, 'job_id', 'GET /api/generate/diagram/status');
  if (!jobId.success) {
    return jobId.response;
  }
  return jsonResponse(await ctx.deps.catalog.diagramStatus(jobId.data, ctx.signal));
}

async function handleTextConstraints(ctx: RouteContext): Promise<Response> {
  const endpoint = 'GET /api/generate/text/constraints';
  const width = validatePathParameter(ctx.params[0], GridDimensionPathSchema, 'width', endpoint);
  if (!width.success) {
    return width.response;
  }
  const height = validatePathParameter(ctx.params[1], GridDimensionPathSchema, 'height', endpoint);
  if (!height.success) {
    return height.response;
  }
  return jsonResponse(await ctx.deps.catalog.textConstraints(width.data, height.data, ctx.signal));
}

async function handleImageCredits(ctx: RouteContext): Promise<Response> {
  const presentationId = validatePathParameter(
    ctx.params[0],
    PresentationIdPathSchema,
    'presentation_id',
    'GET /api/generate/image/credits'
  );
  if (!presentationId.success) {
    return presentationId.response;
  }
  return jsonResponse(await ctx.deps.catalog.imageCredits(presentationId.data, ctx.signal));
}

// ============================================================================
// Route table
// ============================================================================

const ROUTES: Route[] = [
  generateRoute('chart', ChartRequestSchema, (payload) => ({ kind: 'chart', payload })),
  generateRoute('diagram', DiagramRequestSchema, (payload) => ({ kind: 'diagram', payload })),
  generateRoute('text', TextRequestSchema, (payload) => ({ kind: 'text', payload })),
  generateRoute('text/transform', TextTransformRequestSchema, (payload) => ({ kind: 'text_transform', payload })),
  generateRoute('text/autofit', TextAutofitRequestSchema, (payload) => ({ kind: 'text_autofit', payload })),
  generateRoute('table', TableRequestSchema, (payload) => ({ kind: 'table', payload })),
  generateRoute('table/transform', TableTransformRequestSchema, (payload) => ({ kind: 'table_transform', payload })),
  generateRoute('image', ImageRequestSchema, (payload) => ({ kind: 'image', payload })),
  generateRoute('infographic', InfographicRequestSchema, (payload) => ({ kind: 'infographic', payload })),
  { method: 'POST', pattern: /^\/api\/generate\/batch$/, handle: handleBatch },
  { method: 'POST', pattern: /^\/api\/generate\/chart\/validate$/, handle: handleChartValidate },
  { method: 'POST', pattern: /^\/api\/generate\/table\/analyze$/, handle: handleTableAnalyze },
  metadataRoute('chart/constraints', (catalog, signal) => catalog.chartConstraints(signal)),
  metadataRoute('chart/palettes', (catalog, signal) => catalog.chartPalettes(signal)),
  metadataRoute('diagram/types', (catalog, signal) => catalog.diagramTypes(signal)),
  metadataRoute('infographic/types', (catalog, signal) => catalog.infographicTypes(signal)),
  metadataRoute('image/styles', (catalog, signal) => catalog.imageStyles(signal)),
  metadataRoute('table/presets', async () => tablePresets()),
  { method: 'GET', pattern: /^\/api\/generate\/diagram\/status\/([^/]+)$/, handle: handleDiagramStatus },
  { method: 'GET', pattern: /^\/api\/generate\/text\/constraints\/([^/]+)\/([^/]+)$/, handle: handleTextConstraints },
  { method: 'GET', pattern: /^\/api\/generate\/image\/credits\/([^/]+)$/, handle: handleImageCredits },
];

// ============================================================================
// Entry
// ============================================================================

export async function handleGenerateAPI(
  request: Request,
  path: string,
  deps: GenerateApiDeps,
  requestId: string
): Promise<Response> {
  const matching = ROUTES.map((route) => ({ route, match: route.pattern.exec(path) })).filter(
    (candidate) => candidate.match !== null
  );
  if (matching.length === 0) {
    return jsonResponse({ error: 'Not found' }, 404);
  }

  const selected = matching.find((candidate) => candidate.route.method === request.method);
  if (!selected || !selected.match) {
    return new Response(JSON.stringify({ error: 'Method not allowed' }), {
      status: 405,
      headers: {
        'Content-Type': 'application/json',
        Allow: [...new Set(matching.map((candidate) => candidate.route.method))].join(', '),
      },
    });
  }

  const ctx: RouteContext = {
    request,
    params: selected.match.slice(1),
    deps,
    requestId,
    signal: request.signal,
  };

  try {
    return await selected.route.handle(ctx);
  } catch (error) {
    if (error instanceof GenerationCancelledError) {
      safeLog.info('[GenerateAPI] Client disconnected', { requestId, path });
      return jsonResponse(
        { success: false, error: createGenerationError('INTERNAL_ERROR', 'Request cancelled by client') },
        CLIENT_CLOSED_REQUEST
      );
    }
    safeLog.error('[GenerateAPI] Unhandled error', {
      requestId,
      path,
      error: error instanceof Error ? error.message : String(error),
    });
    return jsonResponse(
      { success: false, error: createGenerationError('INTERNAL_ERROR', 'Internal server error'), request_id: requestId },
      500
    );
  }
}
