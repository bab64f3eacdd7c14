/**
 * Metadata Catalog
 *
 * Read-only lookups the frontend uses to build its element pickers. Each one
 * proxies the owning backend and falls back to the bundled catalog when the
 * backend cannot answer; fallback answers carry `_fallback: true`.
 * Nothing is cached between requests.
 */

import catalog from '../data/catalog.json';
import type { GenerationError } from '../types';
import { safeLog } from '../utils/log-sanitizer';
import { BackendDispatcher, type GenerationService } from './backend-dispatcher';
import { BackendHttpError, GenerationCancelledError } from './backend-errors';
import { classifyError } from './error-classifier';
import { mapReportedStatus } from './diagram-job-poller';

export type CatalogBody = Record<string, unknown>;

export type DiagramStatusBody =
  | {
      success: true;
      job_id: string;
      status: 'pending' | 'processing' | 'completed' | 'failed';
      progress?: number;
      mermaid_code?: string;
      svg_content?: string;
      error?: string;
    }
  | { success: false; job_id: string; error: GenerationError };

type DiagramStatusSuccess = Extract<DiagramStatusBody, { success: true }>;

export type CreditsBody = CatalogBody | { success: false; error: GenerationError };

/** Metadata lookups get a shorter budget than generation */
export const METADATA_TIMEOUT_MS = 10_000;

/** Text constraint estimates are computed on the standard 12x8 grid */
const TEXT_GRID = { maxWidth: 12, maxHeight: 8 } as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ============================================================================
// Local catalog
// ============================================================================

export function fallback(body: CatalogBody): CatalogBody {
  return { success: true, ...body, _fallback: true };
}

export function tablePresets(): CatalogBody {
  return { success: true, ...catalog.table };
}

/**
 * Estimated text limits for a grid size, used when the text service is down.
 */
export function estimateTextConstraints(width: number, height: number): CatalogBody {
  const area = width * height;
  return {
    gridWidth: width,
    gridHeight: height,
    maxCharacters: area * 50,
    maxLines: height * 3,
    recommendedFontSize: area > 20 ? '16px' : area > 10 ? '14px' : '12px',
    maxBullets: Math.min(10, height * 2),
  };
}

function imageStylesCatalog(): CatalogBody {
  const { styles, qualities, defaultStyle, defaultQuality } = catalog.image;
  return {
    styles,
    qualities: qualities.map(({ quality, resolution, credits }) => ({ quality, resolution: `${resolution}px`, credits })),
    defaultStyle,
    defaultQuality,
  };
}

function defaultCredits(presentationId: string): CatalogBody {
  const allowance = catalog.image.defaultCreditAllowance;
  return {
    success: true,
    presentationId,
    used: 0,
    remaining: allowance,
    total: allowance,
    qualityCosts: Object.fromEntries(catalog.image.qualities.map(({ quality, credits }) => [quality, credits])),
  };
}

function toStatusLabel(reported: string): 'pending' | 'processing' | 'completed' | 'failed' {
  switch (mapReportedStatus(reported)) {
    case 'pending':
      return 'pending';
    case 'processing':
      return 'processing';
    case 'succeeded':
      return 'completed';
    default:
      return 'failed';
  }
}

// ============================================================================
// Service
// ============================================================================

export class MetadataCatalog {
  constructor(private readonly dispatcher: BackendDispatcher) {}

  chartConstraints(signal?: AbortSignal): Promise<CatalogBody> {
    return this.proxy('chart', '/api/ai/chart/constraints', catalog.chart.constraints, signal);
  }

  chartPalettes(signal?: AbortSignal): Promise<CatalogBody> {
    return this.proxy('chart', '/api/ai/chart/palettes', catalog.chart.palettes, signal);
  }

  diagramTypes(signal?: AbortSignal): Promise<CatalogBody> {
    return this.proxy('diagram', '/api/ai/diagram/types', catalog.diagram, signal);
  }

  infographicTypes(signal?: AbortSignal): Promise<CatalogBody> {
    return this.proxy('infographic', '/api/ai/illustrator/types', catalog.infographic, signal);
  }

  imageStyles(signal?: AbortSignal): Promise<CatalogBody> {
    return this.proxy('image', '/api/ai/image/styles', imageStylesCatalog(), signal);
  }

  textConstraints(width: number, height: number, signal?: AbortSignal): Promise<CatalogBody> {
    const w = clamp(width, 1, TEXT_GRID.maxWidth);
    const h = clamp(height, 1, TEXT_GRID.maxHeight);
    return this.proxy('text_table', `/api/ai/constraints/${w}/${h}`, estimateTextConstraints(w, h), signal);
  }

  /**
   * Image credits for a presentation. An unknown presentation has the
   * default allowance; other failures are classified.
   */
  async imageCredits(presentationId: string, signal?: AbortSignal): Promise<CreditsBody> {
    try {
      const body = await this.dispatcher.requestJson('image', `/api/ai/image/credits/${encodeURIComponent(presentationId)}`, {
        timeoutMs: METADATA_TIMEOUT_MS,
        signal,
      });
      return isRecord(body) ? body : { success: true, presentationId, credits: body };
    } catch (error) {
      if (error instanceof GenerationCancelledError) {
        throw error;
      }
      if (error instanceof BackendHttpError && error.status === 404) {
        return defaultCredits(presentationId);
      }
      return { success: false, error: classifyError(error) };
    }
  }

  /**
   * One status poll of a diagram job, normalized to snake_case.
   */
  async diagramStatus(jobId: string, signal?: AbortSignal): Promise<DiagramStatusBody> {
    try {
      const status = await this.dispatcher.fetchDiagramStatus(jobId, { timeoutMs: METADATA_TIMEOUT_MS, signal });
      const body: DiagramStatusSuccess = { success: true, job_id: jobId, status: toStatusLabel(status.status) };
      if (status.progress !== undefined) {
        body.progress = status.progress;
      }
      if (status.mermaidCode) {
        body.mermaid_code = status.mermaidCode;
      }
      if (status.svgContent) {
        body.svg_content = status.svgContent;
      }
      if (status.error) {
        body.error = status.error;
      }
      return body;
    } catch (error) {
      if (error instanceof GenerationCancelledError) {
        throw error;
      }
      return { success: false, job_id: jobId, error: classifyError(error) };
    }
  }

  private async proxy(
    service: GenerationService,
    path: string,
    local: CatalogBody,
    signal?: AbortSignal
  ): Promise<CatalogBody> {
    try {
      const body = await this.dispatcher.requestJson(service, path, { timeoutMs: METADATA_TIMEOUT_MS, signal });
      if (isRecord(body)) {
        return body;
      }
      safeLog.warn('[Catalog] Unexpected metadata body, using fallback', { service, path });
    } catch (error) {
      if (error instanceof GenerationCancelledError) {
        throw error;
      }
      safeLog.warn('[Catalog] Backend metadata unavailable, using fallback', {
        service,
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return fallback(local);
  }
}
