/**
 * Layout Service Client
 *
 * Upserts generated artifacts into a presentation slide. Injection is
 * keyed by (presentation, slide, element): repeating it replaces the
 * element instead of adding a second one.
 *
 * Layout Service API:
 *   GET /api/presentations/{id}
 *   PUT /api/presentations/{id}/slides/{index}?created_by=...
 *   GET /health
 *
 * Never throws. Failures come back as `{ success: false, error }`.
 */

import { z } from 'zod';
import type { OrchestratorConfig } from '../config';
import type { ElementType, GenerationSuccess } from '../types';
import type { GenerationRequest, GridPosition } from '../schemas/elements';
import { elementTypeOf } from '../schemas/elements';
import { safeLog } from '../utils/log-sanitizer';
import {
  defaultFetch,
  fetchWithTimeout,
  parseJsonBody,
  RequestTimeoutError,
  type FetchedBody,
  type FetchLike,
} from '../utils/fetch-with-timeout';
import { GenerationCancelledError } from './backend-errors';

// ============================================================================
// Types
// ============================================================================

export type LayoutCollection = 'charts' | 'diagrams' | 'text_boxes' | 'images' | 'infographics';

export const COLLECTION_BY_TYPE: Record<ElementType, LayoutCollection> = {
  chart: 'charts',
  diagram: 'diagrams',
  text: 'text_boxes',
  table: 'text_boxes',
  image: 'images',
  infographic: 'infographics',
};

export interface InjectionTarget {
  presentationId: string;
  slideId: string;
  /** Used when no slide carries `slideId` */
  slideIndex: number;
  elementId: string;
  position: GridPosition;
}

export interface InjectionParams extends InjectionTarget {
  elementType: ElementType;
  content: Record<string, unknown>;
}

export type InjectionResult = { success: true; slideIndex: number } | { success: false; error: string };

export interface LayoutHealth {
  status: 'healthy' | 'unhealthy';
  url: string;
  error?: string;
}

export interface LayoutClientOptions {
  fetch?: FetchLike;
}

const HEALTH_TIMEOUT_MS = 5_000;

const SlideSchema = z.record(z.unknown());

const PresentationSchema = z
  .object({
    slides: z.array(SlideSchema).default([]),
  })
  .passthrough();

const ElementArraySchema = z.array(z.record(z.unknown()));

class LayoutRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutRequestError';
  }
}

// ============================================================================
// Client
// ============================================================================

export class LayoutClient {
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;

  constructor(
    private readonly config: OrchestratorConfig,
    options: LayoutClientOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.baseUrl = config.services.layout;
  }

  async inject(params: InjectionParams, signal?: AbortSignal): Promise<InjectionResult> {
    const collection = COLLECTION_BY_TYPE[params.elementType];

    try {
      const presentation = await this.getPresentation(params.presentationId, signal);
      const slideIndex = locateSlide(presentation.slides, params.slideId, params.slideIndex);
      if (slideIndex === undefined) {
        const last = presentation.slides.length - 1;
        return { success: false, error: `Slide index ${params.slideIndex} out of range (0-${last})` };
      }

      const slide = presentation.slides[slideIndex];
      const existing = ElementArraySchema.safeParse(slide[collection]);
      const elements = upsertElement(existing.success ? existing.data : [], params);

      await this.updateSlide(
        params.presentationId,
        slideIndex,
        { [collection]: elements },
        `orchestrator-${params.elementType}`,
        signal
      );

      safeLog.info('[Layout] Element injected', {
        presentationId: params.presentationId,
        slideIndex,
        elementId: params.elementId,
        collection,
      });
      return { success: true, slideIndex };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      safeLog.warn('[Layout] Injection failed', {
        presentationId: params.presentationId,
        elementId: params.elementId,
        error: message,
      });
      return { success: false, error: message };
    }
  }

  async checkHealth(): Promise<LayoutHealth> {
    try {
      const fetched = await fetchWithTimeout(this.fetchImpl, `${this.baseUrl}/health`, { method: 'GET' }, HEALTH_TIMEOUT_MS);
      if (!fetched.ok) {
        return { status: 'unhealthy', url: this.baseUrl, error: `HTTP ${fetched.status}` };
      }
      return { status: 'healthy', url: this.baseUrl };
    } catch (error) {
      safeLog.warn('[Layout] Health check failed', { error });
      return {
        status: 'unhealthy',
        url: this.baseUrl,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async getPresentation(presentationId: string, signal?: AbortSignal) {
    const fetched = await this.request(`/api/presentations/${encodeURIComponent(presentationId)}`, { method: 'GET' }, signal);
    if (fetched.status === 404) {
      throw new LayoutRequestError(`Presentation ${presentationId} not found`);
    }
    if (!fetched.ok) {
      throw new LayoutRequestError(`Layout service error: ${fetched.status}`);
    }

    const parsed = PresentationSchema.safeParse(parseJsonBody(fetched.text));
    if (!parsed.success) {
      throw new LayoutRequestError(`Presentation ${presentationId} has an unexpected shape`);
    }
    return parsed.data;
  }

  private async updateSlide(
    presentationId: string,
    slideIndex: number,
    updates: Record<string, unknown>,
    createdBy: string,
    signal?: AbortSignal
  ): Promise<void> {
    const query = new URLSearchParams({ created_by: createdBy });
    const fetched = await this.request(
      `/api/presentations/${encodeURIComponent(presentationId)}/slides/${slideIndex}?${query.toString()}`,
      {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(updates),
      },
      signal
    );
    if (!fetched.ok) {
      throw new LayoutRequestError(declaredDetail(fetched) ?? `Layout service error: ${fetched.status}`);
    }
  }

  private async request(path: string, init: RequestInit, signal?: AbortSignal): Promise<FetchedBody> {
    const timeoutMs = this.config.serviceTimeoutMs;
    try {
      return await fetchWithTimeout(this.fetchImpl, `${this.baseUrl}${path}`, init, timeoutMs, signal);
    } catch (error) {
      if (error instanceof GenerationCancelledError) {
        throw new LayoutRequestError('Injection cancelled');
      }
      if (error instanceof RequestTimeoutError) {
        throw new LayoutRequestError(`Layout service did not respond within ${Math.round(timeoutMs / 1000)}s`);
      }
      throw new LayoutRequestError('Unable to connect to Layout service');
    }
  }
}

// ============================================================================
// Slide helpers
// ============================================================================

export function locateSlide(
  slides: ReadonlyArray<Record<string, unknown>>,
  slideId: string,
  fallbackIndex: number
): number | undefined {
  const byId = slides.findIndex((slide) => slide.id === slideId || slide.slide_id === slideId);
  if (byId >= 0) {
    return byId;
  }
  return fallbackIndex >= 0 && fallbackIndex < slides.length ? fallbackIndex : undefined;
}

/** Replace the element with the same id, or append a new one */
export function upsertElement(
  elements: ReadonlyArray<Record<string, unknown>>,
  params: Pick<InjectionParams, 'elementId' | 'content' | 'position'>
): Array<Record<string, unknown>> {
  const index = elements.findIndex((element) => element.id === params.elementId);
  if (index < 0) {
    return [...elements, { id: params.elementId, ...params.content, position: params.position }];
  }
  return elements.map((element, i) =>
    i === index ? { ...element, ...params.content, position: params.position } : element
  );
}

function declaredDetail(fetched: FetchedBody): string | undefined {
  const body = parseJsonBody(fetched.text);
  if (typeof body === 'object' && body !== null && 'detail' in body && typeof body.detail === 'string') {
    return body.detail;
  }
  return undefined;
}

// ============================================================================
// Injection content per element type
// ============================================================================

function compact(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

/**
 * Fields written onto the slide element for a successful generation.
 */
export function injectionContent(request: GenerationRequest, response: GenerationSuccess): Record<string, unknown> {
  switch (request.kind) {
    case 'chart':
      return compact({ chart_config: response.chart_config, chart_type: request.payload.chart_type });
    case 'diagram':
      return compact({
        svg_content: response.svg_content,
        mermaid_code: response.metadata?.mermaid_code,
        diagram_type: request.payload.diagram_type,
      });
    case 'text':
    case 'text_transform':
    case 'text_autofit':
    case 'table':
    case 'table_transform':
      return compact({ content: response.html_content });
    case 'image':
      return compact({ image_url: response.image_url, alt_text: request.payload.prompt });
    case 'infographic':
      return compact({
        svg_content: response.svg_content ?? response.html_content,
        infographic_type: request.payload.infographic_type,
        items: request.payload.items,
      });
  }
}

/** Injection parameters for a request whose generation succeeded */
export function injectionParams(request: GenerationRequest, response: GenerationSuccess): InjectionParams {
  const { context, position, element_id } = request.payload;
  return {
    presentationId: context.presentation_id,
    slideId: context.slide_id,
    slideIndex: context.slide_index,
    elementId: element_id,
    position,
    elementType: elementTypeOf(request),
    content: injectionContent(request, response),
  };
}
