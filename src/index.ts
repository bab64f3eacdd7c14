/**
 * Visual Elements Orchestrator
 *
 * Fetch-style entry point: `createApp(config).fetch(request)`.
 * src/server.ts serves it on Node; tests call it directly.
 */

import { randomUUID } from 'node:crypto';
import descriptor from './data/service-descriptor.json';
import type { OrchestratorConfig } from './config';
import { handleGenerateAPI } from './handlers/generate-api';
import { handleHealthCheck, SERVICE_VERSION } from './handlers/health';
import { jsonResponse } from './schemas/validation-helper';
import { BackendDispatcher } from './services/backend-dispatcher';
import type { Clock } from './services/diagram-job-poller';
import { GenerationPipeline } from './services/generation-pipeline';
import { LayoutClient } from './services/layout-client';
import { MetadataCatalog } from './services/metadata-catalog';
import { handlePreflight, withCors } from './utils/cors';
import type { FetchLike } from './utils/fetch-with-timeout';
import { getSafeRequestIdentifier, safeLog } from './utils/log-sanitizer';

export interface AppOptions {
  /** Outbound HTTP for every backend and the Layout Service */
  fetch?: FetchLike;
  clock?: Clock;
}

export interface App {
  fetch(request: Request): Promise<Response>;
}

const REQUEST_ID_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

function requestIdFor(request: Request): string {
  const supplied = request.headers.get('X-Request-ID');
  return supplied && REQUEST_ID_PATTERN.test(supplied) ? supplied : randomUUID();
}

export function createApp(config: OrchestratorConfig, options: AppOptions = {}): App {
  const dispatcher = new BackendDispatcher(config, { fetch: options.fetch, clock: options.clock });
  const layout = new LayoutClient(config, { fetch: options.fetch });
  const pipeline = new GenerationPipeline(config, { dispatcher, layout });
  const catalog = new MetadataCatalog(dispatcher);

  async function route(request: Request, requestId: string): Promise<Response> {
    const url = new URL(request.url);
    const path = url.pathname;

    if (request.method === 'OPTIONS') {
      return handlePreflight(request, config.corsOrigins);
    }

    if (path === '/health') {
      return handleHealthCheck(request, { config, layout });
    }

    if (path === '/') {
      return jsonResponse({ ...descriptor, version: SERVICE_VERSION });
    }

    if (path.startsWith('/api/generate/')) {
      return handleGenerateAPI(request, path, { config, pipeline, catalog }, requestId);
    }

    return jsonResponse({ error: 'Not found' }, 404);
  }

  return {
    async fetch(request: Request): Promise<Response> {
      const requestId = requestIdFor(request);
      const started = Date.now();

      let response: Response;
      try {
        response = await route(request, requestId);
      } catch (error) {
        safeLog.error(`[${requestId}] Error:`, { error: String(error), path: new URL(request.url).pathname });
        response = jsonResponse({ error: 'Internal server error', requestId }, 500);
      }

      safeLog.info('[Request]', {
        requestId,
        route: getSafeRequestIdentifier(request),
        status: response.status,
        durationMs: Date.now() - started,
      });

      const final = withCors(response, request, config.corsOrigins);
      final.headers.set('X-Request-ID', requestId);
      return final;
    },
  };
}
