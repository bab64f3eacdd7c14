/**
 * Health Check Endpoint
 *
 * GET /health lists the backend URLs the orchestrator is configured with.
 * `?detailed=true` also probes the Layout Service; an unreachable Layout
 * Service degrades the status since nothing can be injected.
 */

import type { OrchestratorConfig } from '../config';
import type { LayoutClient } from '../services/layout-client';
import { jsonResponse } from '../schemas/validation-helper';
import { safeLog } from '../utils/log-sanitizer';

export const SERVICE_NAME = 'visual-elements-orchestrator';
export const SERVICE_VERSION = '1.0.0';

export interface HealthDeps {
  config: OrchestratorConfig;
  layout: LayoutClient;
}

export async function handleHealthCheck(request: Request, deps: HealthDeps): Promise<Response> {
  const url = new URL(request.url);
  const detailed = url.searchParams.get('detailed') === 'true';
  const { services, environment } = deps.config;

  const base = {
    status: 'healthy',
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    environment,
    timestamp: new Date().toISOString(),
    services: {
      chart: services.chart,
      diagram: services.diagram,
      text_table: services.textTable,
      image: services.image,
      infographic: services.infographic,
      layout: services.layout,
    },
  };

  if (!detailed) {
    return jsonResponse(base);
  }

  const layout = await deps.layout.checkHealth();
  if (layout.status !== 'healthy') {
    safeLog.warn('[Health] Layout Service unhealthy', { url: layout.url, error: layout.error });
  }

  return jsonResponse({
    ...base,
    status: layout.status === 'healthy' ? 'healthy' : 'degraded',
    dependencies: { layout },
  });
}
