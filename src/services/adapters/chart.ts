/**
 * Chart adapter (analytics service, API v3.0)
 */

import type { ChartRequest } from '../../schemas/elements';
import type { ConvertedConstraints, GridUnits } from '../grid-converter';
import { elementIds, type BackendRequest, type ElementIds } from './types';

export const CHART_API_VERSION = '3.0';

export interface ChartBackendBody extends ElementIds {
  prompt: string;
  chartType: string;
  context: {
    presentationTitle: string;
    slideIndex: number;
    slideTitle?: string;
    industry?: string;
    timeFrame?: string;
  };
  constraints: GridUnits;
  style: {
    palette: string;
    showLegend: boolean;
    showDataLabels: boolean;
    legendPosition?: string;
  };
  data?: Array<{ label: string; value: number }>;
  generateData?: boolean;
  axes?: {
    xLabel?: string;
    yLabel?: string;
    stacked?: boolean;
  };
}

export function adaptChartRequest(
  request: ChartRequest,
  constraints: ConvertedConstraints
): BackendRequest<ChartBackendBody> {
  const { context } = request;
  const body: ChartBackendBody = {
    prompt: request.prompt ?? '',
    chartType: request.chart_type,
    ...elementIds(request.element_id, context),
    context: {
      presentationTitle: context.presentation_title,
      slideIndex: context.slide_index,
      slideTitle: context.slide_title,
      industry: context.industry,
      timeFrame: context.time_frame,
    },
    constraints: constraints.standard,
    style: {
      palette: request.palette,
      showLegend: request.show_legend,
      showDataLabels: request.show_data_labels,
      legendPosition: request.legend_position,
    },
  };

  // Explicit data wins; generateData is only sent when there is none
  if (request.data && request.data.length > 0) {
    body.data = request.data.map(({ label, value }) => ({ label, value }));
  } else {
    body.generateData = request.generate_data;
  }

  if (request.x_label || request.y_label || request.stacked) {
    body.axes = {
      xLabel: request.x_label,
      yLabel: request.y_label,
      stacked: request.stacked || undefined,
    };
  }

  return {
    service: 'chart',
    endpoint: '/api/ai/chart/generate',
    apiVersion: CHART_API_VERSION,
    body,
  };
}
