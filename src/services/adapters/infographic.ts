/**
 * Infographic adapter (illustrator service, API v1.0)
 *
 * Sized on the 32x18 grid. The backend calls the type field `type`.
 */

import type { InfographicRequest } from '../../schemas/elements';
import type { ConvertedConstraints, GridUnits } from '../grid-converter';
import { elementIds, type BackendRequest, type ElementIds } from './types';

export const INFOGRAPHIC_API_VERSION = '1.0';

export interface InfographicBackendBody extends ElementIds {
  prompt: string;
  type: string;
  context: {
    presentationTitle: string;
    slideIndex: number;
    slideTitle?: string;
    presentationTheme?: string;
    brandColors?: string[];
    industry?: string;
  };
  constraints: GridUnits;
  style: {
    colorScheme: string;
    iconStyle: string;
    density: 'balanced';
    orientation: 'auto';
  };
  contentOptions: {
    includeIcons: boolean;
    includeDescriptions: boolean;
    includeNumbers: boolean;
    itemCount?: number;
  };
  items?: Array<Record<string, unknown>>;
}

export function adaptInfographicRequest(
  request: InfographicRequest,
  constraints: ConvertedConstraints
): BackendRequest<InfographicBackendBody> {
  const { context } = request;
  const hasItems = request.items !== undefined && request.items.length > 0;

  return {
    service: 'infographic',
    endpoint: '/api/ai/illustrator/generate',
    apiVersion: INFOGRAPHIC_API_VERSION,
    body: {
      prompt: request.prompt ?? '',
      type: request.infographic_type,
      ...elementIds(request.element_id, context),
      context: {
        presentationTitle: context.presentation_title,
        slideIndex: context.slide_index,
        slideTitle: context.slide_title,
        presentationTheme: context.presentation_theme,
        brandColors: context.brand_colors,
        industry: context.industry,
      },
      constraints: constraints.infographic,
      style: {
        colorScheme: request.color_scheme,
        iconStyle: request.icon_style,
        density: 'balanced',
        orientation: 'auto',
      },
      contentOptions: {
        includeIcons: true,
        includeDescriptions: true,
        includeNumbers: false,
        itemCount: request.item_count ?? (hasItems ? request.items?.length : undefined),
      },
      items: hasItems ? request.items : undefined,
    },
  };
}
