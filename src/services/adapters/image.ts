/**
 * Image adapter (image service, API v2.0)
 */

import type { ImageRequest } from '../../schemas/elements';
import type { ConvertedConstraints, GridUnits } from '../grid-converter';
import { elementIds, type BackendRequest, type ElementIds } from './types';

export const IMAGE_API_VERSION = '2.0';

export interface ImageBackendBody extends ElementIds {
  prompt: string;
  context: {
    presentationTitle: string;
    slideIndex: number;
    slideTitle?: string;
    presentationTheme?: string;
    brandColors?: string[];
  };
  config: {
    style: string;
    aspectRatio: string;
    quality: string;
  };
  constraints: GridUnits;
  options?: {
    negativePrompt?: string;
    seed?: number;
  };
}

export function adaptImageRequest(
  request: ImageRequest,
  constraints: ConvertedConstraints
): BackendRequest<ImageBackendBody> {
  const { context } = request;
  const body: ImageBackendBody = {
    prompt: request.prompt ?? '',
    ...elementIds(request.element_id, context),
    context: {
      presentationTitle: context.presentation_title,
      slideIndex: context.slide_index,
      slideTitle: context.slide_title,
      presentationTheme: context.presentation_theme,
      brandColors: context.brand_colors,
    },
    config: {
      style: request.style,
      aspectRatio: request.aspect_ratio,
      quality: request.quality,
    },
    constraints: constraints.standard,
  };

  if (request.negative_prompt !== undefined || request.seed !== undefined) {
    body.options = {
      negativePrompt: request.negative_prompt,
      seed: request.seed,
    };
  }

  return {
    service: 'image',
    endpoint: '/api/ai/image/generate',
    apiVersion: IMAGE_API_VERSION,
    body,
  };
}
