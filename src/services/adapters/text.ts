/**
 * Text adapters (text & table service, API v1.2): generate, transform, autofit
 */

import type { TextAutofitRequest, TextRequest, TextTransformRequest } from '../../schemas/elements';
import type { ConvertedConstraints, GridUnits } from '../grid-converter';
import { elementIds, slideContext, type BackendRequest, type ElementIds, type SlideContext } from './types';

export const TEXT_API_VERSION = '1.2';

export interface TextBackendBody extends ElementIds {
  prompt: string;
  context: SlideContext;
  constraints: GridUnits;
  options: {
    tone: string;
    format: string;
    language: string;
    maxWords?: number;
  };
}

export interface TextTransformBackendBody extends ElementIds {
  sourceContent: string;
  transformation: string;
  context: SlideContext;
  constraints: GridUnits;
  options?: {
    targetLanguage?: string;
    intensity?: number;
  };
}

export interface TextAutofitBackendBody extends ElementIds {
  content: string;
  targetFit: GridUnits & { maxCharacters?: number };
  strategy: 'smart_condense';
  preserveFormatting: boolean;
}

export function adaptTextRequest(
  request: TextRequest,
  constraints: ConvertedConstraints
): BackendRequest<TextBackendBody> {
  return {
    service: 'text_table',
    endpoint: '/api/ai/text/generate',
    apiVersion: TEXT_API_VERSION,
    body: {
      prompt: request.prompt ?? '',
      ...elementIds(request.element_id, request.context),
      context: slideContext(request.context),
      constraints: constraints.standard,
      options: {
        tone: request.tone,
        format: request.format,
        language: request.language,
        maxWords: request.max_words,
      },
    },
  };
}

export function adaptTextTransformRequest(
  request: TextTransformRequest,
  constraints: ConvertedConstraints
): BackendRequest<TextTransformBackendBody> {
  const body: TextTransformBackendBody = {
    sourceContent: request.source_content,
    transformation: request.transformation,
    ...elementIds(request.element_id, request.context),
    context: slideContext(request.context),
    constraints: constraints.standard,
  };

  if (request.target_language !== undefined || request.intensity !== undefined) {
    body.options = {
      targetLanguage: request.target_language,
      intensity: request.intensity,
    };
  }

  return {
    service: 'text_table',
    endpoint: '/api/ai/text/transform',
    apiVersion: TEXT_API_VERSION,
    body,
  };
}

export function adaptTextAutofitRequest(
  request: TextAutofitRequest,
  constraints: ConvertedConstraints
): BackendRequest<TextAutofitBackendBody> {
  return {
    service: 'text_table',
    endpoint: '/api/ai/text/autofit',
    apiVersion: TEXT_API_VERSION,
    body: {
      content: request.source_content,
      ...elementIds(request.element_id, request.context),
      targetFit: {
        ...constraints.standard,
        maxCharacters: request.target_characters,
      },
      strategy: 'smart_condense',
      preserveFormatting: request.preserve_structure,
    },
  };
}
