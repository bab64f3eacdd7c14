/**
 * Diagram adapter (diagram service, API v3.0)
 *
 * This backend speaks snake_case at the top level, takes `content` instead of
 * `prompt`, and sizes output in pixels. Layout direction has no field of its
 * own, so a non-default direction is appended to the content.
 */

import type { DiagramRequest } from '../../schemas/elements';
import type { ConvertedConstraints } from '../grid-converter';
import type { BackendRequest } from './types';

export const DIAGRAM_API_VERSION = '3.0';

export const DIAGRAM_THEME_DEFAULTS = {
  primaryColor: '#3B82F6',
  colorScheme: 'complementary',
  backgroundColor: '#FFFFFF',
  textColor: '#1F2937',
  fontFamily: 'Inter, system-ui, sans-serif',
} as const;

export interface DiagramBackendBody {
  content: string;
  diagram_type: string;
  data_points: unknown[];
  theme: {
    primaryColor: string;
    secondaryColor?: string;
    colorScheme: string;
    backgroundColor: string;
    textColor: string;
    fontFamily: string;
    style: string;
    useSmartTheming: boolean;
  };
  constraints: {
    maxWidth: number;
    maxHeight: number;
    orientation: 'landscape' | 'portrait';
    complexity: string;
    aspectRatio: string;
    animationEnabled: boolean;
  };
  correlation_id: string;
  session_id: string;
  user_id: string;
}

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

/** "16:9" style ratio reduced by the greatest common divisor */
export function aspectRatio(width: number, height: number): string {
  const divisor = gcd(width, height) || 1;
  return `${width / divisor}:${height / divisor}`;
}

function buildContent(request: DiagramRequest): string {
  const parts: string[] = [];
  if (request.prompt && request.prompt.trim().length > 0) {
    parts.push(request.prompt);
  }
  if (request.direction !== 'TB') {
    parts.push(`Layout direction: ${request.direction}`);
  }
  if (request.mermaid_code) {
    parts.push(`Mermaid code:\n${request.mermaid_code}`);
  }
  return parts.join('\n\n');
}

export function adaptDiagramRequest(
  request: DiagramRequest,
  constraints: ConvertedConstraints
): BackendRequest<DiagramBackendBody> {
  const { maxWidth, maxHeight } = constraints.diagram;
  const brandColors = request.context.brand_colors ?? [];

  return {
    service: 'diagram',
    endpoint: '/api/ai/diagram/generate',
    apiVersion: DIAGRAM_API_VERSION,
    body: {
      content: buildContent(request),
      diagram_type: request.diagram_type.toLowerCase().replace(/-/g, '_'),
      data_points: [],
      theme: {
        ...DIAGRAM_THEME_DEFAULTS,
        primaryColor: brandColors[0] ?? DIAGRAM_THEME_DEFAULTS.primaryColor,
        secondaryColor: brandColors[1],
        style: request.theme,
        useSmartTheming: true,
      },
      constraints: {
        maxWidth,
        maxHeight,
        orientation: maxWidth > maxHeight ? 'landscape' : 'portrait',
        complexity: request.complexity,
        aspectRatio: aspectRatio(maxWidth, maxHeight),
        animationEnabled: false,
      },
      correlation_id: request.element_id,
      session_id: request.context.presentation_id,
      user_id: request.context.slide_id,
    },
  };
}
