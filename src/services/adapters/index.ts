/**
 * Schema adapters: one pure function per request variant.
 */

import type { GenerationRequest } from '../../schemas/elements';
import type { ConvertedConstraints } from '../grid-converter';
import { adaptChartRequest } from './chart';
import { adaptDiagramRequest } from './diagram';
import { adaptImageRequest } from './image';
import { adaptInfographicRequest } from './infographic';
import { adaptTableRequest, adaptTableTransformRequest } from './table';
import { adaptTextAutofitRequest, adaptTextRequest, adaptTextTransformRequest } from './text';
import type { BackendRequest } from './types';

export type { BackendRequest } from './types';
export { adaptTableAnalyzeRequest } from './table';

export function adaptRequest(request: GenerationRequest, constraints: ConvertedConstraints): BackendRequest {
  switch (request.kind) {
    case 'chart':
      return adaptChartRequest(request.payload, constraints);
    case 'diagram':
      return adaptDiagramRequest(request.payload, constraints);
    case 'text':
      return adaptTextRequest(request.payload, constraints);
    case 'text_transform':
      return adaptTextTransformRequest(request.payload, constraints);
    case 'text_autofit':
      return adaptTextAutofitRequest(request.payload, constraints);
    case 'table':
      return adaptTableRequest(request.payload, constraints);
    case 'table_transform':
      return adaptTableTransformRequest(request.payload, constraints);
    case 'image':
      return adaptImageRequest(request.payload, constraints);
    case 'infographic':
      return adaptInfographicRequest(request.payload, constraints);
  }
}
