import type { BackendService } from '../backend-errors';
import type { ElementContext } from '../../schemas/elements';

/**
 * A backend-native request. Never leaves the orchestrator in this form;
 * the dispatcher turns it into an HTTP call.
 */
export interface BackendRequest<TBody extends object = object> {
  service: BackendService;
  /** Path on the service's base URL */
  endpoint: string;
  /** Sent as X-API-Version */
  apiVersion: string;
  body: TBody;
}

/** Identifiers every generation backend takes at the top level */
export interface ElementIds {
  presentationId: string;
  slideId: string;
  elementId: string;
}

export function elementIds(elementId: string, context: ElementContext): ElementIds {
  return {
    presentationId: context.presentation_id,
    slideId: context.slide_id,
    elementId,
  };
}

export interface SlideContext {
  presentationTitle: string;
  slideIndex: number;
  slideCount: number;
  presentationTheme?: string;
  slideTitle?: string;
}

/** Context block shared by the text and table backends */
export function slideContext(context: ElementContext): SlideContext {
  return {
    presentationTitle: context.presentation_title,
    slideIndex: context.slide_index,
    slideCount: context.slide_count,
    presentationTheme: context.presentation_theme,
    slideTitle: context.slide_title,
  };
}
