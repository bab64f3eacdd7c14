import { describe, it, expect } from 'vitest';
import { adaptTextAutofitRequest, adaptTextRequest, adaptTextTransformRequest } from './text';
import {
  TextAutofitRequestSchema,
  TextRequestSchema,
  TextTransformRequestSchema,
} from '../../schemas/elements';
import { convertGridSpan } from '../grid-converter';

const CONSTRAINTS = convertGridSpan({ columns: 8, rows: 6 }, { pxPerCol: 80, pxPerRow: 77 });

const BASE = {
  element_id: 'text-2',
  context: {
    presentation_id: 'pres-1',
    presentation_title: 'Onboarding',
    slide_id: 'slide-1',
    slide_index: 0,
    slide_count: 12,
    presentation_theme: 'corporate',
  },
  position: { grid_row: '2/8', grid_column: '3/11' },
};

describe('adaptTextRequest', () => {
  it('should always forward slideCount', () => {
    const adapted = adaptTextRequest(TextRequestSchema.parse({ ...BASE, prompt: 'Welcome message' }), CONSTRAINTS);

    expect(adapted.service).toBe('text_table');
    expect(adapted.endpoint).toBe('/api/ai/text/generate');
    expect(adapted.apiVersion).toBe('1.2');
    expect(adapted.body).toEqual({
      prompt: 'Welcome message',
      presentationId: 'pres-1',
      slideId: 'slide-1',
      elementId: 'text-2',
      context: {
        presentationTitle: 'Onboarding',
        slideIndex: 0,
        slideCount: 12,
        presentationTheme: 'corporate',
      },
      constraints: { gridWidth: 4, gridHeight: 3 },
      options: { tone: 'professional', format: 'paragraph', language: 'en' },
    });
  });

  it('should default slideCount to 1', () => {
    const { context, ...rest } = BASE;
    const { slide_count: _ignored, ...contextWithoutCount } = context;
    const adapted = adaptTextRequest(
      TextRequestSchema.parse({ ...rest, context: contextWithoutCount, prompt: 'Hi' }),
      CONSTRAINTS
    );

    expect(adapted.body.context.slideCount).toBe(1);
  });

  it('should forward maxWords when set', () => {
    const adapted = adaptTextRequest(
      TextRequestSchema.parse({ ...BASE, prompt: 'Summary', max_words: 50, tone: 'casual', format: 'bullets' }),
      CONSTRAINTS
    );

    expect(adapted.body.options).toEqual({ tone: 'casual', format: 'bullets', language: 'en', maxWords: 50 });
  });
});

describe('adaptTextTransformRequest', () => {
  it('should send sourceContent and omit empty options', () => {
    const adapted = adaptTextTransformRequest(
      TextTransformRequestSchema.parse({ ...BASE, source_content: '<p>Long text</p>', transformation: 'condense' }),
      CONSTRAINTS
    );

    expect(adapted.endpoint).toBe('/api/ai/text/transform');
    expect(adapted.body.sourceContent).toBe('<p>Long text</p>');
    expect(adapted.body.transformation).toBe('condense');
    expect(adapted.body.options).toBeUndefined();
  });

  it('should pass translation options', () => {
    const adapted = adaptTextTransformRequest(
      TextTransformRequestSchema.parse({
        ...BASE,
        source_content: '<p>Hello</p>',
        transformation: 'translate',
        target_language: 'de',
        intensity: 0.5,
      }),
      CONSTRAINTS
    );

    expect(adapted.body.options).toEqual({ targetLanguage: 'de', intensity: 0.5 });
  });
});

describe('adaptTextAutofitRequest', () => {
  it('should fit into the grid with smart condensing', () => {
    const adapted = adaptTextAutofitRequest(
      TextAutofitRequestSchema.parse({ ...BASE, source_content: '<p>Long</p>', target_characters: 200 }),
      CONSTRAINTS
    );

    expect(adapted.endpoint).toBe('/api/ai/text/autofit');
    expect(adapted.body).toEqual({
      content: '<p>Long</p>',
      presentationId: 'pres-1',
      slideId: 'slide-1',
      elementId: 'text-2',
      targetFit: { gridWidth: 4, gridHeight: 3, maxCharacters: 200 },
      strategy: 'smart_condense',
      preserveFormatting: true,
    });
  });
});
