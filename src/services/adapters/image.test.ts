import { describe, it, expect } from 'vitest';
import { adaptImageRequest } from './image';
import { ImageRequestSchema } from '../../schemas/elements';
import { convertGridSpan } from '../grid-converter';

const CONSTRAINTS = convertGridSpan({ columns: 10, rows: 7 }, { pxPerCol: 80, pxPerRow: 77 });

function parse(overrides: Record<string, unknown> = {}) {
  return ImageRequestSchema.parse({
    element_id: 'image-1',
    context: {
      presentation_id: 'pres-1',
      presentation_title: 'Launch',
      slide_id: 'slide-1',
      slide_index: 0,
      brand_colors: ['#0F172A'],
    },
    position: { grid_row: '1/8', grid_column: '1/11' },
    prompt: 'Rocket on a launch pad at dawn',
    ...overrides,
  });
}

describe('adaptImageRequest', () => {
  it('should apply default style, quality and aspect ratio', () => {
    const adapted = adaptImageRequest(parse(), CONSTRAINTS);

    expect(adapted.service).toBe('image');
    expect(adapted.endpoint).toBe('/api/ai/image/generate');
    expect(adapted.apiVersion).toBe('2.0');
    expect(adapted.body.config).toEqual({ style: 'realistic', aspectRatio: '16:9', quality: 'standard' });
    expect(adapted.body.constraints).toEqual({ gridWidth: 5, gridHeight: 4 });
    expect(adapted.body.context.brandColors).toEqual(['#0F172A']);
    expect(adapted.body.options).toBeUndefined();
  });

  it('should pass negative prompt and seed as options', () => {
    const adapted = adaptImageRequest(parse({ negative_prompt: 'text, watermark', seed: 42 }), CONSTRAINTS);

    expect(adapted.body.options).toEqual({ negativePrompt: 'text, watermark', seed: 42 });
  });
});
