import { describe, it, expect } from 'vitest';
import { adaptDiagramRequest, aspectRatio } from './diagram';
import { DiagramRequestSchema } from '../../schemas/elements';
import { convertGridSpan } from '../grid-converter';

const SCALE = { pxPerCol: 80, pxPerRow: 77 };

function parse(overrides: Record<string, unknown> = {}, contextOverrides: Record<string, unknown> = {}) {
  return DiagramRequestSchema.parse({
    element_id: 'diagram-7',
    context: {
      presentation_id: 'pres-1',
      presentation_title: 'Platform Overview',
      slide_id: 'slide-5',
      slide_index: 4,
      ...contextOverrides,
    },
    position: { grid_row: '3/11', grid_column: '2/14' },
    prompt: 'Checkout flow',
    diagram_type: 'flowchart',
    ...overrides,
  });
}

describe('aspectRatio', () => {
  it('should reduce by the greatest common divisor', () => {
    expect(aspectRatio(960, 540)).toBe('16:9');
    expect(aspectRatio(400, 400)).toBe('1:1');
  });
});

describe('adaptDiagramRequest', () => {
  it('should size the diagram in pixels', () => {
    const adapted = adaptDiagramRequest(parse(), convertGridSpan({ columns: 12, rows: 8 }, SCALE));

    expect(adapted.endpoint).toBe('/api/ai/diagram/generate');
    expect(adapted.apiVersion).toBe('3.0');
    expect(adapted.body.constraints).toEqual({
      maxWidth: 960,
      maxHeight: 616,
      orientation: 'landscape',
      complexity: 'moderate',
      aspectRatio: '120:77',
      animationEnabled: false,
    });
  });

  it('should mark tall boxes as portrait', () => {
    const adapted = adaptDiagramRequest(parse(), convertGridSpan({ columns: 4, rows: 10 }, SCALE));

    expect(adapted.body.constraints.orientation).toBe('portrait');
  });

  it('should map identifiers to correlation fields', () => {
    const { body } = adaptDiagramRequest(parse(), convertGridSpan({ columns: 12, rows: 8 }, SCALE));

    expect(body.correlation_id).toBe('diagram-7');
    expect(body.session_id).toBe('pres-1');
    expect(body.user_id).toBe('slide-5');
    expect(body.diagram_type).toBe('flowchart');
    expect(body.data_points).toEqual([]);
  });

  it('should use default theme colors without brand colors', () => {
    const { body } = adaptDiagramRequest(parse({ theme: 'forest' }), convertGridSpan({ columns: 12, rows: 8 }, SCALE));

    expect(body.theme).toEqual({
      primaryColor: '#3B82F6',
      colorScheme: 'complementary',
      backgroundColor: '#FFFFFF',
      textColor: '#1F2937',
      fontFamily: 'Inter, system-ui, sans-serif',
      style: 'forest',
      useSmartTheming: true,
    });
  });

  it('should take primary and secondary colors from the brand palette', () => {
    const { body } = adaptDiagramRequest(
      parse({}, { brand_colors: ['#112233', '#445566', '#778899'] }),
      convertGridSpan({ columns: 12, rows: 8 }, SCALE)
    );

    expect(body.theme.primaryColor).toBe('#112233');
    expect(body.theme.secondaryColor).toBe('#445566');
  });

  it('should keep the prompt as content for the default direction', () => {
    const { body } = adaptDiagramRequest(parse(), convertGridSpan({ columns: 12, rows: 8 }, SCALE));

    expect(body.content).toBe('Checkout flow');
  });

  it('should append direction and mermaid code to the content', () => {
    const { body } = adaptDiagramRequest(
      parse({ direction: 'LR', mermaid_code: 'graph LR\nA-->B' }),
      convertGridSpan({ columns: 12, rows: 8 }, SCALE)
    );

    expect(body.content).toBe('Checkout flow\n\nLayout direction: LR\n\nMermaid code:\ngraph LR\nA-->B');
  });
});
