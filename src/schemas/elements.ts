/**
 * Request schemas for element generation
 *
 * Field names are the frontend's snake_case contract. Structural checks only;
 * business rules (grid minimums, data presence) live in the request validator.
 */

import { z } from 'zod';
import type { ElementType } from '../types';

// ============================================================================
// Enumerations
// ============================================================================

export const CHART_TYPES = [
  'bar', 'line', 'pie', 'doughnut', 'area', 'scatter', 'radar', 'polarArea', 'bubble', 'treemap',
] as const;
export const CHART_PALETTES = [
  'default', 'professional', 'vibrant', 'pastel', 'monochrome', 'sequential', 'diverging', 'categorical',
] as const;
export const LEGEND_POSITIONS = ['top', 'bottom', 'left', 'right'] as const;

export const DIAGRAM_TYPES = [
  'flowchart', 'sequence', 'class', 'state', 'er', 'gantt', 'userjourney', 'gitgraph', 'mindmap', 'pie', 'timeline',
] as const;
export const DIAGRAM_DIRECTIONS = ['TB', 'BT', 'LR', 'RL'] as const;
export const DIAGRAM_THEMES = ['default', 'dark', 'forest', 'neutral', 'base'] as const;
export const DIAGRAM_COMPLEXITIES = ['simple', 'moderate', 'detailed'] as const;

export const TEXT_TONES = ['professional', 'conversational', 'academic', 'persuasive', 'casual', 'technical'] as const;
export const TEXT_FORMATS = ['paragraph', 'bullets', 'numbered', 'headline', 'quote', 'mixed'] as const;
export const TEXT_TRANSFORMATIONS = [
  'expand', 'condense', 'simplify', 'formalize', 'casualize', 'bulletize', 'paragraphize', 'rephrase', 'proofread', 'translate',
] as const;

export const TABLE_PRESETS = ['minimal', 'bordered', 'striped', 'modern', 'professional', 'colorful'] as const;
export const TABLE_TRANSFORMATIONS = [
  'add_column', 'add_row', 'remove_column', 'remove_row', 'sort', 'summarize', 'transpose', 'expand', 'merge_cells', 'split_column',
] as const;
export const TABLE_ANALYSIS_TYPES = ['summary', 'trends', 'statistics'] as const;

export const IMAGE_STYLES = ['realistic', 'illustration', 'abstract', 'minimal', 'photo'] as const;
export const IMAGE_QUALITIES = ['draft', 'standard', 'high', 'ultra'] as const;
export const IMAGE_ASPECT_RATIOS = ['1:1', '16:9', '9:16', '21:9', '4:3'] as const;

export const INFOGRAPHIC_TEMPLATE_TYPES = [
  'pyramid', 'funnel', 'concentric_circles', 'concept_spread', 'venn', 'comparison',
] as const;
export const INFOGRAPHIC_DYNAMIC_TYPES = [
  'timeline', 'process', 'statistics', 'hierarchy', 'list', 'cycle', 'matrix', 'roadmap',
] as const;
export const INFOGRAPHIC_TYPES = [...INFOGRAPHIC_TEMPLATE_TYPES, ...INFOGRAPHIC_DYNAMIC_TYPES] as const;
export const INFOGRAPHIC_COLOR_SCHEMES = ['professional', 'vibrant', 'pastel', 'monochrome', 'warm', 'cool'] as const;
export const INFOGRAPHIC_ICON_STYLES = ['outlined', 'filled', 'duotone', 'minimal'] as const;

// ============================================================================
// Shared pieces
// ============================================================================

/** Optional field that also accepts an explicit null */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);
}

export const ElementContextSchema = z.object({
  presentation_id: z.string(),
  presentation_title: z.string(),
  slide_id: z.string(),
  slide_index: z.number().int().min(0),
  slide_count: z.number().int().min(1).default(1),
  slide_title: optional(z.string()),
  industry: optional(z.string()),
  time_frame: optional(z.string()),
  presentation_theme: optional(z.string()),
  brand_colors: optional(z.array(z.string())),
});

export type ElementContext = z.infer<typeof ElementContextSchema>;

export const GridPositionSchema = z.object({
  grid_row: z.string(),
  grid_column: z.string(),
});

export type GridPosition = z.infer<typeof GridPositionSchema>;

const BaseElementSchema = z.object({
  element_id: z.string().min(1, 'element_id is required'),
  context: ElementContextSchema,
  position: GridPositionSchema,
});

const promptField = optional(z.string().max(2000));

// ============================================================================
// Generation requests
// ============================================================================

export const ChartDataPointSchema = z.object({
  label: z.string(),
  value: z.number(),
});

export const ChartRequestSchema = BaseElementSchema.extend({
  prompt: promptField,
  chart_type: z.enum(CHART_TYPES),
  palette: z.enum(CHART_PALETTES).default('default'),
  data: optional(z.array(ChartDataPointSchema)),
  generate_data: z.boolean().default(false),
  show_legend: z.boolean().default(true),
  show_data_labels: z.boolean().default(false),
  legend_position: optional(z.enum(LEGEND_POSITIONS)),
  x_label: optional(z.string()),
  y_label: optional(z.string()),
  stacked: z.boolean().default(false),
});

export type ChartRequest = z.infer<typeof ChartRequestSchema>;

export const DiagramRequestSchema = BaseElementSchema.extend({
  prompt: promptField,
  diagram_type: z.enum(DIAGRAM_TYPES),
  direction: z.enum(DIAGRAM_DIRECTIONS).default('TB'),
  theme: z.enum(DIAGRAM_THEMES).default('default'),
  complexity: z.enum(DIAGRAM_COMPLEXITIES).default('moderate'),
  mermaid_code: optional(z.string()),
});

export type DiagramRequest = z.infer<typeof DiagramRequestSchema>;

export const TextRequestSchema = BaseElementSchema.extend({
  prompt: promptField,
  tone: z.enum(TEXT_TONES).default('professional'),
  format: z.enum(TEXT_FORMATS).default('paragraph'),
  max_words: optional(z.number().int().positive()),
  language: z.string().min(2).default('en'),
});

export type TextRequest = z.infer<typeof TextRequestSchema>;

export const TextTransformRequestSchema = BaseElementSchema.extend({
  source_content: z.string().min(1, 'source_content is required'),
  transformation: z.enum(TEXT_TRANSFORMATIONS),
  target_language: optional(z.string()),
  intensity: optional(z.number().min(0).max(1)),
});

export type TextTransformRequest = z.infer<typeof TextTransformRequestSchema>;

export const TextAutofitRequestSchema = BaseElementSchema.extend({
  source_content: z.string().min(1, 'source_content is required'),
  target_characters: optional(z.number().int().positive()),
  preserve_structure: z.boolean().default(true),
});

export type TextAutofitRequest = z.infer<typeof TextAutofitRequestSchema>;

export const TableRequestSchema = BaseElementSchema.extend({
  prompt: promptField,
  preset: z.enum(TABLE_PRESETS).default('professional'),
  columns: optional(z.number().int().min(1).max(10)),
  rows: optional(z.number().int().min(1).max(20)),
  has_header: z.boolean().default(true),
  data: optional(z.array(z.array(z.string()))),
});

export type TableRequest = z.infer<typeof TableRequestSchema>;

export const TableTransformOptionsSchema = z.object({
  content: optional(z.string()),
  position: optional(z.number().int()),
  column_index: optional(z.number().int().min(0)),
  row_index: optional(z.number().int().min(0)),
  sort_column: optional(z.number().int().min(0)),
  sort_direction: z.enum(['asc', 'desc']).default('asc'),
  summarize_type: optional(z.enum(['sum', 'avg', 'count', 'min', 'max'])),
  summarize_columns: optional(z.array(z.number().int().min(0))),
  focus_area: optional(z.string()),
  cells: optional(z.array(z.record(z.number().int()))),
  split_count: optional(z.number().int().min(2)),
});

export type TableTransformOptions = z.infer<typeof TableTransformOptionsSchema>;

export const TableTransformRequestSchema = BaseElementSchema.extend({
  source_content: z.string().min(1, 'source_content is required'),
  transformation: z.enum(TABLE_TRANSFORMATIONS),
  options: optional(TableTransformOptionsSchema),
});

export type TableTransformRequest = z.infer<typeof TableTransformRequestSchema>;

export const TableAnalyzeRequestSchema = z.object({
  element_id: z.string().min(1, 'element_id is required'),
  context: ElementContextSchema,
  source_content: z.string().min(1, 'source_content is required'),
  analysis_type: z.enum(TABLE_ANALYSIS_TYPES).default('summary'),
});

export type TableAnalyzeRequest = z.infer<typeof TableAnalyzeRequestSchema>;

export const ImageRequestSchema = BaseElementSchema.extend({
  prompt: promptField,
  style: z.enum(IMAGE_STYLES).default('realistic'),
  quality: z.enum(IMAGE_QUALITIES).default('standard'),
  aspect_ratio: z.enum(IMAGE_ASPECT_RATIOS).default('16:9'),
  negative_prompt: optional(z.string()),
  seed: optional(z.number().int()),
});

export type ImageRequest = z.infer<typeof ImageRequestSchema>;

export const InfographicRequestSchema = BaseElementSchema.extend({
  prompt: promptField,
  infographic_type: z.enum(INFOGRAPHIC_TYPES),
  color_scheme: z.enum(INFOGRAPHIC_COLOR_SCHEMES).default('professional'),
  icon_style: z.enum(INFOGRAPHIC_ICON_STYLES).default('outlined'),
  item_count: optional(z.number().int().min(2).max(15)),
  items: optional(z.array(z.record(z.unknown()))),
  generate_data: z.boolean().default(true),
});

export type InfographicRequest = z.infer<typeof InfographicRequestSchema>;

/** Schema of each element type's generate endpoint */
export const ELEMENT_SCHEMAS = {
  chart: ChartRequestSchema,
  diagram: DiagramRequestSchema,
  text: TextRequestSchema,
  table: TableRequestSchema,
  image: ImageRequestSchema,
  infographic: InfographicRequestSchema,
} as const;

// ============================================================================
// Tagged union consumed by the pipeline
// ============================================================================

export type GenerationRequest =
  | { kind: 'chart'; payload: ChartRequest }
  | { kind: 'diagram'; payload: DiagramRequest }
  | { kind: 'text'; payload: TextRequest }
  | { kind: 'text_transform'; payload: TextTransformRequest }
  | { kind: 'text_autofit'; payload: TextAutofitRequest }
  | { kind: 'table'; payload: TableRequest }
  | { kind: 'table_transform'; payload: TableTransformRequest }
  | { kind: 'image'; payload: ImageRequest }
  | { kind: 'infographic'; payload: InfographicRequest };

/** Element type whose slot a request fills on the slide */
export function elementTypeOf(request: GenerationRequest): ElementType {
  switch (request.kind) {
    case 'text_transform':
    case 'text_autofit':
      return 'text';
    case 'table_transform':
      return 'table';
    default:
      return request.kind;
  }
}

// ============================================================================
// Batch
// ============================================================================

export const BatchElementSchema = z.object({
  element_type: z.enum(['chart', 'diagram', 'text', 'table', 'image', 'infographic']),
  element_id: z.string().min(1, 'element_id is required'),
  context: ElementContextSchema,
  position: GridPositionSchema,
  config: z.record(z.unknown()).default({}),
});

export type BatchElement = z.infer<typeof BatchElementSchema>;

export const BatchGenerateRequestSchema = z.object({
  elements: z.array(BatchElementSchema).min(1, 'At least one element is required').max(50),
  parallel: z.boolean().default(true),
});

export type BatchGenerateRequest = z.infer<typeof BatchGenerateRequestSchema>;
