/**
 * Table adapters (text & table service, API v1.2): generate, transform, analyze
 */

import type {
  TableAnalyzeRequest,
  TableRequest,
  TableTransformOptions,
  TableTransformRequest,
} from '../../schemas/elements';
import type { ConvertedConstraints, GridUnits } from '../grid-converter';
import { elementIds, slideContext, type BackendRequest, type ElementIds, type SlideContext } from './types';

export const TABLE_API_VERSION = '1.2';

export interface TableBackendBody extends ElementIds {
  prompt: string;
  context: SlideContext;
  constraints: GridUnits;
  structure: {
    columns?: number;
    rows?: number;
    hasHeader: boolean;
  };
  style: {
    preset: string;
  };
  data?: string[][];
}

export interface TableTransformBackendOptions {
  content?: string;
  position?: number;
  columnIndex?: number;
  rowIndex?: number;
  sortColumn?: number;
  sortDirection?: 'asc' | 'desc';
  summarizeType?: string;
  summarizeColumns?: number[];
  focusArea?: string;
  cells?: Array<Record<string, number>>;
  splitCount?: number;
}

export interface TableTransformBackendBody extends ElementIds {
  sourceTable: string;
  transformation: string;
  context: SlideContext;
  constraints: GridUnits;
  options?: TableTransformBackendOptions;
}

export interface TableAnalyzeBackendBody {
  sourceContent: string;
  elementId: string;
  context: SlideContext;
  analysisType: string;
}

export function adaptTableRequest(
  request: TableRequest,
  constraints: ConvertedConstraints
): BackendRequest<TableBackendBody> {
  return {
    service: 'text_table',
    endpoint: '/api/ai/table/generate',
    apiVersion: TABLE_API_VERSION,
    body: {
      prompt: request.prompt ?? '',
      ...elementIds(request.element_id, request.context),
      context: slideContext(request.context),
      constraints: constraints.standard,
      structure: {
        columns: request.columns,
        rows: request.rows,
        hasHeader: request.has_header,
      },
      style: { preset: request.preset },
      data: request.data && request.data.length > 0 ? request.data : undefined,
    },
  };
}

export function toBackendTableOptions(options: TableTransformOptions): TableTransformBackendOptions {
  return {
    content: options.content,
    position: options.position,
    columnIndex: options.column_index,
    rowIndex: options.row_index,
    sortColumn: options.sort_column,
    sortDirection: options.sort_direction,
    summarizeType: options.summarize_type,
    summarizeColumns: options.summarize_columns,
    focusArea: options.focus_area,
    cells: options.cells,
    splitCount: options.split_count,
  };
}

export function adaptTableTransformRequest(
  request: TableTransformRequest,
  constraints: ConvertedConstraints
): BackendRequest<TableTransformBackendBody> {
  return {
    service: 'text_table',
    endpoint: '/api/ai/table/transform',
    apiVersion: TABLE_API_VERSION,
    body: {
      sourceTable: request.source_content,
      transformation: request.transformation,
      ...elementIds(request.element_id, request.context),
      context: slideContext(request.context),
      constraints: constraints.standard,
      options: request.options ? toBackendTableOptions(request.options) : undefined,
    },
  };
}

/** Analysis has no grid position, so it takes no constraints */
export function adaptTableAnalyzeRequest(request: TableAnalyzeRequest): BackendRequest<TableAnalyzeBackendBody> {
  return {
    service: 'text_table',
    endpoint: '/api/ai/table/analyze',
    apiVersion: TABLE_API_VERSION,
    body: {
      sourceContent: request.source_content,
      elementId: request.element_id,
      context: slideContext(request.context),
      analysisType: request.analysis_type,
    },
  };
}
