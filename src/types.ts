/**
 * Shared types for the Visual Elements Orchestrator
 */

/** Raw process environment, before validation */
export type Env = Record<string, string | undefined>;

export type ElementType = 'chart' | 'diagram' | 'text' | 'table' | 'image' | 'infographic';

export type ErrorCode =
  | 'GRID_TOO_SMALL'
  | 'MISSING_DATA'
  | 'AI_SERVICE_ERROR'
  | 'INVALID_REQUEST'
  | 'RATE_LIMITED'
  | 'CREDITS_EXHAUSTED'
  | 'TIMEOUT'
  | 'CONNECTION_ERROR'
  | 'INTERNAL_ERROR';

export interface GenerationError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  suggestion?: string;
}

/** The one artifact a successful generation produces */
export type GeneratedContent =
  | { kind: 'chart_config'; value: Record<string, unknown> }
  | { kind: 'svg_content'; value: string }
  | { kind: 'html_content'; value: string }
  | { kind: 'image_url'; value: string };

export interface GenerationSuccess {
  success: true;
  element_id: string;
  chart_config?: Record<string, unknown>;
  svg_content?: string;
  html_content?: string;
  image_url?: string;
  job_id?: string;
  metadata?: Record<string, unknown>;
  insights?: Record<string, unknown>;
  credits_used?: number;
  injected: boolean;
  injection_error?: string;
}

export interface GenerationFailure {
  success: false;
  element_id: string;
  job_id?: string;
  error: GenerationError;
}

export type GenerationResponse = GenerationSuccess | GenerationFailure;

export interface TableAnalysisSuccess {
  success: true;
  element_id: string;
  summary?: string;
  statistics?: Record<string, unknown>;
  trends?: unknown[];
  recommendations?: unknown[];
}

export type TableAnalysisResponse = TableAnalysisSuccess | GenerationFailure;

export interface BatchElementResult {
  element_id: string;
  element_type: ElementType;
  success: boolean;
  result?: GenerationResponse;
  error?: GenerationError;
}

export interface BatchGenerateResponse {
  success: boolean;
  total: number;
  succeeded: number;
  failed: number;
  results: BatchElementResult[];
}
