/**
 * Typed failures raised while talking to generation backends.
 * The error classifier turns each of these into a GenerationError.
 */

export type BackendService = 'chart' | 'diagram' | 'text_table' | 'image' | 'infographic' | 'layout';

/** Non-2xx HTTP status from a backend */
export class BackendHttpError extends Error {
  constructor(
    public readonly service: BackendService,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(`${service} service returned HTTP ${status}`);
    this.name = 'BackendHttpError';
  }
}

/** Local deadline elapsed before the backend answered */
export class BackendTimeoutError extends Error {
  constructor(
    public readonly service: BackendService,
    public readonly timeoutMs: number
  ) {
    super(`${service} service did not respond within ${Math.round(timeoutMs / 1000)}s`);
    this.name = 'BackendTimeoutError';
  }
}

/** The backend could not be reached at all */
export class BackendConnectionError extends Error {
  constructor(
    public readonly service: BackendService,
    cause: unknown
  ) {
    super(`Unable to connect to ${service} service`, { cause });
    this.name = 'BackendConnectionError';
  }
}

/** A 2xx response whose body reports `success: false` */
export class BackendReportedError extends Error {
  constructor(
    public readonly service: BackendService,
    public readonly declaredCode: string | undefined,
    message: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'BackendReportedError';
  }
}

/** A 2xx response that carries none of the expected content */
export class EmptyContentError extends Error {
  constructor(public readonly service: BackendService) {
    super(`${service} service returned no content`);
    this.name = 'EmptyContentError';
  }
}

/** Diagram job reached the failed state */
export class DiagramJobFailedError extends Error {
  constructor(
    public readonly jobId: string,
    reason: string
  ) {
    super(`Diagram job ${jobId} failed: ${reason}`);
    this.name = 'DiagramJobFailedError';
  }
}

/** Diagram job did not finish before the polling ceiling */
export class DiagramPollTimeoutError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly elapsedMs: number
  ) {
    super(`Diagram job ${jobId} did not complete within ${Math.round(elapsedMs / 1000)}s`);
    this.name = 'DiagramPollTimeoutError';
  }
}

/** The caller went away; no further work should be started */
export class GenerationCancelledError extends Error {
  constructor(message = 'Generation cancelled by caller') {
    super(message);
    this.name = 'GenerationCancelledError';
  }
}
