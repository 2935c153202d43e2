/**
 * Error taxonomy for render orchestration
 */

export type OrchestratorErrorCode =
  | 'BAD_INPUT'
  | 'EXECUTABLE_NOT_FOUND'
  | 'CAPACITY_EXCEEDED'
  | 'RENDER_FAILURE'
  | 'POST_PROCESS_FAILURE'
  | 'STREAM_READ_FAILURE'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'NOT_READY'
  | 'ALREADY_CONSUMED';

const HTTP_STATUS: Record<OrchestratorErrorCode, number> = {
  BAD_INPUT: 400,
  EXECUTABLE_NOT_FOUND: 500,
  CAPACITY_EXCEEDED: 429,
  RENDER_FAILURE: 500,
  POST_PROCESS_FAILURE: 500,
  STREAM_READ_FAILURE: 500,
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  NOT_READY: 409,
  ALREADY_CONSUMED: 410,
};

export class OrchestratorError extends Error {
  readonly code: OrchestratorErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: OrchestratorErrorCode,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'OrchestratorError';
    this.code = code;
    this.details = options.details;
  }

  get httpStatus(): number {
    return HTTP_STATUS[this.code];
  }

  static badInput(message: string, details?: Record<string, unknown>): OrchestratorError {
    return new OrchestratorError('BAD_INPUT', message, { details });
  }

  static executableNotFound(message: string): OrchestratorError {
    return new OrchestratorError('EXECUTABLE_NOT_FOUND', message);
  }

  static capacityExceeded(limit: number): OrchestratorError {
    return new OrchestratorError(
      'CAPACITY_EXCEEDED',
      `Maximum ${limit} concurrent renders allowed. Please wait for current renders to complete.`,
      { details: { limit } }
    );
  }

  static postProcessFailure(message: string, output: string, cause?: unknown): OrchestratorError {
    return new OrchestratorError('POST_PROCESS_FAILURE', message, { details: { output }, cause });
  }

  static notFound(jobId: string): OrchestratorError {
    return new OrchestratorError('NOT_FOUND', 'Job not found.', { details: { jobId } });
  }

  static invalidState(jobId: string, message = 'Job is not running.'): OrchestratorError {
    return new OrchestratorError('INVALID_STATE', message, { details: { jobId } });
  }

  static notReady(jobId: string): OrchestratorError {
    return new OrchestratorError('NOT_READY', 'Render is not finished yet.', { details: { jobId } });
  }

  static alreadyConsumed(jobId: string): OrchestratorError {
    return new OrchestratorError('ALREADY_CONSUMED', 'Render has already been downloaded.', {
      details: { jobId },
    });
  }
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
