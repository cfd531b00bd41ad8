export type RelayErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'SUBMISSION_FAILED'
  | 'EMPTY_DATASET'
  | 'INVALID_CSV'
  | 'MERGE_FAILED'
  | 'MERGE_IN_PROGRESS'
  | 'INVALID_MANIFEST'
  | 'UNKNOWN_TOOL';

export class RelayError extends Error {
  public readonly code: RelayErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: RelayErrorCode,
    statusCode: number,
    options: { cause?: unknown; details?: Record<string, unknown> } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RelayError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = options.details;
  }
}

export class StoreTransportError extends RelayError {
  constructor(operation: string, key: string, cause: unknown) {
    super(`Store ${operation} failed for ${key}: ${describeError(cause)}`, 'STORE_UNAVAILABLE', 503, {
      cause,
      details: { operation, key },
    });
    this.name = 'StoreTransportError';
  }
}

export class JobNotFoundError extends RelayError {
  constructor(id: string) {
    super(`No job or session found for ${id}`, 'NOT_FOUND', 404, { details: { id } });
    this.name = 'JobNotFoundError';
  }
}

export class SubmissionError extends RelayError {
  constructor(jobId: string, phase: 'status' | 'input' | 'finalize', cause: unknown) {
    super(`Submission of ${jobId} failed during ${phase} write: ${describeError(cause)}`, 'SUBMISSION_FAILED', 502, {
      cause,
      details: { jobId, phase },
    });
    this.name = 'SubmissionError';
  }
}

export class EmptyDatasetError extends RelayError {
  constructor(filename: string) {
    super(`${filename} contains no data rows`, 'EMPTY_DATASET', 400, { details: { filename } });
    this.name = 'EmptyDatasetError';
  }
}

export class DatasetParseError extends RelayError {
  constructor(filename: string, problems: string[]) {
    super(`Could not parse ${filename}: ${problems.join(', ')}`, 'INVALID_CSV', 400, {
      details: { filename, problems },
    });
    this.name = 'DatasetParseError';
  }
}

export class MergeError extends RelayError {
  constructor(sessionId: string, message: string, cause?: unknown) {
    super(message, 'MERGE_FAILED', 500, { cause, details: { sessionId } });
    this.name = 'MergeError';
  }
}

export class MergeInProgressError extends RelayError {
  constructor(sessionId: string, owner: string, expiresAt: string) {
    super(`Session ${sessionId} is already being merged by ${owner} until ${expiresAt}`, 'MERGE_IN_PROGRESS', 409, {
      details: { sessionId, owner, expiresAt },
    });
    this.name = 'MergeInProgressError';
  }
}

export class ManifestError extends RelayError {
  constructor(sessionId: string, reason: string) {
    super(`Manifest of session ${sessionId} is unusable: ${reason}`, 'INVALID_MANIFEST', 422, {
      details: { sessionId },
    });
    this.name = 'ManifestError';
  }
}

export class UnknownToolError extends RelayError {
  constructor(toolId: string) {
    super(`Unknown tool: ${toolId}`, 'UNKNOWN_TOOL', 400, { details: { toolId } });
    this.name = 'UnknownToolError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
