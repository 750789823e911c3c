export type CourseQaErrorCode =
  | 'CORPUS_NOT_FOUND'
  | 'CORPUS_MALFORMED'
  | 'CORPUS_UNREADABLE'
  | 'SEARCH_REQUEST_FAILED';

/**
 * Base class for the recoverable failures of the retrieval pipeline.
 * These are returned inside result objects, not thrown across module boundaries.
 */
export class CourseQaError extends Error {
  constructor(
    message: string,
    public readonly code: CourseQaErrorCode,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'CourseQaError';
  }
}

export class CorpusNotFoundError extends CourseQaError {
  constructor(public readonly corpusPath: string, originalError?: unknown) {
    super(`Corpus file not found: ${corpusPath}`, 'CORPUS_NOT_FOUND', originalError);
    this.name = 'CorpusNotFoundError';
  }
}

export class CorpusMalformedError extends CourseQaError {
  constructor(
    public readonly corpusPath: string,
    public readonly lineNumber: number,
    reason: string,
    originalError?: unknown
  ) {
    super(`Malformed corpus record at ${corpusPath}:${lineNumber}: ${reason}`, 'CORPUS_MALFORMED', originalError);
    this.name = 'CorpusMalformedError';
  }
}

export class CorpusReadError extends CourseQaError {
  constructor(public readonly corpusPath: string, originalError?: unknown) {
    super(`Unable to read corpus file: ${corpusPath}`, 'CORPUS_UNREADABLE', originalError);
    this.name = 'CorpusReadError';
  }
}

export class SearchRequestFailedError extends CourseQaError {
  constructor(public readonly status: number | null, message: string, originalError?: unknown) {
    super(message, 'SEARCH_REQUEST_FAILED', originalError);
    this.name = 'SearchRequestFailedError';
  }
}

export type RetrievalError =
  | CorpusNotFoundError
  | CorpusMalformedError
  | CorpusReadError
  | SearchRequestFailedError;
