import type { ExtractionFailure } from './types';

/** Raised only in strict mode, when model output cannot be read as an intent. */
export class ExtractionError extends Error {
  readonly reason: ExtractionFailure['reason'];
  readonly snippet: string;

  constructor(failure: ExtractionFailure) {
    super(`Failed to parse model output (${failure.reason}); output was: ${failure.snippet}`);
    this.name = 'ExtractionError';
    this.reason = failure.reason;
    this.snippet = failure.snippet;
  }
}

export class ModelRequestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelRequestError';
  }
}

export class AggregationError extends Error {
  readonly organization: string;

  constructor(organization: string, options?: { cause?: unknown }) {
    const detail =
      options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Connectivity aggregation failed for "${organization}"${detail}`, options);
    this.name = 'AggregationError';
    this.organization = organization;
  }
}
