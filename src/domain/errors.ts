export type PipelineErrorCode =
  | 'VALIDATION_ERROR'
  | 'DISPATCH_FAILURE'
  | 'DIFF_INPUT_ERROR'
  | 'EXTRACTION_ERROR';

/** Base class for every failure the pipeline reports to its callers. */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed alert input. Rejected synchronously, never forwarded. */
export class ValidationError extends PipelineError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

/** Forwarding to the Investigator failed after the retry budget was spent. */
export class DispatchFailure extends PipelineError {
  readonly code = 'DISPATCH_FAILURE';

  constructor(readonly fingerprint: string, readonly reason: string) {
    super(`Dispatch failed for alert ${fingerprint}: ${reason}`);
  }
}

/** A diff root that is not a configuration tree. */
export class DiffInputError extends PipelineError {
  readonly code = 'DIFF_INPUT_ERROR';

  constructor(readonly side: 'old' | 'new', message = `${side} revision is not a configuration tree`) {
    super(message);
  }
}

/**
 * Reserved. The log operations are total over their input, so nothing
 * raises this for well-typed arguments.
 */
export class ExtractionError extends PipelineError {
  readonly code = 'EXTRACTION_ERROR';
}
