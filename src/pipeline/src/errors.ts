export type PipelineErrorCode = 'SOURCE_UNAVAILABLE' | 'STRUCTURAL_ERROR' | 'INVALID_CRITERIA';

/**
 * Base class for failures that end a pipeline cycle
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The dataset could not be fetched or parsed. No table is produced.
 */
export class SourceUnavailableError extends PipelineError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `Dataset source ${source} unavailable: ${message}`, options);
    this.source = source;
  }
}

/**
 * The raw table is missing columns the cleaner depends on
 */
export class StructuralError extends PipelineError {
  readonly missingColumns: readonly string[];

  constructor(missingColumns: readonly string[]) {
    super('STRUCTURAL_ERROR', `Dataset is missing required column(s): ${missingColumns.join(', ')}`);
    this.missingColumns = missingColumns;
  }
}

export class InvalidCriteriaError extends PipelineError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_CRITERIA', `Invalid filter criteria: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
