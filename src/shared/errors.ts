/**
 * shared/errors.ts — Pipeline error taxonomy
 *
 * Structural violations abort the run; nothing here is used for expected
 * data-quality conditions (missing capacity, over-capacity days), which stay
 * in the fact rows as nullable fields.
 */
import type { ZodIssue } from 'zod';

export type PipelineErrorCode =
  | 'MISSING_INPUT'
  | 'EMPTY_DIMENSION'
  | 'INCONSISTENT_KEY'
  | 'INVALID_RECORD';

export class PipelineError extends Error {
  code: PipelineErrorCode;
  details: Record<string, unknown>;
  constructor(message: string, code: PipelineErrorCode, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
  }
}

export class MissingInputError extends PipelineError {
  constructor(input: string, hint?: string) {
    super(`Missing required input: ${input}${hint ? `. ${hint}` : ''}`, 'MISSING_INPUT', { input });
    this.name = 'MissingInputError';
  }
}

export class EmptyDimensionError extends PipelineError {
  constructor(dimension: string) {
    super(`Dimension "${dimension}" has no rows`, 'EMPTY_DIMENSION', { dimension });
    this.name = 'EmptyDimensionError';
  }
}

/** A join found zero or several matches where exactly one is required */
export class InconsistentKeyError extends PipelineError {
  constructor(message: string, key: Record<string, unknown>) {
    super(message, 'INCONSISTENT_KEY', { key });
    this.name = 'InconsistentKeyError';
  }
}

export class InvalidRecordError extends PipelineError {
  constructor(file: string, line: number, issues: ZodIssue[]) {
    const first = issues[0];
    const summary = first ? `${first.path.join('.') || 'row'}: ${first.message}` : 'invalid row';
    super(`${file}:${line} ${summary}`, 'INVALID_RECORD', { file, line, issues });
    this.name = 'InvalidRecordError';
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
