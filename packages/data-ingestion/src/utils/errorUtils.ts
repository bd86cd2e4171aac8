// Error handling utilities for data-ingestion package
import { FatalKind } from '../types';

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

export function createError(message: string, cause?: unknown): Error {
  const error = new Error(message);
  if (cause) {
    error.cause = cause;
  }
  return error;
}

/**
 * Base class for conditions that end a run. Anything recoverable is
 * reported as a FieldIssue instead.
 */
export class PipelineError extends Error {
  readonly kind: FatalKind;

  constructor(kind: FatalKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PipelineError';
    this.kind = kind;
  }
}

export class SourceUnreadableError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super('SourceUnreadable', `${path}: ${message}`, cause);
    this.name = 'SourceUnreadableError';
    this.path = path;
  }
}

export class ContractSetFailureError extends PipelineError {
  readonly table: string;
  readonly failures: string[];

  constructor(table: string, failures: string[]) {
    super('ContractSetFailure', `Contract for ${table} failed: ${failures.join('; ')}`);
    this.name = 'ContractSetFailureError';
    this.table = table;
    this.failures = failures;
  }
}

export class InternalPipelineError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('InternalError', message, cause);
    this.name = 'InternalPipelineError';
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Normalize anything thrown inside a stage into a PipelineError
 */
export function toPipelineError(error: unknown): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }
  return new InternalPipelineError(getErrorMessage(error), error);
}
