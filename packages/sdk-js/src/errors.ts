import type { ZodIssue } from 'zod';
import { getLogger } from './logger';

export type SpanlineErrorCode =
  | 'GUARD_ALREADY_RELEASED'
  | 'BUILDER_CONSUMED'
  | 'COLLABORATOR_FAILURE'
  | 'INVALID_CONFIGURATION';

/**
 * Base class for every error raised or reported by the SDK
 */
export class SpanlineError extends Error {
  readonly code: SpanlineErrorCode;

  constructor(code: SpanlineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpanlineError';
    this.code = code;
  }
}

/**
 * A context guard was released more than once
 */
export class ContextGuardError extends SpanlineError {
  constructor() {
    super('GUARD_ALREADY_RELEASED', 'Context guard has already been released');
    this.name = 'ContextGuardError';
  }
}

/**
 * A span builder was started a second time
 */
export class SpanBuilderConsumedError extends SpanlineError {
  readonly spanName: string;

  constructor(spanName: string) {
    super('BUILDER_CONSUMED', `Span builder "${spanName}" has already been started`);
    this.name = 'SpanBuilderConsumedError';
    this.spanName = spanName;
  }
}

export type Collaborator = 'sampler' | 'idGenerator' | 'spanProcessor';

/**
 * A pluggable collaborator (sampler, id generator, span processor) threw
 */
export class CollaboratorError extends SpanlineError {
  readonly collaborator: Collaborator;

  constructor(collaborator: Collaborator, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('COLLABORATOR_FAILURE', `${collaborator} failed: ${detail}`, { cause });
    this.name = 'CollaboratorError';
    this.collaborator = collaborator;
  }
}

/**
 * Options or environment variables failed validation
 */
export class ConfigurationError extends SpanlineError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type ErrorHandler = (error: SpanlineError) => void;

const defaultErrorHandler: ErrorHandler = (error) => {
  getLogger().error(error.message);
};

let errorHandler: ErrorHandler = defaultErrorHandler;

/**
 * Replace the handler that receives non-fatal SDK errors. Pass nothing to
 * restore the default, which logs them.
 */
export function setErrorHandler(handler?: ErrorHandler): void {
  errorHandler = handler ?? defaultErrorHandler;
}

/**
 * Report a non-fatal error. Never throws.
 */
export function handleError(error: SpanlineError): void {
  try {
    errorHandler(error);
  } catch (handlerError) {
    getLogger().error('Error handler threw while handling', error.message, handlerError);
  }
}
