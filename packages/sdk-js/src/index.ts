// Main exports
export {
  init,
  getTracerProvider,
  setTracerProvider,
  tracer,
  shutdown,
} from './client';

// Types
export type {
  AttributePrimitive,
  AttributeValue,
  Attributes,
  AttributesInput,
  InstrumentationScope,
  Span,
  SpanData,
  SpanEvent,
  SpanKind,
  SpanLimits,
  SpanLink,
  SpanStatus,
  StatusCode,
  TimeInput,
} from './types';

// Tracing
export * from './tracing';

// Configuration
export {
  normalizeOptions,
  loadEnvConfig,
  resolveSpanLimits,
  DEFAULT_SPAN_LIMITS,
  type SpanlineOptions,
  type NormalizedOptions,
  type EnvConfig,
} from './config';

// Resource
export { Resource, SDK_NAME, SDK_LANGUAGE } from './resource';

// Errors
export {
  SpanlineError,
  ContextGuardError,
  SpanBuilderConsumedError,
  CollaboratorError,
  ConfigurationError,
  setErrorHandler,
  handleError,
  type ErrorHandler,
  type Collaborator,
  type SpanlineErrorCode,
} from './errors';

// Logging
export { createDebugLogger, getLogger, setLogger, type DebugLogger } from './logger';
