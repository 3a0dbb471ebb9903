export {
  TRACE_FLAG_NONE,
  TRACE_FLAG_SAMPLED,
  INVALID_TRACE_ID,
  INVALID_SPAN_ID,
  isValidTraceId,
  isValidSpanId,
  normalizeId,
  RandomIdGenerator,
  type IdGenerator,
} from './ids';
export { TraceState } from './trace-state';
export { SpanContext, type SpanContextInit } from './span-context';
export { Context, ContextKey, createContextKey } from './context';
export { ContextGuard, setStrictGuards, isStrictGuards } from './guard';
export {
  AsyncLocalContextStorage,
  SimpleContextStorage,
  getContextStorage,
  setContextStorage,
  type ContextStorage,
} from './storage';
export {
  bindContext,
  bindIterator,
  bindAsyncIterator,
  type BoundIterator,
  type BoundAsyncIterator,
} from './bind';
export { SpanImpl, NoopSpan, INVALID_SPAN, type SpanImplOptions } from './span';
export {
  SpanBuilder,
  resolveSpanConfig,
  type SpanBuilderConfig,
  type SpanEventInput,
  type SpanLinkInput,
  type ResolvedSpanConfig,
  type SpanCollaborators,
} from './span-builder';
export {
  alwaysOnSampler,
  alwaysOffSampler,
  traceIdRatioSampler,
  parentBasedSampler,
  type Sampler,
  type SamplingDecision,
  type SamplingParameters,
  type SamplingResult,
} from './sampler';
export { MultiSpanProcessor, NoopSpanProcessor, type SpanProcessor } from './processor';
export { Tracer, type TracerSharedState } from './tracer';
export { TracerProvider, type TracerProviderOptions } from './provider';
