import type {
  Attributes,
  AttributesInput,
  Span,
  SpanEvent,
  SpanKind,
  SpanLink,
  SpanStatus,
  StatusCode,
  TimeInput,
} from '../types';
import { CollaboratorError, handleError } from '../errors';
import { getLogger } from '../logger';
import { sanitizeAttributes } from '../utils/attributes';
import { toEpochMillis } from '../utils/time';
import type { Context } from './context';
import {
  INVALID_SPAN_ID,
  RandomIdGenerator,
  TRACE_FLAG_NONE,
  TRACE_FLAG_SAMPLED,
  isValidSpanId,
  isValidTraceId,
  normalizeId,
} from './ids';
import type { IdGenerator } from './ids';
import type { Sampler, SamplingDecision, SamplingParameters, SamplingResult } from './sampler';
import { SpanContext } from './span-context';
import { TraceState } from './trace-state';
import type { Tracer } from './tracer';

export interface SpanEventInput {
  name: string;
  attributes?: AttributesInput;
  timestamp?: TimeInput;
}

export interface SpanLinkInput {
  context: SpanContext;
  attributes?: AttributesInput;
}

/**
 * Everything a caller can set before a span starts. Only `name` is required.
 */
export interface SpanBuilderConfig {
  name: string;
  parentContext?: SpanContext;
  traceId?: string;
  spanId?: string;
  spanKind?: SpanKind;
  startTime?: TimeInput;
  endTime?: TimeInput;
  attributes?: AttributesInput;
  events?: SpanEventInput[];
  links?: SpanLinkInput[];
  statusCode?: StatusCode;
  statusMessage?: string;
  samplingResult?: SamplingResult;
  traceState?: TraceState;
}

/**
 * Collects span options before the span is started.
 *
 * @example
 * ```typescript
 * const span = tracer
 *   .spanBuilder('GET /users')
 *   .withKind('server')
 *   .withAttributes({ 'http.method': 'GET' })
 *   .start(tracer);
 * ```
 */
export class SpanBuilder {
  private readonly config: SpanBuilderConfig;
  private consumed = false;

  constructor(name: string) {
    this.config = { name };
  }

  get name(): string {
    return this.config.name;
  }

  /** Explicit parent; wins over everything else */
  withParent(parentContext: SpanContext): this {
    this.config.parentContext = parentContext;
    return this;
  }

  /** Trace to join when no parent context is given */
  withTraceId(traceId: string): this {
    this.config.traceId = traceId;
    return this;
  }

  /** Span ID of an externally tracked parent */
  withSpanId(spanId: string): this {
    this.config.spanId = spanId;
    return this;
  }

  withKind(kind: SpanKind): this {
    this.config.spanKind = kind;
    return this;
  }

  withStartTime(startTime: TimeInput): this {
    this.config.startTime = startTime;
    return this;
  }

  withEndTime(endTime: TimeInput): this {
    this.config.endTime = endTime;
    return this;
  }

  withAttributes(attributes: AttributesInput): this {
    this.config.attributes = { ...attributes };
    return this;
  }

  withEvents(events: SpanEventInput[]): this {
    this.config.events = [...events];
    return this;
  }

  withLinks(links: SpanLinkInput[]): this {
    this.config.links = [...links];
    return this;
  }

  withStatusCode(code: StatusCode): this {
    this.config.statusCode = code;
    return this;
  }

  withStatusMessage(message: string): this {
    this.config.statusMessage = message;
    return this;
  }

  /** Skip the sampler and use this result */
  withSamplingResult(result: SamplingResult): this {
    this.config.samplingResult = result;
    return this;
  }

  /** Replace the trace state inherited from the parent */
  withTraceState(traceState: TraceState): this {
    this.config.traceState = traceState;
    return this;
  }

  start(tracer: Tracer): Span {
    return tracer.build(this);
  }

  startWithContext(tracer: Tracer, context: Context): Span {
    return tracer.buildWithContext(this, context);
  }

  /**
   * Hand the configuration over for construction. Returns undefined once the
   * builder has been consumed.
   *
   * @internal
   */
  consume(): SpanBuilderConfig | undefined {
    if (this.consumed) return undefined;
    this.consumed = true;
    return this.config;
  }
}

export interface SpanCollaborators {
  idGenerator: IdGenerator;
  sampler: Sampler;
}

/**
 * Builder configuration merged against defaults, ambient context and the
 * sampling decision.
 */
export interface ResolvedSpanConfig {
  name: string;
  kind: SpanKind;
  spanContext: SpanContext;
  parentSpanId?: string;
  decision: SamplingDecision;
  startTime: number;
  endTime?: number;
  attributes: Attributes;
  events: SpanEvent[];
  links: SpanLink[];
  status: SpanStatus;
}

const fallbackIds = new RandomIdGenerator();

/**
 * Single place deciding how builder overrides, the ambient context and the
 * tracer's collaborators combine into a span's identity.
 *
 * Parent resolution order:
 * 1. `parentContext`, if set. An invalid one makes the span a root.
 * 2. `traceId`/`spanId` overrides, synthesized into a local parent.
 * 3. The active span of `context`, if its span context is valid.
 * 4. None: root span with a fresh trace ID.
 */
export function resolveSpanConfig(
  config: SpanBuilderConfig,
  context: Context,
  collaborators: SpanCollaborators
): ResolvedSpanConfig {
  const ids = guardIdGenerator(collaborators.idGenerator);
  const { parent, traceId } = resolveParent(config, context, ids);

  const kind = config.spanKind ?? 'internal';
  const attributes = sanitizeAttributes(config.attributes);
  const links: SpanLink[] = (config.links ?? []).map((link) => ({
    context: link.context,
    attributes: sanitizeAttributes(link.attributes),
  }));

  const sampling =
    config.samplingResult ??
    sample(collaborators.sampler, {
      parentContext: parent,
      traceId,
      name: config.name,
      kind,
      attributes,
      links,
    });

  const inheritedFlags = parent ? parent.traceFlags & ~TRACE_FLAG_SAMPLED : TRACE_FLAG_NONE;
  const traceFlags =
    sampling.decision === 'record_and_sample'
      ? inheritedFlags | TRACE_FLAG_SAMPLED
      : inheritedFlags;
  const traceState =
    config.traceState ?? sampling.traceState ?? parent?.traceState ?? TraceState.empty();

  const spanContext = SpanContext.create({
    traceId,
    spanId: ids.newSpanId(),
    traceFlags,
    traceState,
  });

  const startTime =
    config.startTime !== undefined ? toEpochMillis(config.startTime) : Date.now();

  return {
    name: config.name,
    kind,
    spanContext,
    parentSpanId: parent?.spanId,
    decision: sampling.decision,
    startTime,
    endTime: config.endTime !== undefined ? toEpochMillis(config.endTime) : undefined,
    attributes: { ...attributes, ...sampling.attributes },
    events: (config.events ?? []).map((event) => ({
      name: event.name,
      timestamp: event.timestamp !== undefined ? toEpochMillis(event.timestamp) : startTime,
      attributes: sanitizeAttributes(event.attributes),
    })),
    links,
    status: {
      code: config.statusCode ?? 'unset',
      message: config.statusMessage ?? '',
    },
  };
}

function resolveParent(
  config: SpanBuilderConfig,
  context: Context,
  ids: IdGenerator
): { parent?: SpanContext; traceId: string } {
  if (config.parentContext) {
    const explicit = config.parentContext;
    return explicit.isValid()
      ? { parent: explicit, traceId: explicit.traceId }
      : { traceId: ids.newTraceId() };
  }

  if (config.traceId !== undefined || config.spanId !== undefined) {
    const synthesized = SpanContext.create({
      traceId: overrideId(config.traceId, isValidTraceId, 'trace', config.name) ?? ids.newTraceId(),
      spanId: overrideId(config.spanId, isValidSpanId, 'span', config.name) ?? INVALID_SPAN_ID,
      traceFlags: TRACE_FLAG_SAMPLED,
    });
    return {
      parent: synthesized.isValid() ? synthesized : undefined,
      traceId: synthesized.traceId,
    };
  }

  const active = context.span().spanContext();
  if (active.isValid()) {
    return { parent: active, traceId: active.traceId };
  }

  return { traceId: ids.newTraceId() };
}

/**
 * Lowercased override, or undefined when it is absent or malformed. A
 * malformed override is logged and ignored.
 */
function overrideId(
  id: string | undefined,
  isValid: (id: string) => boolean,
  kind: 'trace' | 'span',
  spanName: string
): string | undefined {
  if (id === undefined) return undefined;
  if (isValid(id)) return normalizeId(id);
  getLogger().warn(`Ignoring invalid ${kind} id override "${id}" for span "${spanName}"`);
  return undefined;
}

function sample(sampler: Sampler, params: SamplingParameters): SamplingResult {
  try {
    return sampler.shouldSample(params);
  } catch (error) {
    handleError(new CollaboratorError('sampler', error));
    return { decision: 'drop' };
  }
}

/**
 * Wrap an id generator so a throw or a malformed id falls back to random ids
 */
function guardIdGenerator(generator: IdGenerator): IdGenerator {
  return {
    newTraceId: () =>
      generate(() => generator.newTraceId(), isValidTraceId, () => fallbackIds.newTraceId()),
    newSpanId: () =>
      generate(() => generator.newSpanId(), isValidSpanId, () => fallbackIds.newSpanId()),
  };
}

function generate(
  next: () => string,
  isValid: (id: string) => boolean,
  fallback: () => string
): string {
  try {
    const id = next();
    if (isValid(id)) return normalizeId(id);
    handleError(new CollaboratorError('idGenerator', new Error(`generated invalid id "${id}"`)));
  } catch (error) {
    handleError(new CollaboratorError('idGenerator', error));
  }
  return fallback();
}
