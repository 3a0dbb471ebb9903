import type { InstrumentationScope, Span, SpanLimits } from '../types';
import type { Resource } from '../resource';
import { SpanBuilderConsumedError, handleError } from '../errors';
import { Context } from './context';
import type { ContextGuard } from './guard';
import type { IdGenerator } from './ids';
import type { SpanProcessor } from './processor';
import type { Sampler } from './sampler';
import { INVALID_SPAN, NoopSpan, SpanImpl } from './span';
import { SpanBuilder, resolveSpanConfig } from './span-builder';

/**
 * State a tracer reads from the provider that created it
 */
export interface TracerSharedState {
  readonly sampler: Sampler;
  readonly idGenerator: IdGenerator;
  readonly resource: Resource;
  readonly spanLimits: SpanLimits;
  readonly activeProcessor: SpanProcessor;
  readonly isShutdown: boolean;
}

const DROP_ALL = { decision: 'drop' } as const;

/**
 * Tracer creates spans and activates them.
 *
 * Starting a span never makes it current; use {@link Tracer.markSpanAsActive},
 * {@link Tracer.withSpan} or {@link Tracer.inSpan} for that.
 *
 * @example
 * ```typescript
 * const tracer = provider.getTracer('checkout');
 *
 * tracer.inSpan('charge-card', (cx) => {
 *   // spans started here are children of charge-card
 *   const child = tracer.start('fraud-check');
 *   child.end();
 *   cx.span().end();
 * });
 * ```
 */
export class Tracer {
  readonly instrumentationScope: InstrumentationScope;
  private readonly shared: TracerSharedState;

  constructor(instrumentationScope: InstrumentationScope, shared: TracerSharedState) {
    this.instrumentationScope = instrumentationScope;
    this.shared = shared;
  }

  /**
   * Span with an invalid span context
   */
  invalid(): Span {
    return INVALID_SPAN;
  }

  /**
   * Start a span whose parent is the current context's active span, if any
   */
  start(name: string): Span {
    return this.startFromContext(name, Context.current());
  }

  startFromContext(name: string, context: Context): Span {
    return this.buildWithContext(this.spanBuilder(name), context);
  }

  spanBuilder(name: string): SpanBuilder {
    return new SpanBuilder(name);
  }

  build(builder: SpanBuilder): Span {
    return this.buildWithContext(builder, Context.current());
  }

  buildWithContext(builder: SpanBuilder, context: Context): Span {
    const config = builder.consume();
    if (!config) {
      handleError(new SpanBuilderConsumedError(builder.name));
      return INVALID_SPAN;
    }

    const effective = this.shared.isShutdown ? { ...config, samplingResult: DROP_ALL } : config;
    const resolved = resolveSpanConfig(effective, context, {
      idGenerator: this.shared.idGenerator,
      sampler: this.shared.sampler,
    });

    if (resolved.decision === 'drop') {
      return new NoopSpan(resolved.spanContext);
    }

    const processor = this.shared.activeProcessor;
    const span = new SpanImpl({
      name: resolved.name,
      kind: resolved.kind,
      spanContext: resolved.spanContext,
      parentSpanId: resolved.parentSpanId,
      startTime: resolved.startTime,
      endTime: resolved.endTime,
      attributes: resolved.attributes,
      events: resolved.events,
      links: resolved.links,
      status: resolved.status,
      limits: this.shared.spanLimits,
      resource: this.shared.resource,
      instrumentationScope: this.instrumentationScope,
      onEnd: (ended) => processor.onEnd(ended),
    });

    processor.onStart(span, context);
    return span;
  }

  /**
   * Make `span` the active span until the returned guard is released
   */
  markSpanAsActive(span: Span): ContextGuard {
    return Context.currentWithSpan(span).attach();
  }

  /**
   * Call `fn` with the current active span (or the invalid span)
   */
  getActiveSpan<T>(fn: (span: Span) => T): T {
    return fn(Context.current().span());
  }

  /**
   * Start a span and make it active while `fn` runs. The span is not ended.
   */
  inSpan<T>(name: string, fn: (context: Context) => T): T {
    return this.withSpan(this.start(name), fn);
  }

  /**
   * Make `span` active while `fn` runs. The span is not ended.
   *
   * When `fn` returns a promise, continuations of that promise still see the
   * span as active; the caller's own context is restored as soon as `fn`
   * returns or throws.
   */
  withSpan<T>(span: Span, fn: (context: Context) => T): T {
    const context = Context.currentWithSpan(span);
    const guard = context.attach();
    try {
      return fn(context);
    } finally {
      guard.release();
    }
  }
}
