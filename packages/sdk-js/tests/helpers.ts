import type { Span } from '../src/types';
import type { Context } from '../src/tracing/context';
import type { IdGenerator } from '../src/tracing/ids';
import type { SpanProcessor } from '../src/tracing/processor';
import { TracerProvider } from '../src/tracing/provider';
import type { TracerProviderOptions } from '../src/tracing/provider';
import { alwaysOnSampler } from '../src/tracing/sampler';
import { SpanImpl } from '../src/tracing/span';

/**
 * Deterministic ids: 1, 2, 3... zero-padded to the id width
 */
export class SequentialIdGenerator implements IdGenerator {
  private traceCounter = 0;
  private spanCounter = 0;

  newTraceId(): string {
    this.traceCounter++;
    return this.traceCounter.toString(16).padStart(32, '0');
  }

  newSpanId(): string {
    this.spanCounter++;
    return this.spanCounter.toString(16).padStart(16, '0');
  }
}

export class RecordingProcessor implements SpanProcessor {
  readonly started: SpanImpl[] = [];
  readonly parentContexts: Context[] = [];
  readonly ended: SpanImpl[] = [];
  flushCalls = 0;
  shutdownCalls = 0;

  onStart(span: SpanImpl, parentContext: Context): void {
    this.started.push(span);
    this.parentContexts.push(parentContext);
  }

  onEnd(span: SpanImpl): void {
    this.ended.push(span);
  }

  async forceFlush(): Promise<void> {
    this.flushCalls++;
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls++;
  }
}

export function createTestProvider(options: TracerProviderOptions = {}) {
  const processor = new RecordingProcessor();
  const idGenerator = new SequentialIdGenerator();
  const provider = new TracerProvider({
    sampler: alwaysOnSampler,
    idGenerator,
    spanProcessors: [processor],
    ...options,
  });
  return { provider, processor, idGenerator, tracer: provider.getTracer('test', '1.0.0') };
}

/**
 * Narrow a span handle to a recording span, failing the test otherwise
 */
export function asRecording(span: Span): SpanImpl {
  if (!(span instanceof SpanImpl)) {
    throw new Error('expected a recording span');
  }
  return span;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';
export const SPAN_ID = '00f067aa0ba902b7';
export const OTHER_TRACE_ID = 'aaaabbbbccccddddeeeeffff00001111';
export const OTHER_SPAN_ID = '1234567890abcdef';
