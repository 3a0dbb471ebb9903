import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Context } from '../src/tracing/context';
import { isValidSpanId, isValidTraceId } from '../src/tracing/ids';
import type { IdGenerator } from '../src/tracing/ids';
import { TracerProvider } from '../src/tracing/provider';
import { alwaysOnSampler } from '../src/tracing/sampler';
import { INVALID_SPAN, NoopSpan, SpanImpl } from '../src/tracing/span';
import { NoopSpanProcessor } from '../src/tracing/processor';
import type { SpanProcessor } from '../src/tracing/processor';
import type { Tracer } from '../src/tracing/tracer';
import { Resource } from '../src/resource';
import { CollaboratorError, setErrorHandler } from '../src/errors';
import type { SpanlineError } from '../src/errors';
import {
  RecordingProcessor,
  SequentialIdGenerator,
  asRecording,
  createTestProvider,
  delay,
} from './helpers';

describe('Tracer', () => {
  let provider: TracerProvider;
  let tracer: Tracer;
  let processor: RecordingProcessor;

  beforeEach(() => {
    ({ provider, tracer, processor } = createTestProvider());
  });

  afterEach(() => {
    setErrorHandler();
  });

  it('should not make a started span current', () => {
    tracer.start('foo');
    expect(Context.current()).toBe(Context.root());
  });

  it('should parent spans started while another span is active', () => {
    const foo = tracer.start('foo');
    const guard = tracer.markSpanAsActive(foo);

    const bar = tracer.start('bar');
    expect(Context.current().span()).toBe(foo);
    bar.end();
    expect(Context.current().span()).toBe(foo);

    guard.release();
    expect(Context.current()).toBe(Context.root());
    expect(bar.spanContext().traceId).toBe(foo.spanContext().traceId);
    expect(asRecording(bar).parentSpanId).toBe(foo.spanContext().spanId);
  });

  it('should return the invalid span', () => {
    expect(tracer.invalid()).toBe(INVALID_SPAN);
    expect(tracer.invalid().spanContext().isValid()).toBe(false);
  });

  describe('getActiveSpan', () => {
    it('should pass the invalid span when nothing is active', () => {
      expect(tracer.getActiveSpan((span) => span)).toBe(INVALID_SPAN);
    });

    it('should pass the active span', () => {
      const span = tracer.start('active');
      const guard = tracer.markSpanAsActive(span);
      tracer.getActiveSpan((active) => active.addEvent('hit', {}, 10));
      guard.release();

      expect(asRecording(span).events.map((event) => event.name)).toEqual(['hit']);
    });
  });

  describe('inSpan and withSpan', () => {
    it('should activate the span for the callback and restore afterwards', () => {
      const result = tracer.inSpan('outer', (outerCx) => {
        expect(Context.current()).toBe(outerCx);
        const outer = outerCx.span();

        tracer.inSpan('inner', (innerCx) => {
          const inner = asRecording(innerCx.span());
          expect(inner.parentSpanId).toBe(outer.spanContext().spanId);
          expect(inner.spanContext().traceId).toBe(outer.spanContext().traceId);
        });

        expect(Context.current()).toBe(outerCx);
        return 'done';
      });

      expect(result).toBe('done');
      expect(Context.current()).toBe(Context.root());
    });

    it('should restore the context when the callback throws', () => {
      expect(() =>
        tracer.inSpan('failing', () => {
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(Context.current()).toBe(Context.root());
    });

    it('should not end the span', () => {
      const span = tracer.start('manual');
      const value = tracer.withSpan(span, () => 42);

      expect(value).toBe(42);
      expect(asRecording(span).ended).toBe(false);
      expect(processor.ended).toHaveLength(0);
    });

    it('should keep the span active across awaits inside the callback', async () => {
      const seenAfterAwait = await tracer.inSpan('async-op', async (cx) => {
        await delay(5);
        return Context.current() === cx;
      });

      expect(seenAfterAwait).toBe(true);
      expect(Context.current()).toBe(Context.root());
    });

    it('should keep concurrent operations apart', async () => {
      const run = (name: string, wait: number) =>
        tracer.inSpan(name, async () => {
          await delay(wait);
          return tracer.getActiveSpan((span) => span);
        });

      const [a, b] = await Promise.all([run('a', 10), run('b', 1)]);

      expect(asRecording(a).name).toBe('a');
      expect(asRecording(b).name).toBe('b');
      expect(asRecording(b).parentSpanId).toBeUndefined();
      expect(a.spanContext().traceId).not.toBe(b.spanContext().traceId);
    });
  });

  describe('span processors', () => {
    it('should notify on start with the parent context and once on end', () => {
      const cx = Context.root();
      const span = tracer.startFromContext('processed', cx);
      span.end(2000);
      span.end(3000);

      expect(processor.started).toEqual([span]);
      expect(processor.parentContexts).toEqual([cx]);
      expect(processor.ended).toEqual([span]);
    });

    it('should attach the provider resource and instrumentation scope', () => {
      const span = asRecording(tracer.start('scoped'));

      expect(span.resource).toBe(provider.resource);
      expect(span.instrumentationScope).toEqual({ name: 'test', version: '1.0.0' });
    });

    it('should notify processors added later', () => {
      const late = new RecordingProcessor();
      provider.addSpanProcessor(late);
      tracer.start('after-add');

      expect(late.started).toHaveLength(1);
      expect(processor.started).toHaveLength(1);
    });
  });

  describe('collaborator failures', () => {
    let reported: SpanlineError[];

    beforeEach(() => {
      reported = [];
      setErrorHandler((error) => reported.push(error));
    });

    it('should drop the span when the sampler throws', () => {
      const { tracer: failing, processor: recorder } = createTestProvider({
        sampler: {
          shouldSample: () => {
            throw new Error('boom');
          },
          description: () => 'broken',
        },
      });

      const span = failing.start('unlucky');

      expect(span).toBeInstanceOf(NoopSpan);
      expect(span.spanContext().isValid()).toBe(true);
      expect(recorder.started).toHaveLength(0);
      expect(reported).toHaveLength(1);
      expect(reported[0]).toBeInstanceOf(CollaboratorError);
      expect(reported[0].message).toBe('sampler failed: boom');
    });

    it('should fall back to random ids when the id generator fails', () => {
      const broken: IdGenerator = {
        newTraceId: () => {
          throw new Error('no ids');
        },
        newSpanId: () => '0000000000000000',
      };
      const { tracer: failing } = createTestProvider({ idGenerator: broken });

      const span = failing.start('fallback');

      expect(isValidTraceId(span.spanContext().traceId)).toBe(true);
      expect(isValidSpanId(span.spanContext().spanId)).toBe(true);
      expect(reported.map((error) => error.message)).toEqual([
        'idGenerator failed: no ids',
        'idGenerator failed: generated invalid id "0000000000000000"',
      ]);
    });

    it('should isolate a throwing span processor', () => {
      const throwing: SpanProcessor = {
        onStart: () => {
          throw new Error('start hook');
        },
        onEnd: () => {
          throw new Error('end hook');
        },
        forceFlush: async () => {},
        shutdown: async () => {},
      };
      provider.addSpanProcessor(throwing);

      const span = tracer.start('survivor');
      span.end(5);

      expect(span.isRecording()).toBe(false);
      expect(processor.started).toHaveLength(1);
      expect(processor.ended).toHaveLength(1);
      expect(reported.map((error) => error.message)).toEqual([
        'spanProcessor failed: start hook',
        'spanProcessor failed: end hook',
      ]);
    });

    it('should report a processor that rejects on flush', async () => {
      provider.addSpanProcessor({
        onStart: () => {},
        onEnd: () => {},
        forceFlush: () => Promise.reject(new Error('flush failed')),
        shutdown: async () => {},
      });

      await provider.forceFlush();

      expect(processor.flushCalls).toBe(1);
      expect(reported.map((error) => error.message)).toEqual(['spanProcessor failed: flush failed']);
    });
  });
});

describe('TracerProvider', () => {
  it('should cache tracers by name and version', () => {
    const provider = new TracerProvider();

    expect(provider.getTracer('http')).toBe(provider.getTracer('http'));
    expect(provider.getTracer('http', '1.0.0')).toBe(provider.getTracer('http', '1.0.0'));
    expect(provider.getTracer('http', '1.0.0')).not.toBe(provider.getTracer('http', '2.0.0'));
    expect(provider.getTracer('http')).not.toBe(provider.getTracer('db'));
  });

  it('should use defaults', () => {
    const provider = new TracerProvider();

    expect(provider.sampler.description()).toBe('ParentBased{root=AlwaysOnSampler}');
    expect(provider.resource.attributes).toEqual(Resource.default().attributes);
    expect(provider.spanLimits).toEqual({ maxAttributes: 128, maxEvents: 128, maxLinks: 128 });
  });

  it('should stop recording after shutdown', async () => {
    const processor = new RecordingProcessor();
    const provider = new TracerProvider({
      sampler: alwaysOnSampler,
      idGenerator: new SequentialIdGenerator(),
      spanProcessors: [processor],
    });
    const tracer = provider.getTracer('test');

    const first = provider.shutdown();
    const second = provider.shutdown();
    await first;

    expect(second).toBe(first);
    expect(provider.isShutdown).toBe(true);
    expect(processor.shutdownCalls).toBe(1);

    const span = tracer.start('late');
    expect(span.isRecording()).toBe(false);
    expect(span).not.toBeInstanceOf(SpanImpl);
    expect(span.spanContext().isValid()).toBe(true);
    expect(processor.started).toHaveLength(0);
  });

  it('should ignore processors added after shutdown', async () => {
    const provider = new TracerProvider();
    await provider.shutdown();
    const late = new RecordingProcessor();

    provider.addSpanProcessor(late);
    await provider.forceFlush();

    expect(late.flushCalls).toBe(0);
  });

  it('should record spans through a no-op processor without side effects', async () => {
    const provider = new TracerProvider({
      sampler: alwaysOnSampler,
      spanProcessors: [new NoopSpanProcessor()],
    });
    const span = provider.getTracer('test').start('quiet');
    span.end(5);

    expect(span).toBeInstanceOf(SpanImpl);
    expect(asRecording(span).endTime).toBe(5);
    await expect(provider.shutdown()).resolves.toBeUndefined();
  });

  it('should flush every processor', async () => {
    const first = new RecordingProcessor();
    const second = new RecordingProcessor();
    const provider = new TracerProvider({ spanProcessors: [first, second] });

    await provider.forceFlush();

    expect(first.flushCalls).toBe(1);
    expect(second.flushCalls).toBe(1);
  });
});
