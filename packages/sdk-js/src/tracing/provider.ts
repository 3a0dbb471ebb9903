import type { SpanLimits } from '../types';
import { resolveSpanLimits } from '../config';
import { getLogger } from '../logger';
import { Resource } from '../resource';
import { RandomIdGenerator } from './ids';
import type { IdGenerator } from './ids';
import { MultiSpanProcessor } from './processor';
import type { SpanProcessor } from './processor';
import { alwaysOnSampler, parentBasedSampler } from './sampler';
import type { Sampler } from './sampler';
import { Tracer } from './tracer';
import type { TracerSharedState } from './tracer';

export interface TracerProviderOptions {
  sampler?: Sampler;
  idGenerator?: IdGenerator;
  resource?: Resource;
  spanLimits?: Partial<SpanLimits>;
  spanProcessors?: SpanProcessor[];
}

/**
 * Owns the collaborators shared by its tracers and hands out one tracer per
 * instrumentation name and version.
 */
export class TracerProvider implements TracerSharedState {
  readonly sampler: Sampler;
  readonly idGenerator: IdGenerator;
  readonly resource: Resource;
  readonly spanLimits: SpanLimits;
  readonly activeProcessor: MultiSpanProcessor;

  private readonly tracers = new Map<string, Tracer>();
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: TracerProviderOptions = {}) {
    this.sampler = options.sampler ?? parentBasedSampler(alwaysOnSampler);
    this.idGenerator = options.idGenerator ?? new RandomIdGenerator();
    this.resource = options.resource ?? Resource.default();
    this.spanLimits = resolveSpanLimits(options.spanLimits);
    this.activeProcessor = new MultiSpanProcessor(options.spanProcessors);
  }

  get isShutdown(): boolean {
    return this.shutdownPromise !== null;
  }

  getTracer(name: string, version?: string): Tracer {
    const key = `${name}@${version ?? ''}`;
    let tracer = this.tracers.get(key);
    if (!tracer) {
      tracer = new Tracer({ name, version }, this);
      this.tracers.set(key, tracer);
    }
    return tracer;
  }

  addSpanProcessor(processor: SpanProcessor): void {
    if (this.isShutdown) {
      getLogger().warn('Span processor added after shutdown is ignored');
      return;
    }
    this.activeProcessor.add(processor);
  }

  forceFlush(): Promise<void> {
    return this.activeProcessor.forceFlush();
  }

  /**
   * Shut down every processor. Spans started afterwards are non-recording.
   * Calling it again returns the first call's promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      getLogger().log('Shutting down tracer provider');
      this.shutdownPromise = this.activeProcessor.shutdown();
    }
    return this.shutdownPromise;
  }
}
