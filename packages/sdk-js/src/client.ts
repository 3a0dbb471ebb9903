import { normalizeOptions } from './config';
import type { SpanlineOptions } from './config';
import { createDebugLogger, getLogger, setLogger } from './logger';
import { setStrictGuards } from './tracing/guard';
import { TracerProvider } from './tracing/provider';
import { alwaysOffSampler } from './tracing/sampler';
import type { Tracer } from './tracing/tracer';

/**
 * Provider used before init(): spans are non-recording but their contexts
 * still propagate.
 */
function createDefaultProvider(): TracerProvider {
  return new TracerProvider({ sampler: alwaysOffSampler });
}

let globalProvider: TracerProvider = createDefaultProvider();

/**
 * Initialize the SDK and register the resulting provider globally
 */
export function init(options: SpanlineOptions = {}): TracerProvider {
  const normalized = normalizeOptions(options);

  setLogger(createDebugLogger(normalized.debug));
  setStrictGuards(normalized.strictGuards);

  const provider = new TracerProvider({
    sampler: normalized.sampler,
    idGenerator: normalized.idGenerator,
    resource: normalized.resource,
    spanLimits: normalized.spanLimits,
    spanProcessors: normalized.spanProcessors,
  });
  globalProvider = provider;

  getLogger().log('Tracer provider initialized', {
    serviceName: normalized.serviceName,
    sampler: normalized.sampler.description(),
  });
  return provider;
}

export function getTracerProvider(): TracerProvider {
  return globalProvider;
}

/**
 * Register a provider globally. Tracers obtained from the previous provider
 * keep using it.
 */
export function setTracerProvider(provider: TracerProvider): void {
  globalProvider = provider;
}

/**
 * Tracer from the global provider
 */
export function tracer(name: string, version?: string): Tracer {
  return globalProvider.getTracer(name, version);
}

/**
 * Shut down the global provider and fall back to the non-recording default
 */
export function shutdown(): Promise<void> {
  const provider = globalProvider;
  globalProvider = createDefaultProvider();
  return provider.shutdown();
}
