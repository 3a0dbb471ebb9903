import type { Attributes, SpanKind, SpanLink } from '../types';
import type { SpanContext } from './span-context';
import type { TraceState } from './trace-state';

/**
 * drop: span is not recorded and not sampled.
 * record_only: span is recorded but not sampled.
 * record_and_sample: span is recorded and the sampled flag is set.
 */
export type SamplingDecision = 'drop' | 'record_only' | 'record_and_sample';

export interface SamplingResult {
  decision: SamplingDecision;
  /** Added to the span's attributes */
  attributes?: Attributes;
  /** Replaces the trace state inherited from the parent */
  traceState?: TraceState;
}

export interface SamplingParameters {
  /** Resolved parent, absent for root spans */
  parentContext?: SpanContext;
  traceId: string;
  name: string;
  kind: SpanKind;
  attributes: Attributes;
  links: SpanLink[];
}

export interface Sampler {
  shouldSample(params: SamplingParameters): SamplingResult;
  description(): string;
}

export const alwaysOnSampler: Sampler = {
  shouldSample: () => ({ decision: 'record_and_sample' }),
  description: () => 'AlwaysOnSampler',
};

export const alwaysOffSampler: Sampler = {
  shouldSample: () => ({ decision: 'drop' }),
  description: () => 'AlwaysOffSampler',
};

// 13 hex characters = 52 bits, exactly representable as a number
const RATIO_HEX_DIGITS = 13;
const RATIO_SCALE = 2 ** (RATIO_HEX_DIGITS * 4);

/**
 * Sample a fixed fraction of traces, decided by the low bits of the trace ID
 * so every span of a trace gets the same answer.
 */
export function traceIdRatioSampler(ratio: number): Sampler {
  const clamped = Number.isFinite(ratio) ? Math.max(0, Math.min(ratio, 1)) : 0;
  return {
    shouldSample: ({ traceId }) => {
      if (clamped >= 1) return { decision: 'record_and_sample' };
      if (clamped <= 0) return { decision: 'drop' };
      const bucket = parseInt(traceId.slice(-RATIO_HEX_DIGITS), 16) / RATIO_SCALE;
      return { decision: bucket < clamped ? 'record_and_sample' : 'drop' };
    },
    description: () => `TraceIdRatioBased{${clamped}}`,
  };
}

/**
 * Follow the parent's sampled flag when there is a parent, otherwise ask `root`.
 */
export function parentBasedSampler(root: Sampler): Sampler {
  return {
    shouldSample: (params) => {
      const parent = params.parentContext;
      if (!parent || !parent.isValid()) {
        return root.shouldSample(params);
      }
      return { decision: parent.isSampled() ? 'record_and_sample' : 'drop' };
    },
    description: () => `ParentBased{root=${root.description()}}`,
  };
}
