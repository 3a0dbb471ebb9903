import {
  INVALID_SPAN_ID,
  INVALID_TRACE_ID,
  TRACE_FLAG_NONE,
  TRACE_FLAG_SAMPLED,
  isValidSpanId,
  isValidTraceId,
  normalizeId,
} from './ids';
import { TraceState } from './trace-state';

export interface SpanContextInit {
  traceId: string;
  spanId: string;
  traceFlags?: number;
  traceState?: TraceState;
}

/**
 * Immutable, externally visible identity of a span. Ids are stored in
 * lowercase hex whatever case they were given in.
 *
 * `isRemote` is only ever true for contexts built through
 * {@link SpanContext.remote}, which is the entry point for propagators that
 * deserialize a context received from another process.
 */
export class SpanContext {
  private static readonly INVALID = new SpanContext(
    INVALID_TRACE_ID,
    INVALID_SPAN_ID,
    TRACE_FLAG_NONE,
    TraceState.empty(),
    false
  );

  readonly traceId: string;
  readonly spanId: string;
  readonly traceFlags: number;
  readonly traceState: TraceState;
  readonly isRemote: boolean;

  private constructor(
    traceId: string,
    spanId: string,
    traceFlags: number,
    traceState: TraceState,
    isRemote: boolean
  ) {
    this.traceId = traceId;
    this.spanId = spanId;
    this.traceFlags = traceFlags & 0xff;
    this.traceState = traceState;
    this.isRemote = isRemote;
    Object.freeze(this);
  }

  /**
   * Context for a span created in this process
   */
  static create(init: SpanContextInit): SpanContext {
    return new SpanContext(
      normalizeId(init.traceId),
      normalizeId(init.spanId),
      init.traceFlags ?? TRACE_FLAG_NONE,
      init.traceState ?? TraceState.empty(),
      false
    );
  }

  /**
   * Context received from another process
   */
  static remote(init: SpanContextInit): SpanContext {
    return new SpanContext(
      normalizeId(init.traceId),
      normalizeId(init.spanId),
      init.traceFlags ?? TRACE_FLAG_NONE,
      init.traceState ?? TraceState.empty(),
      true
    );
  }

  /**
   * All-zero identifiers, not sampled
   */
  static invalid(): SpanContext {
    return SpanContext.INVALID;
  }

  isValid(): boolean {
    return isValidTraceId(this.traceId) && isValidSpanId(this.spanId);
  }

  isSampled(): boolean {
    return (this.traceFlags & TRACE_FLAG_SAMPLED) !== 0;
  }
}
