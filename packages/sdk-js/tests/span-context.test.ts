import { describe, expect, it } from 'vitest';
import {
  INVALID_SPAN_ID,
  INVALID_TRACE_ID,
  RandomIdGenerator,
  isValidSpanId,
  isValidTraceId,
} from '../src/tracing/ids';
import { SpanContext } from '../src/tracing/span-context';
import { TraceState } from '../src/tracing/trace-state';
import { SPAN_ID, TRACE_ID } from './helpers';

describe('ids', () => {
  it('should generate valid ids', () => {
    const ids = new RandomIdGenerator();
    const traceId = ids.newTraceId();
    const spanId = ids.newSpanId();

    expect(/^[0-9a-f]{32}$/.test(traceId)).toBe(true);
    expect(/^[0-9a-f]{16}$/.test(spanId)).toBe(true);
  });

  it('should generate unique ids', () => {
    const generator = new RandomIdGenerator();
    const ids = new Set<string>();
    for (let i = 0; i < 100; i++) {
      ids.add(generator.newTraceId());
      ids.add(generator.newSpanId());
    }
    expect(ids.size).toBe(200);
  });

  it('should validate trace ids', () => {
    expect(isValidTraceId(TRACE_ID)).toBe(true);
    expect(isValidTraceId(INVALID_TRACE_ID)).toBe(false);
    expect(isValidTraceId(TRACE_ID.toUpperCase())).toBe(true);
    expect(isValidTraceId(TRACE_ID.slice(1))).toBe(false);
  });

  it('should validate span ids', () => {
    expect(isValidSpanId(SPAN_ID)).toBe(true);
    expect(isValidSpanId(INVALID_SPAN_ID)).toBe(false);
    expect(isValidSpanId('xyz0000000000000')).toBe(false);
  });
});

describe('SpanContext', () => {
  it('should expose an invalid singleton', () => {
    const invalid = SpanContext.invalid();

    expect(invalid).toBe(SpanContext.invalid());
    expect(invalid.isValid()).toBe(false);
    expect(invalid.isSampled()).toBe(false);
    expect(invalid.isRemote).toBe(false);
    expect(invalid.traceState.isEmpty()).toBe(true);
  });

  it('should create local contexts', () => {
    const context = SpanContext.create({ traceId: TRACE_ID, spanId: SPAN_ID, traceFlags: 1 });

    expect(context.isValid()).toBe(true);
    expect(context.isSampled()).toBe(true);
    expect(context.isRemote).toBe(false);
    expect(context.traceState).toBe(TraceState.empty());
  });

  it('should mark contexts from other processes as remote', () => {
    const context = SpanContext.remote({ traceId: TRACE_ID, spanId: SPAN_ID });

    expect(context.isRemote).toBe(true);
    expect(context.isSampled()).toBe(false);
  });

  it('should store ids in lowercase', () => {
    const local = SpanContext.create({ traceId: TRACE_ID.toUpperCase(), spanId: SPAN_ID.toUpperCase() });
    const remote = SpanContext.remote({ traceId: TRACE_ID.toUpperCase(), spanId: SPAN_ID.toUpperCase() });

    expect(local.traceId).toBe(TRACE_ID);
    expect(local.spanId).toBe(SPAN_ID);
    expect(remote.traceId).toBe(TRACE_ID);
    expect(remote.spanId).toBe(SPAN_ID);
    expect(remote.isValid()).toBe(true);
  });

  it('should keep trace flags to one byte', () => {
    const context = SpanContext.create({ traceId: TRACE_ID, spanId: SPAN_ID, traceFlags: 0x1ff });
    expect(context.traceFlags).toBe(0xff);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(SpanContext.create({ traceId: TRACE_ID, spanId: SPAN_ID }))).toBe(true);
  });
});

describe('TraceState', () => {
  it('should start empty', () => {
    const empty = TraceState.empty();
    expect(empty.size).toBe(0);
    expect(empty.isEmpty()).toBe(true);
    expect(TraceState.fromEntries([])).toBe(empty);
  });

  it('should return a new instance on set', () => {
    const original = TraceState.fromEntries([['vendor', 'a']]);
    const updated = original.set('other', 'b');

    expect(original.entries()).toEqual([['vendor', 'a']]);
    expect(updated.entries()).toEqual([
      ['vendor', 'a'],
      ['other', 'b'],
    ]);
  });

  it('should keep the position of a replaced key', () => {
    const state = TraceState.fromEntries([
      ['first', '1'],
      ['second', '2'],
    ]).set('first', 'one');

    expect(state.keys()).toEqual(['first', 'second']);
    expect(state.get('first')).toBe('one');
  });

  it('should return the same instance when nothing changes', () => {
    const state = TraceState.fromEntries([['vendor', 'a']]);
    expect(state.set('vendor', 'a')).toBe(state);
    expect(state.delete('missing')).toBe(state);
  });

  it('should delete keys', () => {
    const state = TraceState.fromEntries([
      ['vendor', 'a'],
      ['other', 'b'],
    ]);
    const removed = state.delete('vendor');

    expect(removed.has('vendor')).toBe(false);
    expect(removed.keys()).toEqual(['other']);
    expect(removed.delete('other')).toBe(TraceState.empty());
    expect(state.has('vendor')).toBe(true);
  });

  it('should keep the last value of duplicate entries', () => {
    const state = TraceState.fromEntries([
      ['vendor', 'a'],
      ['vendor', 'b'],
    ]);
    expect(state.size).toBe(1);
    expect(state.get('vendor')).toBe('b');
  });
});
