import { getRandomValues } from 'node:crypto';

/**
 * Trace flags
 */
export const TRACE_FLAG_NONE = 0x00;
export const TRACE_FLAG_SAMPLED = 0x01;

export const INVALID_TRACE_ID = '00000000000000000000000000000000';
export const INVALID_SPAN_ID = '0000000000000000';

const TRACE_ID_PATTERN = /^[0-9a-f]{32}$/i;
const SPAN_ID_PATTERN = /^[0-9a-f]{16}$/i;

/**
 * Check that a trace ID is 32 hex characters (either case) and not all zeros
 */
export function isValidTraceId(traceId: string): boolean {
  return TRACE_ID_PATTERN.test(traceId) && traceId !== INVALID_TRACE_ID;
}

/**
 * Check that a span ID is 16 hex characters (either case) and not all zeros
 */
export function isValidSpanId(spanId: string): boolean {
  return SPAN_ID_PATTERN.test(spanId) && spanId !== INVALID_SPAN_ID;
}

/**
 * Canonical lowercase form of a hex id
 */
export function normalizeId(id: string): string {
  return id.toLowerCase();
}

/**
 * Source of trace and span identifiers
 */
export interface IdGenerator {
  /** 32 hex characters (16 bytes) */
  newTraceId(): string;
  /** 16 hex characters (8 bytes) */
  newSpanId(): string;
}

/**
 * Random identifiers from the crypto RNG. An all-zero draw is retried.
 */
export class RandomIdGenerator implements IdGenerator {
  newTraceId(): string {
    return randomHex(16, INVALID_TRACE_ID);
  }

  newSpanId(): string {
    return randomHex(8, INVALID_SPAN_ID);
  }
}

function randomHex(byteLength: number, invalid: string): string {
  let id = invalid;
  while (id === invalid) {
    const bytes = new Uint8Array(byteLength);
    getRandomValues(bytes);
    id = Array.from(bytes)
      .map((b) => b.toString(16).padStart(2, '0'))
      .join('');
  }
  return id;
}
