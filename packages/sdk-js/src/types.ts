/**
 * Spanline SDK Type Definitions
 */

import type { SpanContext } from './tracing/span-context';

// ===========================================
// Attribute Types
// ===========================================

export type AttributePrimitive = string | number | boolean;

export type AttributeValue =
  | AttributePrimitive
  | string[]
  | number[]
  | boolean[];

export type Attributes = Record<string, AttributeValue>;

/**
 * Attributes as accepted from callers; nullish values are skipped
 */
export type AttributesInput = Record<string, AttributeValue | null | undefined>;

// ===========================================
// Span Types
// ===========================================

export type SpanKind = 'internal' | 'server' | 'client' | 'producer' | 'consumer';

export type StatusCode = 'unset' | 'ok' | 'error';

export interface SpanStatus {
  code: StatusCode;
  message: string;
}

/** Milliseconds since the epoch, or a Date */
export type TimeInput = number | Date;

export interface SpanEvent {
  name: string;
  /** Milliseconds since the epoch */
  timestamp: number;
  attributes: Attributes;
}

export interface SpanLink {
  context: SpanContext;
  attributes: Attributes;
}

export interface SpanLimits {
  maxAttributes: number;
  maxEvents: number;
  maxLinks: number;
}

export interface InstrumentationScope {
  name: string;
  version?: string;
}

/**
 * Span capability handle
 */
export interface Span {
  /** Set a single attribute */
  setAttribute(key: string, value: AttributeValue | null | undefined): this;
  /** Set multiple attributes */
  setAttributes(attributes: AttributesInput): this;
  /** Add a timestamped event */
  addEvent(name: string, attributes?: AttributesInput, timestamp?: TimeInput): this;
  /** Link to another span context */
  addLink(context: SpanContext, attributes?: AttributesInput): this;
  /** Set span status */
  setStatus(code: StatusCode, message?: string): this;
  /** Rename the span */
  updateName(name: string): this;
  /** Record an error as an `exception` event */
  recordException(error: unknown, timestamp?: TimeInput): this;
  /** End the span; calls after the first are ignored */
  end(endTime?: TimeInput): void;
  /** Check if span is recording */
  isRecording(): boolean;
  /** Get span context for propagation */
  spanContext(): SpanContext;
}

/**
 * Readonly snapshot of a recorded span, as handed to span processors
 */
export interface SpanData {
  name: string;
  kind: SpanKind;
  spanContext: SpanContext;
  parentSpanId?: string;
  startTime: number;
  endTime?: number;
  status: SpanStatus;
  attributes: Attributes;
  events: SpanEvent[];
  links: SpanLink[];
  resource: Attributes;
  instrumentationScope: InstrumentationScope;
  droppedAttributesCount: number;
  droppedEventsCount: number;
  droppedLinksCount: number;
  ended: boolean;
}
