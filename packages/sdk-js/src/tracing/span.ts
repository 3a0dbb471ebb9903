import type {
  Span,
  AttributeValue,
  Attributes,
  AttributesInput,
  InstrumentationScope,
  SpanData,
  SpanEvent,
  SpanKind,
  SpanLimits,
  SpanLink,
  SpanStatus,
  StatusCode,
  TimeInput,
} from '../types';
import type { Resource } from '../resource';
import { copyAttributeValue, isAttributeValue, sanitizeAttributes } from '../utils/attributes';
import { toEpochMillis } from '../utils/time';
import { SpanContext } from './span-context';

export interface SpanImplOptions {
  name: string;
  kind: SpanKind;
  spanContext: SpanContext;
  parentSpanId?: string;
  startTime: number;
  /** Used by end() when it is called without a timestamp */
  endTime?: number;
  attributes: Attributes;
  events: SpanEvent[];
  links: SpanLink[];
  status: SpanStatus;
  limits: SpanLimits;
  resource: Resource;
  instrumentationScope: InstrumentationScope;
  onEnd: (span: SpanImpl) => void;
}

/**
 * Recording span.
 *
 * Every mutator is a no-op once the span has ended.
 */
export class SpanImpl implements Span {
  readonly kind: SpanKind;
  readonly parentSpanId?: string;
  readonly startTime: number;
  readonly resource: Resource;
  readonly instrumentationScope: InstrumentationScope;

  private readonly context: SpanContext;
  private readonly limits: SpanLimits;
  private readonly presetEndTime?: number;
  private readonly onEnd: (span: SpanImpl) => void;

  private _name: string;
  private _status: SpanStatus;
  private _attributes: Attributes = {};
  private _events: SpanEvent[] = [];
  private _links: SpanLink[] = [];
  private _endTime: number | undefined;
  private _recording = true;
  private _droppedAttributes = 0;
  private _droppedEvents = 0;
  private _droppedLinks = 0;

  constructor(options: SpanImplOptions) {
    this._name = options.name;
    this.kind = options.kind;
    this.context = options.spanContext;
    this.parentSpanId = options.parentSpanId;
    this.startTime = options.startTime;
    this.presetEndTime = options.endTime;
    this.resource = options.resource;
    this.instrumentationScope = options.instrumentationScope;
    this.limits = options.limits;
    this.onEnd = options.onEnd;
    this._status = { ...options.status };

    this.setAttributes(options.attributes);
    for (const event of options.events) {
      this.pushEvent(event);
    }
    for (const link of options.links) {
      this.pushLink(link);
    }
  }

  setAttribute(key: string, value: AttributeValue | null | undefined): this {
    if (!this._recording) return this;
    if (key.length === 0 || !isAttributeValue(value)) return this;

    if (
      !Object.prototype.hasOwnProperty.call(this._attributes, key) &&
      Object.keys(this._attributes).length >= this.limits.maxAttributes
    ) {
      this._droppedAttributes++;
      return this;
    }
    this._attributes[key] = copyAttributeValue(value);
    return this;
  }

  setAttributes(attributes: AttributesInput): this {
    for (const [key, value] of Object.entries(attributes)) {
      this.setAttribute(key, value);
    }
    return this;
  }

  addEvent(name: string, attributes?: AttributesInput, timestamp?: TimeInput): this {
    if (!this._recording) return this;
    this.pushEvent({
      name,
      timestamp: timestamp === undefined ? Date.now() : toEpochMillis(timestamp),
      attributes: sanitizeAttributes(attributes),
    });
    return this;
  }

  addLink(context: SpanContext, attributes?: AttributesInput): this {
    if (!this._recording) return this;
    this.pushLink({ context, attributes: sanitizeAttributes(attributes) });
    return this;
  }

  setStatus(code: StatusCode, message = ''): this {
    if (!this._recording) return this;
    this._status = { code, message };
    return this;
  }

  updateName(name: string): this {
    if (!this._recording) return this;
    this._name = name;
    return this;
  }

  recordException(error: unknown, timestamp?: TimeInput): this {
    const attributes: Attributes = {};
    if (error instanceof Error) {
      attributes['exception.type'] = error.name;
      attributes['exception.message'] = error.message;
      if (error.stack) {
        attributes['exception.stacktrace'] = error.stack;
      }
    } else {
      attributes['exception.message'] = String(error);
    }
    return this.addEvent('exception', attributes, timestamp);
  }

  end(endTime?: TimeInput): void {
    if (!this._recording) return;

    this._endTime =
      endTime !== undefined ? toEpochMillis(endTime) : this.presetEndTime ?? Date.now();
    this._recording = false;
    this.onEnd(this);
  }

  isRecording(): boolean {
    return this._recording;
  }

  spanContext(): SpanContext {
    return this.context;
  }

  get name(): string {
    return this._name;
  }

  get ended(): boolean {
    return !this._recording;
  }

  get endTime(): number | undefined {
    return this._endTime;
  }

  get attributes(): Attributes {
    return { ...this._attributes };
  }

  get events(): SpanEvent[] {
    return [...this._events];
  }

  get links(): SpanLink[] {
    return [...this._links];
  }

  get status(): SpanStatus {
    return { ...this._status };
  }

  /**
   * Duration in milliseconds (0 if not ended)
   */
  get duration(): number {
    if (this._endTime === undefined) return 0;
    return this._endTime - this.startTime;
  }

  /**
   * Readonly snapshot for span processors
   */
  toSpanData(): SpanData {
    return {
      name: this._name,
      kind: this.kind,
      spanContext: this.context,
      parentSpanId: this.parentSpanId,
      startTime: this.startTime,
      endTime: this._endTime,
      status: { ...this._status },
      attributes: { ...this._attributes },
      events: this._events.map((event) => ({ ...event, attributes: { ...event.attributes } })),
      links: this._links.map((link) => ({ ...link, attributes: { ...link.attributes } })),
      resource: { ...this.resource.attributes },
      instrumentationScope: { ...this.instrumentationScope },
      droppedAttributesCount: this._droppedAttributes,
      droppedEventsCount: this._droppedEvents,
      droppedLinksCount: this._droppedLinks,
      ended: !this._recording,
    };
  }

  private pushEvent(event: SpanEvent): void {
    if (this._events.length >= this.limits.maxEvents) {
      this._droppedEvents++;
      return;
    }
    this._events.push(event);
  }

  private pushLink(link: SpanLink): void {
    if (this._links.length >= this.limits.maxLinks) {
      this._droppedLinks++;
      return;
    }
    this._links.push(link);
  }
}

/**
 * Non-recording span. Carries a span context so it still propagates, but
 * records nothing.
 */
export class NoopSpan implements Span {
  private readonly context: SpanContext;

  constructor(context: SpanContext = SpanContext.invalid()) {
    this.context = context;
  }

  setAttribute(_key: string, _value: AttributeValue | null | undefined): this {
    return this;
  }
  setAttributes(_attributes: AttributesInput): this {
    return this;
  }
  addEvent(_name: string, _attributes?: AttributesInput, _timestamp?: TimeInput): this {
    return this;
  }
  addLink(_context: SpanContext, _attributes?: AttributesInput): this {
    return this;
  }
  setStatus(_code: StatusCode, _message?: string): this {
    return this;
  }
  updateName(_name: string): this {
    return this;
  }
  recordException(_error: unknown, _timestamp?: TimeInput): this {
    return this;
  }
  end(_endTime?: TimeInput): void {}
  isRecording(): boolean {
    return false;
  }
  spanContext(): SpanContext {
    return this.context;
  }
}

/**
 * Sentinel returned wherever no span is active
 */
export const INVALID_SPAN: Span = new NoopSpan();
