import type { Span } from '../types';
import { ContextGuard } from './guard';
import { INVALID_SPAN } from './span';
import { getContextStorage } from './storage';

/**
 * Typed slot in a {@link Context}. Keys compare by identity.
 */
export class ContextKey<T> {
  readonly description: string;
  private readonly values = new WeakMap<Context, T>();

  constructor(description: string) {
    this.description = description;
  }

  /** @internal */
  assign(context: Context, value: T): void {
    this.values.set(context, value);
  }

  /** @internal */
  isAssigned(context: Context): boolean {
    return this.values.has(context);
  }

  /** @internal */
  lookup(context: Context): T | undefined {
    return this.values.get(context);
  }
}

export function createContextKey<T>(description: string): ContextKey<T> {
  return new ContextKey<T>(description);
}

const SPAN_KEY = createContextKey<Span>('spanline.active-span');

/**
 * Immutable snapshot of ambient state for a thread of control.
 *
 * Every derived context points back at the context it was derived from;
 * lookups walk that chain. The chain is never exposed.
 */
export class Context {
  private static readonly ROOT = new Context(undefined);

  private readonly parent: Context | undefined;

  private constructor(parent: Context | undefined) {
    this.parent = parent;
    Object.freeze(this);
  }

  /**
   * Empty context: no active span, no values
   */
  static root(): Context {
    return Context.ROOT;
  }

  /**
   * Context active for the calling thread of control
   */
  static current(): Context {
    return getContextStorage().get() ?? Context.ROOT;
  }

  static currentWithSpan(span: Span): Context {
    return Context.current().withSpan(span);
  }

  getValue<T>(key: ContextKey<T>): T | undefined {
    for (let node: Context | undefined = this; node; node = node.parent) {
      if (key.isAssigned(node)) return key.lookup(node);
    }
    return undefined;
  }

  withValue<T>(key: ContextKey<T>, value: T): Context {
    const next = new Context(this);
    key.assign(next, value);
    return next;
  }

  /**
   * Active span, or the invalid sentinel span when there is none
   */
  span(): Span {
    return this.getValue(SPAN_KEY) ?? INVALID_SPAN;
  }

  hasActiveSpan(): boolean {
    return this.getValue(SPAN_KEY) !== undefined;
  }

  withSpan(span: Span): Context {
    return this.withValue(SPAN_KEY, span);
  }

  /**
   * Make this context current. The returned guard must be released exactly once.
   */
  attach(): ContextGuard {
    const storage = getContextStorage();
    const prior = storage.swap(this);
    return new ContextGuard(storage, prior);
  }

  /**
   * Run `fn` with this context current, including every asynchronous
   * continuation started inside it.
   */
  run<A extends unknown[], R>(fn: (...args: A) => R, ...args: A): R {
    return getContextStorage().run(this, fn, ...args);
  }
}
