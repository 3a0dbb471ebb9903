import type { Context } from './context';

/**
 * Iterator whose every resumption step runs with a bound context
 */
export interface BoundIterator<T, TReturn, TNext> extends Iterator<T, TReturn, TNext> {
  [Symbol.iterator](): BoundIterator<T, TReturn, TNext>;
}

export interface BoundAsyncIterator<T, TReturn, TNext> extends AsyncIterator<T, TReturn, TNext> {
  [Symbol.asyncIterator](): BoundAsyncIterator<T, TReturn, TNext>;
}

/**
 * Wrap `fn` so that every call runs with `context` current
 */
export function bindContext<A extends unknown[], R>(
  context: Context,
  fn: (...args: A) => R
): (...args: A) => R {
  return (...args: A) => context.run(fn, ...args);
}

/**
 * Attach `context` for one resumption step and release it before control
 * returns to the caller. A guard is never held across a suspension point.
 */
function step<R>(context: Context, resume: () => R): R {
  const guard = context.attach();
  try {
    return resume();
  } finally {
    guard.release();
  }
}

/**
 * Wrap a generator or iterator so that each `next`, `throw` and `return`
 * runs with `context` current.
 *
 * @example
 * ```typescript
 * function* batches() {
 *   // Context.current() is `cx` here, on every resumption
 *   yield Context.current().span();
 * }
 * for (const span of bindIterator(cx, batches())) {
 *   // and the caller's context here
 * }
 * ```
 */
export function bindIterator<T, TReturn, TNext>(
  context: Context,
  iterator: Iterator<T, TReturn, TNext>
): BoundIterator<T, TReturn, TNext> {
  const bound: BoundIterator<T, TReturn, TNext> = {
    next: (...args: [] | [TNext]) => step(context, () => iterator.next(...args)),
    [Symbol.iterator]: () => bound,
  };

  const { return: ret, throw: thr } = iterator;
  if (ret) {
    bound.return = (value?: TReturn) => step(context, () => ret.call(iterator, value));
  }
  if (thr) {
    bound.throw = (error?: unknown) => step(context, () => thr.call(iterator, error));
  }
  return bound;
}

/**
 * Async counterpart of {@link bindIterator}. Each step attaches `context`
 * while the iterator runs synchronously up to its first `await`; the
 * asynchronous continuations it schedules keep `context`, and the caller's
 * context is back in place as soon as the step returns its promise.
 */
export function bindAsyncIterator<T, TReturn, TNext>(
  context: Context,
  iterator: AsyncIterator<T, TReturn, TNext>
): BoundAsyncIterator<T, TReturn, TNext> {
  const bound: BoundAsyncIterator<T, TReturn, TNext> = {
    next: (...args: [] | [TNext]) => step(context, () => iterator.next(...args)),
    [Symbol.asyncIterator]: () => bound,
  };

  const { return: ret, throw: thr } = iterator;
  if (ret) {
    bound.return = (value?: TReturn | PromiseLike<TReturn>) =>
      step(context, () => ret.call(iterator, value));
  }
  if (thr) {
    bound.throw = (error?: unknown) => step(context, () => thr.call(iterator, error));
  }
  return bound;
}
