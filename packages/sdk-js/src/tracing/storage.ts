import { AsyncLocalStorage } from 'node:async_hooks';
import type { Context } from './context';

/**
 * Cell holding the current context of one thread of control.
 *
 * AsyncLocalContextStorage gives every asynchronous execution chain its own
 * cell. SimpleContextStorage shares one module-level cell and is only correct
 * for synchronous code.
 */
export interface ContextStorage {
  get(): Context | undefined;
  /** Replace the current context, returning the one it replaces */
  swap(context: Context | undefined): Context | undefined;
  run<A extends unknown[], R>(context: Context, fn: (...args: A) => R, ...args: A): R;
}

/**
 * Storage using a module-level variable.
 */
export class SimpleContextStorage implements ContextStorage {
  private current: Context | undefined;

  get(): Context | undefined {
    return this.current;
  }

  swap(context: Context | undefined): Context | undefined {
    const prev = this.current;
    this.current = context;
    return prev;
  }

  run<A extends unknown[], R>(context: Context, fn: (...args: A) => R, ...args: A): R {
    const prev = this.swap(context);
    try {
      return fn(...args);
    } finally {
      this.current = prev;
    }
  }
}

/**
 * AsyncLocalStorage-backed context storage.
 */
export class AsyncLocalContextStorage implements ContextStorage {
  private readonly als = new AsyncLocalStorage<Context | undefined>();

  get(): Context | undefined {
    return this.als.getStore();
  }

  swap(context: Context | undefined): Context | undefined {
    const prev = this.als.getStore();
    // enterWith() sets the store for the remainder of the current
    // synchronous execution and the async resources created from it.
    this.als.enterWith(context);
    return prev;
  }

  run<A extends unknown[], R>(context: Context, fn: (...args: A) => R, ...args: A): R {
    return this.als.run(context, fn, ...args);
  }
}

let contextStorage: ContextStorage = new AsyncLocalContextStorage();

export function getContextStorage(): ContextStorage {
  return contextStorage;
}

/**
 * Install a different storage. Contexts attached in the previous storage are
 * not carried over.
 */
export function setContextStorage(storage: ContextStorage): void {
  contextStorage = storage;
}
