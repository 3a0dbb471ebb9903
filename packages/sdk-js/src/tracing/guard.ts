import { ContextGuardError, handleError } from '../errors';
import type { Context } from './context';
import type { ContextStorage } from './storage';

let strictGuards = false;

/**
 * When enabled, releasing a guard twice throws instead of being reported to
 * the error handler.
 */
export function setStrictGuards(enabled: boolean): void {
  strictGuards = enabled;
}

export function isStrictGuards(): boolean {
  return strictGuards;
}

/**
 * Single-use token returned by {@link Context.attach}.
 *
 * Release restores the context that was current when the guard was created,
 * whatever is current at release time.
 */
export class ContextGuard {
  private readonly storage: ContextStorage;
  private readonly prior: Context | undefined;
  private isReleased = false;

  constructor(storage: ContextStorage, prior: Context | undefined) {
    this.storage = storage;
    this.prior = prior;
  }

  get released(): boolean {
    return this.isReleased;
  }

  release(): void {
    if (this.isReleased) {
      const error = new ContextGuardError();
      if (strictGuards) throw error;
      handleError(error);
      return;
    }
    this.isReleased = true;
    this.storage.swap(this.prior);
  }
}
