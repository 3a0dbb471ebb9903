import { CollaboratorError, handleError } from '../errors';
import type { Context } from './context';
import type { SpanImpl } from './span';

/**
 * Hooks called when recording spans start and end
 */
export interface SpanProcessor {
  onStart(span: SpanImpl, parentContext: Context): void;
  onEnd(span: SpanImpl): void;
  forceFlush(): Promise<void>;
  shutdown(): Promise<void>;
}

export class NoopSpanProcessor implements SpanProcessor {
  onStart(_span: SpanImpl, _parentContext: Context): void {}
  onEnd(_span: SpanImpl): void {}
  async forceFlush(): Promise<void> {}
  async shutdown(): Promise<void> {}
}

/**
 * Fans every hook out to a list of processors. A processor that throws or
 * rejects is reported to the error handler and the others still run.
 */
export class MultiSpanProcessor implements SpanProcessor {
  private readonly processors: SpanProcessor[];

  constructor(processors: SpanProcessor[] = []) {
    this.processors = [...processors];
  }

  add(processor: SpanProcessor): void {
    this.processors.push(processor);
  }

  get size(): number {
    return this.processors.length;
  }

  onStart(span: SpanImpl, parentContext: Context): void {
    for (const processor of this.processors) {
      try {
        processor.onStart(span, parentContext);
      } catch (error) {
        handleError(new CollaboratorError('spanProcessor', error));
      }
    }
  }

  onEnd(span: SpanImpl): void {
    for (const processor of this.processors) {
      try {
        processor.onEnd(span);
      } catch (error) {
        handleError(new CollaboratorError('spanProcessor', error));
      }
    }
  }

  forceFlush(): Promise<void> {
    return this.settle((processor) => processor.forceFlush());
  }

  shutdown(): Promise<void> {
    return this.settle((processor) => processor.shutdown());
  }

  private async settle(call: (processor: SpanProcessor) => Promise<void>): Promise<void> {
    const results = await Promise.allSettled(
      this.processors.map((processor) => {
        try {
          return call(processor);
        } catch (error) {
          return Promise.reject(error);
        }
      })
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        handleError(new CollaboratorError('spanProcessor', result.reason));
      }
    }
  }
}
