/**
 * Diagnostic logger used by the SDK itself
 */
export interface DebugLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Debug logger. `log` and `warn` are silent unless enabled; `error` always prints.
 */
export function createDebugLogger(enabled: boolean): DebugLogger {
  return {
    log: (...args: unknown[]) => {
      if (enabled) console.log('[Spanline]', ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled) console.warn('[Spanline]', ...args);
    },
    error: (...args: unknown[]) => {
      console.error('[Spanline]', ...args);
    },
  };
}

let globalLogger: DebugLogger = createDebugLogger(false);

export function getLogger(): DebugLogger {
  return globalLogger;
}

export function setLogger(logger: DebugLogger): void {
  globalLogger = logger;
}
