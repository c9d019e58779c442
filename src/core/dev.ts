const LOG_PREFIX = '[Switchyard]';

let isDevMode = true;

/**
 * Optional global error handler.
 *
 * Switchyard keeps rendering even when a view, a render pass or a listener throws.
 * If no handler is set, errors are logged to the console.
 */
let errorHandler: ((error: Error, source: string) => void) | null = null;

const warnedMessages = new Set<string>();

export function setDevMode(enabled: boolean): void {
  isDevMode = enabled;
}

export function isInDevMode(): boolean {
  return isDevMode;
}

/**
 * Sets a global error handler for recovered failures.
 *
 * @example
 * setErrorHandler((err, src) => report(err, { source: src }));
 */
export function setErrorHandler(handler: ((error: Error, source: string) => void) | null): void {
  errorHandler = handler;
}

/** Normalizes unknown throws and routes them to the global handler (or console). */
export function reportError(error: unknown, source: string): void {
  const err = error instanceof Error ? error : new Error(String(error));
  if (errorHandler) errorHandler(err, source);
  else console.error(`${LOG_PREFIX} Error in ${source}:`, err);
}

/** Dev-only warning, printed once per distinct message. */
export function warnDev(message: string): void {
  if (!isDevMode) return;
  if (warnedMessages.has(message)) return;
  warnedMessages.add(message);
  console.warn(`${LOG_PREFIX} ${message}`);
}

/** Clears the warn-once memory. Intended for tests. */
export function resetDevWarnings(): void {
  warnedMessages.clear();
}

export function formatMessage(message: string): string {
  return `${LOG_PREFIX} ${message}`;
}
