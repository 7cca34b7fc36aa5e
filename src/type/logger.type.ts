/**
 * Logger Interface
 *
 * Pluggable logger for the few places the tree degrades instead of failing
 * (unresolvable keys during lookup or rendering). `console` satisfies it.
 *
 * Default: no-op. Call setLogger() at startup to wire one in.
 */
export interface Logger {
  debug(msg: string): void;
  warn(msg: string): void;
}

const noop = () => {};

/** Module-level logger. Always callable, silent until replaced. */
export const logger: Logger = { debug: noop, warn: noop };

/** Replace the logger implementation. */
export function setLogger(impl: Logger): void {
  logger.debug = impl.debug.bind(impl);
  logger.warn = impl.warn.bind(impl);
}

/** Restore the silent default. */
export function resetLogger(): void {
  logger.debug = noop;
  logger.warn = noop;
}
