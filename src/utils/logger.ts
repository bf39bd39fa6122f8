/**
 * logger.ts: tag-prefixed console logging
 *
 * Debug lines only appear when `verbose` is set; warnings and errors always do.
 */

export interface Logger {
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(tag: string, options: { verbose?: boolean } = {}): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => { if (options.verbose) console.log(prefix, ...args); },
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}
