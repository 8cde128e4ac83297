/**
 * Namespaced logging on top of `debug`.
 *
 * Enable output with `DEBUG=budlink:*` (or a narrower scope such as
 * `DEBUG=budlink:transfer:*`).
 */

import createDebug from 'debug';

export interface Logger {
  debug(formatter: string, ...args: unknown[]): void;
  info(formatter: string, ...args: unknown[]): void;
  warn(formatter: string, ...args: unknown[]): void;
  error(formatter: string, ...args: unknown[]): void;
}

const ROOT_NAMESPACE = 'budlink';

/**
 * Create a logger whose levels map to `budlink:<scope>:<level>` namespaces.
 */
export function createLogger(scope: string): Logger {
  const base = createDebug(`${ROOT_NAMESPACE}:${scope}`);
  const debug = base.extend('debug');
  const info = base.extend('info');
  const warn = base.extend('warn');
  const error = base.extend('error');

  return {
    debug: (formatter, ...args) => debug(formatter, ...args),
    info: (formatter, ...args) => info(formatter, ...args),
    warn: (formatter, ...args) => warn(formatter, ...args),
    error: (formatter, ...args) => error(formatter, ...args),
  };
}

/**
 * Render an unknown thrown value for a log line.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
