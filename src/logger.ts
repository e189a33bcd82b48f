/**
 * Diagnostic logging, built on `debug`.
 *
 * Every namespace lives under `reconnecting-ws:`. Enable with
 * `DEBUG=reconnecting-ws:*`, or force per socket with the builder's `logging`.
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';

export const LOG_NAMESPACE = 'reconnecting-ws';

export function createLogger(scope: string, enabled?: boolean): Debugger {
  const log = createDebug(`${LOG_NAMESPACE}:${scope}`);
  if (enabled !== undefined) {
    log.enabled = enabled;
  }
  return log;
}
