/**
 * Debug logging.
 *
 * `debug('[Scope] message %s', value)` writes to stderr only when
 * DECKWRIGHT_DEBUG is set (any value except '', '0' or 'false') or after
 * setDebugEnabled(true). Format specifiers follow util.format.
 */

import { format } from 'node:util';

let enabledOverride: boolean | null = null;

export function setDebugEnabled(enabled: boolean | null): void {
  enabledOverride = enabled;
}

export function isDebugEnabled(): boolean {
  if (enabledOverride !== null) return enabledOverride;
  const flag = process.env['DECKWRIGHT_DEBUG'];
  return flag !== undefined && flag !== '' && flag !== '0' && flag.toLowerCase() !== 'false';
}

export function debug(message: string, ...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  process.stderr.write(`${new Date().toISOString()} ${format(message, ...args)}\n`);
}
