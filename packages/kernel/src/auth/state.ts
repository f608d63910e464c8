/**
 * xferctl Kernel — Authorization State Nonce
 *
 * Format: `xferctl-<monotonic nanoseconds>-<16 random bytes, hex>`.
 * The monotonic part makes successive values distinct within a process;
 * the random suffix makes them unpredictable to anyone else.
 */

import { randomBytes } from 'node:crypto';

export const STATE_PREFIX = 'xferctl';

export function generateState(): string {
  const nanos = process.hrtime.bigint();
  const suffix = randomBytes(16).toString('hex');
  return `${STATE_PREFIX}-${nanos.toString()}-${suffix}`;
}
