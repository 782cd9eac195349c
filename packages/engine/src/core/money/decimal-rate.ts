/**
 * Decimal rate strings as scaled integers
 */

import { LEDGER_CONFIG } from '@splitledger/shared';
import { LedgerError } from '../errors';

const RATE_PATTERN = /^[0-9]+(\.[0-9]+)?$/;

export interface ScaledRate {
  value: bigint; // rate * 10^scale, truncated past `scale` digits
  scale: number;
}

export function parseRate(rate: string, scale: number = LEDGER_CONFIG.RATE_SCALE): ScaledRate {
  const trimmed = rate.trim();
  if (!RATE_PATTERN.test(trimmed)) {
    throw new LedgerError('InvalidInput', `Rate must be a positive decimal string, got "${rate}"`, {
      rate,
    });
  }
  const [intPart = '0', fracPart = ''] = trimmed.split('.');
  const frac = (fracPart + '0'.repeat(scale)).slice(0, scale);
  const value = BigInt(intPart + frac);
  if (value === 0n) {
    throw new LedgerError('InvalidInput', `Rate must be greater than zero, got "${rate}"`, { rate });
  }
  return { value, scale };
}

/**
 * Render a scaled rate back to a decimal string with trailing zeros removed
 */
export function formatRate({ value, scale }: ScaledRate): string {
  const digits = value.toString().padStart(scale + 1, '0');
  const intPart = digits.slice(0, digits.length - scale);
  const fracPart = digits.slice(digits.length - scale).replace(/0+$/, '');
  return fracPart ? `${intPart}.${fracPart}` : intPart;
}
