/**
 * Integer allocation of minor units
 *
 * All functions work on whole minor units and return parts that sum exactly
 * to the total they were given.
 */

export type RemainderTieBreak = 'first' | 'last';

export function isMinorUnits(value: number): boolean {
  return Number.isSafeInteger(value);
}

/**
 * Split `total` into `count` parts; the first `total % count` parts get one
 * extra unit.
 */
export function splitEvenly(total: number, count: number): number[] {
  if (count <= 0) {
    throw new RangeError('Cannot split across zero parts');
  }
  const base = Math.floor(total / count);
  const remainder = total - base * count;
  return Array.from({ length: count }, (_, index) => (index < remainder ? base + 1 : base));
}

/**
 * Split `total` in proportion to `weights` with the largest-remainder method.
 *
 * Each part is floor(total * weight / sum(weights)); the units lost to
 * flooring go one by one to the largest fractional remainders. Equal
 * remainders are ordered by position, earliest first or latest first
 * depending on `tieBreak`.
 */
export function allocateByWeights(
  total: number,
  weights: readonly number[],
  tieBreak: RemainderTieBreak = 'first'
): number[] {
  if (total < 0) {
    throw new RangeError('Cannot allocate a negative total');
  }
  const weightSum = weights.reduce((sum, weight) => sum + weight, 0);
  if (weightSum <= 0) {
    throw new RangeError('Cannot allocate against zero total weight');
  }

  const bigTotal = BigInt(total);
  const bigWeightSum = BigInt(weightSum);

  const parts: number[] = [];
  const remainders: Array<{ index: number; remainder: bigint }> = [];
  let allocated = 0;

  weights.forEach((weight, index) => {
    const product = bigTotal * BigInt(weight);
    const part = Number(product / bigWeightSum);
    parts.push(part);
    remainders.push({ index, remainder: product % bigWeightSum });
    allocated += part;
  });

  remainders.sort((a, b) => {
    if (a.remainder !== b.remainder) {
      return a.remainder > b.remainder ? -1 : 1;
    }
    return tieBreak === 'first' ? a.index - b.index : b.index - a.index;
  });

  let leftover = total - allocated;
  for (const { index } of remainders) {
    if (leftover <= 0) break;
    parts[index] = (parts[index] ?? 0) + 1;
    leftover -= 1;
  }

  return parts;
}

/**
 * Divide and round half away from zero (half-up on magnitudes)
 */
export function divideRoundHalfUp(numerator: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new RangeError('Denominator must be positive');
  }
  const negative = numerator < 0n;
  const magnitude = negative ? -numerator : numerator;
  const rounded = (magnitude * 2n + denominator) / (denominator * 2n);
  return negative ? -rounded : rounded;
}

export function pow10(exponent: number): bigint {
  let result = 1n;
  for (let i = 0; i < exponent; i++) {
    result *= 10n;
  }
  return result;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
