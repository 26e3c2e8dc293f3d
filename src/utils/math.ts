/**
 * Fixed-width integer helpers.
 *
 * Everything here works on bigint so that widths above 53 bits behave
 * exactly; results that would leave a width saturate at its bounds.
 */

export enum Rounding {
  ROUND_DOWN,
  ROUND_FLOOR,
  ROUND_UP,
}

/** Largest unsigned value representable in `bits` bits. */
export function maxUint(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n;
}

/** Smallest signed value representable in `bits` bits. */
export function minInt(bits: number): bigint {
  return -(1n << BigInt(bits - 1));
}

/** Largest signed value representable in `bits` bits. */
export function maxInt(bits: number): bigint {
  return (1n << BigInt(bits - 1)) - 1n;
}

export function fitsUint(value: bigint | number, bits: number): boolean {
  const v = BigInt(value);
  return v >= 0n && v <= maxUint(bits);
}

export function fitsInt(value: bigint | number, bits: number): boolean {
  const v = BigInt(value);
  return v >= minInt(bits) && v <= maxInt(bits);
}

export function clampBigInt(value: bigint, lo: bigint, hi: bigint): bigint {
  if (value < lo) return lo;
  if (value > hi) return hi;
  return value;
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.min(Math.max(value, lo), hi);
}

export function absBigInt(value: bigint): bigint {
  return value < 0n ? -value : value;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * Unsigned add clamped to `max`.
 */
export function saturatingAdd(a: bigint, b: bigint, max: bigint): bigint {
  const sum = a + b;
  return sum > max ? max : sum;
}

/**
 * Unsigned subtract clamped at zero.
 */
export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

/**
 * Signed add clamped to the range of an int of `bits` bits.
 */
export function saturatingAddSigned(a: bigint, b: bigint, bits: number): bigint {
  return clampBigInt(a + b, minInt(bits), maxInt(bits));
}

/**
 * Compute a * b / denominator with the requested rounding.
 *
 * ROUND_DOWN truncates toward zero, ROUND_FLOOR toward negative infinity
 * and ROUND_UP away from zero.
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denominator: bigint,
  rounding: Rounding = Rounding.ROUND_DOWN,
): bigint {
  if (denominator === 0n) {
    throw new RangeError("mulDiv: division by zero");
  }
  const product = a * b;
  return divide(product, denominator, rounding);
}

/**
 * Integer division with explicit rounding.
 */
export function divide(
  numerator: bigint,
  denominator: bigint,
  rounding: Rounding = Rounding.ROUND_DOWN,
): bigint {
  if (denominator === 0n) {
    throw new RangeError("divide: division by zero");
  }
  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  if (remainder === 0n) return quotient;

  const negative = (numerator < 0n) !== (denominator < 0n);
  switch (rounding) {
    case Rounding.ROUND_DOWN:
      return quotient;
    case Rounding.ROUND_FLOOR:
      return negative ? quotient - 1n : quotient;
    case Rounding.ROUND_UP:
      return negative ? quotient - 1n : quotient + 1n;
  }
}

/**
 * Convert a bigint known to be in safe-integer range back to number.
 */
export function toSafeNumber(value: bigint): number {
  if (
    value > BigInt(Number.MAX_SAFE_INTEGER) ||
    value < BigInt(Number.MIN_SAFE_INTEGER)
  ) {
    throw new RangeError(`Value ${value} exceeds safe integer range`);
  }
  return Number(value);
}
