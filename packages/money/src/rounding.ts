/**
 * @tally/money — Integer division and rounding.
 *
 * Exact helpers over bigint, plus round-half-even for the
 * floating-point products and quotients of float operands.
 *
 * Rules:
 * - Ties go to the even neighbour (banker's rounding)
 * - Floor division rounds toward negative infinity, not toward zero
 * - Divisors are assumed non-zero; callers raise DIVISION_BY_ZERO first
 */

/**
 * Integer division rounding toward negative infinity.
 *
 * bigint `/` truncates toward zero, so a non-exact quotient with
 * operands of opposite sign is one too high.
 *
 * floorDiv(7n, 2n) → 3n
 * floorDiv(-7n, 2n) → -4n
 */
export function floorDiv(dividend: bigint, divisor: bigint): bigint {
  const quotient = dividend / divisor;
  const inexact = dividend % divisor !== 0n;
  return inexact && (dividend < 0n) !== (divisor < 0n) ? quotient - 1n : quotient;
}

/**
 * Exact quotient of two integers, rounded half to even.
 *
 * divideHalfEven(1000n, 3n) → 333n
 * divideHalfEven(5n, 2n) → 2n
 * divideHalfEven(15n, 2n) → 8n
 * divideHalfEven(-5n, 2n) → -2n
 */
export function divideHalfEven(dividend: bigint, divisor: bigint): bigint {
  const n = divisor < 0n ? -dividend : dividend;
  const d = divisor < 0n ? -divisor : divisor;

  const floor = floorDiv(n, d);
  // 0 <= remainder < d
  const twiceRemainder = 2n * (n - floor * d);

  if (twiceRemainder < d) return floor;
  if (twiceRemainder > d) return floor + 1n;
  return floor % 2n === 0n ? floor : floor + 1n;
}

/**
 * Round a finite number to the nearest integer, ties to even.
 *
 * Math.round sends ties toward positive infinity (-2.5 → -2, 2.5 → 3);
 * this sends them to the even neighbour (-2.5 → -2, 2.5 → 2).
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;

  if (fraction < 0.5) return floor;
  if (fraction > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}
