/**
 * Property-Based Tests for @tally/money
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Construction round-trips the integer amount
 * 2. Integer addition and subtraction are inverses
 * 3. Money addition is commutative and associative
 * 4. round() always lands on a whole major unit within half a unit
 * 5. floorDivide and divide agree with exact rational arithmetic
 * 6. Comparison is consistent with the amounts
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Money } from "../src/money.js";
import { floorDiv } from "../src/rounding.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** Amounts well beyond the float-safe range, both signs. */
const arbAmount = fc.bigInt({ min: -(10n ** 24n), max: 10n ** 24n });

/** Non-zero integer divisors. */
const arbDivisor = fc.bigInt({ min: -1_000_000n, max: 1_000_000n }).filter((d) => d !== 0n);

const arbMoney: fc.Arbitrary<Money> = arbAmount.map((amount) => new Money(amount));

// =============================================================================
// Property: Construction
// =============================================================================

describe("property: construction", () => {
  it("toInteger returns the constructed amount", () => {
    fc.assert(
      fc.property(arbAmount, (a) => {
        expect(new Money(a).toInteger()).toBe(a);
      }),
      { numRuns: 500 },
    );
  });

  it("instance(a) equals new Money(a)", () => {
    fc.assert(
      fc.property(arbMoney, arbAmount, (m, a) => {
        expect(m.instance(a).equals(new Money(a))).toBe(true);
      }),
      { numRuns: 500 },
    );
  });
});

// =============================================================================
// Property: Arithmetic Laws
// =============================================================================

describe("property: money arithmetic laws", () => {
  it("(m + k) - k = m", () => {
    fc.assert(
      fc.property(arbMoney, arbAmount, (m, k) => {
        expect(m.add(k).subtract(k).equals(m)).toBe(true);
      }),
      { numRuns: 500 },
    );
  });

  it("(m - k) + k = m", () => {
    fc.assert(
      fc.property(arbMoney, arbAmount, (m, k) => {
        expect(m.subtract(k).add(k).equals(m)).toBe(true);
      }),
      { numRuns: 500 },
    );
  });

  it("addition is commutative: a + b = b + a", () => {
    fc.assert(
      fc.property(arbMoney, arbMoney, (a, b) => {
        expect(a.add(b).equals(b.add(a))).toBe(true);
      }),
      { numRuns: 500 },
    );
  });

  it("addition is associative: (a + b) + c = a + (b + c)", () => {
    fc.assert(
      fc.property(arbMoney, arbMoney, arbMoney, (a, b, c) => {
        expect(a.add(b).add(c).equals(a.add(b.add(c)))).toBe(true);
      }),
      { numRuns: 500 },
    );
  });

  it("subtractFrom is the reflected subtract: k - m = -(m - k)", () => {
    fc.assert(
      fc.property(arbMoney, arbAmount, (m, k) => {
        expect(m.subtractFrom(k).equals(m.subtract(k).negate())).toBe(true);
      }),
      { numRuns: 500 },
    );
  });

  it("abs is never negative and keeps the magnitude", () => {
    fc.assert(
      fc.property(arbMoney, (m) => {
        const abs = m.abs();
        expect(abs.isNegative()).toBe(false);
        expect(abs.equals(m) || abs.equals(m.negate())).toBe(true);
      }),
      { numRuns: 500 },
    );
  });
});

// =============================================================================
// Property: Rounding & Division
// =============================================================================

describe("property: rounding and division", () => {
  it("round() lands on a whole unit no more than half a unit away", () => {
    fc.assert(
      fc.property(arbMoney, (m) => {
        const rounded = m.round().amount;
        const distance = rounded - m.amount;
        expect(rounded % 100n).toBe(0n);
        expect(distance <= 50n && distance >= -50n).toBe(true);
      }),
      { numRuns: 500 },
    );
  });

  it("round() sends exact half units to an even unit", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: -(10n ** 12n), max: 10n ** 12n }), (units) => {
        const rounded = new Money(units * 100n + 50n).round().amount;
        expect((rounded / 100n) % 2n).toBe(0n);
      }),
      { numRuns: 500 },
    );
  });

  it("floorDivide(d) * d + remainder reconstructs the amount", () => {
    fc.assert(
      fc.property(arbMoney, arbDivisor, (m, d) => {
        const q = m.floorDivide(d).amount;
        const remainder = m.amount - q * d;
        expect(q).toBe(floorDiv(m.amount, d));
        // remainder takes the divisor's sign
        expect(remainder === 0n || remainder < 0n === d < 0n).toBe(true);
      }),
      { numRuns: 500 },
    );
  });

  it("divide(d) is within half a unit of the exact quotient", () => {
    fc.assert(
      fc.property(arbMoney, arbDivisor, (m, d) => {
        const q = m.divide(d).amount;
        // |q·d − a| ≤ |d| / 2, scaled by 2 to stay in integers
        const error = 2n * (q * d - m.amount);
        const bound = d < 0n ? -d : d;
        expect(error <= bound && error >= -bound).toBe(true);
      }),
      { numRuns: 500 },
    );
  });
});

// =============================================================================
// Property: Comparison
// =============================================================================

describe("property: comparison", () => {
  it("compareTo agrees with the amounts", () => {
    fc.assert(
      fc.property(arbMoney, arbMoney, (a, b) => {
        const expected = a.amount < b.amount ? -1 : a.amount > b.amount ? 1 : 0;
        expect(a.compareTo(b)).toBe(expected);
        expect(a.lessThan(b)).toBe(expected === -1);
        expect(a.greaterThanOrEqual(b)).toBe(expected !== -1);
      }),
      { numRuns: 500 },
    );
  });
});
