/**
 * Mockwork Kernel — Call Count Ranges
 *
 * Inclusive range of acceptable call counts for Verifier.verifyCalls().
 */

export class Times {
  private constructor(
    readonly min: number,
    readonly max: number,
  ) {}

  static never(): Times {
    return new Times(0, 0);
  }

  static once(): Times {
    return new Times(1, 1);
  }

  static exactly(n: number): Times {
    Times.assertCount(n);
    return new Times(n, n);
  }

  static atLeast(n: number): Times {
    Times.assertCount(n);
    return new Times(n, Number.POSITIVE_INFINITY);
  }

  static atMost(n: number): Times {
    Times.assertCount(n);
    return new Times(0, n);
  }

  /**
   * @throws {RangeError} If either bound is not a non-negative integer or
   *   `min > max`
   */
  static between(min: number, max: number): Times {
    Times.assertCount(min);
    Times.assertCount(max);
    if (min > max) {
      throw new RangeError(`Invalid call count range: ${min} > ${max}`);
    }
    return new Times(min, max);
  }

  allows(count: number): boolean {
    return count >= this.min && count <= this.max;
  }

  toString(): string {
    if (this.min === this.max) {
      return this.min === 1 ? 'exactly once' : `exactly ${this.min} times`;
    }
    if (this.max === Number.POSITIVE_INFINITY) {
      return this.min === 1 ? 'at least once' : `at least ${this.min} times`;
    }
    if (this.min === 0) {
      return this.max === 1 ? 'at most once' : `at most ${this.max} times`;
    }
    return `between ${this.min} and ${this.max} times`;
  }

  private static assertCount(n: number): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`Call count must be a non-negative integer, got ${n}`);
    }
  }
}
