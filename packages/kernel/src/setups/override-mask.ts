/**
 * Mockwork Kernel — Override Mask
 *
 * Growable bit set over setup positions. A set bit means "this setup is
 * known to be overridden by a newer duplicate", letting registry scans skip
 * it without repeating the expectation-identity check.
 *
 * There is no upper bound on the number of positions tracked.
 */

const BITS_PER_WORD = 32;

export class OverrideMask {
  private words: Uint32Array = new Uint32Array(0);

  /** True if position `index` has been marked. Unmarked beyond capacity. */
  has(index: number): boolean {
    const word = index >>> 5;
    if (word >= this.words.length) return false;
    return ((this.words[word] ?? 0) & (1 << (index & 31))) !== 0;
  }

  mark(index: number): void {
    const word = index >>> 5;
    if (word >= this.words.length) {
      this.grow(word + 1);
    }
    this.words[word] = (this.words[word] ?? 0) | (1 << (index & 31));
  }

  /** Number of marked positions. */
  size(): number {
    let total = 0;
    for (const w of this.words) {
      let v = w;
      while (v !== 0) {
        v &= v - 1;
        total++;
      }
    }
    return total;
  }

  /** Positions this mask can hold without growing. */
  get capacity(): number {
    return this.words.length * BITS_PER_WORD;
  }

  private grow(minWords: number): void {
    const next = new Uint32Array(Math.max(minWords, this.words.length * 2));
    next.set(this.words);
    this.words = next;
  }
}
