/** Uniform stream in [0, 1). Shared across rounds; never reseeded per round. */
export interface RandomSource {
  next(): number;
}

/**
 * Seeded linear congruential generator (Numerical Recipes constants).
 * Reproducible for a given seed, which is all selection tests need.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  next(): number {
    this.state = (Math.imul(this.state, 1664525) + 1013904223) | 0;
    return (this.state >>> 0) / 4294967296;
  }

  /** Standard normal draw via Box-Muller. */
  nextGaussian(): number {
    const u1 = this.next() || 0.0001;
    const u2 = this.next();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}

export const pickIndex = (random: RandomSource, length: number): number =>
  Math.min(length - 1, Math.floor(random.next() * length));
