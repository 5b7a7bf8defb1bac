/**
 * Seeded xorshift32 generator for reproducible mine layouts.
 * A string seed is hashed into the 32-bit starting state.
 */

export interface RandomSource {
  /** Integer in [0, max) */
  nextInt(max: number): number;
}

export class SeededRng implements RandomSource {
  private state: number;

  constructor(readonly seed: string) {
    this.state = SeededRng.hashSeed(seed);
  }

  private static hashSeed(seed: string): number {
    let hash = 0;
    for (let i = 0; i < seed.length; i++) {
      hash = ((hash << 5) - hash + seed.charCodeAt(i)) | 0;
    }
    // xorshift never leaves state 0
    return hash === 0 ? 1 : hash >>> 0;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    return this.next() / 4294967296;
  }

  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }
}

/** Short base-36 seed, printed so a layout can be replayed */
export function randomSeed(): string {
  return Math.floor(Math.random() * 0x7fffffff).toString(36);
}
