/**
 * Source of uniform floats in [0, 1). Every other helper derives from
 * `nextFloat`, so a subclass only has to supply that one method.
 */
export abstract class RandomSource {
  abstract nextFloat(): number;

  /** Return an integer in [0, max) */
  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }

  /** Return an integer in [min, max] */
  intBetween(min: number, max: number): number {
    if (max <= min) return min;
    return min + this.nextInt(max - min + 1);
  }

  /** True with probability `p` */
  chance(p: number): boolean {
    return this.nextFloat() < p;
  }

  /** Uniform element of a non-empty array, undefined when empty */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.nextInt(items.length)];
  }

  /** Shuffle an array in place (Fisher-Yates) */
  shuffle<T>(arr: T[]): T[] {
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      [arr[i], arr[j]] = [arr[j], arr[i]];
    }
    return arr;
  }

  /** `count` distinct elements, in random order */
  sample<T>(items: readonly T[], count: number): T[] {
    return this.shuffle([...items]).slice(0, Math.max(0, count));
  }
}

/**
 * Deterministic seeded PRNG using xorshift32.
 * Seed is derived by hashing the seed string into a 32-bit integer.
 */
export class SeededRng extends RandomSource {
  private state: number;

  constructor(seed: string) {
    super();
    this.state = SeededRng.hashString(seed);
  }

  private static hashString(s: string): number {
    let hash = 0;
    for (let i = 0; i < s.length; i++) {
      hash = ((hash << 5) - hash + s.charCodeAt(i)) | 0;
    }
    return hash === 0 ? 1 : Math.abs(hash); // xorshift cannot have state 0
  }

  /** Return next pseudo-random 32-bit unsigned integer */
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
}

/** Unseeded source backed by Math.random. */
export class MathRandomSource extends RandomSource {
  nextFloat(): number {
    return Math.random();
  }
}
