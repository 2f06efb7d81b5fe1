/** Largest seed a noise source accepts; seeds are unsigned 32-bit integers. */
export const MAX_SEED = 0xffffffff;

export function isValidSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED;
}

/**
 * Reproducible noise for synthetic telemetry: a Weyl sequence finished with
 * the murmur3 mixer. Every draw advances one 32-bit state, so a seed fixes
 * the whole stream.
 */
export class NoiseSource {
  private state: number;

  constructor(seed: number) {
    if (!isValidSeed(seed)) {
      throw new RangeError(`seed must be an integer in [0, ${MAX_SEED}], got ${seed}`);
    }
    this.state = seed;
  }

  /** Uniform in [0, 1). */
  unit(): number {
    this.state = (this.state + 0x9e3779b9) >>> 0;
    let z = this.state;
    z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
    z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
    z ^= z >>> 16;
    return (z >>> 0) / 0x100000000;
  }

  /** Uniform in [low, high). */
  uniform(low: number, high: number): number {
    return low + (high - low) * this.unit();
  }

  /** Symmetric noise in [-amplitude, amplitude). */
  jitter(amplitude: number): number {
    return this.uniform(-amplitude, amplitude);
  }

  chance(p: number): boolean {
    return this.unit() < p;
  }

  pick<T>(items: readonly T[]): T {
    const item = items[Math.floor(this.unit() * items.length)];
    if (item === undefined) throw new RangeError('cannot pick from an empty list');
    return item;
  }
}
