/**
 * Seeded pseudo-random source for reproducible datasets.
 *
 * Every generator call receives one of these explicitly; nothing reads
 * from `Math.random()` or any other shared state.
 */

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

/** mulberry32 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/** Integer in [min, maxExclusive). */
export function randomInt(rand: RandomSource, min: number, maxExclusive: number): number {
  return min + Math.floor(rand.next() * (maxExclusive - min));
}

export function pick<T>(rand: RandomSource, items: readonly T[]): T {
  if (!items.length) throw new RangeError("Cannot pick from an empty list");
  return items[Math.floor(rand.next() * items.length)];
}

/** Standard normal draw (Box–Muller). */
export function normal(rand: RandomSource): number {
  // 1 - next() lies in (0, 1], so the log is finite
  const u1 = 1 - rand.next();
  const u2 = rand.next();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/** Log-normal draw; `mean` and `sigma` describe the underlying normal. */
export function lognormal(rand: RandomSource, mean: number, sigma: number): number {
  return Math.exp(mean + sigma * normal(rand));
}
