import { getConfig } from "./config";

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

/** mulberry32: small, fast, and good enough for Monte Carlo over small networks. */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(readonly seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Seed for an independent child stream (e.g. one Gibbs chain). */
  fork(): SeededRandom {
    return new SeededRandom(this.nextInt(0, 0xffffffff));
  }
}

export function createRandom(seed?: number): SeededRandom {
  const resolved =
    seed ?? getConfig().seed ?? Math.floor(Math.random() * 0xffffffff);
  return new SeededRandom(resolved);
}

/**
 * Draws an index with probability proportional to `weights`.
 * Returns -1 when every weight is zero.
 */
export function sampleIndex(weights: readonly number[], random: RandomSource): number {
  let total = 0;
  for (const w of weights) total += w;
  if (!(total > 0)) return -1;

  const u = random.next() * total;
  let cumulative = 0;
  let lastPositive = -1;
  for (let i = 0; i < weights.length; i++) {
    if (weights[i] <= 0) continue;
    cumulative += weights[i];
    lastPositive = i;
    if (u < cumulative) return i;
  }
  // Floating-point shortfall on the last bucket
  return lastPositive;
}
