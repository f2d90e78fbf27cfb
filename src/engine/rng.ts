/**
 * Deterministic RNG Source
 *
 * mulberry32 over a single uint32 state. Uses only 32-bit integer math
 * (Math.imul, shifts), so a seed yields the same sequence on every host.
 * Each session owns its own stream; there is no process-wide generator.
 */

const UINT32_RANGE = 0x100000000;

/** mulberry32 has a weak all-zero state; remap it. */
const ZERO_STATE_REPLACEMENT = 0x12345678;

/** Anything that yields uniform draws in [0, 1). */
export interface UniformSource {
  nextUniform(): number;
}

export class SeededStream implements UniformSource {
  readonly seed: number;
  private state: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed || ZERO_STATE_REPLACEMENT;
  }

  /** Next uint32 in [0, 2^32). */
  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Next float in [0, 1). */
  nextUniform(): number {
    return this.nextUint32() / UINT32_RANGE;
  }
}

/** Wall-clock time in whole microseconds since the epoch. */
export function wallClockMicros(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}

export function isValidSeed(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < UINT32_RANGE;
}

/**
 * Pick the seed for a session.
 * An explicit seed is used verbatim; otherwise the wall clock, truncated to 32 bits.
 */
export function resolveSeed(explicit?: number, nowMicros: () => number = wallClockMicros): number {
  if (explicit !== undefined) {
    if (!isValidSeed(explicit)) {
      throw new Error(`Seed must be an integer in [0, 2^32) (got ${explicit})`);
    }
    return explicit;
  }
  return Math.floor(nowMicros()) % UINT32_RANGE;
}

/** Seed of session n (1-indexed) in a batch: base + n, wrapped to uint32. */
export function batchSeed(baseSeed: number, n: number): number {
  return (baseSeed + n) % UINT32_RANGE;
}
