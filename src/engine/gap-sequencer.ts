/**
 * Gap Sequencer — bounded-transition gap centres.
 *
 * The first gap sits at the midpoint of [minY, maxY]. Each later gap is
 * drawn uniformly from the previous centre ± maxTransition, clamped into
 * [minY, maxY], so no two consecutive gaps are further apart than the
 * bird can travel.
 */

import type { GapBounds } from './config';
import type { UniformSource } from './rng';

export interface GapRecord {
  /** Ordinal position in the sequence, from 0 */
  readonly index: number;
  readonly centerY: number;
}

export class GapSequencer {
  private readonly records: GapRecord[] = [];

  constructor(
    private readonly bounds: GapBounds,
    private readonly uniform: UniformSource,
  ) {}

  /** Every gap generated so far, in order. */
  get history(): readonly GapRecord[] {
    return this.records;
  }

  /** Generate the next gap record. */
  next(): GapRecord {
    const { minY, maxY, maxTransition } = this.bounds;
    const last = this.records[this.records.length - 1];

    let centerY: number;
    if (last === undefined) {
      centerY = (minY + maxY) / 2;
    } else {
      const lo = Math.max(minY, last.centerY - maxTransition);
      const hi = Math.min(maxY, last.centerY + maxTransition);
      if (lo > hi) {
        throw new Error(`Degenerate gap interval [${lo}, ${hi}] after gap ${last.index}`);
      }
      centerY = lo + this.uniform.nextUniform() * (hi - lo);
    }

    const record: GapRecord = { index: this.records.length, centerY };
    this.records.push(record);
    return record;
  }

  /** Centre of the next gap. */
  nextGap(): number {
    return this.next().centerY;
  }
}
