/**
 * Decision Engine Tests
 *
 * Hand-built snapshots with obstacles far to the right unless a test needs
 * an overlap. From y=348, vy=0 one tick gives:
 *   Flap   -> y=339, centre 351
 *   NoFlap -> y=349, centre 361
 * and a second tick:
 *   Flap, Flap     -> centre 342    Flap, NoFlap   -> centre 343
 *   NoFlap, Flap   -> centre 352    NoFlap, NoFlap -> centre 363
 */

import { describe, it, expect } from 'vitest';
import { LookaheadBot, createBot, gapDistance, upcomingObstacles } from '../../src/ai/bot';
import { SECOND_GAP_WEIGHT } from '../../src/ai/bot-config';
import { DEFAULT_GAME_CONFIG } from '../../src/engine/config';
import { cloneState } from '../../src/engine/world';
import { Action } from '../../src/engine/types';
import type { Obstacle, SimulationState } from '../../src/engine/types';
import { playSession } from '../../src/replay/replay';

const config = DEFAULT_GAME_CONFIG;

function obstacle(x: number, gapCenterY: number, index = 0): Obstacle {
  return { index, x, gapCenterY, gapHeight: 120, passed: false };
}

function snapshot(y: number, velocityY: number, obstacles: Obstacle[]): SimulationState {
  return { tick: 10, agent: { x: 256, y, velocityY }, obstacles };
}

const single = createBot('single', config);
const twoPipe = createBot('two_pipe', config);

describe('upcomingObstacles', () => {
  it('drops obstacles whose right edge is at or behind the bird', () => {
    const state = snapshot(348, 0, [obstacle(204, 300, 0), obstacle(205, 300, 1), obstacle(600, 300, 2)]);
    expect(upcomingObstacles(state, config).map((o) => o.index)).toEqual([1, 2]);
  });
});

describe('gapDistance', () => {
  it('measures from the bird centre', () => {
    expect(gapDistance(snapshot(348, 0, []), obstacle(600, 300), config)).toBe(60);
  });
});

describe('LookaheadBot', () => {
  it('reports its variant', () => {
    expect(single.variant).toBe('single');
    expect(twoPipe.variant).toBe('two_pipe');
    expect(new LookaheadBot(config, 2).lookaheadPipes).toBe(2);
  });

  it('does nothing without an obstacle ahead', () => {
    expect(single.decide(snapshot(348, 0, []))).toBe(Action.NoFlap);
  });

  it('flaps when only flapping avoids the ground', () => {
    // NoFlap: y=700 -> clamped 696, bottom 720. Flap: y=681.
    const state = snapshot(690, 300, [obstacle(1000, 690)]);
    expect(single.decide(state)).toBe(Action.Flap);
  });

  it('holds when only holding avoids the ceiling, even if flapping ends closer to the gap', () => {
    // Flap: y=-1 -> 0 (collision), centre 12. NoFlap: y=9, centre 21.
    const state = snapshot(8, 0, [obstacle(1000, 0)]);
    expect(single.decide(state)).toBe(Action.NoFlap);
  });

  it('moves toward the gap when both actions are safe', () => {
    expect(single.decide(snapshot(348, 0, [obstacle(1000, 200)]))).toBe(Action.Flap);
    expect(single.decide(snapshot(348, 0, [obstacle(1000, 600)]))).toBe(Action.NoFlap);
  });

  it('holds on an exact tie', () => {
    // 356 is 5 from both 351 and 361
    expect(single.decide(snapshot(348, 0, [obstacle(1000, 356)]))).toBe(Action.NoFlap);
  });

  it('still picks the branch closer to the gap when neither is safe', () => {
    // Inside the pipe's x-span with the opening [40, 160] far above
    const state = snapshot(348, 0, [obstacle(256, 100)]);
    expect(single.decide(state)).toBe(Action.Flap);
  });

  it('never modifies the snapshot it is given', () => {
    const state = snapshot(348, 0, [obstacle(1000, 200), obstacle(1200, 500, 1)]);
    const before = cloneState(state);
    single.decide(state);
    twoPipe.decide(state);
    expect(state).toEqual(before);
  });
});

describe('two-pipe lookahead', () => {
  // Tie on the first gap (5 each); the second gap sits far above.
  // Flap: 5 + 0.25 * |342 - 100| = 65.5, NoFlap: 5 + 0.25 * |352 - 100| = 68.
  const state = snapshot(348, 0, [obstacle(1000, 356, 0), obstacle(1200, 100, 1)]);

  it('weights the second gap at a quarter', () => {
    expect(SECOND_GAP_WEIGHT).toBe(0.25);
  });

  it('breaks a first-gap tie toward the second gap', () => {
    expect(single.decide(state)).toBe(Action.NoFlap);
    expect(twoPipe.decide(state)).toBe(Action.Flap);
  });

  it('behaves like the single-pipe bot with one obstacle ahead', () => {
    const lone = snapshot(348, 0, [obstacle(1000, 356)]);
    expect(twoPipe.decide(lone)).toBe(single.decide(lone));
  });

  it('keeps the first gap primary when the second gap pulls the other way', () => {
    // Flap:   |351 - 200| + 0.25 * |343 - 600| = 151 + 64.25 = 215.25
    // NoFlap: |361 - 200| + 0.25 * |363 - 600| = 161 + 59.25 = 220.25
    // The second gap alone (257 vs 237) would pick NoFlap.
    const split = snapshot(348, 0, [obstacle(1000, 200, 0), obstacle(1200, 600, 1)]);
    expect(single.decide(split)).toBe(Action.Flap);
    expect(twoPipe.decide(split)).toBe(Action.Flap);
  });

  it('keeps the safety rule ahead of the second gap', () => {
    const nearGround = snapshot(690, 300, [obstacle(1000, 690, 0), obstacle(1200, 690, 1)]);
    expect(twoPipe.decide(nearGround)).toBe(Action.Flap);
  });
});

describe('two-pipe survival', () => {
  it('scores at least as much as the single-pipe bot over seeds 1..30', () => {
    let singleTotal = 0;
    let twoPipeTotal = 0;
    for (let seed = 1; seed <= 30; seed++) {
      singleTotal += playSession(seed, 'single').score;
      twoPipeTotal += playSession(seed, 'two_pipe').score;
    }
    expect(twoPipeTotal).toBeGreaterThanOrEqual(singleTotal);
  }, 60_000);
});
