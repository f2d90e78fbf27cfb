/**
 * Collision Predicate Tests
 *
 * Box-vs-screen and box-vs-pipe checks at the exact edges.
 * Default geometry: bird 34x24 at x=256, pipes 52 wide, screen 720 high.
 */

import { describe, it, expect } from 'vitest';
import { agentBounds, hitsBoundary, hitsObstacle, isColliding, overlapsX } from '../../src/engine/collision';
import { DEFAULT_GAME_CONFIG } from '../../src/engine/config';
import type { AgentState, Obstacle, SimulationState } from '../../src/engine/types';

const config = DEFAULT_GAME_CONFIG;

function agentAt(y: number): AgentState {
  return { x: 256, y, velocityY: 0 };
}

/** Pipe at x with opening [gapCenterY - 60, gapCenterY + 60]. */
function obstacleAt(x: number, gapCenterY = 360): Obstacle {
  return { index: 0, x, gapCenterY, gapHeight: 120, passed: false };
}

describe('agentBounds', () => {
  it('spans the bird box from its top-left corner', () => {
    expect(agentBounds(agentAt(100), config)).toEqual({ left: 256, top: 100, right: 290, bottom: 124 });
  });
});

describe('hitsBoundary', () => {
  it('is false in open air', () => {
    expect(hitsBoundary(agentAt(348), config)).toBe(false);
    expect(hitsBoundary(agentAt(1), config)).toBe(false);
    expect(hitsBoundary(agentAt(695), config)).toBe(false);
  });

  it('is true when touching the top edge', () => {
    expect(hitsBoundary(agentAt(0), config)).toBe(true);
  });

  it('is true when touching the ground', () => {
    expect(hitsBoundary(agentAt(696), config)).toBe(true);
  });
});

describe('overlapsX', () => {
  it('is false when the pipe ends exactly at the bird', () => {
    expect(overlapsX(agentAt(348), obstacleAt(204), config)).toBe(false);
  });

  it('is false when the pipe starts exactly after the bird', () => {
    expect(overlapsX(agentAt(348), obstacleAt(290), config)).toBe(false);
  });

  it('is true for any shared column', () => {
    expect(overlapsX(agentAt(348), obstacleAt(205), config)).toBe(true);
    expect(overlapsX(agentAt(348), obstacleAt(289), config)).toBe(true);
  });
});

describe('hitsObstacle', () => {
  it('is false inside the opening', () => {
    expect(hitsObstacle(agentAt(348), obstacleAt(256), config)).toBe(false);
  });

  it('allows touching the opening edges', () => {
    expect(hitsObstacle(agentAt(300), obstacleAt(256), config)).toBe(false);
    expect(hitsObstacle(agentAt(396), obstacleAt(256), config)).toBe(false);
  });

  it('is true when sticking into the upper pipe', () => {
    expect(hitsObstacle(agentAt(299), obstacleAt(256), config)).toBe(true);
  });

  it('is true when sticking into the lower pipe', () => {
    expect(hitsObstacle(agentAt(397), obstacleAt(256), config)).toBe(true);
  });

  it('ignores pipes that do not overlap horizontally', () => {
    expect(hitsObstacle(agentAt(0), obstacleAt(600), config)).toBe(false);
  });
});

describe('isColliding', () => {
  function state(agent: AgentState, obstacles: Obstacle[]): SimulationState {
    return { tick: 0, agent, obstacles };
  }

  it('is false with no obstacles in open air', () => {
    expect(isColliding(state(agentAt(348), []), config)).toBe(false);
  });

  it('checks every obstacle', () => {
    const obstacles = [obstacleAt(600), obstacleAt(256, 100)];
    expect(isColliding(state(agentAt(348), obstacles), config)).toBe(true);
  });

  it('reports the boundary even without obstacles', () => {
    expect(isColliding(state(agentAt(696), []), config)).toBe(true);
  });
});
