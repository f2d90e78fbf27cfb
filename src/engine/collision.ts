/**
 * Collision Predicate
 *
 * The bird and the pipes are axis-aligned boxes; pixel masks are out of
 * scope. A pipe pair is solid everywhere in its x-span except the opening
 * [gapCenterY - gapHeight/2, gapCenterY + gapHeight/2]. Touching the top
 * or bottom of the screen also counts as a collision.
 *
 * Everything here is pure and may be called any number of times per tick.
 */

import type { GameConfig } from './config';
import type { AgentState, Bounds, Obstacle, SimulationState } from './types';

export function agentBounds(agent: AgentState, config: GameConfig): Bounds {
  return {
    left: agent.x,
    top: agent.y,
    right: agent.x + config.bird.width,
    bottom: agent.y + config.bird.height,
  };
}

/** True when the bird touches the top edge or the ground. */
export function hitsBoundary(agent: AgentState, config: GameConfig): boolean {
  const box = agentBounds(agent, config);
  return box.top <= 0 || box.bottom >= config.screen.height;
}

/** True when the obstacle's x-span overlaps the bird's. */
export function overlapsX(agent: AgentState, obstacle: Obstacle, config: GameConfig): boolean {
  return agent.x < obstacle.x + config.pipe.width && agent.x + config.bird.width > obstacle.x;
}

/** True when the bird overlaps the obstacle horizontally and sticks out of its opening. */
export function hitsObstacle(agent: AgentState, obstacle: Obstacle, config: GameConfig): boolean {
  if (!overlapsX(agent, obstacle, config)) return false;
  const box = agentBounds(agent, config);
  const gapTop = obstacle.gapCenterY - obstacle.gapHeight / 2;
  const gapBottom = obstacle.gapCenterY + obstacle.gapHeight / 2;
  return box.top < gapTop || box.bottom > gapBottom;
}

export function isColliding(state: SimulationState, config: GameConfig): boolean {
  if (hitsBoundary(state.agent, config)) return true;
  for (const obstacle of state.obstacles) {
    if (hitsObstacle(state.agent, obstacle, config)) return true;
  }
  return false;
}
