/**
 * World Model — Simulation Step Functions
 *
 * Pure functions advance a SimulationState by one fixed timestep:
 *   1. Update bird velocity (gravity, or flap impulse)
 *   2. Integrate bird y and clamp it to the screen
 *   3. Scroll obstacles left and cull the ones fully off-screen
 *
 * Spawning is not part of the pure step: it consumes gap records, so it
 * only happens in the live WorldModel. Lookahead branches therefore step
 * geometry alone, never touching the RNG.
 *
 * No Math.random, no Date.now. Fully deterministic.
 */

import type { GameConfig } from './config';
import type { GapRecord, GapSequencer } from './gap-sequencer';
import { Action } from './types';
import type { AgentState, Obstacle, SimulationState } from './types';

// ──────────────────────────────────────────────────────────
// Initial state
// ──────────────────────────────────────────────────────────

/** Bird at its fixed x, vertically centred, with the configured initial velocity. */
export function createAgent(config: GameConfig): AgentState {
  return {
    x: Math.floor(config.screen.width * config.bird.xRatio),
    y: (config.screen.height - config.bird.height) / 2,
    velocityY: config.bird.initialVelocityY,
  };
}

export function createObstacle(gap: GapRecord, x: number, config: GameConfig): Obstacle {
  return {
    index: gap.index,
    x,
    gapCenterY: gap.centerY,
    gapHeight: config.pipe.gapHeight,
    passed: false,
  };
}

/** Tick-0 state: the bird plus one obstacle seeded from the first gap. */
export function createInitialState(config: GameConfig, firstGap: GapRecord): SimulationState {
  const { screen, pipe } = config;
  return {
    tick: 0,
    agent: createAgent(config),
    obstacles: [createObstacle(firstGap, screen.width + pipe.width * pipe.firstOffset, config)],
  };
}

// ──────────────────────────────────────────────────────────
// Pure stepping
// ──────────────────────────────────────────────────────────

/**
 * Advance the bird by one tick.
 *
 * A flap replaces the velocity with the flap impulse (capped at the max
 * rise speed); otherwise gravity accelerates the bird up to the max fall
 * speed. y is clamped to the screen; touching an edge is a collision,
 * reported by the collision predicate, not prevented here.
 */
export function stepAgent(agent: AgentState, action: Action, config: GameConfig): AgentState {
  const { physics, screen, bird } = config;

  const velocityY = action === Action.Flap
    ? Math.max(physics.flapVelocity, -physics.maxRiseSpeed)
    : Math.min(agent.velocityY + physics.gravity * config.dt, physics.maxFallSpeed);

  const maxY = screen.height - bird.height;
  const y = Math.max(0, Math.min(maxY, agent.y + velocityY * config.dt));

  return { x: agent.x, y, velocityY };
}

/** Move every obstacle left by one tick and drop those that have left the screen. */
export function scrollObstacles(obstacles: readonly Obstacle[], config: GameConfig): Obstacle[] {
  const dx = config.physics.scrollSpeed * config.dt;
  const width = config.pipe.width;
  const moved: Obstacle[] = [];
  for (const obstacle of obstacles) {
    const x = obstacle.x - dx;
    if (x + width >= 0) {
      moved.push({ ...obstacle, x });
    }
  }
  return moved;
}

/**
 * Advance a snapshot by one tick without spawning.
 *
 * Pure function: (state, action) -> newState. Used both by the live world
 * and by the decision engine's lookahead branches, with the same dt.
 */
export function stepSimulation(state: SimulationState, action: Action, config: GameConfig): SimulationState {
  return {
    tick: state.tick + 1,
    agent: stepAgent(state.agent, action, config),
    obstacles: scrollObstacles(state.obstacles, config),
  };
}

// ──────────────────────────────────────────────────────────
// Spawning
// ──────────────────────────────────────────────────────────

/** x below which the rightmost obstacle triggers a new spawn. */
export function spawnThreshold(config: GameConfig): number {
  const { screen, pipe } = config;
  return screen.width - pipe.width * (pipe.spawnSpacing + 1);
}

export function shouldSpawn(state: SimulationState, config: GameConfig): boolean {
  const last = state.obstacles[state.obstacles.length - 1];
  if (last === undefined) return true;
  return last.x < spawnThreshold(config);
}

/** Append an obstacle just past the right edge. */
export function spawnObstacle(state: SimulationState, gap: GapRecord, config: GameConfig): SimulationState {
  const x = config.screen.width + config.pipe.spawnOffset;
  return {
    ...state,
    obstacles: [...state.obstacles, createObstacle(gap, x, config)],
  };
}

// ──────────────────────────────────────────────────────────
// Snapshots
// ──────────────────────────────────────────────────────────

/** Independent copy of the agent and obstacle geometry. */
export function cloneState(state: SimulationState): SimulationState {
  return {
    tick: state.tick,
    agent: { ...state.agent },
    obstacles: state.obstacles.map((o) => ({ ...o })),
  };
}

/** Vertical centre of the bird box. */
export function agentCenterY(agent: AgentState, config: GameConfig): number {
  return agent.y + config.bird.height / 2;
}

/** Horizontal centre of the bird box. */
export function agentCenterX(agent: AgentState, config: GameConfig): number {
  return agent.x + config.bird.width / 2;
}

// ──────────────────────────────────────────────────────────
// WorldModel — live session state
// ──────────────────────────────────────────────────────────

/**
 * The live world of one session. Owns the current snapshot and the gap
 * sequencer it spawns from. Each step swaps in a new snapshot, so a
 * snapshot handed out earlier is never changed afterwards.
 */
export class WorldModel {
  private current: SimulationState;

  constructor(
    private readonly config: GameConfig,
    private readonly gaps: GapSequencer,
  ) {
    this.current = createInitialState(config, gaps.next());
  }

  get state(): SimulationState {
    return this.current;
  }

  /** Advance by one tick, spawning from the sequencer when the last obstacle is far enough left. */
  step(action: Action): void {
    let next = stepSimulation(this.current, action, this.config);
    if (shouldSpawn(next, this.config)) {
      next = spawnObstacle(next, this.gaps.next(), this.config);
    }
    this.current = next;
  }

  clone(): SimulationState {
    return cloneState(this.current);
  }

  /** Mark the obstacle spawned from gap `index` as passed. No-op if already passed or gone. */
  markPassed(index: number): void {
    const { obstacles } = this.current;
    if (!obstacles.some((o) => o.index === index && !o.passed)) return;
    this.current = {
      ...this.current,
      obstacles: obstacles.map((o) => (o.index === index ? { ...o, passed: true } : o)),
    };
  }
}
