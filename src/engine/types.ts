/**
 * Engine Type Contracts
 *
 * Every type here is an immutable snapshot. The live WorldModel replaces
 * its snapshot each tick instead of mutating it, which is what lets the
 * decision engine explore hypothetical steps on the same values.
 */

/** The two discrete actions available each tick. */
export enum Action {
  NoFlap = 'no_flap',
  Flap = 'flap',
}

/** Bird state. x never changes during a session. */
export interface AgentState {
  /** Left edge of the bounding box */
  readonly x: number;
  /** Top edge of the bounding box */
  readonly y: number;
  /** Vertical velocity in px/s (negative = up) */
  readonly velocityY: number;
}

/** A pipe pair with a single vertical opening. */
export interface Obstacle {
  /** Ordinal of the GapRecord this obstacle was spawned from */
  readonly index: number;
  /** Left edge of both pipes */
  readonly x: number;
  /** Vertical centre of the opening */
  readonly gapCenterY: number;
  /** Height of the opening */
  readonly gapHeight: number;
  /** True once the bird has crossed this obstacle's centre */
  readonly passed: boolean;
}

/**
 * Lightweight simulation snapshot: agent and obstacle geometry only.
 * No RNG or rendering state, so copying one is cheap.
 */
export interface SimulationState {
  /** Ticks stepped since the session started */
  readonly tick: number;
  readonly agent: AgentState;
  /** Ordered by ascending x (= spawn order) */
  readonly obstacles: readonly Obstacle[];
}

/** Axis-aligned box, edges inclusive of left/top. */
export interface Bounds {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

/**
 * Where a session gets each tick's action: a bot, a recorded sequence,
 * or human input fed by a harness.
 */
export interface ActionSource {
  nextAction(state: SimulationState): Action;
}
