/**
 * Decision Engine — one-step lookahead bot.
 *
 * Each tick the bot steps the current snapshot once with Flap and once
 * with NoFlap (same dt as the live session), runs the collision predicate
 * on both branches, and picks:
 *
 *   Flap safe | NoFlap safe | choice
 *   ----------+-------------+------------------------------------------
 *   yes       | no          | Flap
 *   no        | yes         | NoFlap
 *   yes       | yes         | branch closer to the target gap centre
 *   no        | no          | branch closer to the target gap centre
 *
 * The two-pipe variant refines the safe/safe case. Each branch is scored by
 * its distance to the target gap plus SECOND_GAP_WEIGHT times its best
 * collision-free follow-up distance to the second gap, so the first gap
 * stays primary and the second only bends the choice. Branches are plain snapshots, so the live world is never
 * touched. The bot is a policy only: with no safe action it still returns
 * its best guess and lets the session end.
 */

import type { GameConfig } from '../engine/config';
import { isColliding } from '../engine/collision';
import { Action } from '../engine/types';
import type { Obstacle, SimulationState } from '../engine/types';
import { agentCenterY, stepSimulation } from '../engine/world';
import type { BotVariant } from './bot-config';
import { LOOKAHEAD_PIPES, SECOND_GAP_WEIGHT } from './bot-config';

const ACTIONS: readonly Action[] = [Action.Flap, Action.NoFlap];

export interface DecisionPolicy {
  readonly variant: BotVariant;
  decide(state: SimulationState): Action;
}

/** Obstacles whose x-span is still ahead of or overlapping the bird, nearest first. */
export function upcomingObstacles(state: SimulationState, config: GameConfig): Obstacle[] {
  return state.obstacles.filter((o) => o.x + config.pipe.width > state.agent.x);
}

/** Vertical distance between the bird's centre and a gap centre. */
export function gapDistance(state: SimulationState, obstacle: Obstacle, config: GameConfig): number {
  return Math.abs(agentCenterY(state.agent, config) - obstacle.gapCenterY);
}

export class LookaheadBot implements DecisionPolicy {
  constructor(
    private readonly config: GameConfig,
    readonly lookaheadPipes: 1 | 2,
  ) {}

  get variant(): BotVariant {
    return this.lookaheadPipes === 2 ? 'two_pipe' : 'single';
  }

  decide(state: SimulationState): Action {
    const [target, second] = upcomingObstacles(state, this.config);
    if (target === undefined) return Action.NoFlap;

    const flapped = stepSimulation(state, Action.Flap, this.config);
    const coasted = stepSimulation(state, Action.NoFlap, this.config);
    const flapSafe = !isColliding(flapped, this.config);
    const coastSafe = !isColliding(coasted, this.config);

    if (flapSafe && !coastSafe) return Action.Flap;
    if (!flapSafe && coastSafe) return Action.NoFlap;

    if (flapSafe && coastSafe && this.lookaheadPipes === 2 && second !== undefined) {
      const preferred = this.preferWithSecond(flapped, coasted, target, second);
      if (preferred !== null) return preferred;
    }

    return this.closerToGap(flapped, coasted, target);
  }

  /** Tie-break on the target gap. Equal distances keep NoFlap. */
  private closerToGap(flapped: SimulationState, coasted: SimulationState, target: Obstacle): Action {
    return gapDistance(flapped, target, this.config) < gapDistance(coasted, target, this.config)
      ? Action.Flap
      : Action.NoFlap;
  }

  /**
   * Weighted score over both gaps. Returns null when the scores don't
   * separate the branches (including both infinite).
   */
  private preferWithSecond(
    flapped: SimulationState,
    coasted: SimulationState,
    target: Obstacle,
    second: Obstacle,
  ): Action | null {
    const flapScore = this.branchScore(flapped, target, second);
    const coastScore = this.branchScore(coasted, target, second);
    if (flapScore === coastScore) return null;
    return flapScore < coastScore ? Action.Flap : Action.NoFlap;
  }

  private branchScore(branch: SimulationState, target: Obstacle, second: Obstacle): number {
    return gapDistance(branch, target, this.config) + SECOND_GAP_WEIGHT * this.followUpScore(branch, second);
  }

  /** Best collision-free distance to the second gap one step after the branch. */
  private followUpScore(branch: SimulationState, second: Obstacle): number {
    let best = Infinity;
    for (const action of ACTIONS) {
      const next = stepSimulation(branch, action, this.config);
      if (!isColliding(next, this.config)) {
        best = Math.min(best, gapDistance(next, second, this.config));
      }
    }
    return best;
  }
}

export function createBot(variant: BotVariant, config: GameConfig): LookaheadBot {
  return new LookaheadBot(config, LOOKAHEAD_PIPES[variant]);
}
