import type { GameConfig } from '../engine/config';
import { Action } from '../engine/types';
import type { ActionSource, SimulationState } from '../engine/types';
import type { DecisionPolicy } from './bot';
import { createBot } from './bot';
import type { ControlMode } from './bot-config';

/**
 * Asks a decision policy for every tick's action.
 */
export class PolicyActionSource implements ActionSource {
  constructor(readonly policy: DecisionPolicy) {}

  nextAction(state: SimulationState): Action {
    return this.policy.decide(state);
  }
}

/**
 * Replays a fixed action sequence. Past its end it keeps returning NoFlap.
 */
export class RecordedActionSource implements ActionSource {
  private position = 0;

  constructor(private readonly actions: readonly Action[]) {}

  nextAction(): Action {
    const action = this.actions[this.position];
    if (action === undefined) return Action.NoFlap;
    this.position++;
    return action;
  }

  isComplete(): boolean {
    return this.position >= this.actions.length;
  }

  get cursor(): number {
    return this.position;
  }

  get length(): number {
    return this.actions.length;
  }
}

/**
 * Human input relayed by a harness. A flap request is consumed by the
 * next tick; requests between two ticks collapse into one flap.
 */
export class ManualActionSource implements ActionSource {
  private pendingFlap = false;

  requestFlap(): void {
    this.pendingFlap = true;
  }

  nextAction(): Action {
    const action = this.pendingFlap ? Action.Flap : Action.NoFlap;
    this.pendingFlap = false;
    return action;
  }
}

export function createActionSource(
  mode: ControlMode,
  config: GameConfig,
): PolicyActionSource | ManualActionSource {
  return mode === 'none' ? new ManualActionSource() : new PolicyActionSource(createBot(mode, config));
}
