/**
 * SessionController — Headless Session State Machine
 *
 * Idle -> Running -> Terminated. Drives the tick loop of one session:
 * action -> world step -> collision check -> scoring. Lives in
 * src/engine/ with no rendering imports; a harness (renderer, bridge,
 * batch runner) calls start() once and tick() per frame.
 *
 * Terminated is absorbing and emits exactly one SessionRecord.
 */

import { formatLocalTimestamp, ticksToSeconds } from '../utils/formatTime';
import { isColliding } from './collision';
import type { GameConfig } from './config';
import { DEFAULT_GAME_CONFIG, validateGameConfig } from './config';
import { GapSequencer } from './gap-sequencer';
import type { GapRecord } from './gap-sequencer';
import { SeededStream, resolveSeed } from './rng';
import type { UniformSource } from './rng';
import type { Action, ActionSource, AgentState, Obstacle } from './types';
import { WorldModel, agentCenterX } from './world';

export enum SessionPhase {
  Idle = 'idle',
  Running = 'running',
  Terminated = 'terminated',
}

/** completed = ended by a collision; aborted = cut off at maxTicks. */
export type SessionStatus = 'completed' | 'aborted';

/** One row of the results log. Written once, when the session terminates. */
export interface SessionRecord {
  gameId: number;
  seed: number;
  score: number;
  /** Simulated time: ticks * dt */
  durationSeconds: number;
  pipesPassed: number;
  status: SessionStatus;
  /** ISO-8601 local time at termination */
  timestamp: string;
}

/** What a harness needs to draw one frame. */
export interface TickResult {
  tick: number;
  action: Action | null;
  agent: AgentState;
  obstacles: readonly Obstacle[];
  score: number;
  terminated: boolean;
}

export interface SessionOptions {
  config?: GameConfig;
  /** Id written to the session record (batch index, 1-based) */
  gameId?: number;
  /** Cut the session off after this many ticks (status 'aborted') */
  maxTicks?: number;
  clock?: () => Date;
  onRecord?: (record: SessionRecord) => void;
  /** Replaces the seeded stream; lets tests fix individual draws */
  uniformFactory?: (seed: number) => UniformSource;
}

interface RunningSession {
  seed: number;
  world: WorldModel;
  gaps: GapSequencer;
  source: ActionSource;
}

export class SessionController {
  private readonly config: GameConfig;
  private readonly options: SessionOptions;
  private _phase = SessionPhase.Idle;
  private session: RunningSession | null = null;
  private _score = 0;
  private _record: SessionRecord | null = null;
  private lastResult: TickResult | null = null;
  private readonly history: Action[] = [];

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? DEFAULT_GAME_CONFIG;
    validateGameConfig(this.config);
    this.options = options;
  }

  get phase(): SessionPhase { return this._phase; }
  get score(): number { return this._score; }
  get record(): SessionRecord | null { return this._record; }
  /** Actions applied so far, one per tick. */
  get actions(): readonly Action[] { return this.history; }

  get seed(): number {
    return this.requireSession('seed').seed;
  }

  get ticks(): number {
    return this.session?.world.state.tick ?? 0;
  }

  get gaps(): readonly GapRecord[] {
    return this.session?.gaps.history ?? [];
  }

  get world(): WorldModel {
    return this.requireSession('world').world;
  }

  /**
   * Idle -> Running. Resolves the seed, builds the stream, sequencer and
   * world (with its first obstacle). Returns the resolved seed.
   */
  start(seed: number | undefined, source: ActionSource): number {
    if (this._phase !== SessionPhase.Idle) {
      throw new Error('start() called on a session that has already started');
    }
    const resolved = resolveSeed(seed);
    const uniform = this.options.uniformFactory?.(resolved) ?? new SeededStream(resolved);
    const gaps = new GapSequencer(this.config.gap, uniform);
    const world = new WorldModel(this.config, gaps);
    this.session = { seed: resolved, world, gaps, source };
    this._phase = SessionPhase.Running;
    return resolved;
  }

  /** Advance one tick. After termination, returns the final result unchanged. */
  tick(): TickResult {
    if (this._phase === SessionPhase.Idle) {
      throw new Error('tick() called before start()');
    }
    if (this._phase === SessionPhase.Terminated && this.lastResult) {
      return this.lastResult;
    }

    const { world, source } = this.requireSession('tick');
    const action = source.nextAction(world.clone());
    this.history.push(action);
    world.step(action);

    const state = world.state;
    if (isColliding(state, this.config)) {
      this.terminate('completed');
    } else {
      this.scoreCrossings(world);
      if (this.options.maxTicks !== undefined && state.tick >= this.options.maxTicks) {
        this.terminate('aborted');
      }
    }

    return this.snapshotResult(action);
  }

  /** Current state without advancing. */
  peek(): TickResult {
    if (this._phase === SessionPhase.Idle) {
      throw new Error('peek() called before start()');
    }
    return this.lastResult ?? this.snapshotResult(null);
  }

  // ─── Internals ─────────────────────────────────────────

  private requireSession(what: string): RunningSession {
    if (!this.session) {
      throw new Error(`${what} is not available before start()`);
    }
    return this.session;
  }

  /** Score every obstacle whose centre the bird's centre has reached for the first time. */
  private scoreCrossings(world: WorldModel): void {
    const birdCenter = agentCenterX(world.state.agent, this.config);
    const halfWidth = this.config.pipe.width / 2;
    for (const obstacle of world.state.obstacles) {
      if (!obstacle.passed && obstacle.x + halfWidth <= birdCenter) {
        world.markPassed(obstacle.index);
        this._score++;
      }
    }
  }

  private terminate(status: SessionStatus): void {
    const { seed, world } = this.requireSession('terminate');
    this._phase = SessionPhase.Terminated;
    const clock = this.options.clock ?? (() => new Date());
    const record: SessionRecord = {
      gameId: this.options.gameId ?? 1,
      seed,
      score: this._score,
      durationSeconds: ticksToSeconds(world.state.tick, this.config.fps),
      pipesPassed: this._score,
      status,
      timestamp: formatLocalTimestamp(clock()),
    };
    this._record = record;
    this.options.onRecord?.(record);
  }

  private snapshotResult(action: Action | null): TickResult {
    const { world } = this.requireSession('result');
    const state = world.state;
    const result: TickResult = {
      tick: state.tick,
      action,
      agent: state.agent,
      obstacles: state.obstacles,
      score: this._score,
      terminated: this._phase === SessionPhase.Terminated,
    };
    this.lastResult = result;
    return result;
  }
}
