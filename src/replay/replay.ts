/**
 * Seed/Replay protocol.
 *
 * A session is fully determined by (seed, control mode) plus the action
 * source. Playing a seed with a bot, or replaying its recorded actions,
 * reproduces the same gaps, trajectory, score and termination tick.
 */

import { PolicyActionSource, RecordedActionSource } from '../ai/action-source';
import { createBot } from '../ai/bot';
import type { BotVariant, ControlMode } from '../ai/bot-config';
import { DEFAULT_RUN_CONFIG } from '../ai/bot-config';
import { lookupSeed } from '../batch/results-log';
import { SessionController } from '../engine/SessionController';
import type { SessionOptions, SessionRecord, SessionStatus } from '../engine/SessionController';
import type { GameConfig } from '../engine/config';
import { DEFAULT_GAME_CONFIG } from '../engine/config';
import type { Action, ActionSource } from '../engine/types';

export interface PlayOptions {
  config?: GameConfig;
  gameId?: number;
  /** Tick cap; defaults to DEFAULT_RUN_CONFIG.maxTicks so a perfect bot still stops */
  maxTicks?: number;
  clock?: () => Date;
}

export interface SessionOutcome {
  seed: number;
  mode: ControlMode;
  score: number;
  ticks: number;
  status: SessionStatus;
  actions: Action[];
  /** Gap centres in spawn order */
  gaps: number[];
  record: SessionRecord;
}

function sessionOptions(options: PlayOptions): SessionOptions {
  return {
    config: options.config ?? DEFAULT_GAME_CONFIG,
    gameId: options.gameId,
    maxTicks: options.maxTicks ?? DEFAULT_RUN_CONFIG.maxTicks,
    clock: options.clock,
  };
}

/** Run a started session to termination and collect its outcome. */
export function runToEnd(session: SessionController, mode: ControlMode): SessionOutcome {
  let result = session.peek();
  while (!result.terminated) {
    result = session.tick();
  }
  const record = session.record;
  if (!record) {
    throw new Error('Session terminated without a record');
  }
  return {
    seed: session.seed,
    mode,
    score: session.score,
    ticks: session.ticks,
    status: record.status,
    actions: [...session.actions],
    gaps: session.gaps.map((g) => g.centerY),
    record,
  };
}

/** Play one session with the given source from a seed. */
export function playWithSource(
  seed: number | undefined,
  source: ActionSource,
  mode: ControlMode,
  options: PlayOptions = {},
): SessionOutcome {
  const session = new SessionController(sessionOptions(options));
  session.start(seed, source);
  return runToEnd(session, mode);
}

/** Play a full bot session. */
export function playSession(
  seed: number | undefined,
  variant: BotVariant,
  options: PlayOptions = {},
): SessionOutcome {
  const config = options.config ?? DEFAULT_GAME_CONFIG;
  return playWithSource(seed, new PolicyActionSource(createBot(variant, config)), variant, options);
}

/** Replay a seed with a fixed action sequence instead of a bot. */
export function replayActions(
  seed: number,
  actions: readonly Action[],
  options: PlayOptions = {},
): SessionOutcome {
  return playWithSource(seed, new RecordedActionSource(actions), 'none', options);
}

/**
 * Resolve a game id in a results CSV to its seed and play that seed again.
 * Returns null when the id is not in the file.
 */
export async function replayFromResults(
  filePath: string,
  gameId: number,
  variant: BotVariant,
  options: PlayOptions = {},
): Promise<SessionOutcome | null> {
  const seed = await lookupSeed(filePath, gameId);
  if (seed === null) return null;
  return playSession(seed, variant, { ...options, gameId });
}
