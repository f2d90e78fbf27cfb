/**
 * Batch Runner — many independent bot sessions for statistics.
 *
 * Session n (1-indexed) plays seed base + n. Sessions share nothing but
 * that formula, so up to `concurrency` of them interleave on the event
 * loop, each yielding every `yieldEvery` ticks. Cancellation is checked
 * between ticks only; a cancelled session emits no record. If a session or
 * onRecord throws, the remaining workers are cancelled the same way and
 * runBatch rejects with that first error once they have stopped.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { PolicyActionSource } from '../ai/action-source';
import { createBot } from '../ai/bot';
import type { BotVariant } from '../ai/bot-config';
import { DEFAULT_RUN_CONFIG } from '../ai/bot-config';
import { SessionController } from '../engine/SessionController';
import type { SessionRecord } from '../engine/SessionController';
import type { GameConfig } from '../engine/config';
import { DEFAULT_GAME_CONFIG, validateGameConfig } from '../engine/config';
import { batchSeed, isValidSeed } from '../engine/rng';

export interface BatchOptions {
  baseSeed: number;
  count: number;
  variant: BotVariant;
  config?: GameConfig;
  concurrency?: number;
  maxTicks?: number;
  yieldEvery?: number;
  signal?: AbortSignal;
  clock?: () => Date;
  /** Called once per finished session, e.g. ResultsLog.append */
  onRecord?: (record: SessionRecord) => void | Promise<void>;
}

export interface BatchResult {
  /** In completion order */
  records: SessionRecord[];
  /** Sessions that never started or were interrupted */
  cancelled: number;
}

function validateBatchOptions(options: BatchOptions): void {
  if (!isValidSeed(options.baseSeed)) {
    throw new Error(`baseSeed must be an integer in [0, 2^32) (got ${options.baseSeed})`);
  }
  if (!Number.isInteger(options.count) || options.count <= 0) {
    throw new Error(`count must be a positive integer (got ${options.count})`);
  }
  const concurrency = options.concurrency ?? DEFAULT_RUN_CONFIG.concurrency;
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new Error(`concurrency must be a positive integer (got ${concurrency})`);
  }
  const yieldEvery = options.yieldEvery ?? DEFAULT_RUN_CONFIG.yieldEvery;
  if (!Number.isInteger(yieldEvery) || yieldEvery <= 0) {
    throw new Error(`yieldEvery must be a positive integer (got ${yieldEvery})`);
  }
}

/**
 * Play one session, yielding every `yieldEvery` ticks.
 * Resolves to null when the signal aborts it first.
 */
export async function runSessionCooperatively(
  gameId: number,
  options: BatchOptions,
): Promise<SessionRecord | null> {
  const config = options.config ?? DEFAULT_GAME_CONFIG;
  const yieldEvery = options.yieldEvery ?? DEFAULT_RUN_CONFIG.yieldEvery;
  const session = new SessionController({
    config,
    gameId,
    maxTicks: options.maxTicks ?? DEFAULT_RUN_CONFIG.maxTicks,
    clock: options.clock,
  });
  session.start(batchSeed(options.baseSeed, gameId), new PolicyActionSource(createBot(options.variant, config)));

  let terminated = false;
  while (!terminated) {
    for (let i = 0; i < yieldEvery && !terminated; i++) {
      if (options.signal?.aborted) return null;
      terminated = session.tick().terminated;
    }
    if (!terminated) await yieldToEventLoop();
  }
  return session.record;
}

export async function runBatch(options: BatchOptions): Promise<BatchResult> {
  validateBatchOptions(options);
  validateGameConfig(options.config ?? DEFAULT_GAME_CONFIG);

  const concurrency = Math.min(options.concurrency ?? DEFAULT_RUN_CONFIG.concurrency, options.count);
  const records: SessionRecord[] = [];
  const failures: unknown[] = [];
  let nextGameId = 1;

  // Caller cancellation and a worker failure stop the batch through one signal
  const internal = new AbortController();
  const forwardAbort = () => internal.abort();
  if (options.signal?.aborted) internal.abort();
  else options.signal?.addEventListener('abort', forwardAbort, { once: true });
  const sessionOptions: BatchOptions = { ...options, signal: internal.signal };

  async function worker(): Promise<void> {
    try {
      while (nextGameId <= options.count && !internal.signal.aborted) {
        const gameId = nextGameId++;
        const record = await runSessionCooperatively(gameId, sessionOptions);
        if (record === null) return;
        records.push(record);
        await options.onRecord?.(record);
      }
    } catch (err) {
      failures.push(err);
      internal.abort();
    }
  }

  try {
    await Promise.all(Array.from({ length: concurrency }, () => worker()));
  } finally {
    options.signal?.removeEventListener('abort', forwardAbort);
  }

  if (failures.length > 0) throw failures[0];

  return { records, cancelled: options.count - records.length };
}
