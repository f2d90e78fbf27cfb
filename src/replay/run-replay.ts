/**
 * Replay a single session.
 *
 * Usage:
 *   npm run replay -- --seed <n> [--bot single|two_pipe] [--max-ticks <n>] [--tape-out <file>]
 *   npm run replay -- --results <csv> --game-id <n> [--bot ...] [--tape-out <file>]
 *   npm run replay -- --tape <file>
 *
 * Seed modes replay the bot headlessly and print the outcome. --tape-out
 * writes the played actions as a tape; --tape plays a tape's actions back
 * and checks the score it recorded.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { BOT_LABELS, DEFAULT_RUN_CONFIG, parseBotVariant } from '../ai/bot-config';
import type { BotVariant } from '../ai/bot-config';
import { lookupSeed } from '../batch/results-log';
import { playSession, replayActions } from './replay';
import type { SessionOutcome } from './replay';
import { deserializeTape, serializeTape } from './tape';

function parseIntFlag(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${flag} expects an integer (got "${raw}")`);
  }
  return value;
}

function printOutcome(outcome: SessionOutcome): void {
  console.log(`[replay]   Seed:     ${outcome.seed}`);
  console.log(`[replay]   Control:  ${BOT_LABELS[outcome.mode]}`);
  console.log(`[replay]   Score:    ${outcome.score}`);
  console.log(`[replay]   Ticks:    ${outcome.ticks} (${outcome.record.durationSeconds.toFixed(3)}s)`);
  console.log(`[replay]   Status:   ${outcome.status}`);
}

async function main(): Promise<void> {
  let seed: number | undefined;
  let resultsPath = '';
  let gameId: number | undefined;
  let variant: BotVariant = 'single';
  let maxTicks: number = DEFAULT_RUN_CONFIG.maxTicks;
  let tapeOut = '';
  let tapeIn = '';

  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--seed' && args[i + 1]) {
      seed = parseIntFlag('--seed', args[++i]);
    } else if (args[i] === '--results' && args[i + 1]) {
      resultsPath = args[++i];
    } else if (args[i] === '--game-id' && args[i + 1]) {
      gameId = parseIntFlag('--game-id', args[++i]);
    } else if (args[i] === '--bot' && args[i + 1]) {
      variant = parseBotVariant(args[++i]);
    } else if (args[i] === '--max-ticks' && args[i + 1]) {
      maxTicks = parseIntFlag('--max-ticks', args[++i]);
    } else if (args[i] === '--tape-out' && args[i + 1]) {
      tapeOut = args[++i];
    } else if (args[i] === '--tape' && args[i + 1]) {
      tapeIn = args[++i];
    } else {
      throw new Error(`Unknown or incomplete argument: ${args[i]}`);
    }
  }

  if (tapeIn) {
    const tape = deserializeTape(readFileSync(tapeIn));
    console.log(`[replay] Tape ${tapeIn}: ${tape.header.tickCount} ticks, recorded score ${tape.finalScore}`);
    const outcome = replayActions(tape.header.seed, tape.actions, { maxTicks: tape.header.tickCount });
    printOutcome(outcome);
    if (outcome.score !== tape.finalScore) {
      throw new Error(`Score mismatch: tape says ${tape.finalScore}, replay scored ${outcome.score}`);
    }
    console.log('[replay] Tape verified');
    return;
  }

  if (resultsPath) {
    if (gameId === undefined) {
      throw new Error('--results needs --game-id');
    }
    const found = await lookupSeed(resultsPath, gameId);
    if (found === null) {
      throw new Error(`Game #${gameId} not found in ${resultsPath}`);
    }
    console.log(`[replay] Game #${gameId} -> seed ${found}`);
    seed = found;
  }

  if (seed === undefined) {
    throw new Error('Pass --seed <n>, --results <csv> --game-id <n>, or --tape <file>');
  }

  console.log(`[replay] Replaying seed ${seed}`);
  const outcome = playSession(seed, variant, { maxTicks, gameId });
  printOutcome(outcome);

  if (tapeOut) {
    writeFileSync(tapeOut, serializeTape(outcome.seed, outcome.mode, outcome.actions, outcome.score));
    console.log(`[replay] Tape written to ${tapeOut}`);
  }
}

main().catch((err: unknown) => {
  console.error('[replay]', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
