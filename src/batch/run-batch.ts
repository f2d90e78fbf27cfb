/**
 * Headless batch run of a bot variant.
 *
 * Usage: npm run batch -- [--count <n>] [--seed <base>] [--bot single|two_pipe]
 *          [--output <csv>] [--concurrency <n>] [--max-ticks <n>] [--config <json>]
 *
 * Session n plays seed base + n. Every finished session is appended to the
 * results CSV as it completes; Ctrl+C stops the batch between ticks and
 * keeps the rows already written.
 */

import { BOT_LABELS, DEFAULT_RUN_CONFIG, parseBotVariant } from '../ai/bot-config';
import type { BotVariant } from '../ai/bot-config';
import { DEFAULT_GAME_CONFIG, loadGameConfig } from '../engine/config';
import { resolveSeed } from '../engine/rng';
import { runBatch } from './batch-runner';
import { ResultsLog } from './results-log';
import { computeBatchStats, formatBatchReport } from './stats';

const DEFAULT_COUNT = 100;
const DEFAULT_OUTPUT = 'results.csv';

function parseIntFlag(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${flag} expects an integer (got "${raw}")`);
  }
  return value;
}

async function main(): Promise<void> {
  let count = DEFAULT_COUNT;
  let baseSeed: number | undefined;
  let variant: BotVariant = 'single';
  let outputPath = DEFAULT_OUTPUT;
  let concurrency: number = DEFAULT_RUN_CONFIG.concurrency;
  let maxTicks: number = DEFAULT_RUN_CONFIG.maxTicks;
  let configPath = '';

  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--count' && args[i + 1]) {
      count = parseIntFlag('--count', args[++i]);
    } else if (args[i] === '--seed' && args[i + 1]) {
      baseSeed = parseIntFlag('--seed', args[++i]);
    } else if (args[i] === '--bot' && args[i + 1]) {
      variant = parseBotVariant(args[++i]);
    } else if (args[i] === '--output' && args[i + 1]) {
      outputPath = args[++i];
    } else if (args[i] === '--concurrency' && args[i + 1]) {
      concurrency = parseIntFlag('--concurrency', args[++i]);
    } else if (args[i] === '--max-ticks' && args[i + 1]) {
      maxTicks = parseIntFlag('--max-ticks', args[++i]);
    } else if (args[i] === '--config' && args[i + 1]) {
      configPath = args[++i];
    } else {
      throw new Error(`Unknown or incomplete argument: ${args[i]}`);
    }
  }

  const config = configPath ? loadGameConfig(configPath) : DEFAULT_GAME_CONFIG;
  const seed = resolveSeed(baseSeed);

  console.log('[batch] Starting batch:');
  console.log(`[batch]   Bot:         ${BOT_LABELS[variant]}`);
  console.log(`[batch]   Sessions:    ${count}`);
  console.log(`[batch]   Base seed:   ${seed}`);
  console.log(`[batch]   Concurrency: ${concurrency}`);
  console.log(`[batch]   Output:      ${outputPath}`);

  const log = new ResultsLog(outputPath);
  await log.open();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('[batch] interrupted, finishing current ticks...');
    controller.abort();
  });

  const start = performance.now();
  let done = 0;
  const result = await runBatch({
    baseSeed: seed,
    count,
    variant,
    config,
    concurrency,
    maxTicks,
    signal: controller.signal,
    onRecord: async (record) => {
      await log.append(record);
      done++;
      if (done % 10 === 0 || done === count) {
        console.log(`[batch] ${done}/${count} (game #${record.gameId}: score ${record.score})`);
      }
    },
  });
  await log.flush();

  const elapsed = (performance.now() - start) / 1000;
  console.log(`[batch] Finished ${result.records.length} sessions in ${elapsed.toFixed(1)}s`);
  if (result.cancelled > 0) {
    console.log(`[batch] ${result.cancelled} sessions cancelled`);
  }
  for (const line of formatBatchReport(computeBatchStats(result.records))) {
    console.log(`[batch] ${line}`);
  }
}

main().catch((err: unknown) => {
  console.error('[batch]', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
