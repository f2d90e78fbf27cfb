/**
 * Batch statistics and the printable end-of-run report.
 */

import type { SessionRecord } from '../engine/SessionController';

export interface ScoreBucket {
  label: string;
  min: number;
  /** Inclusive; Infinity for the open-ended last bucket */
  max: number;
  count: number;
  percentage: number;
}

export interface TopScore {
  score: number;
  seed: number;
  gameId: number;
}

export interface BatchStats {
  total: number;
  completed: number;
  aborted: number;
  minScore: number;
  maxScore: number;
  meanScore: number;
  /** Upper median: sorted[floor(n / 2)] */
  medianScore: number;
  topScores: TopScore[];
  distribution: ScoreBucket[];
  minDuration: number;
  maxDuration: number;
  meanDuration: number;
}

const BUCKETS: ReadonlyArray<readonly [number, number]> = [
  [0, 0],
  [1, 5],
  [6, 10],
  [11, 20],
  [21, 50],
  [51, Infinity],
];

const TOP_COUNT = 5;

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function bucketLabel(min: number, max: number): string {
  if (max === Infinity) return `${min}+`;
  if (min === max) return `${min}`;
  return `${min}-${max}`;
}

export function computeBatchStats(records: readonly SessionRecord[]): BatchStats {
  const scores = records.map((r) => r.score);
  const sorted = [...scores].sort((a, b) => a - b);
  const durations = records.map((r) => r.durationSeconds);

  const topScores = [...records]
    .sort((a, b) => b.score - a.score || a.gameId - b.gameId)
    .slice(0, TOP_COUNT)
    .map((r) => ({ score: r.score, seed: r.seed, gameId: r.gameId }));

  const distribution = BUCKETS.map(([min, max]) => {
    const count = scores.filter((s) => s >= min && s <= max).length;
    return {
      label: bucketLabel(min, max),
      min,
      max,
      count,
      percentage: scores.length === 0 ? 0 : (count / scores.length) * 100,
    };
  });

  return {
    total: records.length,
    completed: records.filter((r) => r.status === 'completed').length,
    aborted: records.filter((r) => r.status === 'aborted').length,
    minScore: sorted[0] ?? 0,
    maxScore: sorted[sorted.length - 1] ?? 0,
    meanScore: mean(scores),
    medianScore: sorted[Math.floor(sorted.length / 2)] ?? 0,
    topScores,
    distribution,
    minDuration: durations.length === 0 ? 0 : Math.min(...durations),
    maxDuration: durations.length === 0 ? 0 : Math.max(...durations),
    meanDuration: mean(durations),
  };
}

/** Lines of the end-of-batch summary. */
export function formatBatchReport(stats: BatchStats): string[] {
  const lines = [
    `Sessions: ${stats.total} (${stats.completed} completed, ${stats.aborted} aborted)`,
  ];
  if (stats.total === 0) return lines;

  lines.push(
    `Score: min ${stats.minScore}, max ${stats.maxScore}, mean ${stats.meanScore.toFixed(1)}, median ${stats.medianScore}`,
    `Duration: min ${stats.minDuration.toFixed(2)}s, max ${stats.maxDuration.toFixed(2)}s, mean ${stats.meanDuration.toFixed(2)}s`,
    'Top scores:',
    ...stats.topScores.map((t, i) => `  ${i + 1}. score ${t.score} - seed ${t.seed} (game #${t.gameId})`),
    'Distribution:',
    ...stats.distribution.map((b) => `  ${b.label} pipes: ${b.count} (${b.percentage.toFixed(1)}%)`),
  );

  const best = stats.topScores[0];
  if (best) {
    lines.push(`Replay the best run: npm run replay -- --seed ${best.seed}`);
  }
  return lines;
}
