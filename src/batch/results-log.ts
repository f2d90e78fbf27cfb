/**
 * Results Log — persisted SessionRecords as CSV.
 *
 *   game_id,seed,score,duration_seconds,pipes_passed,status,timestamp
 *
 * One header row, one row per finished session. Rows may arrive from
 * interleaved sessions; ResultsLog funnels them through a single append
 * queue so each row is written whole, exactly once.
 */

import * as fs from 'node:fs/promises';
import type { SessionRecord, SessionStatus } from '../engine/SessionController';
import { formatDurationSeconds } from '../utils/formatTime';

export const RESULTS_COLUMNS = [
  'game_id',
  'seed',
  'score',
  'duration_seconds',
  'pipes_passed',
  'status',
  'timestamp',
] as const;

export const RESULTS_HEADER = RESULTS_COLUMNS.join(',');

const STATUSES: readonly SessionStatus[] = ['completed', 'aborted'];

export function formatResultRow(record: SessionRecord): string {
  return [
    record.gameId,
    record.seed,
    record.score,
    formatDurationSeconds(record.durationSeconds),
    record.pipesPassed,
    record.status,
    record.timestamp,
  ].join(',');
}

function parseInteger(raw: string, column: string, line: number): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new Error(`Results line ${line}: ${column} must be an integer (got "${raw}")`);
  }
  return value;
}

function parseRow(line: string, lineNumber: number): SessionRecord {
  const cells = line.split(',');
  if (cells.length !== RESULTS_COLUMNS.length) {
    throw new Error(
      `Results line ${lineNumber}: expected ${RESULTS_COLUMNS.length} columns, got ${cells.length}`,
    );
  }
  const [gameId, seed, score, duration, pipesPassed, status, timestamp] = cells;
  const parsedStatus = STATUSES.find((s) => s === status);
  if (parsedStatus === undefined) {
    throw new Error(`Results line ${lineNumber}: unknown status "${status}"`);
  }
  const durationSeconds = Number(duration);
  if (!Number.isFinite(durationSeconds)) {
    throw new Error(`Results line ${lineNumber}: duration_seconds must be a number`);
  }
  return {
    gameId: parseInteger(gameId, 'game_id', lineNumber),
    seed: parseInteger(seed, 'seed', lineNumber),
    score: parseInteger(score, 'score', lineNumber),
    durationSeconds,
    pipesPassed: parseInteger(pipesPassed, 'pipes_passed', lineNumber),
    status: parsedStatus,
    timestamp,
  };
}

/** Parse a whole results file. Blank lines are skipped; a wrong header throws. */
export function parseResults(csv: string): SessionRecord[] {
  const lines = csv.split(/\r?\n/);
  assertHeader(lines[0]);
  const records: SessionRecord[] = [];
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === '') continue;
    records.push(parseRow(lines[i].trim(), i + 1));
  }
  return records;
}

function assertHeader(firstLine: string | undefined): void {
  if (firstLine?.trim() !== RESULTS_HEADER) {
    throw new Error(`Not a results file: header must be "${RESULTS_HEADER}"`);
  }
}

function tryParseRow(line: string, lineNumber: number): SessionRecord | null {
  try {
    return parseRow(line, lineNumber);
  } catch {
    return null;
  }
}

/**
 * Seed of the first well-formed row with this game id, or null when there
 * is none. Malformed rows, such as a row cut short by an interrupted batch,
 * are skipped rather than failing the lookup.
 */
export function findSeedByGameId(csv: string, gameId: number): number | null {
  const lines = csv.split(/\r?\n/);
  assertHeader(lines[0]);
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') continue;
    const row = tryParseRow(line, i + 1);
    if (row !== null && row.gameId === gameId) return row.seed;
  }
  return null;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function lookupSeed(filePath: string, gameId: number): Promise<number | null> {
  let csv: string;
  try {
    csv = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) throw new Error(`Results file not found: ${filePath}`);
    throw err;
  }
  return findSeedByGameId(csv, gameId);
}

/**
 * Append-only CSV writer with a single write queue.
 * append() may be called from any number of interleaved sessions.
 */
export class ResultsLog {
  private tail: Promise<void> = Promise.resolve();
  private rows = 0;

  constructor(readonly filePath: string) {}

  get rowCount(): number {
    return this.rows;
  }

  /** Create (or truncate) the file and write the header row. */
  async open(): Promise<void> {
    await this.enqueue(() => fs.writeFile(this.filePath, `${RESULTS_HEADER}\n`, 'utf-8'));
  }

  append(record: SessionRecord): Promise<void> {
    return this.enqueue(async () => {
      await fs.appendFile(this.filePath, `${formatResultRow(record)}\n`, 'utf-8');
      this.rows++;
    });
  }

  /** Resolves once every queued write has finished. */
  flush(): Promise<void> {
    return this.tail;
  }

  private enqueue(write: () => Promise<void>): Promise<void> {
    const run = this.tail.then(write);
    // The caller gets the failure through `run`; the queue itself keeps going.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
