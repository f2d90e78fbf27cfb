import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ManualActionSource } from '../../src/ai/action-source';
import { SessionController } from '../../src/engine/SessionController';
import { Action } from '../../src/engine/types';
import { RESULTS_HEADER } from '../../src/batch/results-log';
import { playSession, playWithSource, replayActions, replayFromResults, runToEnd } from '../../src/replay/replay';

const fixedClock = () => new Date(2026, 4, 6, 7, 8, 9, 10);

describe('playSession', () => {
  it('reports an outcome consistent with its record', () => {
    const outcome = playSession(2024, 'single', { maxTicks: 1500, gameId: 9, clock: fixedClock });
    expect(outcome.seed).toBe(2024);
    expect(outcome.mode).toBe('single');
    expect(outcome.actions).toHaveLength(outcome.ticks);
    expect(outcome.record.gameId).toBe(9);
    expect(outcome.record.seed).toBe(2024);
    expect(outcome.record.score).toBe(outcome.score);
    expect(outcome.record.status).toBe(outcome.status);
    expect(outcome.record.durationSeconds).toBeCloseTo(outcome.ticks / 30, 10);
    expect(outcome.ticks).toBeLessThanOrEqual(1500);
  });

  it('stops at maxTicks as aborted when the bot survives that long', () => {
    const outcome = playSession(2024, 'single', { maxTicks: 1 });
    expect(outcome.ticks).toBe(1);
    expect(outcome.status).toBe('aborted');
  });
});

describe('replayActions', () => {
  it('plays a fixed sequence under external control', () => {
    const outcome = replayActions(3, [Action.Flap, Action.Flap]);
    expect(outcome.mode).toBe('none');
    // two flaps lift the bird 18 px, so the fall takes 56 ticks instead of 52
    expect(outcome.ticks).toBe(56);
    expect(outcome.actions.slice(0, 3)).toEqual([Action.Flap, Action.Flap, Action.NoFlap]);
    expect(outcome.status).toBe('completed');
  });
});

describe('playWithSource / runToEnd', () => {
  it('runs any action source to termination', () => {
    const outcome = playWithSource(8, new ManualActionSource(), 'none');
    expect(outcome.ticks).toBe(52);
    expect(outcome.score).toBe(0);
  });

  it('returns at once for a session that already ended', () => {
    const session = new SessionController({ maxTicks: 3 });
    session.start(1, new ManualActionSource());
    const first = runToEnd(session, 'none');
    const again = runToEnd(session, 'none');
    expect(again.ticks).toBe(first.ticks);
    expect(again.record).toBe(first.record);
  });
});

describe('replayFromResults', () => {
  let dir: string;
  let csvPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flappy-replay-'));
    csvPath = path.join(dir, 'results.csv');
    fs.writeFileSync(
      csvPath,
      [
        RESULTS_HEADER,
        '1,501,4,20.000,4,completed,2026-05-06T07:08:09.010+00:00',
        '2,502,0,1.733,0,completed,2026-05-06T07:08:09.010+00:00',
        '',
      ].join('\n'),
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('replays the seed stored for a game id', async () => {
    const outcome = await replayFromResults(csvPath, 2, 'single', { maxTicks: 1000 });
    expect(outcome?.seed).toBe(502);
    expect(outcome?.record.gameId).toBe(2);
    expect(outcome?.score).toBe(playSession(502, 'single', { maxTicks: 1000 }).score);
  });

  it('returns null for an unknown game id', async () => {
    expect(await replayFromResults(csvPath, 3, 'single')).toBeNull();
  });
});
