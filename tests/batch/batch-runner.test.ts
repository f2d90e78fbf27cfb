import { describe, it, expect } from 'vitest';
import type { SessionRecord } from '../../src/engine/SessionController';
import { runBatch, runSessionCooperatively } from '../../src/batch/batch-runner';
import type { BatchOptions } from '../../src/batch/batch-runner';
import { playSession } from '../../src/replay/replay';

const fixedClock = () => new Date(2026, 9, 19, 12, 0, 0, 0);

const base: BatchOptions = {
  baseSeed: 100,
  count: 6,
  variant: 'single',
  maxTicks: 1500,
  yieldEvery: 50,
  clock: fixedClock,
};

function byGameId(records: SessionRecord[]): SessionRecord[] {
  return [...records].sort((a, b) => a.gameId - b.gameId);
}

describe('runBatch', () => {
  it('plays seed base + n for session n', async () => {
    const { records, cancelled } = await runBatch({ ...base, concurrency: 2 });
    expect(cancelled).toBe(0);
    expect(byGameId(records).map((r) => [r.gameId, r.seed])).toEqual([
      [1, 101],
      [2, 102],
      [3, 103],
      [4, 104],
      [5, 105],
      [6, 106],
    ]);
  });

  it('produces the same records at any concurrency', async () => {
    const serial = await runBatch({ ...base, concurrency: 1 });
    const interleaved = await runBatch({ ...base, concurrency: 4 });
    expect(byGameId(interleaved.records)).toEqual(byGameId(serial.records));
  });

  it('matches a standalone replay of the same seed', async () => {
    const { records } = await runBatch({ ...base, count: 3, concurrency: 3 });
    const third = byGameId(records)[2];
    const replay = playSession(103, 'single', { maxTicks: 1500 });
    expect(third.score).toBe(replay.score);
    expect(third.durationSeconds).toBe(replay.record.durationSeconds);
    expect(third.status).toBe(replay.status);
  });

  it('hands every record to onRecord once', async () => {
    const seen: number[] = [];
    await runBatch({ ...base, concurrency: 3, onRecord: (r) => { seen.push(r.gameId); } });
    expect([...seen].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('waits for an async onRecord before moving on', async () => {
    const order: string[] = [];
    await runBatch({
      ...base,
      count: 2,
      concurrency: 1,
      onRecord: async (r) => {
        order.push(`start ${r.gameId}`);
        await Promise.resolve();
        order.push(`end ${r.gameId}`);
      },
    });
    expect(order).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
  });

  it('starts nothing when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await runBatch({ ...base, signal: controller.signal });
    expect(result.records).toEqual([]);
    expect(result.cancelled).toBe(6);
  });

  it('stops between sessions once cancelled', async () => {
    const controller = new AbortController();
    const result = await runBatch({
      ...base,
      count: 5,
      concurrency: 1,
      signal: controller.signal,
      onRecord: () => controller.abort(),
    });
    expect(result.records.map((r) => r.gameId)).toEqual([1]);
    expect(result.cancelled).toBe(4);
  });

  it('stops the other workers when onRecord fails', async () => {
    let calls = 0;
    await expect(
      runBatch({
        ...base,
        count: 8,
        concurrency: 2,
        onRecord: () => {
          calls++;
          throw new Error('disk full');
        },
      }),
    ).rejects.toThrow('disk full');
    expect(calls).toBe(1);

    // Nothing keeps running after the rejection
    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(calls).toBe(1);
  });

  it('validates its options', async () => {
    await expect(runBatch({ ...base, count: 0 })).rejects.toThrow('count must be a positive integer (got 0)');
    await expect(runBatch({ ...base, concurrency: 0 })).rejects.toThrow(
      'concurrency must be a positive integer (got 0)',
    );
    await expect(runBatch({ ...base, baseSeed: -5 })).rejects.toThrow(
      'baseSeed must be an integer in [0, 2^32) (got -5)',
    );
  });
});

describe('runSessionCooperatively', () => {
  it('emits no record for a cancelled session', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runSessionCooperatively(1, { ...base, signal: controller.signal })).resolves.toBeNull();
  });

  it('yields to the event loop while a session runs', async () => {
    let otherWorkRan = false;
    setImmediate(() => { otherWorkRan = true; });
    const record = await runSessionCooperatively(1, { ...base, maxTicks: 200, yieldEvery: 1 });
    expect(record?.seed).toBe(101);
    expect(otherWorkRan).toBe(true);
  });
});
