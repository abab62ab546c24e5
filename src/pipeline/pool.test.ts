import { describe, expect, it, vi } from 'vitest';
import { runInBatches } from './pool.js';
import { ResourceGovernor, type HostSnapshot } from '../resources/governor.js';

const GB = 1024 ** 3;

const roomy: HostSnapshot = { freeMemoryBytes: 64 * GB, cpuCount: 16, loadAverage: 0, freeDiskBytes: 500 * GB };

function governor(snapshot: HostSnapshot, ceiling = 2) {
  return new ResourceGovernor(
    { sample: async () => snapshot },
    { floor: 1, ceiling, memoryPerWorkerBytes: GB, diskPerWorkerBytes: GB, diskSafetyMarginBytes: 5 * GB },
  );
}

const tick = () => new Promise<void>((r) => setTimeout(r, 1));

describe('runInBatches', () => {
  it('never runs more tasks at once than the governor allows', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runInBatches([1, 2, 3, 4, 5], {
      governor: governor(roomy),
      outputBytesPerItem: 10,
      task: async (n) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight--;
        return n * 10;
      },
    });

    expect(peak).toBe(2);
    expect(results).toEqual([10, 20, 30, 40, 50].map((value) => ({ status: 'fulfilled', value })));
  });

  it('re-evaluates the budget before each batch with the remaining output estimate', async () => {
    const gov = governor(roomy);
    const decide = vi.spyOn(gov, 'decide');
    const decisions: number[] = [];

    await runInBatches([1, 2, 3, 4, 5], {
      governor: gov,
      outputBytesPerItem: 10,
      onDecision: (d) => { decisions.push(d.workers); },
      task: async (n) => n,
    });

    expect(decide.mock.calls).toEqual([[50], [10]]);
    expect(decisions).toEqual([2, 2]);
  });

  it('settles every task even when some fail', async () => {
    const results = await runInBatches(['a', 'b', 'c'], {
      governor: governor(roomy),
      outputBytesPerItem: 0,
      task: async (s) => {
        if (s === 'b') throw new Error('render failed');
        return s.toUpperCase();
      },
    });

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
  });

  it('runs the checkpoint before every task', async () => {
    const order: string[] = [];

    await runInBatches(['a', 'b'], {
      governor: governor(roomy, 1),
      outputBytesPerItem: 0,
      checkpoint: async () => { order.push('checkpoint'); },
      task: async (s) => { order.push(s); },
    });

    expect(order).toEqual(['checkpoint', 'a', 'checkpoint', 'b']);
  });

  it('drops to the floor when disk is short', async () => {
    const decisions: boolean[] = [];
    let peak = 0;
    let inFlight = 0;

    await runInBatches([1, 2, 3], {
      governor: governor({ ...roomy, freeDiskBytes: 4 * GB }, 4),
      outputBytesPerItem: 0,
      onDecision: (d) => { decisions.push(d.lowDisk); },
      task: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight--;
      },
    });

    expect(peak).toBe(1);
    expect(decisions).toEqual([true, true]);
  });
});
