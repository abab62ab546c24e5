import { describe, expect, it } from 'vitest';
import { ResourceGovernor, computeConcurrency, type GovernorOptions, type HostSnapshot } from './governor.js';

const MB = 1024 * 1024;
const GB = 1024 * MB;

const opts: GovernorOptions = {
  floor: 1,
  ceiling: 4,
  memoryPerWorkerBytes: 512 * MB,
  diskPerWorkerBytes: 200 * MB,
  diskSafetyMarginBytes: 5 * GB,
};

const roomy: HostSnapshot = { freeMemoryBytes: 16 * GB, cpuCount: 16, loadAverage: 0.5, freeDiskBytes: 100 * GB };

describe('computeConcurrency', () => {
  it('uses the ceiling on a roomy host', () => {
    expect(computeConcurrency(roomy, opts)).toMatchObject({ workers: 4, limitedBy: 'ceiling', lowDisk: false });
  });

  it('is limited by free memory', () => {
    const d = computeConcurrency({ ...roomy, freeMemoryBytes: 1200 * MB }, opts);
    expect(d).toMatchObject({ workers: 2, limitedBy: 'memory' });
  });

  it('is limited by idle cores under load', () => {
    const d = computeConcurrency({ ...roomy, cpuCount: 8, loadAverage: 5.5 }, opts);
    expect(d).toMatchObject({ workers: 2, limitedBy: 'cpu' });
  });

  it('is limited by disk headroom above the safety margin', () => {
    const d = computeConcurrency({ ...roomy, freeDiskBytes: 5 * GB + 450 * MB }, opts, 50 * MB);
    expect(d).toMatchObject({ workers: 2, limitedBy: 'disk', lowDisk: false });
  });

  it('never drops below the floor', () => {
    const d = computeConcurrency({ ...roomy, freeMemoryBytes: 100 * MB, loadAverage: 40 }, opts);
    expect(d.workers).toBe(1);
  });

  it('treats a floor below one as one', () => {
    const d = computeConcurrency({ ...roomy, freeMemoryBytes: 0 }, { ...opts, floor: 0 });
    expect(d.workers).toBe(1);
  });

  it('forces the floor and flags low disk when remaining output will not fit', () => {
    const d = computeConcurrency({ ...roomy, freeDiskBytes: 5 * GB + 100 * MB }, { ...opts, floor: 2 }, 200 * MB);
    expect(d).toMatchObject({ workers: 2, limitedBy: 'low_disk', lowDisk: true });
  });
});

describe('ResourceGovernor', () => {
  it('re-samples the host on every call', async () => {
    const samples = [roomy, { ...roomy, freeMemoryBytes: 600 * MB }];
    let i = 0;
    const governor = new ResourceGovernor({ sample: async () => samples[i++] ?? roomy }, opts);

    expect(await governor.maxConcurrency()).toBe(4);
    expect(await governor.maxConcurrency()).toBe(1);
  });
});
