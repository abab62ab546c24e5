/**
 * Resource governor — derives a render worker budget from host headroom.
 * Re-evaluated before each batch; a batch in flight keeps the size it started with.
 */
import os from 'node:os';
import { statfs } from 'node:fs/promises';
import { createLogger } from '../utils/logger.js';

const log = createLogger('governor');

export interface HostSnapshot {
  freeMemoryBytes: number;
  cpuCount: number;
  loadAverage: number;
  freeDiskBytes: number;
}

export interface HostProbe {
  sample(): Promise<HostSnapshot>;
}

export class NodeHostProbe implements HostProbe {
  constructor(private readonly diskPath: string) {}

  async sample(): Promise<HostSnapshot> {
    const disk = await statfs(this.diskPath);
    return {
      freeMemoryBytes: os.freemem(),
      cpuCount:        os.availableParallelism(),
      loadAverage:     os.loadavg()[0] ?? 0,
      freeDiskBytes:   disk.bavail * disk.bsize,
    };
  }
}

export interface GovernorOptions {
  floor: number;
  ceiling: number;
  memoryPerWorkerBytes: number;
  diskPerWorkerBytes: number;
  diskSafetyMarginBytes: number;
}

export type LimitingFactor = 'memory' | 'cpu' | 'disk' | 'ceiling' | 'low_disk';

export interface ConcurrencyDecision {
  workers: number;
  limitedBy: LimitingFactor;
  /** Free disk is below the safety margin plus the remaining estimated output. */
  lowDisk: boolean;
  snapshot: HostSnapshot;
}

export function computeConcurrency(
  s: HostSnapshot,
  opts: GovernorOptions,
  remainingOutputBytes = 0,
): ConcurrencyDecision {
  const floor = Math.max(1, Math.floor(opts.floor));
  const ceiling = Math.max(floor, Math.floor(opts.ceiling));
  const diskHeadroom = s.freeDiskBytes - opts.diskSafetyMarginBytes - remainingOutputBytes;

  if (diskHeadroom < 0) {
    return { workers: floor, limitedBy: 'low_disk', lowDisk: true, snapshot: s };
  }

  const budgets: [LimitingFactor, number][] = [
    ['ceiling', ceiling],
    ['memory',  Math.floor(s.freeMemoryBytes / opts.memoryPerWorkerBytes)],
    ['cpu',     Math.floor(Math.max(0, s.cpuCount - s.loadAverage))],
    ['disk',    Math.floor(diskHeadroom / opts.diskPerWorkerBytes)],
  ];
  let [limitedBy, budget]: [LimitingFactor, number] = ['ceiling', ceiling];
  for (const [factor, value] of budgets) {
    if (value < budget) [limitedBy, budget] = [factor, value];
  }

  return { workers: Math.min(ceiling, Math.max(floor, budget)), limitedBy, lowDisk: false, snapshot: s };
}

export class ResourceGovernor {
  constructor(private readonly probe: HostProbe, private readonly opts: GovernorOptions) {}

  async decide(remainingOutputBytes = 0): Promise<ConcurrencyDecision> {
    const decision = computeConcurrency(await this.probe.sample(), this.opts, remainingOutputBytes);
    const level = decision.lowDisk ? 'warn' : 'debug';
    log[level]('Concurrency budget', {
      workers: decision.workers,
      limitedBy: decision.limitedBy,
      freeMemoryMb: Math.round(decision.snapshot.freeMemoryBytes / 1024 / 1024),
      freeDiskMb: Math.round(decision.snapshot.freeDiskBytes / 1024 / 1024),
      load: decision.snapshot.loadAverage,
    });
    return decision;
  }

  async maxConcurrency(remainingOutputBytes = 0): Promise<number> {
    return (await this.decide(remainingOutputBytes)).workers;
  }
}
