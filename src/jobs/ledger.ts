/**
 * Job ledger — the durable, pollable record of a pipeline run.
 *
 *   pending ──advance──▶ processing ──finish──▶ completed | failed
 *                          ▲    │
 *                   resume │    │ pause
 *                          │    ▼
 *                          paused ──finish──▶ completed | failed
 *
 * The owning run holds the authoritative copy in memory. Every persisted write
 * is a partial update of the fields that changed, serialized per job, so an
 * external pause written by another process is never clobbered. A storage
 * failure is appended to the in-memory error log and the run carries on.
 */
import { randomUUID } from 'node:crypto';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { JobStateError, describeError, errorMessage, type ErrorKind } from '../errors.js';
import { isTerminal, type Job, type JobErrorRecord, type JobPatch, type JobRepository, type JobStatus, type TerminalStatus } from './types.js';

const log = createLogger('ledger');

export interface JobLedgerOptions {
  pollMs: number;
  /** Attempts for the final terminal write. */
  terminalWriteAttempts?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface ErrorContext {
  step?: string;
  provider?: string;
  segment?: number;
  kind?: ErrorKind;
}

export interface FinishOutcome {
  status: TerminalStatus;
  outputPath?: string;
}

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

export class JobLedger {
  private readonly owned = new Map<string, Job>();
  /** Last status seen in (or written to) the store, per owned job. */
  private readonly storedStatus = new Map<string, JobStatus>();
  private readonly stepStartedAt = new Map<string, number>();
  private readonly mutex = new KeyedMutex();
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly repo: JobRepository, private readonly opts: JobLedgerOptions) {
    this.now = opts.now ?? (() => new Date());
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async create(name: string, mode: string, scriptHash: string | null = null): Promise<Job> {
    const ts = this.now().toISOString();
    const job: Job = {
      id: randomUUID(),
      name,
      mode,
      status: 'pending',
      progressPercent: 0,
      currentStep: null,
      totalSegments: 0,
      processedSegments: 0,
      scriptHash,
      outputPath: null,
      errorLog: [],
      performanceMetrics: {},
      createdAt: ts,
      startedAt: null,
      completedAt: null,
      updatedAt: ts,
    };
    this.owned.set(job.id, job);
    this.storedStatus.set(job.id, 'pending');

    try {
      await this.mutex.runExclusive(job.id, () => this.repo.insert(structuredClone(job)));
    } catch (err) {
      this.storageFailed(job, err);
    }
    log.info('Job created', { jobId: job.id, name, mode });
    return structuredClone(job);
  }

  /** Sole mutator of progress fields. The first call moves a pending job to processing. */
  async advance(id: string, step: string, processedSegments: number, totalSegments?: number): Promise<Job> {
    const job = this.mutable(id);
    const patch: JobPatch = {};

    if (job.status === 'pending') {
      job.status = 'processing';
      job.startedAt = this.now().toISOString();
      patch.status = job.status;
      patch.startedAt = job.startedAt;
    }
    if (job.currentStep !== step) this.closeStep(job, step);

    if (totalSegments !== undefined) job.totalSegments = Math.max(0, totalSegments);
    job.processedSegments = Math.max(0, job.totalSegments > 0 ? Math.min(processedSegments, job.totalSegments) : processedSegments);
    job.progressPercent = job.totalSegments > 0 ? Math.round((job.processedSegments / job.totalSegments) * 100) : 0;
    job.currentStep = step;

    Object.assign(patch, {
      currentStep: job.currentStep,
      totalSegments: job.totalSegments,
      processedSegments: job.processedSegments,
      progressPercent: job.progressPercent,
      performanceMetrics: { ...job.performanceMetrics },
    } satisfies JobPatch);
    await this.persist(job, patch);
    return structuredClone(job);
  }

  /** Appends; never replaces an earlier record. */
  async recordError(id: string, err: unknown, ctx: ErrorContext = {}): Promise<JobErrorRecord> {
    const job = this.mutable(id);
    const record = this.append(job, err, ctx);
    await this.persist(job, { errorLog: [...job.errorLog] });
    return record;
  }

  incrementMetric(id: string, name: string, by = 1): number {
    const job = this.mutable(id);
    const next = (job.performanceMetrics[name] ?? 0) + by;
    job.performanceMetrics[name] = next;
    return next;
  }

  setMetric(id: string, name: string, value: number): void {
    this.mutable(id).performanceMetrics[name] = value;
  }

  setScriptHash(id: string, scriptHash: string): void {
    this.mutable(id).scriptHash = scriptHash;
  }

  /** Suspend a processing job. Works on jobs owned by another process too. */
  async pause(id: string): Promise<Job> {
    return this.transition(id, 'processing', 'paused');
  }

  async resume(id: string): Promise<Job> {
    return this.transition(id, 'paused', 'processing');
  }

  /**
   * Task-boundary observer. Adopts a pause or resume written to the store by
   * another process, then blocks for as long as the job stays paused.
   */
  async checkpoint(id: string): Promise<void> {
    const job = this.mutable(id);
    for (;;) {
      const stored = await this.readStoredStatus(id);
      if (stored !== null && stored !== this.storedStatus.get(id)) {
        this.storedStatus.set(id, stored);
        if (stored === 'paused' && job.status === 'processing') {
          job.status = 'paused';
          log.info('Job paused externally — waiting', { jobId: id });
        } else if (stored === 'processing' && job.status === 'paused') {
          job.status = 'processing';
          log.info('Job resumed externally', { jobId: id });
        }
      }
      if (job.status !== 'paused') return;
      await this.sleep(this.opts.pollMs);
    }
  }

  async finish(id: string, outcome: FinishOutcome): Promise<Job> {
    const job = this.mutable(id);
    const end = this.now();
    this.closeStep(job, null);
    job.status = outcome.status;
    job.completedAt = job.updatedAt = end.toISOString();
    if (outcome.outputPath) job.outputPath = outcome.outputPath;
    if (outcome.status === 'completed') job.progressPercent = 100;
    job.performanceMetrics['elapsed_ms'] = end.getTime() - Date.parse(job.startedAt ?? job.createdAt);

    const patch: JobPatch = {
      status: job.status,
      progressPercent: job.progressPercent,
      currentStep: job.currentStep,
      totalSegments: job.totalSegments,
      processedSegments: job.processedSegments,
      scriptHash: job.scriptHash,
      outputPath: job.outputPath,
      errorLog: job.errorLog,
      performanceMetrics: job.performanceMetrics,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
      updatedAt: job.updatedAt,
    };
    try {
      await withRetry(
        () => this.mutex.runExclusive(id, () => this.repo.update(id, structuredClone(patch))),
        {
          maxAttempts: this.opts.terminalWriteAttempts ?? 3,
          baseDelayMs: 1_000,
          isRetryable: () => true,
          sleep: this.sleep,
          label: `finish job ${id}`,
        },
      );
      this.storedStatus.set(id, job.status);
    } catch (err) {
      log.error('Terminal job write failed — state only in memory', { jobId: id, error: errorMessage(err) });
    }
    log.info('Job finished', { jobId: id, status: job.status, elapsedMs: job.performanceMetrics['elapsed_ms'] });
    return structuredClone(job);
  }

  /** Snapshot for polling: the live copy for jobs this process runs, else the stored one. */
  async get(id: string): Promise<Job | null> {
    const job = this.owned.get(id);
    if (job) return structuredClone(job);
    return this.repo.find(id);
  }

  async recent(limit = 10): Promise<Job[]> {
    return this.repo.recent(limit);
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private mutable(id: string): Job {
    const job = this.owned.get(id);
    if (!job) throw new JobStateError(`Job ${id} is not owned by this process`);
    if (isTerminal(job.status)) throw new JobStateError(`Job ${id} is ${job.status} and can no longer change`);
    return job;
  }

  private async transition(id: string, from: JobStatus, to: JobStatus): Promise<Job> {
    const job = this.owned.get(id) ?? (await this.repo.find(id));
    if (!job) throw new JobStateError(`No job ${id}`);
    if (job.status !== from) throw new JobStateError(`Cannot move job ${id} from ${job.status} to ${to}`);

    job.status = to;
    if (this.owned.has(id)) {
      await this.persist(job, { status: to });
    } else {
      await this.mutex.runExclusive(id, () => this.repo.update(id, { status: to, updatedAt: this.now().toISOString() }));
    }
    log.info(`Job ${to === 'paused' ? 'paused' : 'resumed'}`, { jobId: id });
    return structuredClone(job);
  }

  private async persist(job: Job, patch: JobPatch): Promise<void> {
    job.updatedAt = this.now().toISOString();
    try {
      await this.mutex.runExclusive(job.id, () => this.repo.update(job.id, structuredClone({ ...patch, updatedAt: job.updatedAt })));
      if (patch.status) this.storedStatus.set(job.id, patch.status);
    } catch (err) {
      this.storageFailed(job, err);
    }
  }

  private async readStoredStatus(id: string): Promise<JobStatus | null> {
    try {
      return (await this.repo.find(id))?.status ?? null;
    } catch (err) {
      log.warn('Could not read job status from store', { jobId: id, error: errorMessage(err) });
      return null;
    }
  }

  private storageFailed(job: Job, err: unknown): void {
    log.warn('Job ledger write failed — continuing in memory', { jobId: job.id, error: errorMessage(err) });
    this.append(job, err, { kind: 'storage_write' });
  }

  private append(job: Job, err: unknown, ctx: ErrorContext): JobErrorRecord {
    const { kind, message } = describeError(err);
    const record: JobErrorRecord = {
      at: this.now().toISOString(),
      step: ctx.step ?? job.currentStep ?? 'setup',
      kind: ctx.kind ?? kind,
      message,
      ...(ctx.provider !== undefined ? { provider: ctx.provider } : {}),
      ...(ctx.segment !== undefined ? { segment: ctx.segment } : {}),
    };
    job.errorLog.push(record);
    return record;
  }

  /** Books the elapsed time of the step being left as `step_<name>_ms`. */
  private closeStep(job: Job, next: string | null): void {
    const nowMs = this.now().getTime();
    const started = this.stepStartedAt.get(job.id);
    if (job.currentStep && started !== undefined) {
      const key = `step_${job.currentStep}_ms`;
      job.performanceMetrics[key] = (job.performanceMetrics[key] ?? 0) + (nowMs - started);
    }
    if (next === null) this.stepStartedAt.delete(job.id);
    else this.stepStartedAt.set(job.id, nowMs);
  }
}
