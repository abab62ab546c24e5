import { z } from 'zod';
import type { ErrorKind } from '../errors.js';

export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed', 'paused'] as const;

export type JobStatus = typeof JOB_STATUSES[number];

export type TerminalStatus = Extract<JobStatus, 'completed' | 'failed'>;

export const isTerminal = (s: JobStatus): s is TerminalStatus => s === 'completed' || s === 'failed';

export const ERROR_KINDS = [
  'transient_provider',
  'permanent_provider',
  'retry_exhausted',
  'all_providers_exhausted',
  'cache_backend',
  'resource_exhaustion',
  'storage_write',
  'render',
  'unknown',
] as const satisfies readonly ErrorKind[];

export const JobErrorRecordSchema = z.object({
  at:       z.string(),
  step:     z.string(),
  kind:     z.enum(ERROR_KINDS),
  message:  z.string(),
  provider: z.string().optional(),
  segment:  z.number().int().optional(),
});

export type JobErrorRecord = z.infer<typeof JobErrorRecordSchema>;

export interface Job {
  id: string;
  name: string;
  /** Render preset the run uses. */
  mode: string;
  status: JobStatus;
  progressPercent: number;
  currentStep: string | null;
  totalSegments: number;
  processedSegments: number;
  scriptHash: string | null;
  outputPath: string | null;
  /** Append-only. */
  errorLog: JobErrorRecord[];
  performanceMetrics: Record<string, number>;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  updatedAt: string;
}

export type JobPatch = Partial<Omit<Job, 'id' | 'createdAt'>>;

export interface JobRepository {
  insert(job: Job): Promise<void>;
  /** Writes only the given fields. */
  update(id: string, patch: JobPatch): Promise<void>;
  find(id: string): Promise<Job | null>;
  recent(limit: number): Promise<Job[]>;
}
