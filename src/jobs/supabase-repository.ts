/**
 * render_jobs persistence. Writes go through the db client so a Supabase
 * outage queues them in SQLite instead of stalling the run.
 */
import { z } from 'zod';
import { dbInsert, dbSelect, dbUpdate, getSupabase, type DbRow } from '../db/client.js';
import { JOB_STATUSES, JobErrorRecordSchema, type Job, type JobPatch, type JobRepository } from './types.js';

const TABLE = 'render_jobs';

const JobRowSchema = z
  .object({
    id:                  z.string(),
    job_name:            z.string(),
    mode:                z.string(),
    status:              z.enum(JOB_STATUSES),
    progress_percent:    z.number(),
    current_step:        z.string().nullable(),
    total_segments:      z.number().int(),
    processed_segments:  z.number().int(),
    script_hash:         z.string().nullable(),
    output_path:         z.string().nullable(),
    error_log:           z.array(JobErrorRecordSchema),
    performance_metrics: z.record(z.number()),
    created_at:          z.string(),
    started_at:          z.string().nullable(),
    completed_at:        z.string().nullable(),
    updated_at:          z.string(),
  })
  .transform((r): Job => ({
    id:                 r.id,
    name:               r.job_name,
    mode:               r.mode,
    status:             r.status,
    progressPercent:    r.progress_percent,
    currentStep:        r.current_step,
    totalSegments:      r.total_segments,
    processedSegments:  r.processed_segments,
    scriptHash:         r.script_hash,
    outputPath:         r.output_path,
    errorLog:           r.error_log,
    performanceMetrics: r.performance_metrics,
    createdAt:          r.created_at,
    startedAt:          r.started_at,
    completedAt:        r.completed_at,
    updatedAt:          r.updated_at,
  }));

const COLUMNS = new Map<string, string>(Object.entries({
  name:               'job_name',
  mode:               'mode',
  status:             'status',
  progressPercent:    'progress_percent',
  currentStep:        'current_step',
  totalSegments:      'total_segments',
  processedSegments:  'processed_segments',
  scriptHash:         'script_hash',
  outputPath:         'output_path',
  errorLog:           'error_log',
  performanceMetrics: 'performance_metrics',
  startedAt:          'started_at',
  completedAt:        'completed_at',
  updatedAt:          'updated_at',
} satisfies { [K in keyof JobPatch]-?: string }));

function toRecord(patch: JobPatch): DbRow {
  const out: DbRow = {};
  for (const [field, value] of Object.entries(patch)) {
    const column = COLUMNS.get(field);
    if (column && value !== undefined) out[column] = value;
  }
  // Headline counters are mirrored into their own columns for dashboards
  if (patch.performanceMetrics) {
    out['api_calls_made'] = patch.performanceMetrics['api_calls_made'] ?? 0;
    out['cache_hits'] = patch.performanceMetrics['cache_hits'] ?? 0;
    const elapsed = patch.performanceMetrics['elapsed_ms'];
    if (elapsed !== undefined) out['actual_time_sec'] = Math.round(elapsed / 1000);
  }
  return out;
}

export class SupabaseJobRepository implements JobRepository {
  async insert(job: Job): Promise<void> {
    await dbInsert(TABLE, { id: job.id, created_at: job.createdAt, ...toRecord(job) });
  }

  async update(id: string, patch: JobPatch): Promise<void> {
    await dbUpdate(TABLE, id, toRecord(patch));
  }

  async find(id: string): Promise<Job | null> {
    const [row] = await dbSelect(TABLE, { id });
    return row ? JobRowSchema.parse(row) : null;
  }

  async recent(limit: number): Promise<Job[]> {
    const { data, error } = await getSupabase()
      .from(TABLE)
      .select('*')
      .order('created_at', { ascending: false })
      .limit(limit);
    if (error) throw new Error(error.message);
    return z.array(JobRowSchema).parse(data ?? []);
  }
}
