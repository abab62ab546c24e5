import type { Job, JobPatch, JobRepository } from './types.js';

export class MemoryJobRepository implements JobRepository {
  private readonly jobs = new Map<string, Job>();

  async insert(job: Job): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
  }

  async update(id: string, patch: JobPatch): Promise<void> {
    const job = this.jobs.get(id);
    if (!job) throw new Error(`No job ${id}`);
    this.jobs.set(id, { ...job, ...structuredClone(patch) });
  }

  async find(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async recent(limit: number): Promise<Job[]> {
    return [...this.jobs.values()]
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, limit)
      .map((j) => structuredClone(j));
  }
}
