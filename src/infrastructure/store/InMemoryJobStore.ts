import { randomUUID } from 'crypto';
import { IJobStore } from '../../core/interfaces/IJobStore.js';
import { Job, JobInput, JobStatus, TERMINAL_STATUSES } from '../../core/entities/Job.js';
import { EnrichedRecord } from '../../core/entities/GenBankRecord.js';

interface StoredJob {
  job: Job;
  /** Insertion order, breaks ties between jobs submitted in the same millisecond */
  seq: number;
}

/**
 * Volatile job registry.
 *
 * Every method runs to completion without yielding, so read-modify-write on a
 * job can never interleave with another mutation. Callers only ever see
 * deep copies.
 */
export class InMemoryJobStore implements IJobStore {
  private jobs: Map<string, StoredJob> = new Map();
  private nextSeq = 0;

  constructor(private debugLog: (message: string) => void = () => {}) {}

  create(input: JobInput, total: number): Job {
    const now = new Date();
    const job: Job = {
      id: randomUUID(),
      status: 'queued',
      progress: { total: Math.max(0, total), completed: 0, errors: 0 },
      submittedAt: now,
      updatedAt: now,
      input: structuredClone(input),
      results: [],
      errors: [],
    };

    this.jobs.set(job.id, { job, seq: this.nextSeq++ });
    this.debugLog(`[JobStore] Job ${job.id} created (${input.kind}, total=${job.progress.total})`);

    return structuredClone(job);
  }

  get(jobId: string): Job | null {
    const stored = this.jobs.get(jobId);
    return stored ? structuredClone(stored.job) : null;
  }

  setStatus(jobId: string, status: JobStatus): void {
    const job = this.jobs.get(jobId)?.job;
    if (!job) return;

    if (TERMINAL_STATUSES.has(job.status)) {
      this.debugLog(`[JobStore] Ignoring ${job.status} -> ${status} for finished job ${jobId}`);
      return;
    }

    this.debugLog(`[JobStore] Job ${jobId}: ${job.status} -> ${status}`);
    job.status = status;
    this.touch(job);
  }

  setProgressTotal(jobId: string, total: number): void {
    const job = this.jobs.get(jobId)?.job;
    if (!job) return;

    job.progress.total = Math.max(0, total);
    this.touch(job);
  }

  appendResult(jobId: string, record: EnrichedRecord): void {
    const job = this.jobs.get(jobId)?.job;
    if (!job) return;

    job.results.push(structuredClone(record));
    job.progress.completed = job.results.length;
    this.touch(job);
  }

  appendError(jobId: string, message: string): void {
    const job = this.jobs.get(jobId)?.job;
    if (!job) return;

    job.errors.push(message);
    job.progress.errors = job.errors.length;
    this.touch(job);
  }

  list(limit: number = 100): Job[] {
    return Array.from(this.jobs.values())
      .sort(
        (a, b) =>
          b.job.submittedAt.getTime() - a.job.submittedAt.getTime() || b.seq - a.seq
      )
      .slice(0, Math.max(0, limit))
      .map((stored) => structuredClone(stored.job));
  }

  /**
   * Counts per status, for health reporting
   */
  getStatistics(): Record<JobStatus, number> & { total: number } {
    const stats = { total: 0, queued: 0, running: 0, succeeded: 0, failed: 0 };
    for (const { job } of this.jobs.values()) {
      stats.total++;
      stats[job.status]++;
    }
    return stats;
  }

  private touch(job: Job): void {
    job.updatedAt = new Date();
  }
}
