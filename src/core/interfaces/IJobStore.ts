import { Job, JobInput, JobStatus } from '../entities/Job.js';
import { EnrichedRecord } from '../entities/GenBankRecord.js';

/**
 * Interface for the job registry.
 * Reads return detached snapshots; all mutation goes through these methods.
 */
export interface IJobStore {
  create(input: JobInput, total: number): Job;

  get(jobId: string): Job | null;

  setStatus(jobId: string, status: JobStatus): void;

  setProgressTotal(jobId: string, total: number): void;

  appendResult(jobId: string, record: EnrichedRecord): void;

  appendError(jobId: string, message: string): void;

  /**
   * Newest submitted first
   */
  list(limit?: number): Job[];

  getStatistics(): Record<JobStatus, number> & { total: number };
}
