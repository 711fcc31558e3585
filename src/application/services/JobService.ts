import { IJobStore } from '../../core/interfaces/IJobStore.js';
import { Job, JobInput, JobView, TERMINAL_STATUSES, toJobView } from '../../core/entities/Job.js';
import { EnrichedRecord } from '../../core/entities/GenBankRecord.js';
import {
  AccessionJobRequestSchema,
  QueryJobRequestSchema,
} from '../../core/schemas/jobRequests.js';
import {
  InvalidFormatError,
  JobNotFoundError,
  JobNotReadyError,
  NothingToRetryError,
} from '../../core/errors.js';
import { exportResultsToCsv } from '../../infrastructure/export/CsvExporter.js';
import { classifyAccession, ResolutionPipeline } from './ResolutionPipeline.js';

export type ResultFormat = 'json' | 'csv';

export type JobResults =
  | { format: 'json'; body: { results: EnrichedRecord[]; errors: string[] } }
  | { format: 'csv'; body: string };

// Per-item error messages written by the pipeline, and whether the id they
// name has to be an assembly accession to be worth resubmitting
const RECOVERABLE_ERRORS: Array<{ pattern: RegExp; assemblyOnly: boolean }> = [
  { pattern: /^Assembly not found: (\S+)$/, assemblyOnly: true },
  { pattern: /^Error resolving (\S+?): /, assemblyOnly: true },
  { pattern: /^Error linking assembly (\S+?): /, assemblyOnly: true },
  { pattern: /^No nuccore link for (\S+)$/, assemblyOnly: true },
  { pattern: /^Error fetching (\S+?): /, assemblyOnly: false },
  { pattern: /^Failed to parse GenBank for (\S+)$/, assemblyOnly: false },
];

/**
 * Ids named by a job's per-item errors, in error order without repeats.
 * Assembly-stage errors only count when they name a GCF_/GCA_ accession: a
 * bare assembly uid cannot be fetched as a sequence.
 */
export function recoverFailedAccessions(errors: readonly string[]): string[] {
  const recovered = new Set<string>();

  for (const error of errors) {
    for (const { pattern, assemblyOnly } of RECOVERABLE_ERRORS) {
      const match = pattern.exec(error);
      if (!match) continue;

      const id = match[1];
      if (!assemblyOnly || classifyAccession(id) === 'container') {
        recovered.add(id);
      }
      break;
    }
  }

  return [...recovered];
}

/**
 * Service for submitting harvest jobs and reading their state
 */
export class JobService {
  private inFlight: Map<string, Promise<void>> = new Map();

  constructor(
    private jobStore: IJobStore,
    private pipeline: ResolutionPipeline
  ) {}

  /**
   * Submit an organism query job. Throws ZodError on an invalid request.
   */
  submitQueryJob(request: unknown): JobView {
    const parsed = QueryJobRequestSchema.parse(request);
    return this.submit({ kind: 'query', ...parsed }, parsed.limit);
  }

  /**
   * Submit an accession list job. Throws ZodError on an invalid request.
   */
  submitAccessionJob(request: unknown): JobView {
    const parsed = AccessionJobRequestSchema.parse(request);
    return this.submit({ kind: 'accessions', ...parsed }, parsed.accessions.length);
  }

  getJob(jobId: string): JobView | null {
    const job = this.jobStore.get(jobId);
    return job ? toJobView(job) : null;
  }

  listJobs(limit: number = 100): JobView[] {
    return this.jobStore.list(limit).map(toJobView);
  }

  /**
   * Results of a finished job; only available once it has succeeded
   */
  getResults(jobId: string, format: string = 'json'): JobResults {
    const job = this.requireJob(jobId);

    if (job.status !== 'succeeded') {
      throw new JobNotReadyError(jobId, job.status);
    }

    if (format === 'json') {
      return { format, body: { results: job.results, errors: job.errors } };
    }
    if (format === 'csv') {
      return { format, body: exportResultsToCsv(job.results) };
    }
    throw new InvalidFormatError(format);
  }

  /**
   * Submit a new accession job for the ids a finished job failed on. The new
   * job keeps the original's filters.
   */
  retryFailedAccessions(jobId: string): JobView {
    const job = this.requireJob(jobId);

    if (!TERMINAL_STATUSES.has(job.status)) {
      throw new JobNotReadyError(jobId, job.status);
    }

    const accessions = recoverFailedAccessions(job.errors);
    if (accessions.length === 0) {
      throw new NothingToRetryError(jobId);
    }

    return this.submit({ kind: 'accessions', accessions, filters: job.input.filters }, accessions.length);
  }

  /**
   * Resolves when the job's pipeline run has finished (immediately if none is running)
   */
  async whenSettled(jobId: string): Promise<void> {
    await this.inFlight.get(jobId);
  }

  getStatistics() {
    return { ...this.jobStore.getStatistics(), inFlight: this.inFlight.size };
  }

  private submit(input: JobInput, total: number): JobView {
    const job = this.jobStore.create(input, total);
    const view = toJobView(job);

    // Start on the next turn so the caller always sees the queued state first
    const run = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.pipeline.run(job.id))
      .catch((error) => {
        console.error(`[JobService] Unexpected pipeline error for job ${job.id}:`, error);
      })
      .finally(() => {
        this.inFlight.delete(job.id);
      });
    this.inFlight.set(job.id, run);

    return view;
  }

  private requireJob(jobId: string): Job {
    const job = this.jobStore.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }
}
