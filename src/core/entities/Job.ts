import { EnrichedRecord } from './GenBankRecord.js';
import { AccessionJobRequest, QueryJobRequest } from '../schemas/jobRequests.js';

/**
 * Job domain entity
 */
export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['succeeded', 'failed']);

export interface JobProgress {
  total: number;
  completed: number;
  errors: number;
}

export type JobInput =
  | ({ kind: 'query' } & QueryJobRequest)
  | ({ kind: 'accessions' } & AccessionJobRequest);

export interface Job {
  id: string;
  status: JobStatus;
  progress: JobProgress;
  submittedAt: Date;
  updatedAt: Date;
  input: JobInput;
  results: EnrichedRecord[];
  errors: string[];
}

/**
 * Wire shape returned by job submission and status lookups
 */
export interface JobView {
  job_id: string;
  status: JobStatus;
  progress: JobProgress;
  submitted_at: string;
  updated_at: string;
  links?: {
    results_json: string;
    results_csv: string;
  };
}

export function toJobView(job: Job): JobView {
  const view: JobView = {
    job_id: job.id,
    status: job.status,
    progress: { ...job.progress },
    submitted_at: job.submittedAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };

  if (job.status === 'succeeded') {
    view.links = {
      results_json: `/api/v1/jobs/${job.id}/results?format=json`,
      results_csv: `/api/v1/jobs/${job.id}/results?format=csv`,
    };
  }

  return view;
}
