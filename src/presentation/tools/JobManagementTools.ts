import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';
import { JobView } from '../../core/entities/Job.js';
import { ASSEMBLY_LEVELS, SOURCE_DB_PREFERENCES } from '../../core/schemas/jobRequests.js';

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

function errorResult(prefix: string, error: unknown): ToolResult {
  return {
    isError: true,
    content: [
      {
        type: 'text',
        text: `${prefix}: ${error instanceof Error ? error.message : String(error)}`,
      },
    ],
  };
}

export function formatJobView(job: JobView): string {
  const { total, completed, errors } = job.progress;

  return `# Job ${job.job_id}

- **Status**: ${job.status}
- **Progress**: ${completed} completed, ${errors} errors, ${total} total
- **Submitted**: ${job.submitted_at}
- **Updated**: ${job.updated_at}
${
  job.status === 'succeeded'
    ? `\nUse \`get-job-results\` with job ID \`${job.job_id}\` to retrieve the records.`
    : ''
}`;
}

const filtersObject = z.object({
  assembly_level: z.array(z.enum(ASSEMBLY_LEVELS)).optional(),
  source_db_preference: z.enum(SOURCE_DB_PREFERENCES).optional(),
  latest_only: z.boolean().optional(),
});

/**
 * Register all job tools
 */
export function registerJobManagementTools(server: McpServer, jobService: JobService) {
  server.tool(
    'submit-query-job',
    'Start a background job that searches assemblies for an organism and harvests their representative sequence records',
    {
      organism: z.string().describe("Organism name, e.g. 'Escherichia coli'"),
      keywords: z.array(z.string()).optional().describe('Extra search keywords'),
      filters: filtersObject.optional().describe('Assembly filters (default: RefSeq, latest only)'),
      limit: z.number().int().min(1).max(100).optional().describe('Max genomes to return (default 20)'),
    },
    async (args) => {
      try {
        return textResult(formatJobView(jobService.submitQueryJob(args)));
      } catch (error) {
        return errorResult('Error submitting query job', error);
      }
    }
  );

  server.tool(
    'submit-accession-job',
    'Start a background job that harvests records for a list of accessions (GCF_/GCA_ assemblies or sequence accessions)',
    {
      accessions: z.array(z.string()).min(1).describe('Accessions to harvest'),
      filters: filtersObject
        .optional()
        .describe('Stored with the job but not applied: every listed accession is harvested as given'),
    },
    async (args) => {
      try {
        return textResult(formatJobView(jobService.submitAccessionJob(args)));
      } catch (error) {
        return errorResult('Error submitting accession job', error);
      }
    }
  );

  server.tool(
    'get-job-status',
    'Get status and progress of a harvest job',
    {
      job_id: z.string().describe('The ID of the job to check'),
    },
    async ({ job_id }) => {
      const job = jobService.getJob(job_id);
      if (!job) {
        return { isError: true, content: [{ type: 'text', text: `Job not found: ${job_id}` }] };
      }
      return textResult(formatJobView(job));
    }
  );

  server.tool(
    'get-job-results',
    'Get the records and errors of a succeeded job, as JSON or CSV',
    {
      job_id: z.string().describe('The ID of the job'),
      format: z.enum(['json', 'csv']).optional().describe('Output format (default json)'),
    },
    async ({ job_id, format }) => {
      try {
        const results = jobService.getResults(job_id, format ?? 'json');
        const text =
          results.format === 'csv' ? results.body : JSON.stringify(results.body, null, 2);
        return textResult(text);
      } catch (error) {
        return errorResult('Error retrieving results', error);
      }
    }
  );

  server.tool(
    'retry-failed-accessions',
    'Start a new accession job for the accessions a finished job reported errors on',
    {
      job_id: z.string().describe('The ID of the finished job'),
    },
    async ({ job_id }) => {
      try {
        return textResult(formatJobView(jobService.retryFailedAccessions(job_id)));
      } catch (error) {
        return errorResult('Error retrying failed accessions', error);
      }
    }
  );

  server.tool(
    'list-jobs',
    'List recent harvest jobs, newest first',
    {
      limit: z.number().int().min(1).max(1000).optional().describe('Max jobs to list (default 100)'),
    },
    async ({ limit }) => {
      const jobs = jobService.listJobs(limit ?? 100);
      const rows = jobs.map(
        (job) =>
          `- ${job.job_id} | ${job.status} | ${job.progress.completed}/${job.progress.total} done, ${job.progress.errors} errors`
      );
      return textResult(rows.length === 0 ? 'No jobs found' : `# Jobs\n\n${rows.join('\n')}`);
    }
  );
}
