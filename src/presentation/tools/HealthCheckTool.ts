import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobService } from '../../application/services/JobService.js';

export interface HealthReport {
  timestamp: string;
  status: 'healthy';
  rateLimitPerSecond: number;
  jobs: ReturnType<JobService['getStatistics']>;
}

export function buildHealthReport(jobService: JobService, rateLimitPerSecond: number): HealthReport {
  return {
    timestamp: new Date().toISOString(),
    status: 'healthy',
    rateLimitPerSecond,
    jobs: jobService.getStatistics(),
  };
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  jobService: JobService,
  rateLimitPerSecond: number
) {
  server.tool(
    'health-check',
    'Report server status, the effective E-utilities rate limit and job counts',
    {},
    async () => ({
      content: [
        {
          type: 'text',
          text: JSON.stringify(buildHealthReport(jobService, rateLimitPerSecond), null, 2),
        },
      ],
    })
  );
}
