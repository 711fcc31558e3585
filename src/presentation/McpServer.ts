import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { JobService } from '../application/services/JobService.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

/**
 * Stdio tool server exposing the job service
 */
export class McpServer {
  private server: BaseMcpServer;

  constructor(
    config: Config,
    jobService: JobService,
    rateLimitPerSecond: number
  ) {
    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });

    registerJobManagementTools(this.server, jobService);
    registerHealthCheckTool(this.server, jobService, rateLimitPerSecond);
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      console.error('[McpServer] stdin error (non-fatal):', error.message);
    });

    process.stdin.on('end', () => {
      console.error('[McpServer] stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    console.error('[McpServer] Running on stdio');
  }

  async shutdown(): Promise<void> {
    await this.server.close();
  }
}
