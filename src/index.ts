#!/usr/bin/env node

/**
 * Genome Metadata Harvester - Entry Point
 *
 * Wires one rate limiter, one E-utilities client, one job store and one
 * pipeline, then starts the HTTP API and/or the stdio tool server.
 */

import { getConfig, printConfigInfo } from './config.js';
import { EntrezApiClient } from './infrastructure/http/EntrezApiClient.js';
import { RetryingTransport } from './infrastructure/http/RetryingTransport.js';
import { GenBankParser } from './infrastructure/parsing/GenBankParser.js';
import { InMemoryJobStore } from './infrastructure/store/InMemoryJobStore.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { ResolutionPipeline } from './application/services/ResolutionPipeline.js';
import { JobService } from './application/services/JobService.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let webServer: WebServer | null = null;
  let mcpServer: McpServer | null = null;

  const config = getConfig();

  const debugLog = (message: string) => {
    if (config.server.debug) {
      console.error(`[DEBUG] ${message}`);
    }
  };

  const entrezSettings = {
    baseUrl: config.ncbi.baseUrl,
    tool: config.ncbi.tool,
    email: config.ncbi.email,
    apiKey: config.ncbi.apiKey,
    rateLimit: config.ncbi.rateLimit,
    burst: config.ncbi.concurrency,
  };
  const rateLimiter = EntrezApiClient.createRateLimiter(entrezSettings);

  printConfigInfo(config, rateLimiter.getRate());

  const transport = new RetryingTransport({
    retry: {
      maxRetries: config.retry.maxRetries,
      baseDelayMs: config.retry.baseDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      jitter: 0.25,
    },
    timeoutMs: config.retry.timeoutMs,
    onRetryLog: (log) => {
      if (!log.success && log.nextRetryInMs !== undefined) {
        debugLog(`[Transport] Attempt ${log.attempt + 1} failed (${log.error}), retrying in ${Math.round(log.nextRetryInMs)}ms`);
      }
    },
  });

  const gateway = new EntrezApiClient(entrezSettings, rateLimiter, transport);
  const parser = new GenBankParser((message) => console.error(`[GenBankParser] ${message}`));
  const jobStore = new InMemoryJobStore(debugLog);
  const pipeline = new ResolutionPipeline(gateway, parser, jobStore, {
    concurrency: config.ncbi.concurrency,
    batchSize: config.ncbi.batchSize,
    debugLog,
  });
  const jobService = new JobService(jobStore, pipeline);

  try {
    if (config.http.enabled) {
      webServer = new WebServer(jobService, config.http.port);
      await webServer.start();
    }

    if (config.mcp.enabled) {
      mcpServer = new McpServer(config, jobService, rateLimiter.getRate());
      await mcpServer.start();
    }

    if (!webServer && !mcpServer) {
      console.error('Nothing to serve: enable HTTP_ENABLED or MCP_ENABLED');
      process.exit(1);
    }

    const shutdown = async (signal: string) => {
      console.error(`\nReceived ${signal}, shutting down gracefully...`);

      if (webServer && webServer.isRunning()) {
        await webServer.stop();
      }
      if (mcpServer) {
        await mcpServer.shutdown();
      }

      console.error('Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    console.error('Fatal error during startup:', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
