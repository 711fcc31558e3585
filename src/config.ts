import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  ncbi: {
    baseUrl: string;
    tool: string;
    email: string;
    apiKey?: string;
    rateLimit: number;
    concurrency: number;
    batchSize: number;
  };
  retry: {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
  };
  http: {
    enabled: boolean;
    port: number;
  };
  mcp: {
    enabled: boolean;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  ncbi: z.object({
    baseUrl: z.string().url('Invalid E-utilities URL format'),
    tool: z.string().min(1, 'Tool name must not be empty'),
    email: z.string().email('Contact email must be a valid address'),
    apiKey: z.string().min(1).optional(),
    rateLimit: z.number().positive('Rate limit must be positive').max(50),
    concurrency: z.number().int().min(1).max(32),
    batchSize: z.number().int().min(1).max(500),
  }),
  retry: z.object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelayMs: z.number().int().min(0).max(60000),
    maxDelayMs: z.number().int().min(0).max(120000),
    timeoutMs: z.number().int().min(1000).max(300000),
  }),
  http: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(0).max(65535),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --ncbi-email me@example.org --rate-limit 10 --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Assemble configuration from CLI arguments, then environment, then defaults.
 * Throws ZodError when the result is invalid.
 */
export function buildConfig(
  cliArgs: Record<string, string | boolean>,
  env: NodeJS.ProcessEnv
): Config {
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    if (cliArgs[cliKey]) return String(cliArgs[cliKey]);
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    if (cliArgs[cliKey]) return String(cliArgs[cliKey]);
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    if (cliArgs[cliKey]) return Number(cliArgs[cliKey]);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'genome-metadata-harvester'),
      version: getString('server-version', 'SERVER_VERSION', '0.1.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    ncbi: {
      baseUrl: getString('ncbi-base-url', 'NCBI_BASE_URL', 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils'),
      tool: getString('ncbi-tool', 'NCBI_TOOL', 'genome-metadata-harvester'),
      email: getString('ncbi-email', 'NCBI_EMAIL', 'user@example.com'),
      apiKey: getOptionalString('ncbi-api-key', 'NCBI_API_KEY'),
      rateLimit: getNumber('rate-limit', 'NCBI_RATE_LIMIT', 3),
      concurrency: getNumber('concurrency', 'NCBI_CONCURRENCY', 6),
      batchSize: getNumber('batch-size', 'NCBI_BATCH_SIZE', 50),
    },
    retry: {
      maxRetries: getNumber('max-retries', 'MAX_RETRIES', 3),
      baseDelayMs: getNumber('retry-base-delay', 'RETRY_BASE_DELAY_MS', 500),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
      timeoutMs: getNumber('http-timeout', 'HTTP_TIMEOUT_MS', 30000),
    },
    http: {
      enabled: getBoolean('http', 'HTTP_ENABLED', true),
      port: getNumber('port', 'HTTP_PORT', 8000),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from environment variables or CLI arguments
 * Exits the process with a readable report if it is invalid
 */
export function getConfig(): Config {
  try {
    return buildConfig(parseArgs(), process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\nConfiguration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  - ${path || 'root'}: ${err.message}`);
      });
      console.error('\nTips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - NCBI_EMAIL must be a valid address (the service uses it to contact you)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary to stderr; the API key itself is never shown
 */
export function printConfigInfo(config: Config, effectiveRate: number): void {
  console.error('='.repeat(68));
  console.error(`  ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error('='.repeat(68));

  console.error(`\nE-utilities: ${config.ncbi.baseUrl}`);
  console.error(`   Tool: ${config.ncbi.tool} | Contact: ${config.ncbi.email}`);
  console.error(`   API key: ${config.ncbi.apiKey ? 'configured' : 'not set'}`);
  console.error(`   Rate: ${effectiveRate} req/s | Concurrency: ${config.ncbi.concurrency} | Batch: ${config.ncbi.batchSize}`);
  console.error(
    `\nRetry: ${config.retry.maxRetries}x (${config.retry.baseDelayMs}-${config.retry.maxDelayMs}ms) | Timeout: ${config.retry.timeoutMs}ms`
  );

  if (config.http.enabled) {
    console.error(`\nHTTP API: http://localhost:${config.http.port}/api/v1/jobs`);
  }
  if (config.mcp.enabled) {
    console.error(`MCP: stdio`);
  }

  console.error('\n' + '-'.repeat(68));
}
