import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import { ZodError } from 'zod';
import type { JobService } from '../../application/services/JobService.js';
import {
  InvalidFormatError,
  JobNotFoundError,
  JobNotReadyError,
  NothingToRetryError,
} from '../../core/errors.js';

/**
 * HTTP API for submitting harvest jobs and polling their state
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private jobService: JobService,
    private port: number = 8000
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app.get('/healthz', (_req: Request, res: Response) => {
      res.json({ status: 'ok' });
    });

    // API: Submit an organism query job
    this.app.post('/api/v1/jobs/query', (req: Request, res: Response) => {
      try {
        res.status(202).json(this.jobService.submitQueryJob(req.body));
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Submit an accession list job
    this.app.post('/api/v1/jobs/accessions', (req: Request, res: Response) => {
      try {
        res.status(202).json(this.jobService.submitAccessionJob(req.body));
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Recent jobs, newest first
    this.app.get('/api/v1/jobs', (req: Request, res: Response) => {
      const limit = Number(req.query.limit ?? 100);
      if (!Number.isInteger(limit) || limit < 1) {
        res.status(400).json({ detail: 'limit must be a positive integer' });
        return;
      }
      res.json({ jobs: this.jobService.listJobs(limit) });
    });

    // API: Job status and progress
    this.app.get('/api/v1/jobs/:id', (req: Request, res: Response) => {
      const job = this.jobService.getJob(req.params.id);
      if (!job) {
        res.status(404).json({ detail: 'Job not found' });
        return;
      }
      res.json(job);
    });

    // API: Job results as JSON or CSV
    this.app.get('/api/v1/jobs/:id/results', (req: Request, res: Response) => {
      try {
        const format = typeof req.query.format === 'string' ? req.query.format : 'json';
        const results = this.jobService.getResults(req.params.id, format);

        if (results.format === 'csv') {
          res
            .status(200)
            .type('text/csv')
            .set('Content-Disposition', `attachment; filename=job_${req.params.id}_results.csv`)
            .send(results.body);
          return;
        }
        res.json(results.body);
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Resubmit the accessions a finished job failed on
    this.app.post('/api/v1/jobs/:id/retry', (req: Request, res: Response) => {
      try {
        res.status(202).json(this.jobService.retryFailedAccessions(req.params.id));
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // Malformed JSON bodies and anything else that escapes a handler
    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        res.status(400).json({ detail: 'Request body is not valid JSON' });
        return;
      }
      this.sendError(res, error);
    });
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof ZodError) {
      res.status(400).json({
        detail: 'Invalid request',
        issues: error.errors.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    } else if (error instanceof JobNotFoundError) {
      res.status(404).json({ detail: error.message });
    } else if (
      error instanceof JobNotReadyError ||
      error instanceof InvalidFormatError ||
      error instanceof NothingToRetryError
    ) {
      res.status(400).json({ detail: error.message });
    } else {
      console.error('[WebServer] Unhandled error:', error);
      res.status(500).json({
        detail: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        console.error(`[WebServer] HTTP API listening on http://localhost:${this.port}`);
        resolve();
      });
      server.on('error', reject);
      this.httpServer = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.httpServer = null;
    console.error('[WebServer] Stopped');
  }

  isRunning(): boolean {
    return this.httpServer !== null;
  }
}
