import express from 'express';
import { Server } from 'http';
import {
  ConfigurationError,
  DeploymentError,
  InvalidArtifactKeyError,
  MalformedEventError,
  errorMessage
} from '../errors';
import { DeploymentResult } from '../types/events';
import logger from '../utils/logger';
import { HealthCheckService } from './HealthCheckService';

export type InvokeFunction = (event: unknown) => Promise<DeploymentResult | null>;

function statusFor(error: unknown): number {
  // the posted notification itself is unusable
  if (error instanceof MalformedEventError || error instanceof InvalidArtifactKeyError) {
    return 400;
  }
  if (error instanceof ConfigurationError || !(error instanceof DeploymentError)) {
    return 500;
  }
  // AWS rejected one of the downstream calls
  return 502;
}

/**
 * Local HTTP front for the deployment handler: accepts S3 notifications on POST /invoke.
 */
export class ApiService {
  private app: express.Application;
  private server: Server | null = null;

  constructor(
    private readonly invoke: InvokeFunction,
    private readonly healthService: HealthCheckService,
    private readonly port: number
  ) {
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * JSON body parsing and request logging.
   */
  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '1mb' }));

    this.app.use((req, res, next) => {
      logger.info(`${req.method} ${req.path}`, {
        userAgent: req.get('User-Agent'),
        ip: req.ip
      });
      next();
    });
  }

  /**
   * Health, readiness, metrics and the invoke route.
   */
  private setupRoutes(): void {
    this.app.get('/health', (req, res) => {
      const health = this.healthService.getHealth();
      res.status(health.status === 'healthy' ? 200 : 503).json(health);
    });

    this.app.get('/ready', (req, res) => {
      const readiness = this.healthService.isReady();
      res.status(readiness.ready ? 200 : 503).json(readiness);
    });

    this.app.get('/live', (req, res) => {
      res.status(200).json({ alive: true });
    });

    this.app.get('/metrics', (req, res) => {
      res.status(200).json(this.healthService.getMetrics());
    });

    this.app.post('/invoke', async (req, res) => {
      try {
        const result = await this.invoke(req.body);

        if (result === null) {
          this.healthService.recordSkipped();
          res.status(202).json({ success: true, skipped: true });
          return;
        }

        this.healthService.recordDeployment(result.endpoint.name);
        res.status(201).json({ success: true, data: result });
      } catch (error: unknown) {
        const message = errorMessage(error);
        this.healthService.recordFailure(message);
        res.status(statusFor(error)).json({
          success: false,
          error: error instanceof Error ? error.name : 'Error',
          message,
          context: error instanceof DeploymentError ? error.context : undefined
        });
      }
    });

    this.app.use('*', (req, res) => {
      res.status(404).json({
        error: 'Not Found',
        message: `Route ${req.method} ${req.originalUrl} not found`
      });
    });

    this.app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
      logger.error('Express error handler', { error: err.message, stack: err.stack });

      if (res.headersSent) {
        return next(err);
      }

      res.status(500).json({
        error: 'Internal Server Error',
        message: err.message
      });
    });
  }

  /**
   * Resolves with the bound port, which differs from the configured one when that is 0.
   */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        logger.info(`API Server started on port ${port}`);
        logger.info(`Invoke: POST http://localhost:${port}/invoke`);
        resolve(port);
      });
      this.server = server;

      server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error(`Port ${this.port} is already in use`);
        } else {
          logger.error(`Server error: ${error.message}`, { error });
        }
        reject(error);
      });
    });
  }

  /**
   * Closes the listener; a no-op when it was never started.
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.server = null;
        logger.info('API Server stopped');
        resolve();
      });
    });
  }

  /**
   * The express app, for mounting in another server.
   */
  getApp(): express.Application {
    return this.app;
  }
}
