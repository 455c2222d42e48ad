import express, { Application, Request, Response, NextFunction } from 'express';
import { createServer, Server as HttpServer } from 'http';
import path from 'path';
import { ProfileResponse, Snapshot } from '../types';
import {
  logger,
  HealthChecker,
  validateQuery,
  historyQuerySchema,
  errorMessage,
} from '../utils';

interface SnapshotReader {
  latestPerAccount(): Promise<Snapshot[]>;
  historyFor(displayName: string): Promise<Snapshot[]>;
}

export interface DashboardServerOptions {
  webDir?: string;
}

export function toProfileResponse(snapshot: Snapshot): ProfileResponse {
  return {
    owner: snapshot.owner,
    timestamp: snapshot.recordedAt.toISOString(),
    rank: snapshot.rank,
    upload: snapshot.upload,
    current_upload: snapshot.currentUpload,
    current_download: snapshot.currentDownload,
    points: snapshot.points,
    seeding_count: snapshot.seedingCount,
  };
}

/**
 * Read-only HTTP surface: the JSON API the dashboard charts, health checks,
 * and the static dashboard itself.
 */
export class DashboardServer {
  private app: Application;
  private httpServer: HttpServer;
  private store: SnapshotReader;
  private healthChecker: HealthChecker;

  constructor(store: SnapshotReader, healthChecker: HealthChecker, options: DashboardServerOptions = {}) {
    this.app = express();
    this.httpServer = createServer(this.app);
    this.store = store;
    this.healthChecker = healthChecker;

    this.setupMiddleware(options.webDir);
    this.setupRoutes();
    this.setupErrorHandling();
  }

  getApp(): Application {
    return this.app;
  }

  start(port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, () => {
        this.httpServer.off('error', reject);
        logger.info('Dashboard', `Server running on port ${port}`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer.listening) {
        resolve();
        return;
      }
      this.httpServer.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        logger.info('Dashboard', 'Server stopped');
        resolve();
      });
    });
  }

  private setupMiddleware(webDir?: string): void {
    // Request logging
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      res.on('finish', () => {
        logger.api(req.method, req.path, res.statusCode, Date.now() - start, {
          ip: req.ip,
        });
      });
      next();
    });

    if (webDir) {
      this.app.use(express.static(path.resolve(webDir)));
    }
  }

  private setupRoutes(): void {
    this.app.get('/health', async (req: Request, res: Response) => {
      const health = await this.healthChecker.checkAll();
      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    });

    this.app.get('/health/live', (req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.get('/health/ready', async (req: Request, res: Response) => {
      const dbHealth = await this.healthChecker.checkComponent('database');
      if (dbHealth.status === 'unhealthy') {
        res.status(503).json({ status: 'not ready', reason: 'Database unavailable' });
        return;
      }
      res.json({ status: 'ready', timestamp: new Date().toISOString() });
    });

    this.app.get('/api/profiles', async (req: Request, res: Response) => {
      try {
        const latest = await this.store.latestPerAccount();
        res.json(latest.map(toProfileResponse));
      } catch (error) {
        logger.error('Dashboard', 'Failed to read latest profiles', { error: errorMessage(error) });
        res.status(500).json({ error: 'Could not read latest profiles from database', code: 'INTERNAL_ERROR' });
      }
    });

    this.app.get(
      '/api/history',
      validateQuery(historyQuerySchema, async (req, res, { owner }) => {
        try {
          const history = await this.store.historyFor(owner);
          res.json(history.map(toProfileResponse));
        } catch (error) {
          logger.error('Dashboard', `Failed to read history for ${owner}`, { error: errorMessage(error) });
          res.status(500).json({ error: 'Could not read history from database', code: 'INTERNAL_ERROR' });
        }
      })
    );
  }

  private setupErrorHandling(): void {
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
    });

    // Registered last so it sees errors from every route
    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      logger.error('Dashboard', 'Unhandled error', {
        error: err.message,
        path: req.path,
        method: req.method,
      });
      res.status(500).json({
        error: 'Internal server error',
        code: 'INTERNAL_ERROR',
      });
    });
  }
}
