import express, { Express, Request, Response, NextFunction } from 'express';
import { createServer, Server as HttpServer } from 'http';
import helmet from 'helmet';
import cors from 'cors';
import { Logger } from '@meshack/shared';
import { createDeliveryRouter, type DeliveryStatusSource } from './routes/delivery.js';
import { createSnrRouter, type SnrStatsSource } from './routes/snr.js';
import {
  API_VERSION,
  StationErrorCode,
  createErrorResponse,
  createResponse,
  type ServerConfig,
} from './types.js';

export interface StationServerDependencies {
  engine: DeliveryStatusSource;
  snrStats: SnrStatsSource;
}

/**
 * Read-mostly HTTP view of the station: delivery status, metrics and SNR
 * statistics, plus the doubly confirmed statistics reset.
 */
export class StationServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private logger = Logger.getInstance();
  private isRunning = false;

  constructor(config: ServerConfig, dependencies: StationServerDependencies) {
    this.config = config;
    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes(dependencies);

    this.logger.info('StationServer initialized', {
      port: config.port,
      host: config.host,
    });
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('StationServer is already running');
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.server.once('error', error => {
        this.logger.error('Failed to start StationServer', {
          error: error.message,
        });
        reject(error);
      });
      this.server.listen(this.config.port, this.config.host, () => {
        this.isRunning = true;
        this.logger.info('StationServer started', {
          port: this.config.port,
          host: this.config.host,
        });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.isRunning = false;
        this.logger.info('StationServer stopped');
        resolve();
      });
    });
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(cors({ origin: this.config.corsOrigins }));
    this.app.use(express.json({ limit: '16kb' }));

    // Request logging
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      this.logger.debug('HTTP Request', {
        method: req.method,
        url: req.url,
        ip: req.ip,
      });
      next();
    });
  }

  private setupRoutes(dependencies: StationServerDependencies): void {
    this.app.get('/health', (req: Request, res: Response) => {
      res.json(
        createResponse({
          status: 'healthy',
          uptime: process.uptime(),
          version: API_VERSION,
        })
      );
    });

    this.app.use('/api/v1/delivery', createDeliveryRouter(dependencies.engine));
    this.app.use('/api/v1/snr', createSnrRouter(dependencies.snrStats));

    this.app.use((req: Request, res: Response) => {
      res
        .status(404)
        .json(
          createErrorResponse(
            StationErrorCode.NOT_FOUND,
            `Route not found: ${req.method} ${req.path}`
          )
        );
    });

    // Malformed JSON bodies and anything a route did not handle
    this.app.use(
      (error: Error, req: Request, res: Response, _next: NextFunction) => {
        const status = hasStatus(error) ? error.status : 500;
        this.logger.error('HTTP Error', {
          error: error.message,
          status,
        });
        res
          .status(status)
          .json(
            createErrorResponse(
              status === 400
                ? StationErrorCode.INVALID_REQUEST
                : StationErrorCode.INTERNAL_ERROR,
              status === 400 ? 'Malformed request body' : 'Internal server error'
            )
          );
      }
    );
  }
}

function hasStatus(error: Error): error is Error & { status: number } {
  return 'status' in error && typeof error.status === 'number';
}
