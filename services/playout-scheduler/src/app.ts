import express from 'express';
import compression from 'compression';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { Server } from 'http';
import { DIContainer } from './container/DIContainer';
import { SchedulerConfig } from './config/scheduler.config';
import { errorHandler, notFoundHandler } from './middleware/errorHandlers';
import { createRateLimitMiddleware } from './middleware/rateLimitMiddleware';
import { createCatalogRoutes, createPlaylistRoutes } from './routes/playlistRoutes';
import { Logger } from './utils/Logger';

/**
 * Express Application with Dependency Injection
 *
 * Single Responsibility: Handle HTTP server setup and routing
 * Dependency Inversion: Uses dependency injection for all services
 */
export class App {
  private readonly app: express.Application;
  private readonly diContainer: DIContainer;
  private readonly logger = new Logger('App');
  private server: Server | null = null;

  constructor(private readonly config: SchedulerConfig, diContainer?: DIContainer) {
    this.app = express();
    this.diContainer = diContainer ?? new DIContainer(config);
    this.setupServices();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /**
   * Initialize application services using dependency injection
   */
  private setupServices(): void {
    this.diContainer.initialize();
  }

  /**
   * Configure Express middleware
   */
  private setupMiddleware(): void {
    // Security middleware
    this.app.use(helmet());
    this.app.use(cors({
      origin: this.config.corsOrigins,
      credentials: true,
    }));

    // Rate limiting
    this.app.use('/api/', createRateLimitMiddleware(this.config.rateLimit));

    // Logging middleware
    if (this.config.nodeEnv !== 'test') {
      this.app.use(morgan(this.config.nodeEnv === 'production' ? 'combined' : 'dev'));
    }

    // Body parsing middleware
    this.app.use(compression());
    this.app.use(express.json({ limit: '1mb' }));
  }

  /**
   * Setup application routes
   */
  private setupRoutes(): void {
    // Health check endpoint
    this.app.get('/health', (req, res) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version || '1.0.0',
      });
    });

    // API documentation endpoint
    this.app.get('/api', (req, res) => {
      res.json({
        name: 'Playout Scheduler API',
        version: process.env.npm_package_version || '1.0.0',
        channel: this.config.channelName,
        endpoints: {
          'GET /health': 'Health check',
          'GET /api': 'API documentation',
          'GET /api/v1/catalog': 'List discovered media by category',
          'GET /api/v1/templates': 'List schedule templates',
          'GET /api/v1/templates/:name': 'Get a schedule template',
          'POST /api/v1/playlists/generate': 'Generate the playlist for a date',
          'GET /api/v1/playlists/:date': 'Get the stored playlist for a date',
        },
      });
    });

    this.app.use(
      '/api/v1/playlists',
      createPlaylistRoutes(this.diContainer.getPlaylistController(), this.config.timezone)
    );
    this.app.use('/api/v1', createCatalogRoutes(this.diContainer.getCatalogController()));
  }

  /**
   * Setup error handling middleware
   */
  private setupErrorHandling(): void {
    // 404 handler
    this.app.use(notFoundHandler);

    // Global error handler
    this.app.use(errorHandler);
  }

  /**
   * Start the Express server
   */
  async start(port: number = this.config.port): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(port, () => {
        this.logger.info(`Playout Scheduler API server running on port ${port}`);
        this.logger.info(`Environment: ${this.config.nodeEnv}`);
        this.logger.info(`Video directory: ${this.config.videoDirectory}`);
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  /**
   * Graceful shutdown
   */
  async shutdown(): Promise<void> {
    this.logger.info('Shutting down application...');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      this.server = null;
    }

    this.logger.info('Application shutdown completed');
  }

  /**
   * Get Express application instance (for testing)
   */
  getApp(): express.Application {
    return this.app;
  }
}
