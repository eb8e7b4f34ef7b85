import express from 'express';
import cors from 'cors';
import { createServer, Server as HttpServer } from 'http';
import { ServiceContext } from './services/ServiceContext.js';
import { ScreenshotToolService } from './services/tools/ScreenshotToolService.js';
import { securityMiddleware } from './middleware/security.js';
import { requestLoggingMiddleware, logger } from './middleware/logging.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createApiRouter } from './routes/api.js';

export class App {
  public express: express.Application;
  private httpServer: HttpServer;
  private toolService: ScreenshotToolService;

  constructor(private readonly context: ServiceContext) {
    this.express = express();
    this.httpServer = createServer(this.express);
    this.toolService = new ScreenshotToolService(context);

    this.initializeMiddleware();
    this.initializeRoutes();
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    this.express.use(securityMiddleware);

    this.express.use(
      cors({
        origin: this.context.config.server.env === 'development' ? true : false,
      })
    );

    this.express.use(express.json({ limit: '1mb' }));

    if (this.context.config.server.env !== 'test') {
      this.express.use(requestLoggingMiddleware);
    }
  }

  private initializeRoutes(): void {
    this.express.get('/health', (_req, res) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version || '1.0.0',
        extractor: this.context.extractor.name,
        describer: this.context.describer.name,
      });
    });

    this.express.use('/api', createApiRouter(this.toolService));
  }

  private initializeErrorHandling(): void {
    // 404 handler
    this.express.use(notFoundHandler);

    // Global error handler
    this.express.use(errorHandler);
  }

  public async start(): Promise<void> {
    await this.context.organizer.ensureFolderStructure();
    logger.info('Organization folders ready', { baseFolder: this.context.organizer.baseFolder });

    const { port, host, env } = this.context.config.server;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    logger.info(`Screenshot sorter started on ${host}:${port}`);
    logger.info(`Environment: ${env}`);
  }

  public async stop(): Promise<void> {
    if (!this.httpServer.listening) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.httpServer.close(error => (error ? reject(error) : resolve()));
    });
    logger.info('Server stopped gracefully');
  }
}
