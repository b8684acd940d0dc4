import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { config } from './config.js';
import { createRoutes, type StatusSources } from './api/routes.js';
import { errorMessage } from './errors.js';

/**
 * Create and configure the Express server
 */
export function createServer(sources: StatusSources): express.Application {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // API routes
  app.use('/api', createRoutes(sources));

  // API 404 handler - catch any unmatched /api routes and return JSON
  app.use('/api/*', (req: Request, res: Response) => {
    console.error(`[API] 404 - Route not found: ${req.method} ${req.originalUrl}`);
    res.status(404).json({
      success: false,
      error: `Route not found: ${req.method} ${req.originalUrl}`,
    });
  });

  // API error handler - ensure API errors return JSON, not HTML
  app.use('/api', (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`[API] Error: ${errorMessage(err)}`);
    res.status(500).json({ success: false, error: errorMessage(err) });
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return app;
}

/**
 * Start the server. Resolves with the listening server so it can be closed
 * on shutdown.
 */
export function startServer(app: express.Application, port: number = config.port): Promise<Server> {
  return new Promise((resolve, reject) => {
    const host = process.env.HOST || '0.0.0.0';
    const server = app.listen(port, host, () => {
      console.log(`\n🚀 Status API running on http://${host}:${port}\n`);
      resolve(server);
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        console.error(`\n❌ Port ${port} is already in use!`);
        console.error('   Set PORT in your .env file to use a different one.\n');
      }
      reject(error);
    });
  });
}
