/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';

// Import routers
import { createAuditRouter } from './modules/audit/audit.router';
import { auditController, AuditController } from './modules/audit/audit.controller';

export const createApp = (controller: AuditController = auditController): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  // Helmet for security headers
  app.use(helmet());

  // CORS configuration
  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Site audit API is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
    });
  });

  // API Routes
  app.use('/api/audits', createAuditRouter(controller));

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
