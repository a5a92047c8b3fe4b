/**
 * Server Entry Point
 * Initializes Express server, MongoDB, and Socket.IO
 */

import { createServer } from 'http';
import { createApp } from './app';
import { connectDB, disconnectDB } from './lib/mongo';
import { closeSocket, initializeSocket } from './lib/socket';
import { registerAuditSocketHandlers } from './modules/audit/audit.socket';
import { auditService } from './modules/audit/audit.service';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  try {
    // Connect to MongoDB
    await connectDB();

    // Create Express app
    const app = createApp();

    // Create HTTP server
    const httpServer = createServer(app);

    // Initialize Socket.IO
    const io = initializeSocket(httpServer);

    // Register Socket.IO handlers
    io.on('connection', (socket) => {
      console.log(`✅ Socket connected: ${socket.id}`);

      registerAuditSocketHandlers(socket);

      socket.on('disconnect', () => {
        console.log(`❌ Socket disconnected: ${socket.id}`);
      });
    });

    // Start server
    httpServer.listen(env.PORT, () => {
      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log(`🚀 Site Audit Server is running`);
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 Crawler: ${env.CRAWL_USER_AGENT} (${env.CRAWL_CONCURRENCY} workers)`);
      console.log(`🚀 API: http://localhost:${env.PORT}/health`);
      console.log(`🚀 Socket.IO: ws://localhost:${env.PORT}`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      console.log(`${signal} signal received: cancelling audits and closing HTTP server`);
      auditService
        .shutdown()
        .then(() => closeSocket())
        .then(() => disconnectDB())
        .then(() => {
          httpServer.close(() => {
            console.log('HTTP server closed');
            process.exit(0);
          });
        })
        .catch((error) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start the server
void startServer();
