import app from './app';
import { env } from './config/env';
import { logFatal, startupLogger } from './logger';

function startServer() {
  const server = app.listen(env.PORT, () => {
    startupLogger.info({ port: env.PORT, env: env.NODE_ENV, corsOrigin: env.CORS_ORIGIN }, 'Server running');
  });

  server.on('error', (error: Error) => {
    logFatal(error, 'Failed to start server');
  });

  // 优雅关闭
  const shutdown = (signal: string) => {
    startupLogger.info({ signal }, 'Shutting down');
    server.close((err) => {
      if (err) {
        startupLogger.error({ err }, 'Error while closing server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer();
