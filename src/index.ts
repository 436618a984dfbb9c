import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { disconnectRedis, getRedisClient } from './redis';
import { abortRunningSearches } from './services/search.service';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    // Trigger Redis connection when the progress mirror is enabled
    if (getRedisClient()) {
      logger.info('📦 Search progress will be mirrored to Redis');
    }

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 INGEST RECONCILER', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
      Logging.info(`Default match threshold: ${env.MATCH_THRESHOLD}%`);
    });

    // Graceful shutdown handlers
    const gracefulShutdown = async (signal: string): Promise<void> => {
      logger.info(`\n${signal} received. Starting graceful shutdown...`);

      // Running searches stop before their next target
      const aborted = abortRunningSearches();
      if (aborted > 0) {
        logger.info(`Cancelled ${aborted} running search(es)`);
      }

      server.close(async (err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        // No-op when the Redis mirror is disabled
        await disconnectRedis();

        logger.info('Server closed successfully');
        process.exit(0);
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000);
    };

    // Handle termination signals
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
void startServer();
