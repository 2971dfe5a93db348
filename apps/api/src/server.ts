import { config, validateConfig } from './config/services.config';
import { createApp } from './app';
import { closeDatabase, getDatabase } from './db';
import { logger } from './utils/logger';
import { ServiceRegistry } from './services/service-registry';

function startServer(): void {
  // Validate configuration
  try {
    validateConfig(config);
    logger.info('Configuration validated successfully');
  } catch (error) {
    logger.error('Configuration validation failed:', error);
    process.exit(1);
  }

  try {
    logger.info('Initializing services...');
    const registry = new ServiceRegistry(getDatabase(), config);
    const app = createApp(registry.getControllers());

    const port = config.port;
    const server = app.listen(port, () => {
      logger.info(`Shelfarr server running on port ${port}`);
      logger.info(`Environment: ${config.nodeEnv}`);
    });

    // Handle graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      server.close(() => {
        registry.close();
        closeDatabase();
        process.exit(0);
      });
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

// Start the server
startServer();
