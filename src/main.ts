/**
 * Main entry point.
 *
 * Loads configuration, wires logging, starts the HTTP server and installs
 * shutdown handlers.
 *
 * @module main
 */
import path from 'path';
import process from 'process';
import { HttpServer } from './core/server';
import { loadConfig, ServerConfig } from './config/server.config';
import logger, { Logger, ConsoleTransport, PrettyFormatter, FileTransport } from './utils/logger';

// Boxed output for the handful of startup and shutdown lines
const startupLogger = new Logger({
  transports: [
    new ConsoleTransport({
      formatter: new PrettyFormatter({ useBoxes: true, useColors: true, showTimestamp: false }),
    }),
  ],
});

function configureLogging(config: ServerConfig): void {
  logger.setLevel(config.logging.level);
  if (config.logging.toFile) {
    logger.addTransport(
      new FileTransport({
        filename: path.join(config.logging.logDir, 'server.log'),
        formatter: new PrettyFormatter({ useColors: false, showTimestamp: true }),
      }),
    );
    logger.addTransport(
      new FileTransport({ filename: path.join(config.logging.logDir, 'server.json') }),
    );
  }
}

async function startApplication(): Promise<void> {
  try {
    const config = loadConfig();
    configureLogging(config);

    startupLogger.info('Starting static file server', {
      environment: process.env.NODE_ENV || 'development',
      nodeVersion: process.version,
      rootDir: config.rootDir,
      defaultDocument: config.defaultDocument,
    });

    const server = new HttpServer(config);
    await server.start();

    startupLogger.success('Server started successfully', {
      host: config.hostname,
      port: config.port,
    });

    setupGracefulShutdown(server);
  } catch (error) {
    startupLogger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

/**
 * Set up handlers for graceful shutdown
 * @param server - The HTTP server instance
 */
function setupGracefulShutdown(server: HttpServer) {
  const shutdown = async () => {
    startupLogger.info('Shutting down server gracefully...');
    try {
      await server.stop();
      await logger.close();
      process.exit(0);
    } catch (error) {
      logger.error('Error during server shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  const onSignal = () => {
    shutdown().catch(() => process.exit(1));
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: { message: error.message, stack: error.stack },
    });
    onSignal();
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection', {
      reason: reason instanceof Error ? { message: reason.message, stack: reason.stack } : String(reason),
    });
  });
}

void startApplication();
