/**
 * Brand Evidence Engine - Main Entry Point
 * HTTP service for typosquatting sweeps and brand infringement reports
 */

import { engineLogger } from './lib/logger.js';
import { config } from './lib/config.js';
import { getErrorMessage } from './lib/errors.js';
import { BrandProtectionAgent } from './agents/brand-protection-agent.js';
import { HttpServer } from './server.js';

/**
 * Main application
 */
class Application {
  private agent: BrandProtectionAgent;
  private httpServer: HttpServer;

  constructor() {
    this.agent = new BrandProtectionAgent();
    this.httpServer = new HttpServer(this.agent);
  }

  /**
   * Start application
   */
  async start(): Promise<void> {
    engineLogger.info('Starting Brand Evidence Engine...');

    await this.httpServer.start();

    engineLogger.info('Brand Evidence Engine started successfully', {
      port: config.server.port,
      environment: config.server.environment,
      probeConcurrency: config.probe.concurrency,
      rdapBaseUrl: config.rdap.baseUrl,
    });
  }

  /**
   * Stop application
   */
  async stop(): Promise<void> {
    engineLogger.info('Stopping Brand Evidence Engine...');

    await this.httpServer.stop();
    this.agent.shutdown();

    engineLogger.info('Brand Evidence Engine stopped');
  }

  /**
   * Setup signal handlers
   */
  setupSignalHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      engineLogger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await this.stop();
        process.exit(0);
      } catch (error) {
        engineLogger.error('Shutdown failed', error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  }

  /**
   * Handle errors
   */
  setupErrorHandlers(): void {
    process.on('uncaughtException', (error) => {
      engineLogger.error('Uncaught exception', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      engineLogger.error('Unhandled rejection', { reason: getErrorMessage(reason) });
      process.exit(1);
    });
  }
}

/**
 * Main function
 */
async function main(): Promise<void> {
  try {
    const app = new Application();

    app.setupSignalHandlers();
    app.setupErrorHandlers();

    await app.start();
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    console.error('Failed to start Brand Evidence Engine:', errorMessage, errorStack);
    process.exit(1);
  }
}

// Run application
void main();
