import { env, validateEnv } from '@/shared/config';
import { logger } from '@/shared/utils';
import { sfxController } from '@/modules/sfx';
import { audioFileService } from '@/modules/storage';
import { ToolHandler, createMcpServer, startStdioServer } from '@/modules/mcp';

function toLogError(error: unknown): Error | Record<string, unknown> {
  return error instanceof Error ? error : { error: String(error) };
}

// The server cannot authenticate without a key, so it does not start
try {
  validateEnv();
} catch (error) {
  logger.error('Environment validation failed', toLogError(error));
  process.exit(1);
}

const server = createMcpServer(new ToolHandler(sfxController, audioFileService));

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);

  try {
    await server.close();
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', toLogError(error));
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
startStdioServer(server)
  .then(() => {
    logger.info('SFX MCP server started', {
      environment: env.NODE_ENV,
      outputDirectory: env.SFX_TEMP_DIR,
    });
  })
  .catch((error: unknown) => {
    logger.error('Failed to start SFX MCP server', toLogError(error));
    process.exit(1);
  });
