import { startServer } from './web/server.js';
import { logger } from './core/logger.js';
import { config } from './config.js';
import { errorMessage } from './core/errors.js';

async function main() {
  logger.info('='.repeat(50));
  logger.info('Comment Harvest Service');
  logger.info('='.repeat(50));

  logger.info('Starting web server...');
  startServer();

  logger.info('');
  logger.info(`Harvest API: POST http://localhost:${config.port}/api/harvest`);
  logger.info('');
  logger.info('One-off harvest:');
  logger.info('  npm run harvest -- "<query>" [--timeout <seconds>] [--json]');
  logger.info('');
}

// Handle graceful shutdown
process.on('SIGINT', () => {
  logger.info('Shutting down...');
  process.exit(0);
});

process.on('SIGTERM', () => {
  logger.info('Shutting down...');
  process.exit(0);
});

main().catch(error => {
  logger.error(`Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
