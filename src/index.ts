import { PairRelayBot, startBot } from './bot';
import { createChildLogger } from './utils/logger';

const logger = createChildLogger('orchestrator');

// Main entry point
const bot = new PairRelayBot(logger);

process.on('SIGINT', async () => {
  logger.info('Received SIGINT, shutting down...');
  await bot.stop();
  process.exit(0);
});

process.on('SIGTERM', async () => {
  logger.info('Received SIGTERM, shutting down...');
  await bot.stop();
  process.exit(0);
});

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});

process.on('uncaughtException', (error) => {
  logger.error({ err: error }, 'Uncaught exception');
  process.exit(1);
});

void startBot(bot, logger);
