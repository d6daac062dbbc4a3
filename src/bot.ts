import { loadConfig, type AppConfig } from './config/settings';
import { closeAppContext, createAppContext, type AppContext } from './context';
import { TimerTicker } from './trading/ticker';
import type { Logger } from './utils/logger';

/**
 * Process-level bot: load config, build the context, run the coordinator.
 */
export class PairRelayBot {
  private context: AppContext | null = null;
  private ticker = new TimerTicker();

  constructor(private logger: Logger, private load: () => AppConfig = () => loadConfig()) {}

  async start(): Promise<void> {
    this.logger.info('Starting DEX pair relay bot');

    const config = this.load();
    this.logger.info({
      network: config.feed.network,
      strategy: config.strategy,
      schedule: config.schedule,
    }, 'Configuration loaded');

    this.context = await createAppContext(config);
    await this.context.coordinator.run(this.ticker);
  }

  async stop(): Promise<void> {
    this.logger.info('Stopping bot...');
    this.ticker.cancel();
    if (this.context) {
      await closeAppContext(this.context);
      this.context = null;
    }
    this.logger.info('Bot stopped');
  }
}

/**
 * Start the bot; a start-up failure is logged with its message and stack,
 * then the process exits with code 1.
 */
export async function startBot(
  bot: Pick<PairRelayBot, 'start'>,
  logger: Logger,
  exit: (code: number) => void = code => process.exit(code)
): Promise<void> {
  try {
    await bot.start();
  } catch (error) {
    logger.error({ err: error }, 'Failed to start bot');
    exit(1);
  }
}
