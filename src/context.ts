import { Pool } from 'pg';
import { DexScreenerClient } from './api/dexscreener';
import type { AppConfig } from './config/settings';
import { TradeLedger } from './db/trade-ledger';
import { TelegramNotifier } from './notify/telegram-notifier';
import { TradeCoordinator, type CoordinatorSettings } from './trading/trade-coordinator';
import { createChildLogger } from './utils/logger';

/**
 * Everything the process shares, built once at start-up and passed down.
 */
export interface AppContext {
  config: AppConfig;
  pool: Pool;
  ledger: TradeLedger;
  notifier: TelegramNotifier;
  feed: DexScreenerClient;
  coordinator: TradeCoordinator;
}

export function coordinatorSettings(config: AppConfig): CoordinatorSettings {
  return {
    network: config.feed.network,
    thresholds: {
      minLiquidityUsd: config.strategy.minLiquidityUsd,
      minVolume24hUsd: config.strategy.minVolume24hUsd,
    },
    tradeAction: config.strategy.tradeAction,
    tradeAmount: config.strategy.tradeAmount,
    skipAlreadyTraded: config.strategy.skipAlreadyTraded,
    successIntervalMs: config.schedule.successIntervalMs,
    failureIntervalMs: config.schedule.failureIntervalMs,
  };
}

/**
 * Open the database pool, make sure the trades table exists and wire the
 * collaborators together.
 */
export async function createAppContext(config: AppConfig): Promise<AppContext> {
  const dbLogger = createChildLogger('database');

  // One cycle at a time, so a single connection is enough
  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: 1,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    dbLogger.error({ err }, 'Unexpected database pool error');
  });

  const ledger = new TradeLedger(
    { query: (text, values) => pool.query(text, values) },
    createChildLogger('ledger')
  );

  try {
    await ledger.ensureSchema();
  } catch (error) {
    await pool.end();
    throw error;
  }

  const notifier = new TelegramNotifier(config.telegram, createChildLogger('telegram'));

  const feed = new DexScreenerClient(createChildLogger('dexscreener'), {
    baseUrl: config.feed.baseUrl,
    timeoutMs: config.feed.timeoutMs,
  });

  const coordinator = new TradeCoordinator(
    { feed, notifier, ledger, logger: createChildLogger('coordinator') },
    coordinatorSettings(config)
  );

  return { config, pool, ledger, notifier, feed, coordinator };
}

export async function closeAppContext(context: AppContext): Promise<void> {
  context.coordinator.stop();
  await context.pool.end();
  createChildLogger('database').info('Database pool closed');
}
