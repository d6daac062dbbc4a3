import * as dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';

dotenv.config();

const ChatIdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

const TelegramSchema = z.object({
  api_url: z.string().url().default('https://api.telegram.org'),
  bot_token: z.string().min(1),
  chat_id: ChatIdSchema,
  trade_chat_id: ChatIdSchema.optional(),
});

const FeedSchema = z.object({
  base_url: z.string().url().default('https://api.dexscreener.com/latest/dex'),
  network: z.string().min(1).default('ethereum'),
  timeout_ms: z.number().int().positive().default(10_000),
});

const StrategySchema = z.object({
  min_liquidity_usd: z.number().nonnegative().default(100_000),
  min_volume_24h_usd: z.number().nonnegative().default(500_000),
  trade_action: z.enum(['buy', 'sell']).default('buy'),
  trade_amount: z.number().positive().default(0.1),
  // Off: a pair that keeps qualifying is bought again every cycle
  skip_already_traded: z.boolean().default(false),
});

const ScheduleSchema = z.object({
  success_interval_ms: z.number().int().positive().default(300_000),
  failure_interval_ms: z.number().int().positive().default(60_000),
});

const RawConfigSchema = z.object({
  web3_provider: z.string().url(),
  database: z.object({
    url: z.string().min(1),
  }),
  telegram: TelegramSchema,
  feed: FeedSchema.default({}),
  strategy: StrategySchema.default({}),
  schedule: ScheduleSchema.default({}),
});

export type TradeAction = 'buy' | 'sell';

export interface AppConfig {
  // Chain RPC endpoint; not used by any trading logic yet
  web3Provider: string;
  databaseUrl: string;
  telegram: {
    apiUrl: string;
    botToken: string;
    chatId: string;
    tradeChatId?: string;
  };
  feed: {
    baseUrl: string;
    network: string;
    timeoutMs: number;
  };
  strategy: {
    minLiquidityUsd: number;
    minVolume24hUsd: number;
    tradeAction: TradeAction;
    tradeAmount: number;
    skipAlreadyTraded: boolean;
  };
  schedule: {
    successIntervalMs: number;
    failureIntervalMs: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Overlay environment variables on the file contents. Env wins.
 */
function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  const database = section(raw, 'database');
  const telegram = section(raw, 'telegram');
  const feed = section(raw, 'feed');

  if (env.WEB3_PROVIDER) merged.web3_provider = env.WEB3_PROVIDER;
  if (env.DATABASE_URL) database.url = env.DATABASE_URL;
  if (env.TELEGRAM_BOT_TOKEN) telegram.bot_token = env.TELEGRAM_BOT_TOKEN;
  if (env.TELEGRAM_CHAT_ID) telegram.chat_id = env.TELEGRAM_CHAT_ID;
  if (env.TELEGRAM_TRADE_CHAT_ID) telegram.trade_chat_id = env.TELEGRAM_TRADE_CHAT_ID;
  if (env.FEED_NETWORK) feed.network = env.FEED_NETWORK;

  merged.database = database;
  merged.telegram = telegram;
  if (Object.keys(feed).length > 0) merged.feed = feed;

  return merged;
}

/**
 * Validate raw (snake_case) configuration and map it to AppConfig.
 *
 * @throws ConfigError listing every invalid path
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): AppConfig {
  const input = applyEnvOverrides(isRecord(raw) ? raw : {}, env);
  const result = RawConfigSchema.safeParse(input);

  if (!result.success) {
    const errors = result.error.issues
      .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${errors}`);
  }

  const { data } = result;

  return {
    web3Provider: data.web3_provider,
    databaseUrl: data.database.url,
    telegram: {
      apiUrl: data.telegram.api_url.replace(/\/+$/, ''),
      botToken: data.telegram.bot_token,
      chatId: data.telegram.chat_id,
      tradeChatId: data.telegram.trade_chat_id,
    },
    feed: {
      baseUrl: data.feed.base_url.replace(/\/+$/, ''),
      network: data.feed.network,
      timeoutMs: data.feed.timeout_ms,
    },
    strategy: {
      minLiquidityUsd: data.strategy.min_liquidity_usd,
      minVolume24hUsd: data.strategy.min_volume_24h_usd,
      tradeAction: data.strategy.trade_action,
      tradeAmount: data.strategy.trade_amount,
      skipAlreadyTraded: data.strategy.skip_already_traded,
    },
    schedule: {
      successIntervalMs: data.schedule.success_interval_ms,
      failureIntervalMs: data.schedule.failure_interval_ms,
    },
  };
}

/**
 * Load configuration from a JSON file (CONFIG_PATH, else ./config.json) with
 * environment overrides. A missing file is tolerated when the environment
 * supplies every required value.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const path = configPath || env.CONFIG_PATH || resolve(process.cwd(), 'config.json');

  let raw: unknown = {};
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (!missing) {
      throw new ConfigError(`Failed to parse config file ${path}`, { cause: error });
    }
  }

  return parseConfig(raw, env);
}
