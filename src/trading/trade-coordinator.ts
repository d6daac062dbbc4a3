/**
 * Trade Coordinator - polls the pair feed and relays simulated trades
 */

import type { PairFeed } from '../api/dexscreener';
import type { Ledger } from '../db/trade-ledger';
import type { Notifier } from '../notify/telegram-notifier';
import { isValidTrade, type TradeThresholds } from '../strategy/liquidity-filter';
import type { Logger } from '../utils/logger';
import type { Ticker } from './ticker';
import type { CoordinatorState, CycleOutcome, Pair, TradeAction, TradeRecord } from './types';

export interface CoordinatorSettings {
  network: string;
  thresholds: TradeThresholds;
  tradeAction: TradeAction;
  tradeAmount: number;
  skipAlreadyTraded: boolean;
  successIntervalMs: number;
  failureIntervalMs: number;
}

export const DEFAULT_COORDINATOR_SETTINGS: Omit<CoordinatorSettings, 'thresholds'> = {
  network: 'ethereum',
  tradeAction: 'buy',
  tradeAmount: 0.1,
  skipAlreadyTraded: false,
  successIntervalMs: 300_000, // 5 minutes
  failureIntervalMs: 60_000,
};

export interface CoordinatorDeps {
  feed: PairFeed;
  notifier: Notifier;
  ledger: Ledger;
  logger: Logger;
}

/**
 * One cycle: fetch pairs, filter, and for each qualifying pair send the
 * command to the trade chat, record it, and confirm on the status chat.
 * Cycles run strictly one after another.
 */
export class TradeCoordinator {
  private state: CoordinatorState = 'idle';
  private announced = false;
  private tradedPairs = new Set<string>();
  private cycles = 0;

  constructor(private deps: CoordinatorDeps, private settings: CoordinatorSettings) {
    deps.logger.info({ settings }, 'Trade coordinator initialized');
  }

  getState(): CoordinatorState {
    return this.state;
  }

  /**
   * Run cycles until stop() is called. There is no other way out.
   */
  async run(ticker: Ticker): Promise<void> {
    if (this.state !== 'idle') {
      this.deps.logger.warn({ state: this.state }, 'Trade coordinator already started');
      return;
    }

    this.state = 'running';
    if (!this.announced) {
      this.announced = true;
      await this.deps.notifier.send('🚀 Trading bot started');
    }

    while (this.isActive()) {
      const outcome = await this.runCycle();
      if (!this.isActive()) break;

      this.state = 'sleeping';
      this.deps.logger.debug({ nextDelayMs: outcome.nextDelayMs }, 'Sleeping until next cycle');
      await ticker.sleep(outcome.nextDelayMs);
      if (!this.isActive()) break;
      this.state = 'running';
    }

    this.deps.logger.info({ cycles: this.cycles }, 'Trade coordinator stopped');
  }

  stop(): void {
    this.state = 'stopped';
  }

  /**
   * Evaluate every pair once. Feed and notification failures are absorbed;
   * anything thrown (a ledger failure, an unreadable price) fails the cycle,
   * is reported on the status chat, and shortens the next sleep.
   */
  async runCycle(): Promise<CycleOutcome> {
    this.cycles++;
    const { logger } = this.deps;
    const trades: TradeRecord[] = [];
    let pairsSeen = 0;

    try {
      const result = await this.deps.feed.fetchPairs(this.settings.network);
      if (!result.ok) {
        logger.warn({ kind: result.error.kind }, 'No pairs this cycle');
      }
      pairsSeen = result.pairs.length;

      for (const pair of result.pairs) {
        if (!isValidTrade(pair, this.settings.thresholds)) continue;

        if (this.settings.skipAlreadyTraded && this.tradedPairs.has(pair.address)) {
          logger.debug({ pairAddress: pair.address, symbol: pair.symbol }, 'Pair already traded, skipping');
          continue;
        }

        trades.push(await this.executeTrade(pair));
      }

      logger.info({ cycle: this.cycles, pairsSeen, trades: trades.length }, 'Cycle complete');
      return { status: 'ok', pairsSeen, trades, nextDelayMs: this.settings.successIntervalMs };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      logger.error({ cycle: this.cycles, err: failure }, 'Cycle failed');
      await this.deps.notifier.send(`❌ Error: ${failure.message}`);
      return {
        status: 'failed',
        pairsSeen,
        trades,
        nextDelayMs: this.settings.failureIntervalMs,
        error: failure,
      };
    }
  }

  private async executeTrade(pair: Pair): Promise<TradeRecord> {
    const { tradeAction: action, tradeAmount: amount } = this.settings;
    const price = parsePrice(pair);

    const command = formatTradeCommand(action, pair.symbol, amount);
    const sent = await this.deps.notifier.send(command, 'trade');
    if (!sent.delivered) {
      this.deps.logger.warn({ pairAddress: pair.address, command }, 'Trade command not delivered');
    }

    const record = await this.deps.ledger.append(pair.address, action, amount, price);
    this.tradedPairs.add(pair.address);

    const verb = action === 'buy' ? 'Bought' : 'Sold';
    await this.deps.notifier.send(`✅ ${verb} ${pair.symbol} at $${pair.priceUsd}`);

    return record;
  }

  private isActive(): boolean {
    return this.state !== 'stopped';
  }
}

/**
 * Command format read by the execution bot, e.g. `/buy FOO 0.1`.
 */
export function formatTradeCommand(action: TradeAction, symbol: string, amount: number): string {
  return `/${action} ${symbol} ${amount}`;
}

function parsePrice(pair: Pair): number {
  const price = Number(pair.priceUsd);
  if (pair.priceUsd.trim() === '' || !Number.isFinite(price)) {
    throw new Error(`Invalid price "${pair.priceUsd}" for ${pair.symbol}`);
  }
  return price;
}
