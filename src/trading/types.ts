import type { TradeAction } from '../config/settings';

export type { TradeAction };

/**
 * A tradable pair as reported by the market-data feed for one cycle.
 */
export interface Pair {
  address: string;
  symbol: string;
  // Verbatim feed string, e.g. "1.50"
  priceUsd: string;
  liquidityUsd: number;
  volume24hUsd: number;
}

/**
 * Persisted trade. id and timestamp are assigned by the database.
 */
export interface TradeRecord {
  id: number;
  timestamp: Date;
  pairAddress: string;
  action: TradeAction;
  amount: number;
  price: number;
}

export type CoordinatorState = 'idle' | 'running' | 'sleeping' | 'stopped';

/**
 * Result of one evaluation pass.
 */
export interface CycleOutcome {
  status: 'ok' | 'failed';
  pairsSeen: number;
  trades: TradeRecord[];
  nextDelayMs: number;
  error?: Error;
}
