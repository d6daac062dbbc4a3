import type { Pair } from '../trading/types';

export interface TradeThresholds {
  minLiquidityUsd: number;
  minVolume24hUsd: number;
}

export const DEFAULT_THRESHOLDS: TradeThresholds = {
  minLiquidityUsd: 100_000,
  minVolume24hUsd: 500_000,
};

/**
 * A pair qualifies when both liquidity and 24h volume are strictly above the
 * thresholds. Each call is independent of every other.
 */
export function isValidTrade(pair: Pair, thresholds: TradeThresholds = DEFAULT_THRESHOLDS): boolean {
  return pair.liquidityUsd > thresholds.minLiquidityUsd
    && pair.volume24hUsd > thresholds.minVolume24hUsd;
}
