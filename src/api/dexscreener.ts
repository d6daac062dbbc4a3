/**
 * DexScreener pair feed
 * https://docs.dexscreener.com/api/reference
 */

import { z } from 'zod';
import { defaultFetch, type HttpFetch, type HttpResponse } from '../utils/http';
import type { Logger } from '../utils/logger';
import type { Pair } from '../trading/types';

export const DEFAULT_FEED_URL = 'https://api.dexscreener.com/latest/dex';
export const DEFAULT_FEED_TIMEOUT_MS = 10_000;

/**
 * Pair entry as DexScreener reports it. Only the fields we trade on are checked;
 * liquidity is either a bare number or the `{ usd, base, quote }` object.
 */
const DexPairSchema = z.object({
  pairAddress: z.string().min(1),
  baseToken: z.object({
    symbol: z.string().min(1),
  }),
  priceUsd: z.string().min(1),
  liquidity: z.union([
    z.number(),
    z.object({ usd: z.number().optional() }),
  ]).optional(),
  volume: z.object({
    h24: z.number().optional(),
  }).optional(),
});

const DexPairsResponseSchema = z.object({
  pairs: z.array(z.unknown()).nullable(),
});

type DexPair = z.infer<typeof DexPairSchema>;

export type FeedErrorKind = 'timeout' | 'network' | 'http' | 'parse';

export class FeedError extends Error {
  constructor(
    readonly kind: FeedErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FeedError';
  }
}

/**
 * Pairs are always present; on failure they are empty and `error` says why.
 */
export type FeedResult =
  | { ok: true; pairs: Pair[] }
  | { ok: false; pairs: Pair[]; error: FeedError };

export interface PairFeed {
  fetchPairs(network: string): Promise<FeedResult>;
}

export interface DexScreenerOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: HttpFetch;
}

/**
 * DexScreener API client
 */
export class DexScreenerClient implements PairFeed {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: HttpFetch;

  constructor(private logger: Logger, options: DexScreenerOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_FEED_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FEED_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? defaultFetch;
  }

  /**
   * Fetch the current pair list for a network. Never throws.
   */
  async fetchPairs(network: string): Promise<FeedResult> {
    const url = `${this.baseUrl}/pairs/${encodeURIComponent(network)}`;

    let response: HttpResponse;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      return this.fail(network, timedOut
        ? new FeedError('timeout', `Pair feed timed out after ${this.timeoutMs}ms`, { cause: error })
        : new FeedError('network', `Pair feed request failed: ${errorMessage(error)}`, { cause: error }));
    }

    if (!response.ok) {
      await this.discardBody(response);
      return this.fail(network, new FeedError('http', `Pair feed returned HTTP ${response.status}`));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return this.fail(network, new FeedError('parse', 'Pair feed returned a non-JSON body', { cause: error }));
    }

    const parsed = DexPairsResponseSchema.safeParse(body);
    if (!parsed.success) {
      return this.fail(network, new FeedError('parse', 'Pair feed body has no pairs array'));
    }

    const pairs: Pair[] = [];
    for (const entry of parsed.data.pairs ?? []) {
      const pair = DexPairSchema.safeParse(entry);
      if (!pair.success) {
        this.logger.warn({
          network,
          pairAddress: pairAddressOf(entry),
          issues: pair.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        }, 'Skipping malformed pair');
        continue;
      }
      pairs.push(toPair(pair.data));
    }

    this.logger.debug({ network, count: pairs.length }, 'Fetched pairs');
    return { ok: true, pairs };
  }

  // Frees the connection; the error body itself is of no use
  private async discardBody(response: HttpResponse): Promise<void> {
    try {
      await response.text();
    } catch (error) {
      this.logger.debug({ err: errorMessage(error) }, 'Could not read error body');
    }
  }

  private fail(network: string, error: FeedError): FeedResult {
    this.logger.warn({ network, kind: error.kind, err: error.message }, 'Pair feed unavailable');
    return { ok: false, pairs: [], error };
  }
}

/**
 * Convert a DexScreener entry to a Pair. Missing liquidity or volume counts as 0.
 */
function toPair(pair: DexPair): Pair {
  const liquidity = typeof pair.liquidity === 'number'
    ? pair.liquidity
    : pair.liquidity?.usd ?? 0;

  return {
    address: pair.pairAddress,
    symbol: pair.baseToken.symbol,
    priceUsd: pair.priceUsd,
    liquidityUsd: liquidity,
    volume24hUsd: pair.volume?.h24 ?? 0,
  };
}

function pairAddressOf(entry: unknown): string | undefined {
  if (typeof entry === 'object' && entry !== null && 'pairAddress' in entry) {
    return typeof entry.pairAddress === 'string' ? entry.pairAddress : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
