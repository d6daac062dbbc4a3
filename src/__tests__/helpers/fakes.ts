import type { FeedResult, PairFeed } from '../../api/dexscreener';
import type { Ledger } from '../../db/trade-ledger';
import type { SqlExecutor } from '../../db/types';
import type { Destination, Notifier, NotifyResult } from '../../notify/telegram-notifier';
import type { HttpFetch, HttpResponse } from '../../utils/http';
import type { Pair, TradeAction, TradeRecord } from '../../trading/types';

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

export function mockFetch(...responses: Array<HttpResponse | Error>): jest.Mock<ReturnType<HttpFetch>, Parameters<HttpFetch>> {
  const fn = jest.fn<ReturnType<HttpFetch>, Parameters<HttpFetch>>();
  for (const response of responses) {
    if (response instanceof Error) {
      fn.mockRejectedValueOnce(response);
    } else {
      fn.mockResolvedValueOnce(response);
    }
  }
  return fn;
}

export function makePair(overrides: Partial<Pair> = {}): Pair {
  return {
    address: '0xabc',
    symbol: 'FOO',
    priceUsd: '1.50',
    liquidityUsd: 200_000,
    volume24hUsd: 600_000,
    ...overrides,
  };
}

export class FakeFeed implements PairFeed {
  readonly networks: string[] = [];
  private results: FeedResult[];

  constructor(...results: FeedResult[]) {
    this.results = results;
  }

  async fetchPairs(network: string): Promise<FeedResult> {
    this.networks.push(network);
    return this.results.shift() ?? { ok: true, pairs: [] };
  }
}

export class FakeNotifier implements Notifier {
  readonly sent: Array<{ text: string; destination: Destination }> = [];

  // Sends to this destination are recorded but reported as undelivered
  constructor(private failing: Destination | null = null) {}

  async send(text: string, destination: Destination = 'status'): Promise<NotifyResult> {
    this.sent.push({ text, destination });
    if (destination === this.failing) {
      return { delivered: false, chatId: destination, error: new Error('Telegram API returned HTTP 502') };
    }
    return { delivered: true, chatId: destination };
  }

  to(destination: Destination): string[] {
    return this.sent.filter(m => m.destination === destination).map(m => m.text);
  }
}

export class FakeLedger implements Ledger {
  readonly records: TradeRecord[] = [];
  failWith: Error | null = null;

  async append(pairAddress: string, action: TradeAction, amount: number, price: number): Promise<TradeRecord> {
    if (this.failWith) throw this.failWith;
    const record: TradeRecord = {
      id: this.records.length + 1,
      timestamp: new Date('2026-01-01T00:00:00Z'),
      pairAddress,
      action,
      amount,
      price,
    };
    this.records.push(record);
    return record;
  }
}

/**
 * Records every statement; answers INSERT ... RETURNING with an incrementing id.
 */
export class FakeSql implements SqlExecutor {
  readonly statements: Array<{ text: string; values?: unknown[] }> = [];
  private failures: Error[] = [];
  private nextId = 1;

  failNext(error: Error): void {
    this.failures.push(error);
  }

  async query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }> {
    this.statements.push({ text, values });
    const failure = this.failures.shift();
    if (failure) throw failure;

    if (text.includes('INSERT INTO trades')) {
      return { rows: [{ id: this.nextId++, timestamp: new Date('2026-01-01T00:00:00Z') }] };
    }
    return { rows: [] };
  }
}
