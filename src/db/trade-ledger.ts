import type { Logger } from '../utils/logger';
import type { TradeAction, TradeRecord } from '../trading/types';
import { createTables } from './schema';
import type { SqlExecutor } from './types';

export class LedgerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
  }
}

export interface Ledger {
  append(pairAddress: string, action: TradeAction, amount: number, price: number): Promise<TradeRecord>;
}

/**
 * Append-only trade audit trail in the `trades` table.
 *
 * @example
 * const ledger = new TradeLedger(pool, log);
 * await ledger.append('0xabc', 'buy', 0.1, 1.5);
 */
export class TradeLedger implements Ledger {
  private schemaReady: Promise<void> | null = null;

  constructor(private db: SqlExecutor, private logger: Logger) {}

  /**
   * Create the trades table if it is missing. Runs once; a failed attempt is
   * retried on the next call.
   */
  ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = createTables(this.db, this.logger).catch((error: unknown) => {
        this.schemaReady = null;
        throw new LedgerError('Failed to create trades table', { cause: error });
      });
    }
    return this.schemaReady;
  }

  /**
   * Insert one trade. id and timestamp come from the database.
   *
   * @throws LedgerError on any database failure
   */
  async append(pairAddress: string, action: TradeAction, amount: number, price: number): Promise<TradeRecord> {
    await this.ensureSchema();

    let rows: Array<Record<string, unknown>>;
    try {
      ({ rows } = await this.db.query(
        `INSERT INTO trades (pair_address, action, amount, price)
         VALUES ($1, $2, $3, $4)
         RETURNING id, timestamp`,
        [pairAddress, action, amount, price]
      ));
    } catch (error) {
      throw new LedgerError(`Failed to record ${action} of ${pairAddress}: ${messageOf(error)}`, { cause: error });
    }

    const row = rows[0];
    if (!row) {
      throw new LedgerError(`Insert of ${pairAddress} returned no row`);
    }

    const record: TradeRecord = {
      id: Number(row.id),
      timestamp: row.timestamp instanceof Date ? row.timestamp : new Date(String(row.timestamp)),
      pairAddress,
      action,
      amount,
      price,
    };

    this.logger.info({ id: record.id, pairAddress, action, amount, price }, 'Trade recorded');
    return record;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
