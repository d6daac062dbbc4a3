import type { Logger } from '../utils/logger';
import type { SqlExecutor } from './types';

export const CREATE_TRADES_TABLE = `
  CREATE TABLE IF NOT EXISTS trades (
    id SERIAL PRIMARY KEY,
    timestamp TIMESTAMP DEFAULT NOW(),
    pair_address TEXT,
    action TEXT,
    amount NUMERIC,
    price NUMERIC
  );
`;

export const createTables = async (db: SqlExecutor, logger: Logger): Promise<void> => {
  logger.info('Creating database tables...');
  await db.query(CREATE_TRADES_TABLE);
  logger.info('Database tables ready');
};
