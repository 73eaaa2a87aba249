import { Client, Pool, type PoolConfig } from 'pg';
import { type WithTransaction } from '@contactbook/domain';
import { type SafeLogger } from '@contactbook/shared';

export function createPool(config: PoolConfig, logger: SafeLogger): Pool {
  const pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(pool: Pool, logger: SafeLogger): Promise<void> {
  await pool.end();
  logger.info({}, 'Database pool closed');
}

/** Runs `fn` on one pooled client inside BEGIN/COMMIT, rolling back on error. */
export function createTransactionRunner(pool: Pool): WithTransaction {
  return async <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  };
}

/** Narrows the opaque transaction handle the domain passes back to a pg client. */
export function pgClient(tx: unknown): Client {
  if (tx instanceof Client) return tx;
  throw new Error('Transaction handle is not a pg client');
}
