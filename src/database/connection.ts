import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { config } from '../config';
import { dbLogger as logger } from '../utils/logger';

let pool: Pool | undefined;

export const initDatabase = async (): Promise<Pool> => {
  if (pool) return pool;

  const created = new Pool({
    connectionString: config.database.url,
    max: config.database.maxConnections,
    idleTimeoutMillis: config.database.idleTimeoutMillis,
    connectionTimeoutMillis: config.database.connectionTimeoutMillis,
  });

  created.on('error', (err) => {
    logger.error(`Unexpected database error: ${err.message}`);
  });

  try {
    const client = await created.connect();
    await client.query('SELECT NOW()');
    client.release();
  } catch (error) {
    logger.error(`Failed to connect to database: ${error}`);
    await created.end();
    throw error;
  }

  pool = created;
  logger.info('Database connection established successfully');
  return pool;
};

export const getConnection = async (): Promise<PoolClient> => {
  const active = await initDatabase();
  return active.connect();
};

export const query = async <R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<R>> => {
  const active = await initDatabase();
  return active.query<R>(text, params);
};

export const transaction = async <T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> => {
  const client = await getConnection();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};

export const closeDatabase = async (): Promise<void> => {
  if (pool) {
    await pool.end();
    pool = undefined;
    logger.info('Database connection closed');
  }
};
