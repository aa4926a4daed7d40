import pg from 'pg';
import logger from '../../utils/logger';

const { Pool } = pg;

let pool: pg.Pool | null = null;

/**
 * Initialize the PostgreSQL connection pool from a connection string.
 * Subsequent calls return the existing pool.
 */
export function initDatabase(connectionString: string): pg.Pool {
  if (pool) return pool;

  pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected PostgreSQL pool error');
  });

  return pool;
}

/**
 * Close the database pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Create tables if they don't exist.
 *
 * Sessions reference modules without ON DELETE CASCADE: removing a module's
 * sessions is done explicitly by the store, inside the same transaction.
 */
export async function ensureSchema(db: pg.Pool): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS modules (
      id serial PRIMARY KEY,
      name varchar(100) NOT NULL,
      target_hours double precision NOT NULL CHECK (target_hours >= 0),
      exam_date date,
      created_at timestamptz NOT NULL DEFAULT now()
    );
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS study_sessions (
      id serial PRIMARY KEY,
      module_id integer NOT NULL REFERENCES modules(id),
      duration double precision NOT NULL CHECK (duration > 0),
      date date NOT NULL,
      notes text,
      created_at timestamptz NOT NULL DEFAULT now()
    );
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS ai_recommendations (
      id serial PRIMARY KEY,
      recommendation_text text NOT NULL,
      created_at timestamptz NOT NULL DEFAULT now()
    );
  `);

  await db.query(`CREATE INDEX IF NOT EXISTS idx_study_sessions_module_id ON study_sessions (module_id);`);
  await db.query(`CREATE INDEX IF NOT EXISTS idx_study_sessions_date ON study_sessions (date);`);

  logger.info('Database tables created/verified');
}

/**
 * Execute a transaction
 */
export async function transaction<T>(
  db: pg.Pool,
  callback: (client: pg.PoolClient) => Promise<T>
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
