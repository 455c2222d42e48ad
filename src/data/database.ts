import { Pool, PoolConfig, QueryResultRow } from 'pg';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger, ErrorCode, StorageError, errorMessage } from '../utils';

export const DEFAULT_MIGRATIONS_DIR = join(__dirname, '..', '..', 'migrations');

/** Anything that runs SQL: the pool itself, or one client inside a transaction. */
export interface Queryable {
  query<T extends QueryResultRow>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

export interface PooledClient extends Queryable {
  release(): void;
}

/** The part of a pg `Pool` this class uses. */
export interface ConnectionPool extends Queryable {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

export interface DatabaseOptions {
  nodeEnv?: string;
}

export function createPoolConfig(connectionString: string, options: DatabaseOptions = {}): PoolConfig {
  return {
    connectionString,
    ssl: options.nodeEnv === 'production' ? { rejectUnauthorized: false } : false,
    max: parseInt(process.env.DB_POOL_MAX || '10', 10),
    idleTimeoutMillis: parseInt(process.env.DB_IDLE_TIMEOUT || '30000', 10),
    connectionTimeoutMillis: parseInt(process.env.DB_CONNECT_TIMEOUT || '5000', 10),
  };
}

export class Database implements Queryable {
  private pool: ConnectionPool;

  constructor(connection: string | ConnectionPool, options: DatabaseOptions = {}) {
    if (typeof connection === 'string') {
      const pool = new Pool(createPoolConfig(connection, options));
      pool.on('error', (err) => {
        logger.error('Database', 'Unexpected pool error', { error: err.message });
      });
      this.pool = pool;
    } else {
      this.pool = connection;
    }
  }

  async connect(): Promise<void> {
    try {
      await this.ping();
      logger.info('Database', 'Connected to PostgreSQL');
    } catch (error) {
      logger.error('Database', 'Failed to connect to PostgreSQL', { error: errorMessage(error) });
      throw new StorageError('Failed to connect to database', { error: errorMessage(error) }, ErrorCode.DB_CONNECTION_ERROR);
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    logger.info('Database', 'Disconnected from PostgreSQL');
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async query<T extends QueryResultRow>(sql: string, params?: unknown[]): Promise<{ rows: T[] }> {
    const result = await this.pool.query<T>(sql, params);
    return { rows: result.rows };
  }

  /** Runs `work` on a single client between BEGIN and COMMIT; any rejection rolls back. */
  async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Applies every not-yet-executed `.sql` file in `migrationsDir`, in name order.
   * The schema files themselves are idempotent, so this is safe on every startup.
   */
  async migrate(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id SERIAL PRIMARY KEY,
        filename VARCHAR(255) NOT NULL UNIQUE,
        executed_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);

    const result = await this.query<{ filename: string }>('SELECT filename FROM schema_migrations');
    const executed = new Set(result.rows.map((r) => r.filename));

    const files = readdirSync(migrationsDir).filter((f) => f.endsWith('.sql')).sort();
    logger.debug('Migrations', `Found ${files.length} migration files`);

    const applied: string[] = [];
    for (const file of files) {
      if (executed.has(file)) {
        logger.debug('Migrations', `Skipping ${file} (already executed)`);
        continue;
      }

      logger.info('Migrations', `Running: ${file}`);
      const sql = readFileSync(join(migrationsDir, file), 'utf-8');

      try {
        await this.transaction(async (tx) => {
          await tx.query(sql);
          await tx.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        });
      } catch (error) {
        throw new StorageError(`Migration ${file} failed`, { file, error: errorMessage(error) }, ErrorCode.DB_TRANSACTION_ERROR);
      }
      applied.push(file);
    }

    logger.info('Migrations', 'All migrations completed', { applied: applied.length });
    return applied;
  }
}
