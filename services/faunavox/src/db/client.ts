import {
  Pool,
  type PoolClient,
  type PoolConfig,
  type QueryResultRow,
} from 'pg';

export interface DatabaseSettings {
  databaseUrl: string;
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  ssl: boolean;
}

export function buildPoolConfig(settings: DatabaseSettings): PoolConfig {
  if (settings.databaseUrl) {
    return {
      connectionString: settings.databaseUrl,
      ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
    };
  }

  if (settings.host && settings.user && settings.name) {
    return {
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password || undefined,
      database: settings.name,
      ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
    };
  }

  throw new Error('DATABASE_NOT_CONFIGURED');
}

export interface Database {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
  withTransaction<T>(handler: (client: PoolClient) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createDatabase(settings: DatabaseSettings): Database {
  const pool = new Pool(buildPoolConfig(settings));

  return {
    async query<T extends QueryResultRow>(
      text: string,
      params: unknown[] = []
    ): Promise<T[]> {
      const result = await pool.query<T>(text, params);
      return result.rows;
    },

    async withTransaction<T>(
      handler: (client: PoolClient) => Promise<T>
    ): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await handler(client);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    },

    async close(): Promise<void> {
      await pool.end();
    },
  };
}
