import { Pool } from 'pg';
import type { PostgresConfig } from './config.js';
import type { SourceRow } from './types/sales.js';

export type SourceClient = {
  query(text: string, params?: unknown[]): Promise<{ rows: SourceRow[] }>;
  release(): void;
};

export type SourcePool = {
  connect(): Promise<SourceClient>;
  end(): Promise<void>;
};

export function createSourcePool(config: PostgresConfig): SourcePool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: 1,
  });

  return {
    async connect() {
      const client = await pool.connect();
      return {
        async query(text, params) {
          const result = await client.query(text, params);
          return { rows: result.rows };
        },
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

export async function withConnection<T>(pool: SourcePool, fn: (client: SourceClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}
