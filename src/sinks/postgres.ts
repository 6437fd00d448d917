import pg from 'pg';

import { errorMessage, type PersistenceError } from '@lib/errors';
import { dbLogger } from '@lib/logger';
import type { SensorPayload } from '@lib/readings';
import { err, ok, type Result } from '@lib/result';
import type { PersistenceSink } from '@lib/sinks';

/** The part of `pg.Pool` the sink needs. */
export type Queryable = {
  query: (text: string, values?: unknown[]) => Promise<unknown>;
};

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS sensor_data (
    id SERIAL PRIMARY KEY,
    sensor_path VARCHAR(255) NOT NULL,
    ts_collected TIMESTAMPTZ NOT NULL DEFAULT now(),
    decoded_data JSONB NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS ix_sensor_data_path_time ON sensor_data (sensor_path, ts_collected)',
  'CREATE INDEX IF NOT EXISTS ix_sensor_data_time_desc ON sensor_data (ts_collected DESC)',
];

export const INSERT_READING =
  'INSERT INTO sensor_data (sensor_path, ts_collected, decoded_data) VALUES ($1, $2, $3)';

export class PostgresSink implements PersistenceSink {
  constructor(private readonly db: Queryable) {}

  async ensureSchema(): Promise<void> {
    for (const statement of SCHEMA_STATEMENTS) {
      await this.db.query(statement);
    }
    dbLogger.info('Database schema ready');
  }

  async append(
    endpoint: string,
    collectedAt: Date,
    fields: SensorPayload,
  ): Promise<Result<void, PersistenceError>> {
    try {
      await this.db.query(INSERT_READING, [
        endpoint,
        collectedAt,
        JSON.stringify(fields),
      ]);
      return ok(undefined);
    } catch (e) {
      return err({ type: 'persistence', message: errorMessage(e) });
    }
  }
}

export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
  pool.on('error', (e) => {
    dbLogger.error({ err: e.message }, 'Idle database client failed');
  });
  const masked: string = connectionString.replace(/:[^:@/]+@/, ':***@');
  dbLogger.info({ url: masked }, 'Database pool initialized');
  return pool;
}
