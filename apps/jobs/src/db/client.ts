import * as fs from 'fs';
import * as path from 'path';
import { Pool } from 'pg';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import { createLogger } from '../utils/logger';

const log = createLogger('db');

const SCHEMA_PATH = path.join(__dirname, '../../sql/schema.sql');

export interface Database {
  db: NodePgDatabase;
  /** Create any missing tables from sql/schema.sql */
  applySchema(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Open a pooled connection. DATABASE_URL is used when no connection string is given.
 */
export function createDatabase(connectionString: string | undefined = process.env.DATABASE_URL): Database {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 10000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    log.error('Unexpected error on idle client', err);
  });

  return {
    db: drizzle(pool),
    applySchema: async () => {
      const ddl = fs.readFileSync(SCHEMA_PATH, 'utf-8');
      await pool.query(ddl);
      log.success('Schema applied');
    },
    close: () => pool.end(),
  };
}
