import pg from 'pg';
import { sql } from 'drizzle-orm';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { DrizzleSession, type Session } from './storage.js';
import { log } from './log.js';

/**
 * Storage handle. Every call to `withSession` checks out one connection,
 * runs the work inside a transaction and hands the connection back, whether
 * the work resolved or threw.
 */
export interface Storage {
  withSession<T>(work: (session: Session) => Promise<T>): Promise<T>;
  ensureSchema(): Promise<void>;
  close(): Promise<void>;
}

export interface PoolOptions {
  databaseUrl: string;
  poolMax: number;
}

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS items (
    id serial PRIMARY KEY,
    name text NOT NULL,
    description text NOT NULL,
    model_data bytea
  )`,
  `CREATE INDEX IF NOT EXISTS items_name_idx ON items (name)`,
  `CREATE TABLE IF NOT EXISTS projects (
    id serial PRIMARY KEY,
    name text NOT NULL,
    description text NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS instances (
    id serial PRIMARY KEY,
    project_id integer NOT NULL,
    item_id integer NOT NULL,
    position_x double precision NOT NULL,
    position_y double precision NOT NULL,
    position_z double precision NOT NULL,
    rotation_x double precision NOT NULL,
    rotation_y double precision NOT NULL,
    rotation_z double precision NOT NULL,
    scale_x double precision NOT NULL,
    scale_y double precision NOT NULL,
    scale_z double precision NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS instances_project_id_idx ON instances (project_id)`,
];

/**
 * Wraps any drizzle Postgres database. The production handle sits on a
 * node-postgres pool; tests hand in an in-process database instead.
 */
export function createStorage<Q extends PgQueryResultHKT>(
  db: PgDatabase<Q>,
  release: () => Promise<void>,
): Storage {
  return {
    withSession(work) {
      return db.transaction((tx) => work(new DrizzleSession<Q>(tx)));
    },

    async ensureSchema() {
      for (const statement of SCHEMA_STATEMENTS) {
        await db.execute(sql.raw(statement));
      }
    },

    close: release,
  };
}

export function openStorage({ databaseUrl, poolMax }: PoolOptions): Storage {
  const pool = new pg.Pool({ connectionString: databaseUrl, max: poolMax });

  // An idle client losing its connection should not take the process down
  pool.on('error', (err) => {
    console.error('Idle database client error:', err);
  });

  const db = drizzle(pool);
  log(`Database pool created (max ${poolMax} connections)`, 'db');

  return createStorage<NodePgQueryResultHKT>(db, () => pool.end());
}
