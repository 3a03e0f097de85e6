import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteQueryResultHKT } from 'drizzle-orm/pglite';
import type { Express } from 'express';
import { createApp, type AppOptions } from '../app.js';
import { createStorage, type Storage } from '../db.js';
import type { InstanceCreate } from '../../shared/schema.js';

export interface ColumnInfo {
  name: string;
  type: string;
  notNull: boolean;
}

export interface TestDatabase {
  storage: Storage;
  reset(): Promise<void>;
  columns(table: string): Promise<ColumnInfo[]>;
}

// In-process Postgres, so the real drizzle queries run without a server
export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  const storage = createStorage<PgliteQueryResultHKT>(drizzle(client), () => client.close());
  await storage.ensureSchema();

  return {
    storage,
    async reset() {
      await client.exec('TRUNCATE items, projects, instances RESTART IDENTITY');
    },
    async columns(table) {
      const result = await client.query<{ column_name: string; data_type: string; is_nullable: string }>(
        `SELECT column_name, data_type, is_nullable
           FROM information_schema.columns
          WHERE table_schema = 'public' AND table_name = $1
          ORDER BY ordinal_position`,
        [table],
      );
      return result.rows.map((row) => ({
        name: row.column_name,
        type: row.data_type,
        notNull: row.is_nullable === 'NO',
      }));
    },
  };
}

export const testOptions: AppOptions = {
  corsOrigins: ['http://localhost:5173'],
  bodyLimit: '1mb',
  modelUploadLimitBytes: 1024 * 1024,
  logRequests: false,
};

export function buildApp(storage: Storage, overrides: Partial<AppOptions> = {}): Express {
  return createApp(storage, { ...testOptions, ...overrides });
}

export function instanceBody(overrides: Partial<InstanceCreate> = {}): InstanceCreate {
  return {
    project_id: 1,
    item_id: 1,
    position_x: 0,
    position_y: 0,
    position_z: 0,
    rotation_x: 0,
    rotation_y: 0,
    rotation_z: 0,
    scale_x: 1,
    scale_y: 1,
    scale_z: 1,
    ...overrides,
  };
}

export async function seedProjectAndItem(storage: Storage): Promise<{ projectId: number; itemId: number }> {
  return storage.withSession(async (session) => {
    const project = await session.createProject({ name: 'Living room', description: 'Ground floor layout' });
    const item = await session.createItem({ name: 'Chair', description: 'Oak dining chair', model_data: null });
    return { projectId: project.id, itemId: item.id };
  });
}
