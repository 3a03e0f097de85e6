import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { getTableConfig, type PgTable } from 'drizzle-orm/pg-core';
import { instances, items, projects } from '../../shared/schema.js';
import { createTestDatabase, instanceBody, type TestDatabase } from './helpers.js';

// information_schema reports serial columns by their storage type
function declaredColumns(table: PgTable) {
  return getTableConfig(table).columns.map((column) => {
    const sqlType = column.getSQLType();
    return {
      name: column.name,
      type: sqlType === 'serial' ? 'integer' : sqlType,
      notNull: column.notNull,
    };
  });
}

describe('storage handle', () => {
  let database: TestDatabase;

  beforeAll(async () => {
    database = await createTestDatabase();
  });

  beforeEach(async () => {
    await database.reset();
  });

  afterAll(async () => {
    await database.storage.close();
  });

  it('can ensure the schema more than once', async () => {
    await expect(database.storage.ensureSchema()).resolves.toBeUndefined();
  });

  it.each([
    ['items', items],
    ['projects', projects],
    ['instances', instances],
  ])('creates the %s table exactly as the drizzle model declares it', async (name, table) => {
    expect(await database.columns(name)).toEqual(declaredColumns(table));
  });

  it('round-trips an instance row through every column', async () => {
    const body = instanceBody({
      project_id: 7,
      item_id: 9,
      position_x: 1.25,
      position_y: -2.5,
      position_z: 3.75,
      rotation_x: 45,
      rotation_y: -90,
      rotation_z: 180.5,
      scale_x: 0.5,
      scale_y: 2,
      scale_z: 4,
    });

    const stored = await database.storage.withSession(async (session) => {
      const created = await session.createInstance(body);
      return session.getInstance(created.id);
    });

    expect(stored).toEqual({ id: 1, ...body });
  });

  it('commits the work of a session that resolves', async () => {
    await database.storage.withSession((session) =>
      session.createProject({ name: 'Office', description: 'Second floor' }),
    );

    const rows = await database.storage.withSession((session) => session.listProjects());
    expect(rows).toEqual([{ id: 1, name: 'Office', description: 'Second floor' }]);
  });

  it('rolls back everything a failing session wrote', async () => {
    const attempt = database.storage.withSession(async (session) => {
      await session.createProject({ name: 'Office', description: 'Second floor' });
      await session.createItem({ name: 'Desk', description: 'Steel desk', model_data: null });
      throw new Error('abort after writes');
    });

    await expect(attempt).rejects.toThrow('abort after writes');

    const counts = await database.storage.withSession(async (session) => ({
      projects: (await session.listProjects()).length,
      items: (await session.listItems()).length,
    }));
    expect(counts).toEqual({ projects: 0, items: 0 });
  });

  it('round-trips binary payloads byte for byte', async () => {
    const payload = Buffer.from([0x00, 0x5c, 0x78, 0xff, 0x10]);

    const stored = await database.storage.withSession(async (session) => {
      const item = await session.createItem({ name: 'Blob', description: 'raw', model_data: payload });
      return session.getItem(item.id);
    });

    expect(stored?.model_data).toBeInstanceOf(Buffer);
    expect(stored?.model_data?.equals(payload)).toBe(true);
  });

  it('clears a payload when null is written', async () => {
    const item = await database.storage.withSession((session) =>
      session.createItem({ name: 'Blob', description: 'raw', model_data: Buffer.from('abc') }),
    );

    const cleared = await database.storage.withSession((session) => session.setItemModel(item.id, null));

    expect(cleared?.model_data).toBeNull();
  });

  it('reports false when deleting a missing row', async () => {
    const removed = await database.storage.withSession((session) => session.deleteInstance(1));

    expect(removed).toBe(false);
  });

  it('updates nothing for an unknown instance id', async () => {
    const updated = await database.storage.withSession((session) => session.updateInstance(3, instanceBody()));

    expect(updated).toBeUndefined();
  });
});
