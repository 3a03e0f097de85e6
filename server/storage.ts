import { asc, eq, sql } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import {
  instances,
  items,
  projects,
  type Instance,
  type InstanceCreate,
  type Item,
  type NewItem,
  type Project,
  type ProjectCreate,
} from '../shared/schema.js';

// Everything a route can do inside one unit of work
export interface Session {
  getItem(id: number): Promise<Item | undefined>;
  listItems(): Promise<Item[]>;
  createItem(data: NewItem): Promise<Item>;
  updateItem(id: number, data: NewItem): Promise<Item | undefined>;
  setItemModel(id: number, modelData: Buffer | null): Promise<Item | undefined>;
  deleteItem(id: number): Promise<boolean>;

  getProject(id: number): Promise<Project | undefined>;
  listProjects(): Promise<Project[]>;
  createProject(data: ProjectCreate): Promise<Project>;
  updateProject(id: number, data: ProjectCreate): Promise<Project | undefined>;
  deleteProject(id: number): Promise<boolean>;

  getInstance(id: number): Promise<Instance | undefined>;
  listInstances(): Promise<Instance[]>;
  listProjectInstances(projectId: number): Promise<Instance[]>;
  createInstance(data: InstanceCreate): Promise<Instance>;
  updateInstance(id: number, data: InstanceCreate): Promise<Instance | undefined>;
  deleteInstance(id: number): Promise<boolean>;

  ping(): Promise<void>;
}

export class DrizzleSession<Q extends PgQueryResultHKT> implements Session {
  constructor(private readonly db: PgDatabase<Q>) {}

  async getItem(id: number): Promise<Item | undefined> {
    const found = await this.db.select().from(items).where(eq(items.id, id)).limit(1);
    return found[0];
  }

  async listItems(): Promise<Item[]> {
    return this.db.select().from(items).orderBy(asc(items.id));
  }

  async createItem(data: NewItem): Promise<Item> {
    const [created] = await this.db.insert(items).values(data).returning();
    return created;
  }

  async updateItem(id: number, data: NewItem): Promise<Item | undefined> {
    const [updated] = await this.db
      .update(items)
      .set({ name: data.name, description: data.description, model_data: data.model_data ?? null })
      .where(eq(items.id, id))
      .returning();
    return updated;
  }

  async setItemModel(id: number, modelData: Buffer | null): Promise<Item | undefined> {
    const [updated] = await this.db
      .update(items)
      .set({ model_data: modelData })
      .where(eq(items.id, id))
      .returning();
    return updated;
  }

  async deleteItem(id: number): Promise<boolean> {
    const removed = await this.db.delete(items).where(eq(items.id, id)).returning({ id: items.id });
    return removed.length > 0;
  }

  async getProject(id: number): Promise<Project | undefined> {
    const found = await this.db.select().from(projects).where(eq(projects.id, id)).limit(1);
    return found[0];
  }

  async listProjects(): Promise<Project[]> {
    return this.db.select().from(projects).orderBy(asc(projects.id));
  }

  async createProject(data: ProjectCreate): Promise<Project> {
    const [created] = await this.db.insert(projects).values(data).returning();
    return created;
  }

  async updateProject(id: number, data: ProjectCreate): Promise<Project | undefined> {
    const [updated] = await this.db
      .update(projects)
      .set({ name: data.name, description: data.description })
      .where(eq(projects.id, id))
      .returning();
    return updated;
  }

  async deleteProject(id: number): Promise<boolean> {
    const removed = await this.db.delete(projects).where(eq(projects.id, id)).returning({ id: projects.id });
    return removed.length > 0;
  }

  async getInstance(id: number): Promise<Instance | undefined> {
    const found = await this.db.select().from(instances).where(eq(instances.id, id)).limit(1);
    return found[0];
  }

  async listInstances(): Promise<Instance[]> {
    return this.db.select().from(instances).orderBy(asc(instances.id));
  }

  async listProjectInstances(projectId: number): Promise<Instance[]> {
    return this.db
      .select()
      .from(instances)
      .where(eq(instances.project_id, projectId))
      .orderBy(asc(instances.id));
  }

  async createInstance(data: InstanceCreate): Promise<Instance> {
    const [created] = await this.db.insert(instances).values(data).returning();
    return created;
  }

  async updateInstance(id: number, data: InstanceCreate): Promise<Instance | undefined> {
    // Full replacement: every column except the key is written
    const [updated] = await this.db
      .update(instances)
      .set({
        project_id: data.project_id,
        item_id: data.item_id,
        position_x: data.position_x,
        position_y: data.position_y,
        position_z: data.position_z,
        rotation_x: data.rotation_x,
        rotation_y: data.rotation_y,
        rotation_z: data.rotation_z,
        scale_x: data.scale_x,
        scale_y: data.scale_y,
        scale_z: data.scale_z,
      })
      .where(eq(instances.id, id))
      .returning();
    return updated;
  }

  async deleteInstance(id: number): Promise<boolean> {
    const removed = await this.db.delete(instances).where(eq(instances.id, id)).returning({ id: instances.id });
    return removed.length > 0;
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }
}
