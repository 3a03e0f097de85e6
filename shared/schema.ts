import { pgTable, text, serial, integer, doublePrecision, customType, index } from "drizzle-orm/pg-core";
import { createInsertSchema, createSelectSchema } from "drizzle-zod";
import { z } from "zod";

// Raw model payloads. node-postgres hands back a Buffer, PGlite a Uint8Array.
const bytea = customType<{ data: Buffer; driverData: Buffer | Uint8Array }>({
  dataType() {
    return "bytea";
  },
  toDriver(value) {
    return value;
  },
  fromDriver(value) {
    return Buffer.from(value);
  },
});

export const items = pgTable("items", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  description: text("description").notNull(),
  model_data: bytea("model_data"),
}, (table) => ({
  nameIdx: index("items_name_idx").on(table.name),
}));

export const projects = pgTable("projects", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  description: text("description").notNull(),
});

// project_id and item_id are checked by the routes, not by constraints
export const instances = pgTable("instances", {
  id: serial("id").primaryKey(),
  project_id: integer("project_id").notNull(),
  item_id: integer("item_id").notNull(),
  position_x: doublePrecision("position_x").notNull(),
  position_y: doublePrecision("position_y").notNull(),
  position_z: doublePrecision("position_z").notNull(),
  rotation_x: doublePrecision("rotation_x").notNull(),
  rotation_y: doublePrecision("rotation_y").notNull(),
  rotation_z: doublePrecision("rotation_z").notNull(),
  scale_x: doublePrecision("scale_x").notNull(),
  scale_y: doublePrecision("scale_y").notNull(),
  scale_z: doublePrecision("scale_z").notNull(),
}, (table) => ({
  projectIdx: index("instances_project_id_idx").on(table.project_id),
}));

// Keys are Postgres integers; anything else would fail inside the query
export const integerKeySchema = z.number().int().min(-2147483648).max(2147483647);

export const instanceCreateSchema = createInsertSchema(instances)
  .omit({ id: true })
  .extend({
    project_id: integerKeySchema,
    item_id: integerKeySchema,
  });
export const instanceReadSchema = createSelectSchema(instances);

export const projectCreateSchema = createInsertSchema(projects).omit({ id: true });
export const projectReadSchema = createSelectSchema(projects);

export const itemCreateSchema = createInsertSchema(items)
  .omit({ id: true, model_data: true })
  .extend({
    model_data: z.string().base64().nullish(),
  });
export const itemReadSchema = createSelectSchema(items)
  .omit({ model_data: true })
  .extend({
    has_model_data: z.boolean(),
  });

export type InstanceCreate = z.infer<typeof instanceCreateSchema>;
export type InstanceRead = z.infer<typeof instanceReadSchema>;
export type Instance = typeof instances.$inferSelect;

export type ProjectCreate = z.infer<typeof projectCreateSchema>;
export type ProjectRead = z.infer<typeof projectReadSchema>;
export type Project = typeof projects.$inferSelect;

export type ItemCreate = z.infer<typeof itemCreateSchema>;
export type ItemRead = z.infer<typeof itemReadSchema>;
export type Item = typeof items.$inferSelect;
export type NewItem = typeof items.$inferInsert;
