import { pgTable, text, serial, integer, doublePrecision, uniqueIndex, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const itemCategories = pgTable("item_categories", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(),
});

export const items = pgTable(
  "items",
  {
    id: serial("id").primaryKey(),
    item_code: text("item_code").notNull(),
    item_description: text("item_description").notNull(),
    unit: text("unit").notNull(),
    rate: doublePrecision("rate").notNull(),
    category_id: integer("category_id").references(() => itemCategories.id),
  },
  (table) => ({
    itemCodeUnique: uniqueIndex("items_item_code_unique").on(table.item_code),
    categoryIdx: index("items_category_id_idx").on(table.category_id),
  }),
);

export const projects = pgTable("projects", {
  id: serial("id").primaryKey(),
  project_name: text("project_name").notNull(),
  client_name: text("client_name").notNull(),
});

export const estimations = pgTable(
  "estimations",
  {
    id: serial("id").primaryKey(),
    project_id: integer("project_id").notNull().references(() => projects.id),
    estimation_name: text("estimation_name").notNull(),
  },
  (table) => ({
    projectIdx: index("estimations_project_id_idx").on(table.project_id),
  }),
);

// Dimensions are stored exactly as submitted; quantity, rate and amount are the effective values.
export const estimationLines = pgTable(
  "estimation_lines",
  {
    id: serial("id").primaryKey(),
    estimation_id: integer("estimation_id").notNull().references(() => estimations.id),
    item_id: integer("item_id").notNull().references(() => items.id),
    sub_description: text("sub_description"),
    no_of_units: doublePrecision("no_of_units"),
    length: doublePrecision("length"),
    width: doublePrecision("width"),
    thickness: doublePrecision("thickness"),
    quantity: doublePrecision("quantity").notNull(),
    rate: doublePrecision("rate").notNull(),
    amount: doublePrecision("amount").notNull(),
  },
  (table) => ({
    estimationIdx: index("estimation_lines_estimation_id_idx").on(table.estimation_id),
  }),
);

export const insertCategorySchema = createInsertSchema(itemCategories)
  .omit({ id: true })
  .extend({
    name: z.string().trim().min(1).max(255),
  });

export const insertItemSchema = createInsertSchema(items)
  .omit({ id: true })
  .extend({
    item_code: z.string().trim().min(1).max(50),
    item_description: z.string().trim().min(1),
    unit: z.string().trim().min(1).max(20),
    rate: z.number().finite().nonnegative(),
    category_id: z.number().int().positive().nullable().optional(),
  });

export const insertProjectSchema = createInsertSchema(projects)
  .omit({ id: true })
  .extend({
    project_name: z.string().trim().min(1).max(255),
    client_name: z.string().trim().max(255),
  });

export const insertEstimationSchema = createInsertSchema(estimations).omit({ id: true });
export const insertEstimationLineSchema = createInsertSchema(estimationLines).omit({ id: true });

export type Category = typeof itemCategories.$inferSelect;
export type InsertCategory = z.infer<typeof insertCategorySchema>;
export type Item = typeof items.$inferSelect;
export type InsertItem = z.infer<typeof insertItemSchema>;
export type Project = typeof projects.$inferSelect;
export type InsertProject = z.infer<typeof insertProjectSchema>;
export type Estimation = typeof estimations.$inferSelect;
export type InsertEstimation = z.infer<typeof insertEstimationSchema>;
export type EstimationLine = typeof estimationLines.$inferSelect;
export type InsertEstimationLine = z.infer<typeof insertEstimationLineSchema>;

// ── Request bodies ──────────────────────────────────

export const estimationBodySchema = z.object({
  estimation_name: z.string().trim().min(1).max(255),
});

const measurement = z.number().finite().nonnegative().nullable().optional();

export const lineCreateSchema = z.object({
  item_id: z.number().int().positive(),
  sub_description: z.string().nullable().optional(),
  no_of_units: measurement,
  length: measurement,
  width: measurement,
  thickness: measurement,
  quantity: measurement,
  rate: measurement,
});

// item_id is fixed once a line exists
export const lineUpdateSchema = lineCreateSchema.omit({ item_id: true });

export const deleteLinesSchema = z.object({
  line_ids: z.array(z.number().int().positive()),
});

export type EstimationBody = z.infer<typeof estimationBodySchema>;
export type LineCreate = z.infer<typeof lineCreateSchema>;
export type LineUpdate = z.infer<typeof lineUpdateSchema>;

export type EstimationWithLines = Estimation & { lines: EstimationLine[] };

export interface EstimationTotal {
  estimation_id: number;
  grand_total: number;
}
