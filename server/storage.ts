import type { AppDatabase } from "./db";
import {
  itemCategories, items, projects, estimations, estimationLines,
  type Category, type InsertCategory,
  type Item, type InsertItem,
  type Project, type InsertProject,
  type Estimation, type InsertEstimation,
  type EstimationLine, type InsertEstimationLine,
} from "@shared/schema";
import { eq, asc, inArray, sql, count } from "drizzle-orm";
import { ConflictError, isUniqueViolation } from "./errors";

export interface IStorage {
  createCategory(data: InsertCategory): Promise<Category>;
  getCategories(): Promise<Category[]>;
  getCategory(id: number): Promise<Category | undefined>;
  getCategoryByName(name: string): Promise<Category | undefined>;

  createItem(data: InsertItem): Promise<Item>;
  getItems(): Promise<Item[]>;
  getItem(id: number): Promise<Item | undefined>;
  getItemByCode(itemCode: string): Promise<Item | undefined>;

  createProject(data: InsertProject): Promise<Project>;
  getProjects(): Promise<Project[]>;
  getProject(id: number): Promise<Project | undefined>;
  deleteProject(id: number): Promise<Project | undefined>;

  createEstimation(data: InsertEstimation): Promise<Estimation>;
  getEstimations(projectId: number): Promise<Estimation[]>;
  countEstimations(projectId: number): Promise<number>;
  getEstimation(id: number): Promise<Estimation | undefined>;
  updateEstimationName(id: number, estimationName: string): Promise<Estimation | undefined>;
  deleteEstimation(id: number): Promise<Estimation | undefined>;

  createLine(data: InsertEstimationLine): Promise<EstimationLine>;
  getLines(estimationId: number): Promise<EstimationLine[]>;
  getLine(id: number): Promise<EstimationLine | undefined>;
  updateLine(id: number, updates: Partial<Omit<InsertEstimationLine, "estimation_id" | "item_id">>): Promise<EstimationLine | undefined>;
  deleteLines(ids: number[]): Promise<number>;
  getEstimationTotal(estimationId: number): Promise<number>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: AppDatabase) {}

  async createCategory(data: InsertCategory): Promise<Category> {
    try {
      const [category] = await this.db.insert(itemCategories).values(data).returning();
      return category;
    } catch (error) {
      if (isUniqueViolation(error)) throw new ConflictError(`Category "${data.name}" already exists`);
      throw error;
    }
  }

  async getCategories(): Promise<Category[]> {
    return this.db.select().from(itemCategories).orderBy(asc(itemCategories.id));
  }

  async getCategory(id: number): Promise<Category | undefined> {
    const [category] = await this.db.select().from(itemCategories).where(eq(itemCategories.id, id));
    return category;
  }

  async getCategoryByName(name: string): Promise<Category | undefined> {
    const [category] = await this.db.select().from(itemCategories).where(eq(itemCategories.name, name));
    return category;
  }

  async createItem(data: InsertItem): Promise<Item> {
    try {
      const [item] = await this.db.insert(items).values(data).returning();
      return item;
    } catch (error) {
      if (isUniqueViolation(error)) throw new ConflictError(`Item code "${data.item_code}" already exists`);
      throw error;
    }
  }

  async getItems(): Promise<Item[]> {
    return this.db.select().from(items).orderBy(asc(items.id));
  }

  async getItem(id: number): Promise<Item | undefined> {
    const [item] = await this.db.select().from(items).where(eq(items.id, id));
    return item;
  }

  async getItemByCode(itemCode: string): Promise<Item | undefined> {
    const [item] = await this.db.select().from(items).where(eq(items.item_code, itemCode));
    return item;
  }

  async createProject(data: InsertProject): Promise<Project> {
    const [project] = await this.db.insert(projects).values(data).returning();
    return project;
  }

  async getProjects(): Promise<Project[]> {
    return this.db.select().from(projects).orderBy(asc(projects.id));
  }

  async getProject(id: number): Promise<Project | undefined> {
    const [project] = await this.db.select().from(projects).where(eq(projects.id, id));
    return project;
  }

  async deleteProject(id: number): Promise<Project | undefined> {
    const [project] = await this.db.delete(projects).where(eq(projects.id, id)).returning();
    return project;
  }

  async createEstimation(data: InsertEstimation): Promise<Estimation> {
    const [estimation] = await this.db.insert(estimations).values(data).returning();
    return estimation;
  }

  async getEstimations(projectId: number): Promise<Estimation[]> {
    return this.db
      .select()
      .from(estimations)
      .where(eq(estimations.project_id, projectId))
      .orderBy(asc(estimations.id));
  }

  async countEstimations(projectId: number): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(estimations)
      .where(eq(estimations.project_id, projectId));
    return row?.value ?? 0;
  }

  async getEstimation(id: number): Promise<Estimation | undefined> {
    const [estimation] = await this.db.select().from(estimations).where(eq(estimations.id, id));
    return estimation;
  }

  async updateEstimationName(id: number, estimationName: string): Promise<Estimation | undefined> {
    const [estimation] = await this.db
      .update(estimations)
      .set({ estimation_name: estimationName })
      .where(eq(estimations.id, id))
      .returning();
    return estimation;
  }

  async deleteEstimation(id: number): Promise<Estimation | undefined> {
    return this.db.transaction(async (tx) => {
      await tx.delete(estimationLines).where(eq(estimationLines.estimation_id, id));
      const [estimation] = await tx.delete(estimations).where(eq(estimations.id, id)).returning();
      return estimation;
    });
  }

  async createLine(data: InsertEstimationLine): Promise<EstimationLine> {
    const [line] = await this.db.insert(estimationLines).values(data).returning();
    return line;
  }

  async getLines(estimationId: number): Promise<EstimationLine[]> {
    return this.db
      .select()
      .from(estimationLines)
      .where(eq(estimationLines.estimation_id, estimationId))
      .orderBy(asc(estimationLines.id));
  }

  async getLine(id: number): Promise<EstimationLine | undefined> {
    const [line] = await this.db.select().from(estimationLines).where(eq(estimationLines.id, id));
    return line;
  }

  async updateLine(
    id: number,
    updates: Partial<Omit<InsertEstimationLine, "estimation_id" | "item_id">>,
  ): Promise<EstimationLine | undefined> {
    const [line] = await this.db
      .update(estimationLines)
      .set(updates)
      .where(eq(estimationLines.id, id))
      .returning();
    return line;
  }

  async deleteLines(ids: number[]): Promise<number> {
    if (ids.length === 0) return 0;
    const deleted = await this.db
      .delete(estimationLines)
      .where(inArray(estimationLines.id, ids))
      .returning({ id: estimationLines.id });
    return deleted.length;
  }

  async getEstimationTotal(estimationId: number): Promise<number> {
    const [row] = await this.db
      .select({ total: sql<number>`coalesce(sum(${estimationLines.amount}), 0)`.mapWith(Number) })
      .from(estimationLines)
      .where(eq(estimationLines.estimation_id, estimationId));
    return row?.total ?? 0;
  }
}
