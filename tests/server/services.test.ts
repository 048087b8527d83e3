import { describe, it, expect, beforeAll, beforeEach, afterAll } from "vitest";
import { openDatabase, type DatabaseHandle } from "../../server/db";
import { resetDatabase } from "../fixtures/database";
import { DatabaseStorage } from "../../server/storage";
import { ConflictError, NotFoundError, ValidationError } from "../../server/errors";
import { createCategory, listCategories, createItem, listItems, getItem } from "../../server/catalogService";
import {
  createProject, listProjects, deleteProject,
  createEstimation, listEstimations, getEstimation, renameEstimation, deleteEstimation,
} from "../../server/projectService";
import { addLine, listLines, updateLine, deleteLines, getTotal } from "../../server/estimationService";
import { estimationLines } from "@shared/schema";

let database: DatabaseHandle;
let storage: DatabaseStorage;

beforeAll(async () => {
  database = await openDatabase();
  storage = new DatabaseStorage(database.db);
});

beforeEach(async () => {
  await resetDatabase(database.db);
});

afterAll(async () => {
  await database.close();
});

const slab = { item_code: "ITM-001", item_description: "Reinforced concrete slab", unit: "m3", rate: 120.5 };

async function estimationWithItem() {
  const item = await createItem(storage, slab);
  const project = await createProject(storage, { project_name: "Riverside Clinic", client_name: "Test Client" });
  const estimation = await createEstimation(storage, project.id, "Phase 1");
  return { item, project, estimation };
}

// ─────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────
describe("catalog", () => {
  it("lists categories in creation order", async () => {
    await createCategory(storage, { name: "Site Preparation" });
    await createCategory(storage, { name: "Concrete Works" });

    const names = (await listCategories(storage)).map((c) => c.name);

    expect(names).toEqual(["Site Preparation", "Concrete Works"]);
  });

  it("rejects a duplicate category name with ConflictError", async () => {
    await createCategory(storage, { name: "Masonry" });

    await expect(createCategory(storage, { name: "Masonry" })).rejects.toBeInstanceOf(ConflictError);
  });

  it("keeps exactly one item per code and rejects the duplicate", async () => {
    await createItem(storage, slab);

    await expect(createItem(storage, { ...slab, rate: 99 })).rejects.toBeInstanceOf(ConflictError);

    const matching = (await listItems(storage)).filter((i) => i.item_code === "ITM-001");
    expect(matching).toHaveLength(1);
    expect(matching[0].rate).toBe(120.5);
  });

  it("rejects a negative rate with ValidationError", async () => {
    await expect(createItem(storage, { ...slab, rate: -1 })).rejects.toBeInstanceOf(ValidationError);
    expect(await listItems(storage)).toEqual([]);
  });

  it("rejects an unknown category with NotFoundError", async () => {
    await expect(createItem(storage, { ...slab, category_id: 7 })).rejects.toThrow("Category 7 not found");
  });

  it("links an item to an existing category", async () => {
    const category = await createCategory(storage, { name: "Concrete Works" });

    const item = await createItem(storage, { ...slab, category_id: category.id });

    expect(item.category_id).toBe(category.id);
    expect(await getItem(storage, item.id)).toEqual(item);
  });

  it("raises NotFoundError for an unknown item id", async () => {
    await expect(getItem(storage, 5)).rejects.toBeInstanceOf(NotFoundError);
  });
});

// ─────────────────────────────────────────────────
// Projects & estimations
// ─────────────────────────────────────────────────
describe("projects and estimations", () => {
  it("creates and lists projects", async () => {
    const project = await createProject(storage, { project_name: "Depot", client_name: "Test Client" });

    expect(await listProjects(storage)).toEqual([project]);
  });

  it("refuses estimations for an unknown project", async () => {
    await expect(createEstimation(storage, 3, "Phase 1")).rejects.toThrow("Project 3 not found");
    await expect(listEstimations(storage, 3)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists only the project's estimations", async () => {
    const { project, estimation } = await estimationWithItem();
    const other = await createProject(storage, { project_name: "Other", client_name: "Someone" });
    await createEstimation(storage, other.id, "Unrelated");

    expect(await listEstimations(storage, project.id)).toEqual([estimation]);
  });

  it("rejects deleting a project that still owns estimations", async () => {
    const { project } = await estimationWithItem();

    await expect(deleteProject(storage, project.id)).rejects.toBeInstanceOf(ConflictError);
    expect(await listProjects(storage)).toHaveLength(1);
  });

  it("deletes a project without estimations", async () => {
    const project = await createProject(storage, { project_name: "Empty", client_name: "Nobody" });

    expect(await deleteProject(storage, project.id)).toEqual(project);
    expect(await listProjects(storage)).toEqual([]);
  });

  it("returns an estimation with its lines", async () => {
    const { item, estimation } = await estimationWithItem();
    const line = await addLine(storage, estimation.id, { item_id: item.id, quantity: 2 });

    expect(await getEstimation(storage, estimation.id)).toEqual({ ...estimation, lines: [line] });
  });

  it("renames an estimation", async () => {
    const { estimation } = await estimationWithItem();

    const renamed = await renameEstimation(storage, estimation.id, "Phase 1 (revised)");

    expect(renamed).toEqual({ ...estimation, estimation_name: "Phase 1 (revised)" });
  });

  it("deletes an estimation and its lines, after which the project can go", async () => {
    const { item, project, estimation } = await estimationWithItem();
    await addLine(storage, estimation.id, { item_id: item.id, quantity: 1 });

    await deleteEstimation(storage, estimation.id);

    await expect(listLines(storage, estimation.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(await deleteProject(storage, project.id)).toEqual(project);
  });
});

// ─────────────────────────────────────────────────
// Lines
// ─────────────────────────────────────────────────
describe("estimation lines", () => {
  it("computes quantity from dimensions and copies the item rate", async () => {
    const { item, estimation } = await estimationWithItem();

    const line = await addLine(storage, estimation.id, {
      item_id: item.id,
      no_of_units: 2,
      length: 3.5,
      width: 2.0,
      thickness: 0.5,
    });

    expect(line).toEqual({
      id: 1,
      estimation_id: estimation.id,
      item_id: item.id,
      sub_description: null,
      no_of_units: 2,
      length: 3.5,
      width: 2,
      thickness: 0.5,
      quantity: 7,
      rate: 120.5,
      amount: 843.5,
    });
  });

  it("totals two identical lines at 1687", async () => {
    const { item, estimation } = await estimationWithItem();
    const dims = { item_id: item.id, no_of_units: 2, length: 3.5, width: 2.0, thickness: 0.5 };
    await addLine(storage, estimation.id, dims);
    await addLine(storage, estimation.id, dims);

    expect(await getTotal(storage, estimation.id)).toEqual({ estimation_id: estimation.id, grand_total: 1687 });
  });

  it("uses the explicit quantity and rate regardless of dimensions", async () => {
    const { item, estimation } = await estimationWithItem();

    const line = await addLine(storage, estimation.id, {
      item_id: item.id,
      quantity: 3,
      rate: 10,
      length: 50,
      width: 50,
    });

    expect(line.quantity).toBe(3);
    expect(line.rate).toBe(10);
    expect(line.amount).toBe(30);
    expect(line.length).toBe(50);
  });

  it("stores omitted dimensions as null and uses 1 in their place", async () => {
    const { item, estimation } = await estimationWithItem();

    const line = await addLine(storage, estimation.id, { item_id: item.id, length: 4, sub_description: "Ground floor" });

    expect(line.no_of_units).toBeNull();
    expect(line.width).toBeNull();
    expect(line.thickness).toBeNull();
    expect(line.quantity).toBe(4);
    expect(line.amount).toBe(482);
    expect(line.sub_description).toBe("Ground floor");
  });

  it("persists nothing when the item does not exist", async () => {
    const { estimation } = await estimationWithItem();

    await expect(addLine(storage, estimation.id, { item_id: 99, quantity: 1 })).rejects.toThrow("Item 99 not found");
    expect(await listLines(storage, estimation.id)).toEqual([]);
  });

  it("raises NotFoundError for an unknown estimation", async () => {
    const { item } = await estimationWithItem();

    await expect(addLine(storage, 42, { item_id: item.id })).rejects.toThrow("Estimation 42 not found");
    expect(await database.db.select().from(estimationLines)).toEqual([]);
    await expect(listLines(storage, 42)).rejects.toBeInstanceOf(NotFoundError);
    await expect(getTotal(storage, 42)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("returns a zero total for an estimation without lines", async () => {
    const { estimation } = await estimationWithItem();

    expect((await getTotal(storage, estimation.id)).grand_total).toBe(0);
  });

  it("recomputes quantity and amount on update while keeping the rate", async () => {
    const { item, estimation } = await estimationWithItem();
    const line = await addLine(storage, estimation.id, { item_id: item.id, quantity: 1, rate: 10 });

    const updated = await updateLine(storage, line.id, { no_of_units: 3, length: 2 });

    expect(updated).toMatchObject({ quantity: 6, rate: 10, amount: 60, no_of_units: 3, length: 2 });
  });

  it("applies a new rate on update when one is given", async () => {
    const { item, estimation } = await estimationWithItem();
    const line = await addLine(storage, estimation.id, { item_id: item.id, quantity: 2 });

    const updated = await updateLine(storage, line.id, { quantity: 2, rate: 50 });

    expect(updated.amount).toBe(100);
    expect(await getTotal(storage, estimation.id)).toEqual({ estimation_id: estimation.id, grand_total: 100 });
  });

  it("rejects figures that overflow with ValidationError", async () => {
    const { item, estimation } = await estimationWithItem();

    await expect(
      addLine(storage, estimation.id, { item_id: item.id, quantity: 1e200, rate: 1e200 }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await listLines(storage, estimation.id)).toEqual([]);
  });

  it("raises NotFoundError when updating an unknown line", async () => {
    await expect(updateLine(storage, 8, { quantity: 1 })).rejects.toThrow("Line 8 not found");
  });

  it("deletes lines by id", async () => {
    const { item, estimation } = await estimationWithItem();
    const a = await addLine(storage, estimation.id, { item_id: item.id, quantity: 1 });
    await addLine(storage, estimation.id, { item_id: item.id, quantity: 2 });

    expect(await deleteLines(storage, [a.id])).toBe(1);
    expect(await getTotal(storage, estimation.id)).toEqual({ estimation_id: estimation.id, grand_total: 241 });
  });
});
