import { Router } from "express";
import type { IStorage } from "../storage";
import { insertCategorySchema, insertItemSchema } from "@shared/schema";
import { createCategory, listCategories, createItem, listItems, getItem } from "../catalogService";
import { handleRouteError, parseBody, parseIdParam } from "../utils";

export function itemsRouter(storage: IStorage): Router {
  const router = Router();

  router.post("/categories", async (req, res) => {
    try {
      const data = parseBody(insertCategorySchema, req.body, "Invalid category data");
      const category = await createCategory(storage, data);
      res.status(201).json(category);
    } catch (error: unknown) {
      handleRouteError(res, error, "items.createCategory");
    }
  });

  router.get("/categories", async (_req, res) => {
    try {
      res.json(await listCategories(storage));
    } catch (error: unknown) {
      handleRouteError(res, error, "items.listCategories");
    }
  });

  router.post("/", async (req, res) => {
    try {
      const data = parseBody(insertItemSchema, req.body, "Invalid item data");
      const item = await createItem(storage, data);
      res.status(201).json(item);
    } catch (error: unknown) {
      handleRouteError(res, error, "items.create");
    }
  });

  router.get("/", async (_req, res) => {
    try {
      res.json(await listItems(storage));
    } catch (error: unknown) {
      handleRouteError(res, error, "items.list");
    }
  });

  router.get("/:itemId", async (req, res) => {
    try {
      const itemId = parseIdParam(req.params.itemId, "item id");
      res.json(await getItem(storage, itemId));
    } catch (error: unknown) {
      handleRouteError(res, error, "items.get");
    }
  });

  return router;
}
