import type { Express } from "express";
import type { IStorage } from "../storage";
import { itemsRouter } from "./items";
import { projectsRouter } from "./projects";
import { estimationsRouter } from "./estimations";

export function registerRoutes(app: Express, storage: IStorage): Express {
  // ─── Health ───────────────────────────
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  // ─── Domain routers ────────────────────
  app.use("/items", itemsRouter(storage));
  app.use("/projects", projectsRouter(storage));
  app.use("/estimations", estimationsRouter(storage));

  return app;
}
