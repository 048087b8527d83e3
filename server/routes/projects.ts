import { Router } from "express";
import type { IStorage } from "../storage";
import { estimationBodySchema, insertProjectSchema } from "@shared/schema";
import {
  createProject, listProjects, deleteProject,
  createEstimation, listEstimations,
} from "../projectService";
import { handleRouteError, parseBody, parseIdParam } from "../utils";

export function projectsRouter(storage: IStorage): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    try {
      const data = parseBody(insertProjectSchema, req.body, "Invalid project data");
      res.status(201).json(await createProject(storage, data));
    } catch (error: unknown) {
      handleRouteError(res, error, "projects.create");
    }
  });

  router.get("/", async (_req, res) => {
    try {
      res.json(await listProjects(storage));
    } catch (error: unknown) {
      handleRouteError(res, error, "projects.list");
    }
  });

  router.delete("/:projectId", async (req, res) => {
    try {
      const projectId = parseIdParam(req.params.projectId, "project id");
      res.json(await deleteProject(storage, projectId));
    } catch (error: unknown) {
      handleRouteError(res, error, "projects.delete");
    }
  });

  router.post("/:projectId/estimations", async (req, res) => {
    try {
      const projectId = parseIdParam(req.params.projectId, "project id");
      const { estimation_name } = parseBody(estimationBodySchema, req.body, "Invalid estimation data");
      res.status(201).json(await createEstimation(storage, projectId, estimation_name));
    } catch (error: unknown) {
      handleRouteError(res, error, "projects.createEstimation");
    }
  });

  router.get("/:projectId/estimations", async (req, res) => {
    try {
      const projectId = parseIdParam(req.params.projectId, "project id");
      res.json(await listEstimations(storage, projectId));
    } catch (error: unknown) {
      handleRouteError(res, error, "projects.listEstimations");
    }
  });

  return router;
}
