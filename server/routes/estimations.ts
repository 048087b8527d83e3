import { Router } from "express";
import type { IStorage } from "../storage";
import { deleteLinesSchema, estimationBodySchema, lineCreateSchema, lineUpdateSchema } from "@shared/schema";
import { getEstimation, renameEstimation, deleteEstimation } from "../projectService";
import { addLine, listLines, updateLine, deleteLines, getTotal } from "../estimationService";
import { handleRouteError, parseBody, parseIdParam } from "../utils";

export function estimationsRouter(storage: IStorage): Router {
  const router = Router();

  // ─── Line-level routes (registered before /:estimationId) ───
  router.put("/lines/:lineId", async (req, res) => {
    try {
      const lineId = parseIdParam(req.params.lineId, "line id");
      const data = parseBody(lineUpdateSchema, req.body, "Invalid line data");
      res.json(await updateLine(storage, lineId, data));
    } catch (error: unknown) {
      handleRouteError(res, error, "estimations.updateLine");
    }
  });

  router.delete("/lines", async (req, res) => {
    try {
      const { line_ids } = parseBody(deleteLinesSchema, req.body, "Invalid line ids");
      const deleted = await deleteLines(storage, line_ids);
      res.json({ deleted, message: `${deleted} lines deleted successfully.` });
    } catch (error: unknown) {
      handleRouteError(res, error, "estimations.deleteLines");
    }
  });

  // ─── Estimation routes ───
  router.get("/:estimationId", async (req, res) => {
    try {
      const estimationId = parseIdParam(req.params.estimationId, "estimation id");
      res.json(await getEstimation(storage, estimationId));
    } catch (error: unknown) {
      handleRouteError(res, error, "estimations.get");
    }
  });

  router.patch("/:estimationId", async (req, res) => {
    try {
      const estimationId = parseIdParam(req.params.estimationId, "estimation id");
      const { estimation_name } = parseBody(estimationBodySchema, req.body, "Invalid estimation data");
      res.json(await renameEstimation(storage, estimationId, estimation_name));
    } catch (error: unknown) {
      handleRouteError(res, error, "estimations.rename");
    }
  });

  router.delete("/:estimationId", async (req, res) => {
    try {
      const estimationId = parseIdParam(req.params.estimationId, "estimation id");
      res.json(await deleteEstimation(storage, estimationId));
    } catch (error: unknown) {
      handleRouteError(res, error, "estimations.delete");
    }
  });

  router.post("/:estimationId/lines", async (req, res) => {
    try {
      const estimationId = parseIdParam(req.params.estimationId, "estimation id");
      const data = parseBody(lineCreateSchema, req.body, "Invalid line data");
      res.status(201).json(await addLine(storage, estimationId, data));
    } catch (error: unknown) {
      handleRouteError(res, error, "estimations.addLine");
    }
  });

  router.get("/:estimationId/lines", async (req, res) => {
    try {
      const estimationId = parseIdParam(req.params.estimationId, "estimation id");
      res.json(await listLines(storage, estimationId));
    } catch (error: unknown) {
      handleRouteError(res, error, "estimations.listLines");
    }
  });

  router.get("/:estimationId/total", async (req, res) => {
    try {
      const estimationId = parseIdParam(req.params.estimationId, "estimation id");
      res.json(await getTotal(storage, estimationId));
    } catch (error: unknown) {
      handleRouteError(res, error, "estimations.total");
    }
  });

  return router;
}
