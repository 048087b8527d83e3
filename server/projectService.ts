import type { IStorage } from "./storage";
import type { Estimation, EstimationWithLines, InsertProject, Project } from "@shared/schema";
import { ConflictError, NotFoundError } from "./errors";

export function createProject(storage: IStorage, data: InsertProject): Promise<Project> {
  return storage.createProject(data);
}

export function listProjects(storage: IStorage): Promise<Project[]> {
  return storage.getProjects();
}

async function requireProject(storage: IStorage, projectId: number): Promise<Project> {
  const project = await storage.getProject(projectId);
  if (!project) throw new NotFoundError(`Project ${projectId} not found`);
  return project;
}

/** Projects that still own estimations cannot be deleted. */
export async function deleteProject(storage: IStorage, projectId: number): Promise<Project> {
  const project = await requireProject(storage, projectId);
  const owned = await storage.countEstimations(projectId);
  if (owned > 0) {
    throw new ConflictError(`Project ${projectId} still has ${owned} estimation(s)`);
  }
  await storage.deleteProject(projectId);
  return project;
}

export async function createEstimation(storage: IStorage, projectId: number, estimationName: string): Promise<Estimation> {
  await requireProject(storage, projectId);
  return storage.createEstimation({ project_id: projectId, estimation_name: estimationName });
}

export async function listEstimations(storage: IStorage, projectId: number): Promise<Estimation[]> {
  await requireProject(storage, projectId);
  return storage.getEstimations(projectId);
}

export async function requireEstimation(storage: IStorage, estimationId: number): Promise<Estimation> {
  const estimation = await storage.getEstimation(estimationId);
  if (!estimation) throw new NotFoundError(`Estimation ${estimationId} not found`);
  return estimation;
}

export async function getEstimation(storage: IStorage, estimationId: number): Promise<EstimationWithLines> {
  const estimation = await requireEstimation(storage, estimationId);
  const lines = await storage.getLines(estimationId);
  return { ...estimation, lines };
}

export async function renameEstimation(storage: IStorage, estimationId: number, estimationName: string): Promise<Estimation> {
  await requireEstimation(storage, estimationId);
  const updated = await storage.updateEstimationName(estimationId, estimationName);
  if (!updated) throw new NotFoundError(`Estimation ${estimationId} not found`);
  return updated;
}

/** Removes the estimation together with all of its lines. */
export async function deleteEstimation(storage: IStorage, estimationId: number): Promise<Estimation> {
  await requireEstimation(storage, estimationId);
  const deleted = await storage.deleteEstimation(estimationId);
  if (!deleted) throw new NotFoundError(`Estimation ${estimationId} not found`);
  return deleted;
}
