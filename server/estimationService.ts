import type { IStorage } from "./storage";
import type { EstimationLine, EstimationTotal, LineCreate, LineUpdate } from "@shared/schema";
import { NotFoundError, ValidationError } from "./errors";
import { calculateLineFigures, type LineFigures, type LineInputs } from "./lineCalculator";
import { requireEstimation } from "./projectService";

function finiteFigures(inputs: LineInputs, fallbackRate: number): LineFigures {
  const figures = calculateLineFigures(inputs, fallbackRate);
  if (!Number.isFinite(figures.quantity) || !Number.isFinite(figures.amount)) {
    throw new ValidationError("Line quantity or amount is out of range");
  }
  return figures;
}

/**
 * Adds a line to an estimation. The rate falls back to the item's catalog
 * rate at the time of insertion and is not re-synced afterwards.
 */
export async function addLine(storage: IStorage, estimationId: number, input: LineCreate): Promise<EstimationLine> {
  await requireEstimation(storage, estimationId);
  const item = await storage.getItem(input.item_id);
  if (!item) throw new NotFoundError(`Item ${input.item_id} not found`);

  const figures = finiteFigures(input, item.rate);

  return storage.createLine({
    estimation_id: estimationId,
    item_id: item.id,
    sub_description: input.sub_description ?? null,
    no_of_units: input.no_of_units ?? null,
    length: input.length ?? null,
    width: input.width ?? null,
    thickness: input.thickness ?? null,
    ...figures,
  });
}

export async function listLines(storage: IStorage, estimationId: number): Promise<EstimationLine[]> {
  await requireEstimation(storage, estimationId);
  return storage.getLines(estimationId);
}

/**
 * Replaces a line's description and measurements. The stored rate is kept
 * unless the update carries one.
 */
export async function updateLine(storage: IStorage, lineId: number, input: LineUpdate): Promise<EstimationLine> {
  const line = await storage.getLine(lineId);
  if (!line) throw new NotFoundError(`Line ${lineId} not found`);

  const figures = finiteFigures(input, line.rate);
  const updated = await storage.updateLine(lineId, {
    sub_description: input.sub_description ?? null,
    no_of_units: input.no_of_units ?? null,
    length: input.length ?? null,
    width: input.width ?? null,
    thickness: input.thickness ?? null,
    ...figures,
  });
  if (!updated) throw new NotFoundError(`Line ${lineId} not found`);
  return updated;
}

export function deleteLines(storage: IStorage, lineIds: number[]): Promise<number> {
  return storage.deleteLines(lineIds);
}

export async function getTotal(storage: IStorage, estimationId: number): Promise<EstimationTotal> {
  await requireEstimation(storage, estimationId);
  const grandTotal = await storage.getEstimationTotal(estimationId);
  return { estimation_id: estimationId, grand_total: grandTotal };
}
