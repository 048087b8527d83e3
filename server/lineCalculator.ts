export type DimensionField = "no_of_units" | "length" | "width" | "thickness";

/**
 * Factor used for each dimension a line leaves out. A missing factor never
 * zeroes the product.
 */
export const DIMENSION_DEFAULTS: Readonly<Record<DimensionField, number>> = {
  no_of_units: 1,
  length: 1,
  width: 1,
  thickness: 1,
};

const DIMENSION_FIELDS: readonly DimensionField[] = ["no_of_units", "length", "width", "thickness"];

export type LineDimensions = Partial<Record<DimensionField, number | null>>;

export interface LineInputs extends LineDimensions {
  quantity?: number | null;
  rate?: number | null;
}

export interface LineFigures {
  quantity: number;
  rate: number;
  amount: number;
}

/**
 * Quantity from dimensions: no_of_units × length × width × thickness,
 * with absent factors taken from DIMENSION_DEFAULTS.
 */
export function calculateQuantity(dimensions: LineDimensions): number {
  let qty = 1;
  for (const field of DIMENSION_FIELDS) {
    qty *= dimensions[field] ?? DIMENSION_DEFAULTS[field];
  }
  return qty;
}

/** An explicit quantity always wins over the dimensions. */
export function effectiveQuantity(inputs: LineInputs): number {
  return inputs.quantity ?? calculateQuantity(inputs);
}

/**
 * Resolves the figures stored on a line. `fallbackRate` is the item's rate
 * on insert, or the line's current rate on update.
 */
export function calculateLineFigures(inputs: LineInputs, fallbackRate: number): LineFigures {
  const quantity = effectiveQuantity(inputs);
  const rate = inputs.rate ?? fallbackRate;
  return { quantity, rate, amount: quantity * rate };
}
