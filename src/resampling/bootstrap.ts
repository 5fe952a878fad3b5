import type { Alignment } from "../sequences/alignment.js";
import type { RandomSource } from "./random.js";

export interface BootstrapReplicate {
  alignment: Alignment;
  // Source column behind each replicate column, in draw order.
  indices: number[];
}

export function drawColumnIndices(columnCount: number, random: RandomSource): number[] {
  const indices = new Array<number>(columnCount);
  for (let i = 0; i < columnCount; i++) indices[i] = random.nextInt(columnCount);
  return indices;
}

/**
 * Rebuilds every row from the same column list, so columns stay aligned across
 * rows. A column may appear any number of times.
 */
export function applyColumnIndices(alignment: Alignment, indices: readonly number[]): Alignment {
  for (const idx of indices) {
    if (!Number.isInteger(idx) || idx < 0 || idx >= alignment.columnCount) {
      throw new RangeError(`column index ${idx} outside [0, ${alignment.columnCount - 1}]`);
    }
  }

  const records = alignment.records.map((r) => {
    let sequence = "";
    for (const idx of indices) sequence += r.sequence.charAt(idx);
    return { id: r.id, description: r.description, sequence };
  });

  return { records: Object.freeze(records), columnCount: indices.length };
}

export function bootstrapAlignment(alignment: Alignment, random: RandomSource): BootstrapReplicate {
  const indices = drawColumnIndices(alignment.columnCount, random);
  return { alignment: applyColumnIndices(alignment, indices), indices };
}
