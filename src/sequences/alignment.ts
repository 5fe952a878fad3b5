import { SequenceFormatError } from "../core/errors.js";
import { collectRecords, readFastaRecords, type SequenceRecord } from "./fasta.js";

export interface Alignment {
  readonly records: readonly SequenceRecord[];
  readonly columnCount: number;
}

export function createAlignment(records: readonly SequenceRecord[]): Alignment {
  const first = records[0];
  if (!first) throw new SequenceFormatError("alignment has no sequences");
  const columnCount = first.sequence.length;
  if (columnCount === 0) throw new SequenceFormatError("alignment has no columns");

  const seen = new Set<string>();
  for (const r of records) {
    if (r.sequence.length !== columnCount) {
      throw new SequenceFormatError(
        `sequence ${r.id} has length ${r.sequence.length}, expected ${columnCount} (input is not aligned)`
      );
    }
    if (seen.has(r.id)) throw new SequenceFormatError(`duplicate sequence id in alignment: ${r.id}`);
    seen.add(r.id);
  }

  return { records: Object.freeze([...records]), columnCount };
}

export async function readAlignment(filePath: string): Promise<Alignment> {
  return createAlignment(await collectRecords(readFastaRecords(filePath)));
}
