import type { SequenceRecord } from "./fasta.js";

export type RecordPredicate = (record: SequenceRecord) => boolean;

export type Selection = { found: true; record: SequenceRecord } | { found: false };

/** Case-sensitive substring match on the record description (e.g. "18S"). */
export function labelContains(tag: string): RecordPredicate {
  return (record) => record.description.includes(tag);
}

/**
 * Longest matching record in one pass. Ties go to the record seen first.
 */
export async function selectLongest(
  records: AsyncIterable<SequenceRecord> | Iterable<SequenceRecord>,
  predicate: RecordPredicate
): Promise<Selection> {
  let best: SequenceRecord | null = null;
  for await (const record of records) {
    if (!predicate(record)) continue;
    if (best === null || record.sequence.length > best.sequence.length) best = record;
  }
  return best === null ? { found: false } : { found: true, record: best };
}
