import { createReadStream, promises as fs } from "fs";
import readline from "readline";
import { SequenceFormatError } from "../core/errors.js";

export interface SequenceRecord {
  readonly id: string;
  // Full header line without the leading '>'; includes the id.
  readonly description: string;
  readonly sequence: string;
}

const LINE_WIDTH = 60;

function headerRecord(header: string, sequence: string): SequenceRecord {
  const description = header.trim();
  const id = description.split(/\s+/, 1)[0] ?? "";
  return { id, description, sequence };
}

export async function* parseFastaLines(
  lines: AsyncIterable<string> | Iterable<string>,
  source = "input"
): AsyncGenerator<SequenceRecord> {
  let header: string | null = null;
  let parts: string[] = [];
  let lineNo = 0;

  for await (const rawLine of lines) {
    lineNo++;
    const line = rawLine.trimEnd();
    if (line.startsWith(">")) {
      if (header !== null) yield headerRecord(header, parts.join(""));
      header = line.slice(1);
      parts = [];
      continue;
    }
    if (header === null) {
      if (line.trim().length === 0) continue;
      throw new SequenceFormatError(`${source}:${lineNo}: sequence data before the first FASTA header`);
    }
    parts.push(line.replace(/\s+/g, ""));
  }

  if (header !== null) yield headerRecord(header, parts.join(""));
}

/** Streams records from a FASTA file without loading it whole. */
export async function* readFastaRecords(filePath: string): AsyncGenerator<SequenceRecord> {
  const input = createReadStream(filePath, { encoding: "utf8" });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    yield* parseFastaLines(rl, filePath);
  } finally {
    rl.close();
    input.destroy();
  }
}

export function parseFasta(text: string): AsyncGenerator<SequenceRecord> {
  return parseFastaLines(text.split(/\r?\n/));
}

export async function collectRecords(records: AsyncIterable<SequenceRecord>): Promise<SequenceRecord[]> {
  const out: SequenceRecord[] = [];
  for await (const r of records) out.push(r);
  return out;
}

export function formatFasta(records: Iterable<SequenceRecord>): string {
  let out = "";
  for (const r of records) {
    out += `>${r.description || r.id}\n`;
    for (let i = 0; i < r.sequence.length; i += LINE_WIDTH) {
      out += r.sequence.slice(i, i + LINE_WIDTH) + "\n";
    }
  }
  return out;
}

export async function writeFasta(filePath: string, records: Iterable<SequenceRecord>): Promise<void> {
  await fs.writeFile(filePath, formatFasta(records), "utf8");
}
