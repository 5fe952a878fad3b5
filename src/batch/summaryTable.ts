import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";

export const SUMMARY_HEADER = ["SampleID", "Longest18S_Length"] as const;

export function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function csvRow(fields: ReadonlyArray<string | number>): string {
  return fields.map(csvField).join(",") + "\r\n";
}

/**
 * Two-column summary table, written row by row as outcomes arrive. Opening
 * truncates any previous table at the same path.
 */
export class SummaryTableWriter {
  private rows = 0;

  private constructor(
    readonly filePath: string,
    private readonly handle: FileHandle
  ) {}

  static async create(filePath: string, header: readonly string[] = SUMMARY_HEADER): Promise<SummaryTableWriter> {
    const handle = await fs.open(filePath, "w");
    const table = new SummaryTableWriter(filePath, handle);
    await handle.write(csvRow(header));
    return table;
  }

  get rowCount(): number {
    return this.rows;
  }

  async append(itemId: string, length: number): Promise<void> {
    if (!Number.isInteger(length) || length < 0) throw new RangeError(`length must be a non-negative integer: ${length}`);
    await this.handle.write(csvRow([itemId, length]));
    this.rows++;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
