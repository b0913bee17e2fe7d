import { mkdir, open, type FileHandle } from "fs/promises";
import { join } from "path";
import { format } from "date-fns";
import { stringify } from "csv-stringify/sync";
import type { Options } from "csv-stringify";
import type { ExtraValue, FlatRecord } from "@bolanekoll/core";
import type { RecordSink } from "./types.js";

export type CsvSinkOptions = {
  namespace: string;
  dataDir: string;
  now?: Date;
  debug?: boolean;
};

// Booleans as true/false rather than the library's 1/empty
const STRINGIFY_OPTIONS: Options = {
  cast: { boolean: (value) => String(value) },
};

function toCsvLine(values: ExtraValue[]): string {
  return stringify([values], STRINGIFY_OPTIONS);
}

/**
 * Writes one CSV file per provider run:
 * <dataDir>/<namespace>_mortgage_pricing_<timestamp>.csv
 *
 * The header comes from the first record. Later records are written in that
 * column order; missing columns stay empty and unknown ones are dropped.
 */
export class CsvSink implements RecordSink {
  readonly name = "csv";
  readonly filepath: string;

  private header: string[] | null = null;
  private handle: FileHandle | null = null;
  private droppedColumns = new Set<string>();

  constructor(private options: CsvSinkOptions) {
    const timestamp = format(options.now ?? new Date(), "yyyy-MM-dd'T'HH-mm-ss-SSS");
    this.filepath = join(options.dataDir, `${options.namespace}_mortgage_pricing_${timestamp}.csv`);
  }

  async write(record: FlatRecord): Promise<void> {
    const handle = await this.ensureOpen();

    let header = this.header;
    if (header === null) {
      header = Object.keys(record);
      this.header = header;
      await handle.appendFile(toCsvLine(header));
    }

    for (const key of Object.keys(record)) {
      if (!header.includes(key) && !this.droppedColumns.has(key)) {
        this.droppedColumns.add(key);
        console.warn(`${this.filepath}: column "${key}" is not in the header, dropping it`);
      }
    }

    await handle.appendFile(toCsvLine(header.map((key) => record[key] ?? null)));
    if (this.options.debug) {
      console.debug(`wrote ${JSON.stringify(record)} to ${this.filepath}`);
    }
  }

  async close(): Promise<void> {
    if (this.handle) {
      await this.handle.close();
      this.handle = null;
      console.log(`Export to ${this.filepath} done`);
    }
  }

  private async ensureOpen(): Promise<FileHandle> {
    if (!this.handle) {
      await mkdir(this.options.dataDir, { recursive: true });
      this.handle = await open(this.filepath, "wx");
    }
    return this.handle;
  }
}
