import type { FlatRecord } from "@bolanekoll/core";

/**
 * Destination for scraped rows. One sink instance per provider run.
 */
export interface RecordSink {
  readonly name: string;
  write(record: FlatRecord): Promise<void>;
  close(): Promise<void>;
}
