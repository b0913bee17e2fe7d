export type { RecordSink } from "./types.js";
export { CsvSink, type CsvSinkOptions } from "./csv-sink.js";

import { SinkKind } from "@bolanekoll/core";
import { CsvSink } from "./csv-sink.js";
import type { RecordSink } from "./types.js";

export type SinkContext = {
  namespace: string;
  dataDir: string;
  debug?: boolean;
};

export const IMPLEMENTED_SINKS: Record<SinkKind, (context: SinkContext) => RecordSink> = {
  [SinkKind.CSV]: (context) => new CsvSink(context),
};

export function createSink(kind: SinkKind, context: SinkContext): RecordSink {
  return IMPLEMENTED_SINKS[kind](context);
}
