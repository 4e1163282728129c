// src/atlas/export_service.ts
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Writable } from "node:stream";
import { stringify } from "csv-stringify";
import { RECORD_ORDER } from "./page_fetcher.js";
import { DISPLAY_HEADER, exportValues } from "./projection.js";
import type { RecordStore } from "./store.js";
import type { QuerySnapshot } from "./types.js";

const pad = (n: number) => String(n).padStart(2, "0");

/** filtered_results_YYYY-MM-DD.csv, in local time. */
export function exportFileName(date: Date = new Date()): string {
  return `filtered_results_${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}.csv`;
}

/**
 * Stream every record matching the snapshot as CSV into `out`, in the same
 * order the pages use. Resolves to the number of data rows written; aborting
 * `signal` tears the pipeline down and rejects with an AbortError.
 */
export async function exportRecords(
  store: RecordStore,
  snapshot: QuerySnapshot,
  out: Writable,
  signal?: AbortSignal
): Promise<number> {
  const rows = store.iterate(snapshot.predicate, { orderBy: RECORD_ORDER });
  let written = 0;

  function* lines(): Generator<string[]> {
    yield [...DISPLAY_HEADER];
    for (const row of rows) {
      written++;
      yield exportValues(row);
    }
  }

  await pipeline(Readable.from(lines()), stringify(), out, { signal });
  return written;
}
