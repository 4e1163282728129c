// src/atlas/page_fetcher.ts
import { pageOffset } from "./pagination.js";
import { projectPage } from "./projection.js";
import { numericExpr } from "./query_compiler.js";
import type { RecordStore } from "./store.js";
import type { DisplayRecord, PageState, QuerySnapshot } from "./types.js";

// Curated reference database first, then the other curated resources, then predictions.
export const PRIMARY_SOURCES: readonly string[] = ["UniProt"];
export const CURATED_SOURCES: readonly string[] = ["OmniPath", "SIGNOR", "Signor", "TRRUST", "ORegAnno", "HTRIdb"];

const quote = (s: string) => `'${s.replace(/'/g, "''")}'`;

export const SOURCE_RANK =
  `(CASE WHEN Source IN (${PRIMARY_SOURCES.map(quote).join(", ")}) THEN 0` +
  ` WHEN Source IN (${CURATED_SOURCES.map(quote).join(", ")}) THEN 1 ELSE 2 END)`;

/**
 * Fixed ordering shared by the page fetcher and export: source rank, titled
 * rows before untitled ones, PMID compared as a number (non-numeric last),
 * and the unique accession as the final tie-break so pages never overlap.
 */
export const RECORD_ORDER = [
  SOURCE_RANK,
  "(Title IS NULL OR trim(Title) = '')",
  `(${numericExpr("PMID")} IS NULL)`,
  numericExpr("PMID"),
  "AC",
].join(", ");

export interface FetchedPage {
  offset: number;
  rows: DisplayRecord[];
}

export function fetchPage(store: RecordStore, snapshot: QuerySnapshot, state: PageState): FetchedPage {
  const offset = pageOffset(state);
  const rows = store.select(snapshot.predicate, {
    orderBy: RECORD_ORDER,
    limit: state.pageSize,
    offset,
  });
  return { offset, rows: projectPage(rows, offset) };
}
