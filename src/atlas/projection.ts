// src/atlas/projection.ts
import { polarityValue, resolvePolarity } from "./polarity.js";
import { describeMechanism, isNonMechanismLabel, NON_MECHANISM_DISPLAY } from "./taxonomy.js";
import type { DisplayCell, DisplayRecord, PredictionRow, StoredColumn } from "./types.js";

export const DISPLAY_COLUMNS: readonly StoredColumn[] = [
  "AC", "Protein_Name", "Gene_Name", "Protein_ID", "OS", "PMID", "UniProtKB_accessions",
  "Title", "Abstract", "Journal", "Authors", "Year", "Month", "Source", "Has_Mechanism",
  "Mechanism_Probability", "Autoregulatory_Type", "Type_Confidence", "Polarity",
];

// Character budgets for the table view; the full value always travels alongside.
export const TRUNCATE_AT: Partial<Record<StoredColumn, number>> = {
  AC: 30,
  Protein_Name: 50,
  Gene_Name: 30,
  Protein_ID: 25,
  OS: 40,
  Title: 50,
  Abstract: 50,
  Journal: 40,
  Authors: 50,
};

export const EMPTY_TEXT = "—";

const PUBMED_URL = "https://pubmed.ncbi.nlm.nih.gov/";
const UNIPROT_URL = "https://www.uniprot.org/uniprotkb/";

/** Stored names use underscores for spaces. */
export function displayName(column: string): string {
  return column.replace(/_/g, " ");
}

export const DISPLAY_HEADER: readonly string[] = DISPLAY_COLUMNS.map(displayName);

function text(v: string | number | null): string {
  if (v === null || v === undefined) return "";
  return String(v).trim();
}

export function truncateCell(value: string | number | null, max?: number): DisplayCell {
  const full = text(value);
  if (!full) return { text: EMPTY_TEXT, full: null, truncated: false };
  if (max !== undefined && full.length > max) {
    return { text: `${full.slice(0, max)}...`, full, truncated: true };
  }
  return { text: full, full, truncated: false };
}

export function firstAccession(list: string | null): string | null {
  const first = text(list).split(",")[0]?.trim();
  return first ? first : null;
}

/** Plain, untruncated values keyed by stored column; shared by the table view and export. */
function resolvedValues(row: PredictionRow): Record<string, string> {
  const out: Record<string, string> = {};
  for (const col of DISPLAY_COLUMNS) out[col] = text(row[col]);

  if (isNonMechanismLabel(row.Autoregulatory_Type)) out.Autoregulatory_Type = NON_MECHANISM_DISPLAY;
  if (out.Protein_ID.startsWith("NA_")) out.Protein_ID = "";
  out.Polarity = polarityValue(resolvePolarity(row.Polarity, row.Autoregulatory_Type)) ?? "";
  return out;
}

export function projectRow(row: PredictionRow, rowNumber: number): DisplayRecord {
  const values = resolvedValues(row);
  const cells: Record<string, DisplayCell> = {};

  for (const col of DISPLAY_COLUMNS) {
    const cell = truncateCell(values[col], TRUNCATE_AT[col]);
    cells[displayName(col)] = cell;
  }

  // Hidden placeholder IDs show blank rather than the em dash
  if (text(row.Protein_ID).startsWith("NA_")) {
    cells[displayName("Protein_ID")] = { text: "", full: null, truncated: false };
  }

  const pmid = values.PMID;
  if (/^\d+$/.test(pmid)) cells.PMID.href = `${PUBMED_URL}${pmid}`;

  const uniprot = firstAccession(row.UniProtKB_accessions);
  if (uniprot) cells[displayName("UniProtKB_accessions")].href = `${UNIPROT_URL}${encodeURIComponent(uniprot)}`;

  const polarity = resolvePolarity(row.Polarity, row.Autoregulatory_Type);
  const record: DisplayRecord = { rowNumber, cells, polarity };
  if (!isNonMechanismLabel(row.Autoregulatory_Type)) {
    const ontology = describeMechanism(values.Autoregulatory_Type);
    if (ontology) record.ontology = ontology;
  }
  return record;
}

export function projectPage(rows: PredictionRow[], offset: number): DisplayRecord[] {
  return rows.map((row, i) => projectRow(row, offset + i + 1));
}

/** One CSV line's worth of values, in DISPLAY_HEADER order. */
export function exportValues(row: PredictionRow): string[] {
  const values = resolvedValues(row);
  return DISPLAY_COLUMNS.map(col => values[col]);
}
